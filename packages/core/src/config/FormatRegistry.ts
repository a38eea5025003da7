// packages/core/src/config/FormatRegistry.ts
import type { FormatId, WireFormat } from "../types/index.js";
import { FormatError, UnrecognizedFormatError } from "../errors/index.js";

export class FormatRegistry {
  private static readonly byLength = new Map<number, WireFormat>();

  static register(f: WireFormat): void {
    if (this.byLength.has(f.length)) throw new FormatError(`Format for length ${f.length} already registered`);
    this.byLength.set(f.length, f);
  }
  /** Dispatch by payload length. */
  static get(length: number): WireFormat {
    const f = this.byLength.get(length);
    if (!f) throw new UnrecognizedFormatError(length);
    return f;
  }
  static byId(id: FormatId): WireFormat {
    for (const f of this.byLength.values()) if (f.id === id) return f;
    throw new FormatError(`Unknown format: ${id}`);
  }
  static has(length: number): boolean { return this.byLength.has(length); }
  static list(): WireFormat[] {
    return [...this.byLength.values()].sort((a, b) => b.length - a.length);
  }
}
