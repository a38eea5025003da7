import { EncodingError, DecodingError } from "../errors/index.js";

export const MAC_LENGTH = 6;

/* ------------------------------------------------------------------ */

export function concat(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out   = new Uint8Array(total);
  let offset  = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

/** Copy of `buf` with the byte order reversed. */
export function reversed(buf: Uint8Array): Uint8Array {
  return Uint8Array.from(buf).reverse();
}

/** Constant-time comparison; length mismatch returns early. */
export function equalBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) diff |= a[i] ^ b[i];
  return diff === 0;
}

/* ----------  Hex encode  ------------------------------------------ */
export function hexEncode(...chunks: Uint8Array[]): string {
  const data = concat(...chunks);
  let s = '';
  for (let i = 0; i < data.length; i++) s += data[i].toString(16).padStart(2, '0');
  return s;
}

/* ----------  Hex decode  ------------------------------------------ */
/**
 * Decode a hex string. Whitespace, `:` and `-` separators are ignored so
 * that `"A4 C1 38"`, `"a4:c1:38"` and `"a4c138"` are equivalent.
 */
export function hexDecode(hex: string): Uint8Array {
  const clean = hex.replace(/[\s:-]/g, '');
  if (!/^[0-9A-Fa-f]*$/.test(clean) || clean.length % 2 !== 0) {
    throw new DecodingError(
      `Invalid hex: length=${clean.length}, content='${clean.slice(0, 12)}…'`,
    );
  }
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

/* ----------  MAC addresses  --------------------------------------- */

/** Format 6 address bytes as `AA:BB:CC:DD:EE:FF`. */
export function toMac(addr: Uint8Array): string {
  if (addr.length !== MAC_LENGTH) {
    throw new EncodingError(`MAC address must be ${MAC_LENGTH} bytes, got ${addr.length}`);
  }
  return Array.from(addr, b => b.toString(16).padStart(2, '0').toUpperCase()).join(':');
}

/**
 * Parse a colon- or dash-delimited MAC address. Returns `null` for anything
 * else, e.g. the opaque UUID some platforms report instead of the address.
 */
export function parseAddress(address: string): Uint8Array | null {
  if (!/^([0-9A-Fa-f]{2}[:-]){5}[0-9A-Fa-f]{2}$/.test(address)) return null;
  return hexDecode(address);
}

/** Last two octets of an address (`A4:C1:38:8D:18:B2` → `18B2`). */
export function shortAddress(address: string): string {
  const parts = address.replace(/-/g, ':').split(':');
  const last  = parts[parts.length - 1];
  if (last.length === 2 && parts.length > 1) {
    return `${parts[parts.length - 2].toUpperCase()}${last.toUpperCase()}`;
  }
  return last.toUpperCase();
}
