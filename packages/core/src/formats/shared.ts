import type { DecodeContext } from '../types/index.js';
import {
  DecryptionFailedError,
  EncodingError,
  IdentifierMismatchError,
  PlatformUnsupportedError,
} from '../errors/index.js';
import { equalBytes, toMac } from '../util/bytes.js';

export function viewOf(buf: Uint8Array): DataView {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
}

/**
 * Pick the true sender MAC for a plaintext frame carrying `claimed`.
 * Without a transport MAC the claim is taken as-is; otherwise both must match.
 */
export function reconcileMac(claimed: Uint8Array, ctx: DecodeContext): Uint8Array {
  if (!ctx.trustTransport) return claimed;
  if (!equalBytes(claimed, ctx.transportMac)) {
    throw new IdentifierMismatchError(toMac(claimed), toMac(ctx.transportMac));
  }
  return ctx.transportMac;
}

/** Decrypt an encrypted frame that carries no MAC of its own. */
export function decryptFrame(
  payload: Uint8Array,
  ctx: DecodeContext,
  firmware: string,
  plainLength: number,
): Uint8Array {
  if (!ctx.trustTransport) throw new PlatformUnsupportedError(firmware);
  const plain = ctx.cipher.decryptPayload(payload, ctx.transportMac);
  if (plain.length !== plainLength) {
    throw new DecryptionFailedError(`Decrypted payload has ${plain.length} bytes, expected ${plainLength}`);
  }
  return plain;
}

/** Scale a physical value to its raw integer and range-check it. */
export function toRaw(
  field: string,
  value: number,
  scale: number,
  min: number,
  max: number,
): number {
  const raw = Math.round(value * scale);
  if (!Number.isFinite(raw) || raw < min || raw > max) {
    throw new EncodingError(`${field} out of range: ${value}`);
  }
  return raw;
}

export function requireField(field: string, value: number | undefined): number {
  if (value === undefined) throw new EncodingError(`${field} is required for this format`);
  return value;
}
