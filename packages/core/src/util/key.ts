import { hexDecode } from './bytes.js';
import { DecodingError, KeyFormatError } from '../errors/index.js';

export type BindkeyInput = Uint8Array | string | null | undefined;

/**
 * Normalise a bindkey given as bytes or hex. Length is not checked here;
 * a wrong-sized key is reported per payload as `InvalidKeyLength`.
 */
export function normalizeKey(k: BindkeyInput): Uint8Array | null {
  if (k === null || k === undefined) return null;
  if (k instanceof Uint8Array) return k;
  try {
    return hexDecode(k);
  } catch (err) {
    if (err instanceof DecodingError) throw new KeyFormatError('Bindkey must be a hex string');
    throw err;
  }
}
