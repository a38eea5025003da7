// packages/core/src/frame/encoder.ts
import '../config/formats.js';
import { FormatRegistry } from '../config/FormatRegistry.js';
import { AtcCcmCipher } from '../algorithms/aes-ccm/AtcCcmCipher.js';
import { EncodingError } from '../errors/index.js';
import { parseAddress } from '../util/bytes.js';
import { normalizeKey, type BindkeyInput } from '../util/key.js';
import type { CryptoProvider } from '../providers/CryptoProvider.js';
import type { FormatId, FrameFields } from '../types/index.js';

export interface EncodeOptions {
  /** Sender MAC, `AA:BB:CC:DD:EE:FF`. */
  address  : string;
  /** Required for the encrypted formats. */
  bindkey? : BindkeyInput;
}

/**
 * Build the service-data payload a sensor would broadcast for `fields`.
 * Encrypted formats use `fields.counter` as the subtype/nonce byte.
 *
 * @throws {EncodingError} On a non-MAC address or out-of-range field.
 * @throws {MissingKeyError | InvalidKeyLengthError} For encrypted formats without a usable key.
 */
export function encodePayload(
  provider: CryptoProvider,
  format: FormatId | number,
  fields: FrameFields,
  opt: EncodeOptions,
): Uint8Array {
  const desc = typeof format === 'number' ? FormatRegistry.get(format) : FormatRegistry.byId(format);

  const mac = parseAddress(opt.address);
  if (!mac) throw new EncodingError(`Not a MAC address: ${opt.address}`);

  const cipher = new AtcCcmCipher(provider);
  cipher.setKey(normalizeKey(opt.bindkey));
  try {
    return desc.encode(fields, { mac, cipher });
  } finally {
    cipher.zeroKey();
  }
}
