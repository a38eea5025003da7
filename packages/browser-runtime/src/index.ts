import {
  AtcDecoder,
  encodePayload,
  type AtcDecoderOptions,
  type EncodeOptions,
  type FormatId,
  type FrameFields,
} from '../../core/src/index.js';
import { browserProvider } from './provider.js';

export function createDecoder(cfg?: AtcDecoderOptions): AtcDecoder {
  return new AtcDecoder(browserProvider, cfg);
}

export function encode(format: FormatId | number, fields: FrameFields, opt: EncodeOptions): Uint8Array {
  return encodePayload(browserProvider, format, fields, opt);
}

export { browserProvider } from './provider.js';
export * from '../../core/src/index.js';
