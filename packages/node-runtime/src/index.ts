// packages/node-runtime/src/index.ts
import {
  AtcDecoder,
  encodePayload,
  type AtcDecoderOptions,
  type EncodeOptions,
  type FormatId,
  type FrameFields,
} from '../../core/src/index.js';
import { nodeProvider } from './provider.js';

export function createDecoder(cfg?: AtcDecoderOptions): AtcDecoder {
  return new AtcDecoder(nodeProvider, cfg);
}

export function encode(format: FormatId | number, fields: FrameFields, opt: EncodeOptions): Uint8Array {
  return encodePayload(nodeProvider, format, fields, opt);
}

export { nodeProvider } from './provider.js';
export * from '../../core/src/index.js';
