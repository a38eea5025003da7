// packages/browser-runtime/src/provider.ts
import type { CryptoProvider } from "../../core/src/providers/CryptoProvider.js";
import { nobleCcm } from "../../core/src/algorithms/aes-ccm/noble-ccm.js";

/**
 * AES-CCM for browsers. WebCrypto has no CCM mode, so this goes through the
 * `@noble/ciphers` AES primitives.
 */
export const browserProvider: CryptoProvider = {
  ccmEncrypt: (params, plain) => nobleCcm.encrypt(params, plain),
  ccmDecrypt: (params, sealed) => nobleCcm.decrypt(params, sealed),
};
