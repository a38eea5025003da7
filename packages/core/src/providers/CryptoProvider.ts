export interface CcmParams {
  key       : Uint8Array;
  nonce     : Uint8Array;
  aad       : Uint8Array;
  tagLength : number;
}

/**
 * AES-CCM primitive supplied by the runtime package.
 *
 * `ccmEncrypt` returns `ciphertext || tag`; `ccmDecrypt` takes the same
 * framing and throws when the tag does not authenticate.
 */
export interface CryptoProvider {
  ccmEncrypt(params: CcmParams, plain: Uint8Array): Uint8Array;
  ccmDecrypt(params: CcmParams, sealed: Uint8Array): Uint8Array;
}
