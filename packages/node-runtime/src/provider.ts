import { createCipheriv, createDecipheriv, type CipherCCMTypes } from 'node:crypto';
import type { CcmParams, CryptoProvider } from '../../core/src/providers/CryptoProvider.js';

function ccmAlgorithm(key: Uint8Array): CipherCCMTypes {
  switch (key.length) {
    case 16: return 'aes-128-ccm';
    case 24: return 'aes-192-ccm';
    case 32: return 'aes-256-ccm';
    default: throw new RangeError(`Invalid AES key length: ${key.length}`);
  }
}

export const nodeProvider: CryptoProvider = {
  ccmEncrypt({ key, nonce, aad, tagLength }: CcmParams, plain: Uint8Array): Uint8Array {
    const cipher = createCipheriv(ccmAlgorithm(key), key, nonce, { authTagLength: tagLength });
    cipher.setAAD(aad, { plaintextLength: plain.length });
    const body = Buffer.concat([cipher.update(plain), cipher.final()]);
    return new Uint8Array(Buffer.concat([body, cipher.getAuthTag()]));
  },

  ccmDecrypt({ key, nonce, aad, tagLength }: CcmParams, sealed: Uint8Array): Uint8Array {
    if (sealed.length < tagLength) throw new Error('Sealed data shorter than tag');
    const decipher = createDecipheriv(ccmAlgorithm(key), key, nonce, { authTagLength: tagLength });
    decipher.setAuthTag(sealed.subarray(sealed.length - tagLength));
    const cipher = sealed.subarray(0, sealed.length - tagLength);
    decipher.setAAD(aad, { plaintextLength: cipher.length });
    const plain = decipher.update(cipher);
    // CCM reports a bad tag from final()
    decipher.final();
    return new Uint8Array(plain);
  },
};
