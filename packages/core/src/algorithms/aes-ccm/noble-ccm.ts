import { cbc, ctr } from '@noble/ciphers/aes.js';
import { concat, equalBytes } from '../../util/bytes.js';
import type { CcmParams } from '../../providers/CryptoProvider.js';

const BLOCK = 16;
const ZERO_BLOCK = new Uint8Array(BLOCK);

/**
 * AES-CCM (NIST SP 800-38C / RFC 3610) assembled from the `@noble/ciphers`
 * AES primitives: CBC with a zero IV yields the CBC-MAC, CTR yields the
 * keystream.
 *
 * ## Framing
 * - Input/output of the sealed form is `[ ciphertext || tag(M) ]`.
 * - Nonce length `N` is 7..13 bytes; the length field takes `L = 15 - N` bytes.
 * - Tag length `M` is one of 4, 6, 8, 10, 12, 14, 16.
 *
 * @remarks
 * WebCrypto offers no CCM mode, so the browser runtime goes through this
 * implementation while Node uses its native `aes-*-ccm` ciphers.
 */
export const nobleCcm = {
  encrypt(params: CcmParams, plain: Uint8Array): Uint8Array {
    checkParams(params);
    const { key, nonce, aad, tagLength } = params;

    const mac    = cbcMac(key, nonce, aad, plain, tagLength);
    const stream = ctr(key, counterBlock(nonce)).encrypt(concat(ZERO_BLOCK, plain));
    const s0     = stream.subarray(0, BLOCK);
    const cipher = stream.subarray(BLOCK);

    return concat(cipher, xor(mac, s0.subarray(0, tagLength)));
  },

  /**
   * @throws {Error} If the sealed input is shorter than the tag or the tag
   *   does not authenticate.
   */
  decrypt(params: CcmParams, sealed: Uint8Array): Uint8Array {
    checkParams(params);
    const { key, nonce, aad, tagLength } = params;
    if (sealed.length < tagLength) throw new Error('Sealed data shorter than tag');

    const cipher = sealed.subarray(0, sealed.length - tagLength);
    const tag    = sealed.subarray(sealed.length - tagLength);

    const stream = ctr(key, counterBlock(nonce)).decrypt(concat(ZERO_BLOCK, cipher));
    const s0     = stream.subarray(0, BLOCK);
    const plain  = stream.slice(BLOCK);

    const expected = xor(cbcMac(key, nonce, aad, plain, tagLength), s0.subarray(0, tagLength));
    if (!equalBytes(expected, tag)) {
      plain.fill(0);
      throw new Error('CCM tag mismatch');
    }
    return plain;
  },
};

function checkParams({ key, nonce, tagLength }: CcmParams): void {
  if (![16, 24, 32].includes(key.length)) throw new Error(`Invalid AES key length: ${key.length}`);
  if (nonce.length < 7 || nonce.length > 13) throw new Error(`Invalid CCM nonce length: ${nonce.length}`);
  if (tagLength < 4 || tagLength > 16 || tagLength % 2 !== 0) {
    throw new Error(`Invalid CCM tag length: ${tagLength}`);
  }
}

/** A0: flags(L-1) || nonce || counter 0 */
function counterBlock(nonce: Uint8Array): Uint8Array {
  const a0 = new Uint8Array(BLOCK);
  a0[0] = 15 - nonce.length - 1;
  a0.set(nonce, 1);
  return a0;
}

function cbcMac(
  key: Uint8Array,
  nonce: Uint8Array,
  aad: Uint8Array,
  plain: Uint8Array,
  tagLength: number,
): Uint8Array {
  const q  = 15 - nonce.length;
  const b0 = new Uint8Array(BLOCK);
  b0[0] = (aad.length > 0 ? 0x40 : 0) | (((tagLength - 2) / 2) << 3) | (q - 1);
  b0.set(nonce, 1);

  let len = plain.length;
  for (let i = BLOCK - 1; i > nonce.length; i--) {
    b0[i] = len & 0xff;
    len = Math.floor(len / 256);
  }
  if (len > 0) throw new Error('Message too long for nonce length');

  const blocks = concat(b0, encodeAad(aad), padToBlock(plain));
  const out    = cbc(key, new Uint8Array(BLOCK), { disablePadding: true }).encrypt(blocks);
  return out.slice(out.length - BLOCK, out.length - BLOCK + tagLength);
}

function encodeAad(aad: Uint8Array): Uint8Array {
  if (aad.length === 0) return new Uint8Array(0);
  if (aad.length >= 0xff00) throw new Error('AAD too long');
  return padToBlock(concat(Uint8Array.of(aad.length >> 8, aad.length & 0xff), aad));
}

function padToBlock(buf: Uint8Array): Uint8Array {
  const rem = buf.length % BLOCK;
  return rem === 0 ? buf : concat(buf, new Uint8Array(BLOCK - rem));
}

function xor(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length);
  for (let i = 0; i < a.length; i++) out[i] = a[i] ^ b[i];
  return out;
}
