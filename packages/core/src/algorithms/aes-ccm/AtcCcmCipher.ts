import type { CryptoProvider, CcmParams } from '../../providers/CryptoProvider.js';
import {
  DecryptionFailedError,
  InvalidKeyLengthError,
  MissingKeyError,
} from '../../errors/index.js';
import { concat, MAC_LENGTH, reversed } from '../../util/bytes.js';

/**
 * AES-CCM as used by the encrypted ATC advertisement formats.
 *
 * ## Framing
 * - Payload: `[ subtype(1) | ciphertext | tag(4) ]`.
 * - Nonce (11 bytes): `reversed MAC(6) | payloadLength + 3 (1) | 16 1A 18 (3) | subtype(1)`.
 *   The length byte counts the AD header around the service data as it
 *   appears in the air frame.
 * - AAD: the single byte `0x11`.
 *
 * ## Key handling
 * - The bindkey is copied on {@link setKey} and overwritten by {@link zeroKey}.
 * - Key presence and length are checked per payload, so a session can hold a
 *   bad key and keep running.
 */
export class AtcCcmCipher {
  /** CCM nonce length in bytes. */
  public static readonly NONCE_LENGTH = 11;

  /** CCM tag length in bytes (reduced, non-default). */
  public static readonly TAG_LENGTH = 4;

  /** Required bindkey length in bytes. */
  public static readonly KEY_LENGTH = 16;

  /** Bytes framing the ciphertext: subtype in front, tag behind. */
  public static readonly OVERHEAD = 1 + AtcCcmCipher.TAG_LENGTH;

  /** Environmental sensing service class, as it appears in the frame. */
  public static readonly SERVICE_TAG = Uint8Array.of(0x16, 0x1a, 0x18);

  public static readonly AAD = Uint8Array.of(0x11);

  private key: Uint8Array | null = null;

  constructor(private readonly p: CryptoProvider) {}

  /** Replace the bindkey. `null` clears it. */
  public setKey(k: Uint8Array | null): void {
    this.zeroKey();
    this.key = k ? Uint8Array.from(k) : null;
  }

  public zeroKey(): void {
    if (this.key) this.key.fill(0);
    this.key = null;
  }

  public get hasKey(): boolean { return this.key !== null; }

  static buildNonce(mac: Uint8Array, payloadLength: number, subtype: number): Uint8Array {
    if (mac.length !== MAC_LENGTH) throw new RangeError(`MAC must be ${MAC_LENGTH} bytes`);
    return concat(
      reversed(mac),
      Uint8Array.of((payloadLength + 3) & 0xff),
      AtcCcmCipher.SERVICE_TAG,
      Uint8Array.of(subtype & 0xff),
    );
  }

  /**
   * Authenticate and decrypt an encrypted advertisement payload.
   *
   * @param payload - Full service-data payload (subtype, ciphertext, tag).
   * @param mac - True MAC address of the sender in natural byte order.
   * @returns The verified plaintext.
   * @throws {MissingKeyError} If no bindkey is configured.
   * @throws {InvalidKeyLengthError} If the bindkey is not 16 bytes.
   * @throws {DecryptionFailedError} If the payload is too short or the tag does not verify.
   */
  public decryptPayload(payload: Uint8Array, mac: Uint8Array): Uint8Array {
    const params = this.params(mac, payload.length, payload[0] ?? 0);
    if (payload.length < AtcCcmCipher.OVERHEAD) {
      throw new DecryptionFailedError('Invalid payload: too short for subtype and tag.');
    }
    try {
      return this.p.ccmDecrypt(params, payload.subarray(1));
    } catch {
      throw new DecryptionFailedError();
    }
  }

  /**
   * Encrypt `plain` into a full advertisement payload.
   *
   * @param subtype - Leading byte; doubles as the per-packet nonce input.
   * @throws {MissingKeyError} If no bindkey is configured.
   * @throws {InvalidKeyLengthError} If the bindkey is not 16 bytes.
   */
  public encryptPayload(plain: Uint8Array, subtype: number, mac: Uint8Array): Uint8Array {
    const payloadLength = plain.length + AtcCcmCipher.OVERHEAD;
    const params = this.params(mac, payloadLength, subtype);
    return concat(Uint8Array.of(subtype & 0xff), this.p.ccmEncrypt(params, plain));
  }

  private params(mac: Uint8Array, payloadLength: number, subtype: number): CcmParams {
    return {
      key      : this.requireKey(),
      nonce    : AtcCcmCipher.buildNonce(mac, payloadLength, subtype),
      aad      : AtcCcmCipher.AAD,
      tagLength: AtcCcmCipher.TAG_LENGTH,
    };
  }

  private requireKey(): Uint8Array {
    if (!this.key) throw new MissingKeyError();
    if (this.key.length !== AtcCcmCipher.KEY_LENGTH) throw new InvalidKeyLengthError(this.key.length);
    return this.key;
  }
}
