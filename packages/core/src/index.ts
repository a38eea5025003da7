// packages/core/src/index.ts

import './config/formats.js';

import type { CryptoProvider }    from './providers/CryptoProvider.js';
import { FormatRegistry }         from './config/FormatRegistry.js';
import { MANUFACTURER, MODEL, SENSOR_LIBRARY } from './config/formats.js';
import { AtcCcmCipher }           from './algorithms/aes-ccm/AtcCcmCipher.js';
import { SessionStateMachine, type SessionState } from './session/SessionState.js';
import {
  hexEncode,
  parseAddress,
  shortAddress,
  toMac,
  MAC_LENGTH,
} from './util/bytes.js';
import { normalizeKey, type BindkeyInput } from './util/key.js';
import {
  createLogger,
  LogLevel,
  type Verbosity,
  type Logger,
} from './util/logger.js';
import {
  DecodeError,
  UnrecognizedFormatError,
} from './errors/index.js';
import type {
  DecodeContext,
  DecodeResult,
  Frame,
  Measurements,
  SensorDescription,
  SensorUpdate,
  ServiceInfo,
  WireFormat,
} from './types/index.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring an AtcDecoder session.
 */
export interface AtcDecoderOptions {
  /** 16-byte bindkey as bytes or 32 hex characters */
  bindkey?                        : BindkeyInput;
  /**
   * Whether `ServiceInfo.address` is the sender's real MAC. Set to false on
   * platforms that hand out opaque identifiers instead (e.g. CoreBluetooth).
   */
  identifierTrustedFromTransport? : boolean;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?                        : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?                         : (msg: string) => void;
}

/**
 * Per-device decoding session for ATC firmware advertisements.
 *
 * Feed every advertisement of one device to {@link update}. Failures are
 * returned, never thrown, and only ever touch the key/verification state.
 */
export class AtcDecoder {
  private readonly cipher         : AtcCcmCipher;
  private readonly session        = new SessionStateMachine();
  private readonly trustTransport : boolean;

  private knownMac : Uint8Array | null = null;
  private lastInfo : ServiceInfo | null = null;

  // — diagnostics ------------------------------------------------------------
  private readonly log : Logger;

  /**
   * @param provider - AES-CCM implementation of the runtime
   * @param opt - Bindkey, platform capability and logging options
   */
  constructor(
    provider: CryptoProvider,
    opt: AtcDecoderOptions = {},
  ) {
    this.cipher         = new AtcCcmCipher(provider);
    this.cipher.setKey(normalizeKey(opt.bindkey));
    this.trustTransport = opt.identifierTrustedFromTransport ?? true;
    this.log            = createLogger(opt.verbose ?? 0, opt.logger);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Informational helpers
  // ════════════════════════════════════════════════════════════════════════

  /** Wire format a payload would be decoded as, or null for unknown lengths. */
  static identify(payload: Uint8Array): WireFormat | null {
    return FormatRegistry.has(payload.length) ? FormatRegistry.get(payload.length) : null;
  }

  static isSupportedPayload(payload: Uint8Array): boolean {
    return FormatRegistry.has(payload.length);
  }

  get state(): SessionState            { return this.session.state; }
  /**
   * True while the session is `Unseen`: until a recognised payload decodes
   * or fails on its key. Identifier mismatches and platform-unsupported
   * frames leave it pending, as do payloads of unknown length.
   */
  get pending(): boolean               { return this.session.pending; }
  get isEncrypted(): boolean           { return this.session.isEncrypted; }
  get bindkeyVerified(): boolean       { return this.session.bindkeyVerified; }

  /** Whether the sender's real MAC is known (always on MAC-reporting platforms). */
  get macKnown(): boolean              { return this.trustTransport || this.knownMac !== null; }
  /** Real MAC of the sender once a payload has been decoded. */
  get mac(): string | null             { return this.knownMac ? toMac(this.knownMac) : null; }

  /** Last advertisement that decoded successfully. */
  get lastServiceInfo(): ServiceInfo | null { return this.lastInfo; }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Setters / getters for run-time flexibility
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Replace the bindkey and re-run the last successful advertisement.
   * @returns The reprocessed result, or null when nothing was cached
   * @throws {KeyFormatError} If a string key is not hex
   */
  setBindkey(k: BindkeyInput): DecodeResult | null {
    this.cipher.setKey(normalizeKey(k));
    this.session.dispatch('keyChanged');
    this.log.log(LogLevel.debug, 'Bindkey replaced');
    return this.lastInfo ? this.update(this.lastInfo) : null;
  }

  /** Adjust verbosity level of internal logger at runtime. */
  setVerbose(level: Verbosity): void         { this.log.level = level; }
  /** Get the current logger verbosity setting. */
  getVerbose(): Verbosity                    { return this.log.level; }

  // ════════════════════════════════════════════════════════════════════════
  //  Decoding
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Decode every service-data entry of an advertisement.
   *
   * @returns The last successful update. Without one, the last failure of a
   *   recognised format, so that key problems are not hidden behind entries
   *   of unknown length.
   */
  update(info: ServiceInfo): DecodeResult {
    this.log.log(LogLevel.trace, `Parsing ATC BLE advertisement from ${info.address}`);

    let result: DecodeResult | null = null;
    for (const payload of Object.values(info.serviceData)) {
      const r = this.decodePayload(payload, info);
      if (r.ok) {
        this.lastInfo = info;
        result = r;
      } else if (!result || (!result.ok && outranks(r.error, result.error))) {
        result = r;
      }
    }
    return result ?? { ok: false, error: new UnrecognizedFormatError(null) };
  }

  /**
   * Decode one service-data payload in the context of its advertisement.
   */
  decodePayload(payload: Uint8Array, info: ServiceInfo): DecodeResult {
    if (!FormatRegistry.has(payload.length)) {
      const error = new UnrecognizedFormatError(payload.length);
      this.log.log(LogLevel.debug, error.message);
      return { ok: false, error };
    }
    const desc = FormatRegistry.get(payload.length);
    const ctx  = this.contextFor(info.address);

    try {
      const frame = desc.decode(payload, ctx);
      this.session.dispatch(desc.encrypted ? 'decryptOk' : 'plaintext');
      this.knownMac = frame.mac;
      this.log.log(LogLevel.trace, `Decoded ${desc.firmware} frame from ${toMac(frame.mac)}`);
      return { ok: true, update: this.buildUpdate(desc, frame, info) };
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      this.recordFailure(err, desc, payload, ctx);
      return { ok: false, error: err };
    }
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Helpers
  // ════════════════════════════════════════════════════════════════════════

  private contextFor(address: string): DecodeContext {
    let transportMac = parseAddress(address);
    if (!transportMac) {
      if (this.trustTransport) this.log.log(LogLevel.debug, `Address ${address} is not a MAC address`);
      transportMac = new Uint8Array(MAC_LENGTH);
    }
    return { transportMac, trustTransport: this.trustTransport, cipher: this.cipher };
  }

  private recordFailure(
    err: DecodeError,
    desc: WireFormat,
    payload: Uint8Array,
    ctx: DecodeContext,
  ): void {
    switch (err.reason) {
      case 'MissingKey':
        this.session.dispatch('keyMissing');
        this.log.log(LogLevel.debug, err.message);
        break;
      case 'InvalidKeyLength':
        this.session.dispatch('keyMissing');
        this.log.log(LogLevel.error, err.message);
        break;
      case 'DecryptionFailed': {
        this.session.dispatch('decryptFailed');
        this.log.log(LogLevel.warn, `${err.message} (${desc.firmware})`);
        const nonce = AtcCcmCipher.buildNonce(ctx.transportMac, payload.length, payload[0]);
        this.log.log(LogLevel.trace, `token: ${hexEncode(payload.subarray(payload.length - AtcCcmCipher.TAG_LENGTH))}`);
        this.log.log(LogLevel.trace, `nonce: ${hexEncode(nonce)}`);
        this.log.log(LogLevel.trace, `encrypted_payload: ${hexEncode(payload.subarray(1, payload.length - AtcCcmCipher.TAG_LENGTH))}`);
        break;
      }
      case 'PlatformUnsupported':
        this.log.log(LogLevel.warn, err.message);
        break;
      default:
        this.log.log(LogLevel.debug, err.message);
    }
  }

  private buildUpdate(desc: WireFormat, frame: Frame, info: ServiceInfo): SensorUpdate {
    const name  = info.name ?? `ATC ${shortAddress(info.address)}`;
    const title = `${name} (${info.address})`;

    const measurements: Measurements = {};
    const descriptions: Partial<Record<keyof Measurements, SensorDescription>> = {};
    for (const kind of desc.reports) {
      const value = frame[kind];
      if (value === undefined) continue;
      measurements[kind] = value;
      descriptions[kind] = SENSOR_LIBRARY[kind];
    }
    measurements.signal_strength = info.rssi;
    descriptions.signal_strength = SENSOR_LIBRARY.signal_strength;

    return {
      title,
      firmware: desc.firmware,
      device: {
        name        : title,
        manufacturer: MANUFACTURER,
        model       : MODEL,
        swVersion   : desc.firmware,
      },
      measurements,
      descriptions,
    };
  }
}

/** A failure on a recognised format beats one on an unknown length; ties go to the later one. */
function outranks(next: DecodeError, current: DecodeError): boolean {
  return next.reason !== 'UnrecognizedFormat' || current.reason === 'UnrecognizedFormat';
}

/** Summary of the registered wire formats, longest first. */
export function describeFormats(): Array<Pick<WireFormat, 'id' | 'length' | 'layout' | 'encrypted' | 'firmware'>> {
  return FormatRegistry.list().map(({ id, length, layout, encrypted, firmware }) => (
    { id, length, layout, encrypted, firmware }
  ));
}

export { FormatRegistry } from './config/FormatRegistry.js';
export { AtcCcmCipher } from './algorithms/aes-ccm/AtcCcmCipher.js';
export { nobleCcm } from './algorithms/aes-ccm/noble-ccm.js';
export { encodePayload, type EncodeOptions } from './frame/encoder.js';
export { hexDecode, hexEncode, parseAddress, shortAddress, toMac } from './util/bytes.js';
export { createLogger, isVerbosity, type Logger, type Verbosity } from './util/logger.js';
export type { SessionState, SessionEvent } from './session/SessionState.js';
export type { CryptoProvider, CcmParams } from './providers/CryptoProvider.js';
export type { BindkeyInput } from './util/key.js';
export * from './errors/index.js';
export type * from './types/index.js';
