const DISABLE_STACKTRACE : boolean = true;

export class AtcBeaconError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

/* ------------------------------------------------------------------
   Usage errors - thrown to the caller
   ------------------------------------------------------------------ */
export class EncodingError        extends AtcBeaconError {}
export class DecodingError        extends AtcBeaconError {}
export class FormatError          extends AtcBeaconError {}
export class KeyFormatError       extends AtcBeaconError {}

/* ------------------------------------------------------------------
   Decode failures - reported in-band through DecodeResult
   ------------------------------------------------------------------ */
export type DecodeFailureReason =
  | 'UnrecognizedFormat'
  | 'IdentifierMismatch'
  | 'PlatformUnsupported'
  | 'MissingKey'
  | 'InvalidKeyLength'
  | 'DecryptionFailed';

export abstract class DecodeError extends AtcBeaconError {
  abstract readonly reason: DecodeFailureReason;
}

export class UnrecognizedFormatError extends DecodeError {
  readonly reason = 'UnrecognizedFormat' as const;
  /** `null` when the advertisement carried no service data at all. */
  constructor(readonly length: number | null) {
    super(length === null
      ? 'Advertisement carries no service data'
      : `No wire format with payload length ${length}`);
  }
}

export class IdentifierMismatchError extends DecodeError {
  readonly reason = 'IdentifierMismatch' as const;
  constructor(readonly expected: string, readonly received: string) {
    super(`MAC address doesn't match data frame. Expected: ${expected}, Got: ${received}`);
  }
}

export class PlatformUnsupportedError extends DecodeError {
  readonly reason = 'PlatformUnsupported' as const;
  constructor(firmware: string) {
    super(`Encrypted ${firmware} format needs the transport MAC address, use another advertising format`);
  }
}

export class MissingKeyError extends DecodeError {
  readonly reason = 'MissingKey' as const;
  constructor() { super('Encryption key not set and advertisement is encrypted'); }
}

export class InvalidKeyLengthError extends DecodeError {
  readonly reason = 'InvalidKeyLength' as const;
  constructor(readonly length: number) {
    super(`Encryption key should be 16 bytes (32 characters) long, got ${length} bytes`);
  }
}

export class DecryptionFailedError extends DecodeError {
  readonly reason = 'DecryptionFailed' as const;
  constructor(message = 'Decryption failed: wrong key or corrupted payload') {
    super(message);
  }
}
