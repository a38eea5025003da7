// packages/core/src/session/SessionState.ts

export type SessionState =
  | 'Unseen'
  | 'PlaintextObserved'
  | 'EncryptedKeyMissing'
  | 'EncryptedVerified'
  | 'EncryptedFailed';

/**
 * Inputs driving the session:
 * - `plaintext`     a plaintext frame decoded
 * - `keyMissing`    an encrypted frame arrived without a usable bindkey
 * - `decryptOk`     an encrypted frame authenticated
 * - `decryptFailed` an encrypted frame failed authentication
 * - `keyChanged`    the bindkey was replaced
 */
export type SessionEvent =
  | 'plaintext'
  | 'keyMissing'
  | 'decryptOk'
  | 'decryptFailed'
  | 'keyChanged';

const ENCRYPTED_OUTCOMES = {
  keyMissing   : 'EncryptedKeyMissing',
  decryptOk    : 'EncryptedVerified',
  decryptFailed: 'EncryptedFailed',
} as const satisfies Partial<Record<SessionEvent, SessionState>>;

/*
 * Once a device has sent an encrypted frame it stays in the encrypted
 * branch; a later plaintext frame does not reset the key status.
 * A key change drops verification until the next successful decrypt.
 */
const TRANSITIONS: Record<SessionState, Record<SessionEvent, SessionState>> = {
  Unseen: {
    plaintext : 'PlaintextObserved',
    keyChanged: 'Unseen',
    ...ENCRYPTED_OUTCOMES,
  },
  PlaintextObserved: {
    plaintext : 'PlaintextObserved',
    keyChanged: 'PlaintextObserved',
    ...ENCRYPTED_OUTCOMES,
  },
  EncryptedKeyMissing: {
    plaintext : 'EncryptedKeyMissing',
    keyChanged: 'EncryptedKeyMissing',
    ...ENCRYPTED_OUTCOMES,
  },
  EncryptedVerified: {
    plaintext : 'EncryptedVerified',
    keyChanged: 'EncryptedKeyMissing',
    ...ENCRYPTED_OUTCOMES,
  },
  EncryptedFailed: {
    plaintext : 'EncryptedFailed',
    keyChanged: 'EncryptedKeyMissing',
    ...ENCRYPTED_OUTCOMES,
  },
};

export class SessionStateMachine {
  private current: SessionState = 'Unseen';

  get state(): SessionState { return this.current; }

  /**
   * No payload has moved the session yet. Only decode outcomes and key
   * failures do; other failures leave it pending.
   */
  get pending(): boolean { return this.current === 'Unseen'; }

  get isEncrypted(): boolean {
    return this.current === 'EncryptedKeyMissing'
        || this.current === 'EncryptedVerified'
        || this.current === 'EncryptedFailed';
  }

  get bindkeyVerified(): boolean { return this.current === 'EncryptedVerified'; }

  dispatch(event: SessionEvent): SessionState {
    this.current = TRANSITIONS[this.current][event];
    return this.current;
  }
}
