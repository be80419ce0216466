// Relay Errors - One class per failure scope

export type RelayErrorKind = 'startup' | 'local-stream' | 'transport-send' | 'transport-receive';

export class RelayError extends Error {
  readonly kind: RelayErrorKind;

  constructor(kind: RelayErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RelayError';
    this.kind = kind;
  }
}

/** Missing argument, bad config or failed initial connection. Fatal to the process. */
export class StartupError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('startup', message, options);
    this.name = 'StartupError';
  }
}

/** Reading stdin or writing stdout failed. Ends only the owning task. */
export class LocalStreamError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('local-stream', message, options);
    this.name = 'LocalStreamError';
  }
}

export class TransportSendError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transport-send', message, options);
    this.name = 'TransportSendError';
  }
}

export class TransportReceiveError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transport-receive', message, options);
    this.name = 'TransportReceiveError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
