/** Broker unreachable or CONNECT refused. Retried, never fatal. */
export class ConnectionError extends Error {
  readonly code = 'connection_error';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export type DecodeReason =
  | 'unrecognized_topic'
  | 'empty_payload'
  | 'malformed_payload'
  | 'unsupported_version'
  | 'missing_device_id'
  | 'invalid_timestamp';

/** The message can never be decoded; it is acked and dropped. */
export class DecodeError extends Error {
  readonly code = 'decode_error';

  constructor(readonly reason: DecodeReason, readonly topic: string, detail?: string) {
    super(detail ? `${reason}: ${detail}` : reason);
    this.name = 'DecodeError';
  }
}

export type ForwardErrorKind = 'transient' | 'permanent';

export class ForwardError extends Error {
  readonly code = 'forward_error';

  constructor(
    readonly kind: ForwardErrorKind,
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ForwardError';
  }
}

/** SQLite refused the write; the broker message must not be acked. */
export class StorageError extends Error {
  readonly code = 'storage_error';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class QueueFullError extends Error {
  readonly code = 'queue_full';

  constructor(readonly capacity: number) {
    super(`queue holds ${capacity} records`);
    this.name = 'QueueFullError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
