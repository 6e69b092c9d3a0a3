/** Why a datagram could not be turned into an OSC message. */
export type DecodeErrorKind = 'malformed' | 'unsupported';

/**
 * Per-packet decode failure. Returned from the decoder rather than thrown so
 * the listener can count and drop it.
 */
export class DecodeError extends Error {
  public readonly kind: DecodeErrorKind;
  /** Byte offset at which decoding stopped. */
  public readonly offset: number;

  constructor(kind: DecodeErrorKind, message: string, offset: number) {
    super(message);
    this.name = 'DecodeError';
    this.kind = kind;
    this.offset = offset;
  }
}

/** Socket could not be bound. Fatal, never retried. */
export class StartupError extends Error {
  public readonly code: string | undefined;
  public readonly host: string;
  public readonly port: number;

  constructor(params: { host: string; port: number; cause: unknown }) {
    const code = errnoCode(params.cause);
    const reason = params.cause instanceof Error ? params.cause.message : String(params.cause);
    super(`failed to bind OSC socket on ${params.host}:${params.port}: ${reason}`, {
      cause: params.cause,
    });
    this.name = 'StartupError';
    this.code = code;
    this.host = params.host;
    this.port = params.port;
  }
}

function errnoCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}
