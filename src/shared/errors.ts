/**
 * @file    shared/errors.ts
 * @purpose Error taxonomy for capture, navigation and replication failures.
 * @depends None (leaf module)
 */

export enum CaptureErrorKind {
  TransientNetwork = 'transient_network',
  Unauthorized     = 'unauthorized',
  NotFound         = 'not_found',
  InvalidRequest   = 'invalid_request',
  ServerError      = 'server_error',
}

export class CaptureError extends Error {
  readonly kind: CaptureErrorKind;
  readonly status: number | null;
  readonly detail: string | null;

  constructor(
    kind: CaptureErrorKind,
    message: string,
    options: { status?: number; detail?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'CaptureError';
    this.kind = kind;
    this.status = options.status ?? null;
    this.detail = options.detail ?? null;
  }

  /** Map an HTTP status (and optional server detail) onto the taxonomy */
  static fromStatus(status: number, detail?: string): CaptureError {
    const message = detail
      ? `Server returned status ${status}: ${detail}`
      : `Server returned status ${status}`;

    if (status === 401 || status === 403) {
      return new CaptureError(CaptureErrorKind.Unauthorized, message, { status, detail });
    }
    if (status === 404) {
      return new CaptureError(CaptureErrorKind.NotFound, message, { status, detail });
    }
    if (status === 400 || status === 422) {
      return new CaptureError(CaptureErrorKind.InvalidRequest, message, { status, detail });
    }
    return new CaptureError(CaptureErrorKind.ServerError, message, { status, detail });
  }

  static network(cause: unknown): CaptureError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new CaptureError(
      CaptureErrorKind.TransientNetwork,
      `Network error: ${reason}`,
      { cause },
    );
  }
}

/** Anything that is not already a CaptureError counts as a network failure */
export function toCaptureError(err: unknown): CaptureError {
  return err instanceof CaptureError ? err : CaptureError.network(err);
}

/**
 * Failures that mean the path to the server is down (or refuses us), as
 * opposed to the server answering that a target does not exist.
 */
export function isConnectivityError(err: CaptureError): boolean {
  switch (err.kind) {
    case CaptureErrorKind.TransientNetwork:
    case CaptureErrorKind.Unauthorized:
      return true;
    case CaptureErrorKind.ServerError:
      return err.status !== null && err.status >= 502 && err.status <= 504;
    default:
      return false;
  }
}
