type AuthErrorKind = 'InvalidCredentials' | 'CaptchaRejected' | 'NetworkError' | 'SessionExpired';
type TransportErrorKind = 'Timeout' | 'ConnectionReset' | 'UnexpectedStatus';
type ProtocolErrorKind = 'MalformedResponse' | 'RejectedByServer';
type SchedulingErrorKind = 'QueueFull' | 'ShutdownInProgress';

abstract class PacerError<K extends string = string> extends Error {
  abstract readonly family: 'auth' | 'transport' | 'protocol' | 'scheduling';

  constructor(
    readonly kind: K,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

class AuthError extends PacerError<AuthErrorKind> {
  readonly family = 'auth';
}

class TransportError extends PacerError<TransportErrorKind> {
  readonly family = 'transport';
  /** 仅 UnexpectedStatus 时有值 */
  readonly status?: number;

  constructor(
    kind: TransportErrorKind,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(kind, message, options);
    this.status = options?.status;
  }
}

class ProtocolError extends PacerError<ProtocolErrorKind> {
  readonly family = 'protocol';
  /** 服务端原始状态码，供 RetryPolicy 分类 */
  readonly code: number | null;
  readonly body?: string;

  constructor(
    kind: ProtocolErrorKind,
    message: string,
    options?: { cause?: unknown; code?: number | null; body?: string },
  ) {
    super(kind, message, options);
    this.code = options?.code ?? null;
    this.body = options?.body;
  }
}

class SchedulingError extends PacerError<SchedulingErrorKind> {
  readonly family = 'scheduling';
}

function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

export { AuthError, PacerError, ProtocolError, SchedulingError, TransportError, errorMessage };
export type { AuthErrorKind, ProtocolErrorKind, SchedulingErrorKind, TransportErrorKind };
