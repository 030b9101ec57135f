import { AuthError, PacerError, ProtocolError, SchedulingError, TransportError } from './errors.js';

type ErrorClass = 'Transient' | 'AuthExpired' | 'Permanent';

type RetryPolicyOptions = {
  /** 连续失败上限 K */
  maxAttempts: number;
  /** 验证码紧凑重试上限（不退避） */
  captchaAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
  /** 表示会话失效的服务端状态码 */
  authExpiredCodes?: readonly number[];
  /** 可重试的服务端状态码 */
  transientCodes?: readonly number[];
  random?: () => number;
};

const AUTH_EXPIRED_HTTP = new Set([302, 401]);
const PERMANENT_HTTP = new Set([400, 404, 405, 422]);

class RetryPolicy {
  readonly maxAttempts: number;
  readonly captchaAttempts: number;
  readonly #baseDelayMs: number;
  readonly #maxDelayMs: number;
  readonly #jitterMs: number;
  readonly #authExpiredCodes: ReadonlySet<number>;
  readonly #transientCodes: ReadonlySet<number>;
  readonly #random: () => number;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.captchaAttempts = Math.max(1, Math.floor(options.captchaAttempts));
    this.#baseDelayMs = Math.max(0, options.baseDelayMs);
    this.#maxDelayMs = Math.max(0, options.maxDelayMs);
    this.#jitterMs = Math.max(0, options.jitterMs);
    this.#authExpiredCodes = new Set(options.authExpiredCodes ?? [-1]);
    this.#transientCodes = new Set(options.transientCodes ?? [500, 502, 503, 504]);
    this.#random = options.random ?? Math.random;
  }

  /**
   * backoff(attempt) = min(maxDelay, base * 2^attempt + jitter)
   * attempt 从 0 开始。抖动不超过 base * 2^attempt 且封顶包含抖动，延迟不会随次数变小。
   */
  backoff(attempt: number): number {
    const exp = this.#baseDelayMs * 2 ** Math.max(0, attempt);
    const jitter = Math.floor(this.#random() * Math.min(this.#jitterMs, exp));
    return Math.min(this.#maxDelayMs, exp + jitter);
  }

  /** attempts 为已发生的连续失败次数 */
  shouldRetry(attempts: number): boolean {
    return attempts < this.maxAttempts;
  }

  shouldRetryCaptcha(attempts: number): boolean {
    return attempts < this.captchaAttempts;
  }

  classify(error: unknown): ErrorClass {
    if (!(error instanceof PacerError)) return 'Permanent';

    if (error instanceof TransportError) {
      if (error.kind !== 'UnexpectedStatus') return 'Transient';
      const status = error.status ?? 0;
      if (AUTH_EXPIRED_HTTP.has(status)) return 'AuthExpired';
      if (PERMANENT_HTTP.has(status)) return 'Permanent';
      return 'Transient';
    }

    if (error instanceof AuthError) {
      switch (error.kind) {
        case 'SessionExpired':
          return 'AuthExpired';
        case 'NetworkError':
        case 'CaptchaRejected':
          return 'Transient';
        case 'InvalidCredentials':
          return 'Permanent';
      }
    }

    if (error instanceof ProtocolError) {
      if (error.kind === 'MalformedResponse') return 'Transient';
      const code = error.code;
      if (code !== null && this.#authExpiredCodes.has(code)) return 'AuthExpired';
      if (code !== null && this.#transientCodes.has(code)) return 'Transient';
      // 未识别的拒绝码可能是平台策略变化，不盲目重试
      return 'Permanent';
    }

    if (error instanceof SchedulingError) return 'Permanent';

    return 'Permanent';
  }
}

export { RetryPolicy };
export type { ErrorClass, RetryPolicyOptions };
