import chalk from 'chalk';

import type { Credential } from '../config.js';
import type { CaptchaChallenge, LoginResponse, PlatformApi, SessionCredentials } from '../api/platform.js';
import { AuthError, PacerError, errorMessage } from '../errors.js';
import type { RetryPolicy } from '../retry.js';
import { type Clock, systemClock } from '../utils.js';
import { type CaptchaClassifier, isPlausibleCaptcha } from './captcha.js';
import { encryptPassword } from './cipher.js';

/**
 * 登录会话。由 AuthSessionManager 独占创建与失效，worker 只读使用。
 */
class Session implements SessionCredentials {
  #valid = true;

  constructor(
    /** 单调递增的代号，用来判断会话新旧 */
    readonly id: number,
    readonly token: string,
    readonly cookies: Readonly<Record<string, string>>,
    readonly createdAt: number,
    readonly userId?: number,
  ) {
    Object.freeze(this.cookies);
  }

  get valid() {
    return this.#valid;
  }

  expire() {
    this.#valid = false;
  }
}

type AuthSessionManagerOptions = {
  api: PlatformApi;
  credential: Credential;
  classifier: CaptchaClassifier;
  policy: RetryPolicy;
  /** 登录前使用的固定 token，登录响应未返回 system_uuid 时沿用 */
  fallbackToken?: string;
  /** 距上次探测超过该间隔时，getSession 会先探测一次；0 表示不探测 */
  probeIntervalMs?: number;
  clock?: Clock;
  onRenewed?: (session: Session) => void;
};

const CAPTCHA_MESSAGE = /验证码|校验码|captcha/i;

function asNetworkError(e: unknown, where: string): unknown {
  if (e instanceof PacerError && (e.family === 'transport' || e.family === 'protocol')) {
    return new AuthError('NetworkError', `${where}失败: ${e.message}`, { cause: e });
  }
  return e;
}

class AuthSessionManager {
  readonly #api: PlatformApi;
  readonly #credential: Credential;
  readonly #classifier: CaptchaClassifier;
  readonly #policy: RetryPolicy;
  readonly #fallbackToken: string;
  readonly #probeIntervalMs: number;
  readonly #clock: Clock;
  readonly #onRenewed: ((session: Session) => void) | undefined;

  #current: Session | null = null;
  #inflight: Promise<Session> | null = null;
  #generation = 0;
  #lastProbeAt = 0;

  constructor(options: AuthSessionManagerOptions) {
    this.#api = options.api;
    this.#credential = options.credential;
    this.#classifier = options.classifier;
    this.#policy = options.policy;
    this.#fallbackToken = options.fallbackToken ?? '';
    this.#probeIntervalMs = options.probeIntervalMs ?? 0;
    this.#clock = options.clock ?? systemClock;
    this.#onRenewed = options.onRenewed;
  }

  get current(): Session | null {
    return this.#current;
  }

  /**
   * 登录：取验证码 → 识别 → 加密密码 → 提交。
   * 验证码一次性且很快过期，识别失败或被拒时立即换一张重试（不退避），
   * 超过上限抛出 AuthError(CaptchaRejected)。
   */
  async login(credential: Credential = this.#credential): Promise<Session> {
    let cookies: Record<string, string> = {};
    let lastReason = '';

    for (let attempt = 1; ; attempt++) {
      let challenge: CaptchaChallenge;
      try {
        challenge = await this.#api.fetchCaptcha(cookies);
      } catch (e) {
        throw asNetworkError(e, '获取验证码');
      }
      cookies = challenge.cookies;

      let code = '';
      try {
        code = (await this.#classifier.classify(challenge.image)).trim();
      } catch (e) {
        console.warn(chalk.yellow(`⚠️ 验证码识别出错: ${errorMessage(e)}`));
      }

      if (isPlausibleCaptcha(code)) {
        let resp: LoginResponse;
        try {
          resp = await this.#api.login(
            {
              username: credential.username,
              password: encryptPassword(credential.password, credential.cipherKey),
              verifyCode: code,
            },
            cookies,
          );
        } catch (e) {
          throw asNetworkError(e, '登录请求');
        }

        if (resp.status === 1) {
          const session = new Session(
            ++this.#generation,
            resp.token ?? this.#fallbackToken,
            resp.cookies,
            this.#clock(),
            resp.userId,
          );
          console.log(chalk.green(`✅ 登录成功 (第 ${attempt} 次尝试, session #${session.id})`));
          return session;
        }

        if (!CAPTCHA_MESSAGE.test(resp.message)) {
          console.error(chalk.red(`❌ 登录失败: ${resp.message || `status=${resp.status}`}`));
          throw new AuthError('InvalidCredentials', `登录失败: ${resp.message || `status=${resp.status}`}`);
        }
        lastReason = resp.message;
      } else {
        lastReason = `识别结果不是 4 位数字: "${code}"`;
      }

      if (!this.#policy.shouldRetryCaptcha(attempt)) {
        throw new AuthError(
          'CaptchaRejected',
          `验证码连续 ${attempt} 次未通过: ${lastReason}`,
        );
      }
      console.warn(chalk.yellow(`⚠️ 验证码未通过 (${attempt}/${this.#policy.captchaAttempts})，立即重试: ${lastReason}`));
    }
  }

  /**
   * 轻量登录态探测
   */
  async isValid(session: Session): Promise<boolean> {
    if (!session.valid) return false;
    const { httpStatus, status } = await this.#api.loginStatus(session);
    return httpStatus === 200 && status !== 0 && status !== -1;
  }

  /**
   * 返回当前有效会话；没有则登录（与其他调用方共享同一次登录）。
   */
  async getSession(): Promise<Session> {
    const cur = this.#current;
    if (!cur?.valid) return await this.renew(cur ?? void 0);

    const now = this.#clock();
    if (this.#probeIntervalMs <= 0 || now - this.#lastProbeAt < this.#probeIntervalMs) return cur;

    // 先占位，避免多个 worker 同时探测
    this.#lastProbeAt = now;
    try {
      if (await this.isValid(cur)) return cur;
    } catch (e) {
      // 探测本身失败不代表会话失效，继续使用
      console.warn(chalk.yellow(`⚠️ 登录态探测失败，沿用当前会话: ${errorMessage(e)}`));
      return cur;
    }

    console.warn(chalk.yellow(`⚠️ 会话 #${cur.id} 已失效，重新登录`));
    return await this.renew(cur);
  }

  /**
   * 串行化的会话续期。
   * - 已有登录在进行：直接等待它的结果
   * - stale 之后已经换过新会话：直接返回新会话
   */
  renew(stale?: Session): Promise<Session> {
    const cur = this.#current;
    if (cur?.valid && cur !== stale) return Promise.resolve(cur);
    if (this.#inflight) return this.#inflight;

    cur?.expire();
    const inflight = this.login()
      .then((session) => {
        this.#current = session;
        this.#lastProbeAt = this.#clock();
        this.#onRenewed?.(session);
        return session;
      })
      .finally(() => {
        this.#inflight = null;
      });
    this.#inflight = inflight;
    return inflight;
  }

  invalidate(session: Session) {
    if (this.#current === session) session.expire();
  }
}

export { AuthSessionManager, Session };
export type { AuthSessionManagerOptions };
