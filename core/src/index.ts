import chalk from 'chalk';

import type { AppConfig } from './config.js';
import AICaptchaModel from './ai/CaptchaModel.js';
import { AxiosTransport, type HttpTransport } from './api/axiosInstance.js';
import { PlatformApi } from './api/platform.js';
import type { CaptchaClassifier } from './auth/captcha.js';
import { AuthSessionManager, type Session } from './auth/session.js';
import { type VerificationResult, discoverCourses, verifyCompletion } from './course/discovery.js';
import { type CourseRegistry, JsonFileCourseRegistry } from './course/registry.js';
import type { Course } from './course/types.js';
import { errorMessage } from './errors.js';
import { ProgressEmitter, type RunnerProgressEvent } from './events.js';
import { RetryPolicy } from './retry.js';
import ConcurrentScheduler, { type RunSummary } from './scheduler/scheduler.js';
import type { Clock } from './utils.js';

/** 调度结果加上与平台核对完成情况的结果 */
type PacerSummary = RunSummary & VerificationResult;

/** 可替换的外部依赖，测试时注入进程内实现 */
type PacerDeps = {
  transport?: HttpTransport;
  classifier?: CaptchaClassifier;
  registry?: CourseRegistry;
  random?: () => number;
  clock?: Clock;
};

class PacerRunner {
  readonly #config: AppConfig;
  readonly #api: PlatformApi;
  readonly #auth: AuthSessionManager;
  readonly #registry: CourseRegistry;
  readonly #scheduler: ConcurrentScheduler;
  readonly #emitter = new ProgressEmitter();
  #stopRequested = false;

  constructor(config: AppConfig, deps: PacerDeps = {}) {
    this.#config = config;

    const classifier = deps.classifier ?? AICaptchaModel.init(config);
    if (!classifier) {
      throw new Error('没有可用的验证码识别器，请配置 _API/_KEY/_MODEL');
    }

    const transport =
      deps.transport ??
      new AxiosTransport({
        baseUrl: config.baseUrl,
        timeoutMs: config.requestTimeoutMs,
        proxy: config.proxy,
      });
    this.#api = new PlatformApi(transport, config);

    const policy = new RetryPolicy({ ...config.retry, random: deps.random });

    this.#auth = new AuthSessionManager({
      api: this.#api,
      credential: config.credential,
      classifier,
      policy,
      fallbackToken: config.authToken,
      probeIntervalMs: config.session.probeIntervalMs,
      clock: deps.clock,
      onRenewed: (session) =>
        this.#emitter.emit({ kind: 'sessionRenewed', sessionId: session.id, ts: Date.now() }),
    });

    this.#registry = deps.registry ?? new JsonFileCourseRegistry(config.registryPath);

    this.#scheduler = new ConcurrentScheduler({
      api: this.#api,
      auth: this.#auth,
      policy,
      registry: this.#registry,
      ...config.scheduler,
      clock: deps.clock,
      emitter: this.#emitter,
    });
  }

  onProgress(listener: (e: RunnerProgressEvent) => void) {
    return this.#emitter.on(listener);
  }

  /** 登录并拉取待学习课程 */
  async discover(): Promise<Course[]> {
    const session = await this.#auth.getSession();
    return await discoverCourses(this.#api, session, {
      sco: this.#config.sco,
      registry: this.#registry,
    });
  }

  async start(): Promise<PacerSummary> {
    const courses = await this.discover();
    if (this.#stopRequested) this.#scheduler.stop();
    const summary = await this.#scheduler.run(courses);
    // 被中断时尽快退出，不再核对
    if (summary.stopped) return { ...summary, verified: false, unconfirmed: [] };
    return { ...summary, ...(await this.verify(summary.done)) };
  }

  async verify(done: Course[]): Promise<VerificationResult> {
    if (done.length === 0) return { verified: true, unconfirmed: [] };
    let session: Session;
    try {
      session = await this.#auth.getSession();
    } catch (e) {
      console.warn(chalk.yellow(`⚠️ 无法登录平台核对完成情况: ${errorMessage(e)}`));
      return { verified: false, unconfirmed: [] };
    }
    return await verifyCompletion(this.#api, session, done, this.#registry);
  }

  stop() {
    this.#stopRequested = true;
    this.#scheduler.stop();
  }

  pause(courseId: number) {
    return this.#scheduler.pause(courseId);
  }

  resume(courseId: number) {
    return this.#scheduler.resume(courseId);
  }

  seek(courseId: number, location: number) {
    return this.#scheduler.seek(courseId, location);
  }
}

export const pacer = {
  create(config: AppConfig, deps?: PacerDeps) {
    const runner = new PacerRunner(config, deps);
    return {
      onProgress(listener: (e: RunnerProgressEvent) => void) {
        return runner.onProgress(listener);
      },
      async start() {
        return await runner.start().catch((e: unknown) => {
          console.error(chalk.red('❌ 运行失败:'), e);
          throw e;
        });
      },
      stop() {
        runner.stop();
      },
      pause(courseId: number) {
        return runner.pause(courseId);
      },
      resume(courseId: number) {
        return runner.resume(courseId);
      },
      seek(courseId: number, location: number) {
        return runner.seek(courseId, location);
      },
    };
  },
};

export { loadConfig, parseEnvBool, parseEnvNumber, printConfigStatus } from './config.js';
export { AuthError, PacerError, ProtocolError, SchedulingError, TransportError } from './errors.js';
export { MemoryCourseRegistry, JsonFileCourseRegistry } from './course/registry.js';
export { encryptPassword, decryptPassword } from './auth/cipher.js';
export { default as ProgressCodec } from './course/codec.js';

export type { AppConfig, Credential, CourseCategory } from './config.js';
export type { Course, CourseRecord, ProgressEvent } from './course/types.js';
export type { HttpRequest, HttpResponse, HttpTransport } from './api/axiosInstance.js';
export type { CaptchaClassifier } from './auth/captcha.js';
export type { CourseRegistry } from './course/registry.js';
export type { PacerDeps, PacerSummary, RunnerProgressEvent, RunSummary };
