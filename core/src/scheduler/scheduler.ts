import chalk from 'chalk';

import type { PlatformApi } from '../api/platform.js';
import type { AuthSessionManager, Session } from '../auth/session.js';
import ProgressCodec from '../course/codec.js';
import type { CourseRegistry } from '../course/registry.js';
import CourseTask from '../course/task.js';
import { type Course, toCourseRecord } from '../course/types.js';
import { ProtocolError, SchedulingError, errorMessage } from '../errors.js';
import { ProgressEmitter, type ProgressListener, summarize } from '../events.js';
import type { RetryPolicy } from '../retry.js';
import { type Clock, sleep, systemClock } from '../utils.js';
import { TaskQueue } from './queue.js';
import RateLimiter from './rateLimiter.js';

type SchedulerOptions = {
  api: PlatformApi;
  auth: AuthSessionManager;
  policy: RetryPolicy;
  registry: CourseRegistry;
  /** worker 数量，上限 6 */
  concurrency: number;
  /** 每次提交前模拟播放的时长 */
  cadenceMs: number;
  taskIntervalMs: number;
  globalIntervalMs: number;
  drainTimeoutMs: number;
  queueCapacity: number;
  completionRatio: number;
  clock?: Clock;
  emitter?: ProgressEmitter;
};

type RunSummary = {
  total: number;
  done: Course[];
  failed: Array<{ course: Course; reason: string }>;
  cancelled: Course[];
  /** 因队列容量不足未能入队的课程 */
  rejected: Course[];
  stopped: boolean;
};

type CycleOutcome = 'requeue' | 'parked' | 'terminal' | 'cancelled';

const MAX_CONCURRENCY = 6;

class ConcurrentScheduler {
  readonly #api: PlatformApi;
  readonly #auth: AuthSessionManager;
  readonly #policy: RetryPolicy;
  readonly #registry: CourseRegistry;
  readonly #limiter: RateLimiter;
  readonly #queue: TaskQueue;
  readonly #emitter: ProgressEmitter;
  readonly #clock: Clock;
  readonly #concurrency: number;
  readonly #cadenceMs: number;
  readonly #drainTimeoutMs: number;
  readonly #completionRatio: number;

  /** 所有已接收的任务 */
  readonly #tasks = new Map<number, CourseTask>();
  /** 已暂停、不在队列中的任务 */
  readonly #paused = new Map<number, CourseTask>();
  readonly #waiters = new Set<() => void>();
  readonly #abort = new AbortController();

  #running = false;
  #stopping = false;
  /** run() 已经给出结果：之后结束的提交只写登记表，不再改任务状态或发事件 */
  #finalized = false;
  #requestStop: () => void = () => undefined;
  readonly #stopRequested = new Promise<void>((resolve) => {
    this.#requestStop = resolve;
  });

  constructor(options: SchedulerOptions) {
    this.#api = options.api;
    this.#auth = options.auth;
    this.#policy = options.policy;
    this.#registry = options.registry;
    this.#clock = options.clock ?? systemClock;
    this.#emitter = options.emitter ?? new ProgressEmitter();
    this.#concurrency = Math.min(Math.max(1, Math.floor(options.concurrency)), MAX_CONCURRENCY);
    this.#cadenceMs = Math.max(0, options.cadenceMs);
    this.#drainTimeoutMs = Math.max(0, options.drainTimeoutMs);
    this.#completionRatio = options.completionRatio;
    this.#queue = new TaskQueue(options.queueCapacity);
    this.#limiter = new RateLimiter({
      taskIntervalMs: options.taskIntervalMs,
      globalIntervalMs: options.globalIntervalMs,
      clock: this.#clock,
    });
  }

  onProgress(listener: ProgressListener) {
    return this.#emitter.on(listener);
  }

  task(courseId: number): CourseTask | undefined {
    return this.#tasks.get(courseId);
  }

  private remaining(): number {
    let n = 0;
    for (const t of this.#tasks.values()) if (!t.terminal) n++;
    return n;
  }

  private wake() {
    for (const w of [...this.#waiters]) w();
  }

  /** 空闲等待：到点、有新任务或停止时返回 */
  private idle(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const done = () => {
        if (timer) clearTimeout(timer);
        this.#waiters.delete(done);
        resolve();
      };
      this.#waiters.add(done);
      if (Number.isFinite(ms)) timer = setTimeout(done, Math.max(0, ms));
    });
  }

  /**
   * 接收一门课程。运行中调用也会立即参与调度。
   */
  enqueue(course: Course): CourseTask {
    if (this.#stopping) {
      throw new SchedulingError('ShutdownInProgress', `调度器正在停止，课程 ${course.id} 不再入队`);
    }
    const existing = this.#tasks.get(course.id);
    if (existing && !existing.terminal) return existing;

    if (this.remaining() >= this.#queue.capacity) {
      throw new SchedulingError('QueueFull', `队列已满 (${this.#queue.capacity})，课程 ${course.id} 无法入队`);
    }

    const task = new CourseTask(course, { completionRatio: this.#completionRatio });
    this.#tasks.set(task.id, task);
    this.#queue.push(task);
    this.wake();
    return task;
  }

  pause(courseId: number): boolean {
    const task = this.#tasks.get(courseId);
    if (!task || task.terminal || this.#paused.has(courseId)) return false;
    task.enqueueCommand({ type: 'pause' });
    return true;
  }

  resume(courseId: number): boolean {
    const task = this.#paused.get(courseId);
    if (!task) {
      const t = this.#tasks.get(courseId);
      if (!t || t.terminal) return false;
      // 暂停命令还没被 worker 应用
      t.enqueueCommand({ type: 'resume' });
      return true;
    }

    this.#paused.delete(courseId);
    task.resume(this.#clock());
    task.suspendClock(this.#clock());
    this.#queue.push(task);
    console.log(chalk.cyan(`▶️ 恢复播放: ${task.course.name}`));
    this.wake();
    return true;
  }

  seek(courseId: number, location: number): boolean {
    const task = this.#tasks.get(courseId);
    if (!task || task.terminal) return false;
    // 暂停中的任务不归任何 worker 所有，直接跳转
    if (this.#paused.has(courseId)) return task.seek(location, this.#clock());
    task.enqueueCommand({ type: 'seek', location });
    return true;
  }

  /**
   * 运行直到所有任务结束，或被 stop() 停止
   */
  async run(courses: Course[]): Promise<RunSummary> {
    if (this.#running) throw new Error('调度器已在运行');
    this.#running = true;

    const rejected: Course[] = [];
    const notStarted: Course[] = [];
    for (const course of courses) {
      try {
        this.enqueue(course);
      } catch (e) {
        if (!(e instanceof SchedulingError)) throw e;
        if (e.kind === 'ShutdownInProgress') {
          notStarted.push(course);
          continue;
        }
        console.warn(chalk.yellow(`⚠️ ${e.message}`));
        rejected.push(course);
      }
    }

    const total = this.#tasks.size;
    this.#emitter.emit({
      kind: 'runStart',
      totalCourses: total,
      concurrency: this.#concurrency,
      ts: Date.now(),
    });
    console.log(chalk.blue(`🚀 开始学习 ${total} 门课程，并发 ${this.#concurrency}`));

    const workers = Array.from({ length: this.#concurrency }, (_, i) => this.worker(`W${i + 1}`));

    const drainAbort = new AbortController();
    await Promise.race([
      Promise.all(workers),
      this.#stopRequested.then(() => sleep(this.#drainTimeoutMs, drainAbort.signal)),
    ]);
    drainAbort.abort();

    this.#finalized = true;
    const summary = this.summarize(total, rejected);
    for (const course of notStarted) {
      summary.cancelled.push({ ...course });
      this.#emitter.emit({ kind: 'taskCancelled', course: summarize(course), ts: Date.now() });
    }
    this.#emitter.emit({
      kind: 'runEnd',
      done: summary.done.length,
      failed: summary.failed.length,
      cancelled: summary.cancelled.length,
      ts: Date.now(),
    });
    console.log(
      chalk.blue(
        `🏁 学习结束：完成 ${summary.done.length}，失败 ${summary.failed.length}，取消 ${summary.cancelled.length}`,
      ),
    );
    this.#running = false;
    return summary;
  }

  /**
   * 停止派发并打断所有等待点；进行中的提交不会被中断。
   * 未完成的任务在 run() 的结果中记为取消。
   */
  stop() {
    if (this.#stopping) return;
    this.#stopping = true;
    console.log(chalk.yellow('⏹️ 正在停止调度，等待进行中的提交完成...'));
    this.#abort.abort();
    this.#requestStop();
    this.wake();
  }

  private summarize(total: number, rejected: Course[]): RunSummary {
    const summary: RunSummary = {
      total,
      done: [],
      failed: [],
      cancelled: [],
      rejected,
      stopped: this.#stopping,
    };
    for (const task of this.#tasks.values()) {
      if (task.state === 'Done') summary.done.push({ ...task.course });
      else if (task.state === 'Failed') {
        summary.failed.push({ course: { ...task.course }, reason: task.failureReason ?? '' });
      } else {
        summary.cancelled.push({ ...task.course });
        this.#emitter.emit({ kind: 'taskCancelled', course: summarize(task.course), ts: Date.now() });
      }
    }
    return summary;
  }

  private async worker(tag: string) {
    while (!this.#stopping && this.remaining() > 0) {
      const now = this.#clock();
      const task = this.#queue.takeReady(now);
      if (!task) {
        const next = this.#queue.nextAvailableAt();
        await this.idle(next === null ? Number.POSITIVE_INFINITY : next - now);
        continue;
      }

      let outcome: CycleOutcome;
      try {
        outcome = await this.cycle(task, tag);
      } catch (e) {
        // cycle 内部已经处理了可预期的错误，走到这里说明是程序错误
        console.error(chalk.red(`[${tag}] ❌ 任务 ${task.course.name} 出现未预期错误:`), e);
        if (this.#finalized) break;
        task.fail(`未预期错误: ${errorMessage(e)}`);
        this.reportFailed(task, tag);
        outcome = 'terminal';
      }

      if (outcome === 'requeue' && !this.#stopping) {
        this.#queue.push(task, task.retry.nextEligibleAt);
      }
      if (outcome === 'terminal') this.wake();
    }
  }

  /**
   * 单个任务的一次派发：准备 → 应用命令 → 播放一个周期 → 提交进度
   */
  private async cycle(task: CourseTask, tag: string): Promise<CycleOutcome> {
    const prefix = `[${tag}] `;
    const signal = this.#abort.signal;
    let session: Session | null = null;

    try {
      if (!task.opened) {
        session = await this.#auth.getSession();
        const { playable, playStatus } = await this.#api.checkCourse(session, task.course.userCourseId);
        if (this.#finalized) return 'cancelled';
        if (!playable) {
          task.fail(`课程不可播放 (play_status=${playStatus ?? '无'})`);
          this.reportFailed(task, tag);
          return 'terminal';
        }
        await this.#api.openPlayer(session, task.course.userCourseId);
        if (this.#finalized) return 'cancelled';
        task.markOpened();
        if (task.state === 'Queued') task.start(this.#clock());

        this.#emitter.emit({ kind: 'taskStart', workerTag: tag, course: summarize(task.course), ts: Date.now() });
        console.log(
          chalk.bgBlueBright(
            `${prefix}${task.course.name} (${task.course.category === 'required' ? '必修' : '选修'}) ` +
              `${task.course.progressPercent.toFixed(1)}%`,
          ),
        );
      }

      task.resumeClock(this.#clock());
      for (const cmd of task.applyCommands(this.#clock())) {
        console.log(chalk.cyan(`${prefix}🎛️ ${task.course.name}: ${cmd.type === 'seek' ? `跳转到 ${cmd.location}s` : cmd.type}`));
      }
      if (task.state === 'Paused') {
        this.#paused.set(task.id, task);
        console.log(chalk.cyan(`${prefix}⏸️ 暂停播放: ${task.course.name}`));
        return 'parked';
      }

      if (!(await sleep(this.#cadenceMs, signal))) {
        task.suspendClock(this.#clock());
        return 'cancelled';
      }

      const event = task.nextEvent(this.#clock());
      session = await this.#auth.getSession();
      if (!(await this.#limiter.acquire(task.id, signal)) || this.#stopping) {
        task.suspendClock(this.#clock());
        return 'cancelled';
      }

      // 提交一旦发出就不再中断
      const result = await this.#api.submitProgress(session, ProgressCodec.encode(task.course, event));
      if (!result.accepted) {
        throw new ProtocolError(
          'RejectedByServer',
          `进度被拒绝 (status=${result.statusCode})${result.message ? `: ${result.message}` : ''}`,
          { code: result.statusCode },
        );
      }

      if (this.#finalized) {
        await this.persist(task.projected(event), prefix);
        console.warn(chalk.yellow(`${prefix}⚠️ ${task.course.name} 的提交在停止超时后才完成，只写入登记表`));
        return 'cancelled';
      }

      task.acknowledge(event);
      await this.persist(task.course, prefix);

      this.#emitter.emit({
        kind: 'taskProgress',
        workerTag: tag,
        course: summarize(task.course),
        lessonLocation: task.course.lessonLocation,
        sessionTime: task.course.sessionTime,
        ts: Date.now(),
      });
      console.log(
        `${prefix}📈 ${task.course.name}: +${event.sessionTimeDelta}s ` +
          `累计 ${task.course.sessionTime}/${task.course.durationSeconds}s (${task.course.progressPercent.toFixed(1)}%)`,
      );

      if (task.state === 'Done') {
        this.#limiter.forget(task.id);
        this.#emitter.emit({ kind: 'taskDone', workerTag: tag, course: summarize(task.course), ts: Date.now() });
        console.log(chalk.green(`${prefix}✅ 完成: ${task.course.name}`));
        return 'terminal';
      }

      task.suspendClock(this.#clock());
      return 'requeue';
    } catch (e) {
      if (this.#finalized) {
        console.warn(chalk.yellow(`${prefix}⚠️ ${task.course.name} 停止后的提交失败: ${errorMessage(e)}`));
        return 'cancelled';
      }
      return await this.handleFailure(task, tag, e, session);
    }
  }

  private async persist(course: Course, prefix: string) {
    try {
      await this.#registry.save(toCourseRecord(course));
    } catch (e) {
      // 登记表只用于续播，写失败不影响进度上报
      console.warn(chalk.yellow(`${prefix}⚠️ 写入课程登记表失败: ${errorMessage(e)}`));
    }
  }

  private async handleFailure(
    task: CourseTask,
    tag: string,
    error: unknown,
    stale: Session | null,
  ): Promise<CycleOutcome> {
    const prefix = `[${tag}] `;
    task.suspendClock(this.#clock());

    let cause = error;
    let errorClass = this.#policy.classify(cause);

    // 本次失败已经用尽重试次数时不必再登录
    if (errorClass === 'AuthExpired' && this.#policy.shouldRetry(task.retry.attempts + 1)) {
      console.warn(chalk.yellow(`${prefix}🔑 会话失效，重新登录: ${errorMessage(cause)}`));
      if (stale) this.#auth.invalidate(stale);
      try {
        await this.#auth.renew(stale ?? void 0);
      } catch (e) {
        cause = e;
        errorClass = this.#policy.classify(e);
      }
      if (this.#finalized) return 'cancelled';
    }

    // 续期成功后立即重试，其余可重试错误按退避等待
    const delayMs = errorClass === 'Transient' ? this.#policy.backoff(task.retry.attempts) : 0;
    task.recordFailure(cause, errorClass, this.#clock(), delayMs);

    const { attempts, lastError } = task.retry;
    if (errorClass === 'Permanent') task.fail(`不可重试的错误: ${lastError}`);
    else if (!this.#policy.shouldRetry(attempts)) task.fail(`连续失败 ${attempts} 次: ${lastError}`);

    if (task.terminal) {
      this.reportFailed(task, tag);
      return 'terminal';
    }
    this.reportRetry(task, tag, delayMs);
    return 'requeue';
  }

  private reportRetry(task: CourseTask, tag: string, delayMs: number) {
    const { attempts, lastErrorClass, lastError } = task.retry;
    this.#emitter.emit({
      kind: 'taskRetry',
      workerTag: tag,
      course: summarize(task.course),
      errorClass: lastErrorClass ?? 'Transient',
      attempts,
      delayMs,
      message: lastError ?? '',
      ts: Date.now(),
    });
    console.warn(
      chalk.yellow(
        `[${tag}] 🔁 ${task.course.name} 第 ${attempts}/${this.#policy.maxAttempts} 次失败 ` +
          `(${lastErrorClass})，${Math.round(delayMs / 1000)}s 后重试: ${lastError}`,
      ),
    );
  }

  private reportFailed(task: CourseTask, tag: string) {
    const message = task.failureReason ?? '';
    this.#limiter.forget(task.id);
    this.#emitter.emit({ kind: 'taskFailed', workerTag: tag, course: summarize(task.course), message, ts: Date.now() });
    console.error(chalk.red(`[${tag}] ❌ 放弃课程 ${task.course.name}: ${message}`));
  }
}

export default ConcurrentScheduler;

export type { RunSummary, SchedulerOptions };
