import { errorMessage } from '../errors.js';
import type { ErrorClass } from '../retry.js';
import type { Course, ProgressEvent } from './types.js';

type TaskState = 'Queued' | 'Playing' | 'Seeking' | 'Paused' | 'Completing' | 'Done' | 'Failed';

type RetryState = {
  /** 连续失败次数，成功提交后清零 */
  attempts: number;
  nextEligibleAt: number;
  lastErrorClass: ErrorClass | null;
  lastError: string | null;
};

type TaskCommand =
  | { type: 'pause' }
  | { type: 'resume' }
  | { type: 'seek'; location: number };

type CourseTaskOptions = {
  /** 累计时长达到 ratio * duration 视为完成 */
  completionRatio: number;
};

const ACCRUING: ReadonlySet<TaskState> = new Set(['Playing', 'Seeking', 'Completing']);

/**
 * 单门课程的播放状态机。
 *
 * Queued → Playing ↔ {Seeking, Paused} → Completing → Done，活跃状态都可能进入 Failed。
 * 失败计数只做记录，放弃的判断在调度器里。
 * 同一时刻只会被一个 worker 持有，所以内部不加锁。
 */
class CourseTask {
  readonly course: Course;
  readonly retry: RetryState = {
    attempts: 0,
    nextEligibleAt: 0,
    lastErrorClass: null,
    lastError: null,
  };

  readonly #ratio: number;
  #state: TaskState = 'Queued';
  #pendingDelta = 0;
  #lastTickAt: number | null = null;
  #inflight: ProgressEvent | null = null;
  #commands: TaskCommand[] = [];
  #failureReason: string | null = null;
  #opened = false;

  constructor(course: Course, options: CourseTaskOptions) {
    this.course = { ...course };
    this.#ratio = options.completionRatio;
  }

  get id() {
    return this.course.id;
  }

  get state(): TaskState {
    return this.#state;
  }

  get terminal() {
    return this.#state === 'Done' || this.#state === 'Failed';
  }

  get failureReason() {
    return this.#failureReason;
  }

  /** 尚未提交的观看秒数 */
  get pendingDelta() {
    return this.#pendingDelta;
  }

  /** 是否已经做过首次派发时的准备（权限检查 + 打开播放页） */
  get opened() {
    return this.#opened;
  }

  markOpened() {
    this.#opened = true;
  }

  get completionThreshold() {
    return this.#ratio * this.course.durationSeconds;
  }

  private settle(now: number) {
    if (!ACCRUING.has(this.#state) || this.#lastTickAt === null) return;
    const elapsed = Math.max(0, (now - this.#lastTickAt) / 1000);
    this.#pendingDelta += elapsed;
    this.course.lessonLocation = Math.min(
      this.course.durationSeconds,
      this.course.lessonLocation + elapsed,
    );
    this.#lastTickAt = now;
  }

  /** worker 接手任务时开始计时 */
  resumeClock(now: number) {
    if (ACCRUING.has(this.#state) && this.#lastTickAt === null) this.#lastTickAt = now;
  }

  /** 交还任务（回到队列、暂停或取消）时结算并停止计时 */
  suspendClock(now: number) {
    this.settle(now);
    this.#lastTickAt = null;
  }

  start(now: number) {
    if (this.#state !== 'Queued') {
      throw new Error(`任务 ${this.id} 当前状态为 ${this.#state}，无法开始`);
    }
    this.#state = 'Playing';
    this.#lastTickAt = now;
  }

  pause(now: number): boolean {
    if (this.#state !== 'Playing' && this.#state !== 'Seeking') return false;
    this.suspendClock(now);
    this.#state = 'Paused';
    return true;
  }

  resume(now: number): boolean {
    if (this.#state !== 'Paused') return false;
    this.#state = 'Playing';
    this.resumeClock(now);
    return true;
  }

  /**
   * 跳转播放位置。只移动位置，不计入观看时长。
   * 播放中跳转会短暂进入 Seeking，下一次 nextEvent 时回到 Playing。
   */
  seek(location: number, now: number): boolean {
    if (this.#state !== 'Playing' && this.#state !== 'Seeking' && this.#state !== 'Paused') {
      return false;
    }
    this.settle(now);
    this.course.lessonLocation = Math.min(this.course.durationSeconds, Math.max(0, location));
    if (this.#state === 'Playing') this.#state = 'Seeking';
    return true;
  }

  enqueueCommand(command: TaskCommand) {
    this.#commands.push(command);
  }

  get hasPendingCommands() {
    return this.#commands.length > 0;
  }

  /**
   * 按顺序应用积压的控制命令，返回实际生效的命令
   */
  applyCommands(now: number): TaskCommand[] {
    const applied: TaskCommand[] = [];
    const commands = this.#commands;
    this.#commands = [];
    for (const cmd of commands) {
      const ok =
        cmd.type === 'pause'
          ? this.pause(now)
          : cmd.type === 'resume'
            ? this.resume(now)
            : this.seek(cmd.location, now);
      if (ok) applied.push(cmd);
    }
    return applied;
  }

  /**
   * 结算到 now 为止的观看时长，生成本次要提交的进度事件。
   * 提交被确认（acknowledge）之前不会修改累计时长。
   */
  nextEvent(now: number): ProgressEvent {
    if (!ACCRUING.has(this.#state)) {
      throw new Error(`任务 ${this.id} 当前状态为 ${this.#state}，无法生成进度`);
    }
    this.settle(now);
    if (this.#state === 'Seeking') this.#state = 'Playing';

    const delta = Math.floor(this.#pendingDelta);
    const completed = this.course.sessionTime + delta >= this.completionThreshold;
    if (completed) this.#state = 'Completing';

    const event: ProgressEvent = {
      lessonLocation: Math.floor(this.course.lessonLocation),
      sessionTimeDelta: delta,
      timestamp: new Date(now),
      completionStatus: completed ? 'completed' : 'incomplete',
    };
    this.#inflight = event;
    return event;
  }

  /** event 被接受后的课程进度，不修改任务本身 */
  projected(event: ProgressEvent): Course {
    const sessionTime = this.course.sessionTime + event.sessionTimeDelta;
    const duration = this.course.durationSeconds;
    return {
      ...this.course,
      sessionTime,
      progressPercent: duration > 0 ? Math.min(100, (sessionTime / duration) * 100) : 100,
      completionStatus: event.completionStatus,
    };
  }

  /**
   * 服务端已接受 event：提交累计时长，刷新进度与完成状态，清空失败计数
   */
  acknowledge(event: ProgressEvent) {
    if (this.#inflight !== event) {
      throw new Error(`任务 ${this.id} 确认的不是最近一次生成的进度事件`);
    }
    this.#inflight = null;

    this.#pendingDelta = Math.max(0, this.#pendingDelta - event.sessionTimeDelta);
    const { sessionTime, progressPercent, completionStatus } = this.projected(event);
    this.course.sessionTime = sessionTime;
    this.course.progressPercent = progressPercent;
    this.course.completionStatus = completionStatus;

    this.retry.attempts = 0;
    this.retry.nextEligibleAt = 0;
    this.retry.lastErrorClass = null;
    this.retry.lastError = null;

    if (event.completionStatus === 'completed') {
      this.#state = 'Done';
      this.#lastTickAt = null;
    }
  }

  /**
   * 记录一次失败的派发。是否放弃由调用方按 RetryPolicy 决定。
   */
  recordFailure(error: unknown, errorClass: ErrorClass, now: number, delayMs: number) {
    this.#inflight = null;
    this.retry.attempts += 1;
    this.retry.lastErrorClass = errorClass;
    this.retry.lastError = errorMessage(error);
    this.retry.nextEligibleAt = now + Math.max(0, delayMs);
  }

  fail(reason: string) {
    if (this.terminal) return;
    this.#state = 'Failed';
    this.#failureReason = reason;
    this.#lastTickAt = null;
  }
}

export default CourseTask;

export type { CourseTaskOptions, RetryState, TaskCommand, TaskState };
