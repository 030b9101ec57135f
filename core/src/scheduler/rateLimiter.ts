import { type Clock, sleep, systemClock } from '../utils.js';

type RateLimiterOptions = {
  /** 同一门课两次提交的最小间隔 */
  taskIntervalMs: number;
  /** 所有课程之间两次提交的最小间隔 */
  globalIntervalMs: number;
  clock?: Clock;
};

/**
 * 提交限速：按课程 + 全局两级间隔发放提交名额
 */
class RateLimiter {
  readonly #taskIntervalMs: number;
  readonly #globalIntervalMs: number;
  readonly #clock: Clock;
  readonly #nextForTask = new Map<number, number>();
  #nextGlobal = 0;

  constructor(options: RateLimiterOptions) {
    this.#taskIntervalMs = Math.max(0, options.taskIntervalMs);
    this.#globalIntervalMs = Math.max(0, options.globalIntervalMs);
    this.#clock = options.clock ?? systemClock;
  }

  /** 距离 courseId 可以提交还需等待的毫秒数 */
  waitTime(courseId: number, now = this.#clock()): number {
    const task = this.#nextForTask.get(courseId) ?? 0;
    return Math.max(0, this.#nextGlobal - now, task - now);
  }

  /**
   * 等待并占用一个提交名额。被 signal 打断时返回 false，不占用名额。
   */
  async acquire(courseId: number, signal?: AbortSignal): Promise<boolean> {
    for (;;) {
      if (signal?.aborted) return false;
      const now = this.#clock();
      const wait = this.waitTime(courseId, now);
      if (wait <= 0) {
        // 检查与占位在同一个同步段内完成，不会被其他 worker 插队
        this.#nextGlobal = now + this.#globalIntervalMs;
        this.#nextForTask.set(courseId, now + this.#taskIntervalMs);
        return true;
      }
      if (!(await sleep(wait, signal))) return false;
    }
  }

  forget(courseId: number) {
    this.#nextForTask.delete(courseId);
  }
}

export default RateLimiter;

export type { RateLimiterOptions };
