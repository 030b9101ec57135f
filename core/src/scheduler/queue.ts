import { SchedulingError } from '../errors.js';
import type CourseTask from '../course/task.js';

type QueueEntry = {
  task: CourseTask;
  /** 退避期间不可派发 */
  availableAt: number;
};

const CATEGORY_RANK = { required: 0, elective: 1 } as const;

/**
 * 派发顺序：进度低的优先，其次必修先于选修，最后按课程 ID
 */
function compareTasks(a: CourseTask, b: CourseTask): number {
  return (
    a.course.progressPercent - b.course.progressPercent ||
    CATEGORY_RANK[a.course.category] - CATEGORY_RANK[b.course.category] ||
    a.id - b.id
  );
}

class TaskQueue {
  readonly #capacity: number;
  #entries: QueueEntry[] = [];

  constructor(capacity: number) {
    this.#capacity = Math.max(1, Math.floor(capacity));
  }

  get size() {
    return this.#entries.length;
  }

  get capacity() {
    return this.#capacity;
  }

  has(id: number) {
    return this.#entries.some((e) => e.task.id === id);
  }

  push(task: CourseTask, availableAt = 0) {
    if (this.has(task.id)) {
      throw new Error(`课程 ${task.id} 已在队列中`);
    }
    if (this.#entries.length >= this.#capacity) {
      throw new SchedulingError('QueueFull', `队列已满 (${this.#capacity})，课程 ${task.id} 无法入队`);
    }
    this.#entries.push({ task, availableAt });
  }

  /**
   * 取出 now 时刻可派发、优先级最高的任务
   */
  takeReady(now: number): CourseTask | null {
    let best: QueueEntry | null = null;
    for (const e of this.#entries) {
      if (e.availableAt > now) continue;
      if (!best || compareTasks(e.task, best.task) < 0) best = e;
    }
    if (!best) return null;
    const picked = best;
    this.#entries = this.#entries.filter((e) => e !== picked);
    return picked.task;
  }

  /** 最早可派发时间；队列为空时返回 null */
  nextAvailableAt(): number | null {
    if (this.#entries.length === 0) return null;
    return Math.min(...this.#entries.map((e) => e.availableAt));
  }
}

export { TaskQueue, compareTasks };
export type { QueueEntry };
