import chalk from 'chalk';

import { errorMessage } from './errors.js';
import type { ErrorClass } from './retry.js';
import type { Course } from './course/types.js';

type CourseSummary = Pick<Course, 'id' | 'name' | 'category' | 'progressPercent'>;

type RunnerProgressEvent =
  | {
    kind: 'runStart';
    totalCourses: number;
    concurrency: number;
    ts: number;
  }
  | {
    kind: 'runEnd';
    done: number;
    failed: number;
    cancelled: number;
    ts: number;
  }
  | {
    kind: 'taskStart';
    workerTag: string;
    course: CourseSummary;
    ts: number;
  }
  | {
    kind: 'taskProgress';
    workerTag: string;
    course: CourseSummary;
    lessonLocation: number;
    sessionTime: number;
    ts: number;
  }
  | {
    kind: 'taskRetry';
    workerTag: string;
    course: CourseSummary;
    errorClass: ErrorClass;
    attempts: number;
    delayMs: number;
    message: string;
    ts: number;
  }
  | {
    kind: 'taskDone';
    workerTag: string;
    course: CourseSummary;
    ts: number;
  }
  | {
    kind: 'taskFailed';
    workerTag?: string;
    course: CourseSummary;
    message: string;
    ts: number;
  }
  | {
    kind: 'taskCancelled';
    course: CourseSummary;
    ts: number;
  }
  | {
    kind: 'sessionRenewed';
    sessionId: number;
    ts: number;
  };

type ProgressListener = (e: RunnerProgressEvent) => void;

/**
 * 进度事件广播。监听器抛出的异常只记录警告，不影响运行。
 */
class ProgressEmitter {
  readonly #listeners = new Set<ProgressListener>();

  on(listener: ProgressListener) {
    this.#listeners.add(listener);
    return () => {
      this.#listeners.delete(listener);
    };
  }

  emit(e: RunnerProgressEvent) {
    for (const l of this.#listeners) {
      try {
        l(e);
      } catch (e) {
        console.warn(chalk.yellow(`⚠️ 进度监听器出错 (${errorMessage(e)})，继续运行`));
      }
    }
  }
}

function summarize(course: Course): CourseSummary {
  return {
    id: course.id,
    name: course.name,
    category: course.category,
    progressPercent: course.progressPercent,
  };
}

export { ProgressEmitter, summarize };
export type { CourseSummary, ProgressListener, RunnerProgressEvent };
