import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import chalk from 'chalk';

import { errorMessage } from '../errors.js';
import type { CourseRecord } from './types.js';

/**
 * 课程登记表：保存每门课最近一次被接受的进度，重启后从这里续播。
 */
interface CourseRegistry {
  load(): Promise<CourseRecord[]>;
  save(record: CourseRecord): Promise<void>;
}

function isCourseRecord(v: unknown): v is CourseRecord {
  if (typeof v !== 'object' || v === null) return false;
  const num = (k: string) => typeof Reflect.get(v, k) === 'number';
  const category = Reflect.get(v, 'category');
  return (
    num('id') &&
    num('userCourseId') &&
    num('durationSeconds') &&
    num('lessonLocation') &&
    num('sessionTime') &&
    (category === 'required' || category === 'elective')
  );
}

class MemoryCourseRegistry implements CourseRegistry {
  readonly #records = new Map<number, CourseRecord>();

  constructor(initial: CourseRecord[] = []) {
    for (const r of initial) this.#records.set(r.id, { ...r });
  }

  async load(): Promise<CourseRecord[]> {
    return [...this.#records.values()].map((r) => ({ ...r }));
  }

  async save(record: CourseRecord): Promise<void> {
    this.#records.set(record.id, { ...record });
  }

  get(id: number): CourseRecord | undefined {
    const r = this.#records.get(id);
    return r && { ...r };
  }
}

/**
 * JSON 文件登记表。写入串行化：先写临时文件再 rename，避免并发写出半截文件。
 */
class JsonFileCourseRegistry implements CourseRegistry {
  readonly #path: string;
  #records: Map<number, CourseRecord> | null = null;
  #tail: Promise<void> = Promise.resolve();

  constructor(path: string) {
    this.#path = path;
  }

  private async ensureLoaded(): Promise<Map<number, CourseRecord>> {
    if (this.#records) return this.#records;

    const records = new Map<number, CourseRecord>();
    let text: string | null = null;
    try {
      text = await readFile(this.#path, 'utf-8');
    } catch (e) {
      if (!(e instanceof Error && 'code' in e && e.code === 'ENOENT')) throw e;
    }

    if (text !== null && text.trim()) {
      let data: unknown;
      try {
        data = JSON.parse(text);
      } catch (e) {
        console.warn(chalk.yellow(`⚠️ 登记表 ${this.#path} 不是合法 JSON，将重新生成: ${errorMessage(e)}`));
        data = [];
      }
      for (const r of Array.isArray(data) ? data : []) {
        if (isCourseRecord(r)) records.set(r.id, r);
      }
    }

    this.#records = records;
    return records;
  }

  async load(): Promise<CourseRecord[]> {
    const records = await this.ensureLoaded();
    return [...records.values()].map((r) => ({ ...r }));
  }

  save(record: CourseRecord): Promise<void> {
    const run = this.#tail.then(async () => {
      const records = await this.ensureLoaded();
      records.set(record.id, { ...record });

      const tmp = `${this.#path}.tmp`;
      await mkdir(dirname(this.#path), { recursive: true });
      await writeFile(tmp, JSON.stringify([...records.values()], null, 2), 'utf-8');
      await rename(tmp, this.#path);
    });
    // 一次写失败不影响后续写入，错误仍交给本次调用方
    this.#tail = run.catch(() => undefined);
    return run;
  }
}

export { JsonFileCourseRegistry, MemoryCourseRegistry, isCourseRecord };
export type { CourseRegistry };
