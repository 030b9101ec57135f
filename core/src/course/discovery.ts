/**
 * 课程发现：拉取必修 + 选修列表，过滤已完成课程，并用登记表中的进度续播。
 */
import chalk from 'chalk';

import type { AppConfig, CourseCategory } from '../config.js';
import type { PlatformApi, PlatformCourse, SessionCredentials } from '../api/platform.js';
import { errorMessage } from '../errors.js';
import type { CourseRegistry } from './registry.js';
import { type Course, type CourseRecord, toCourseRecord } from './types.js';

type DiscoveryOptions = {
  sco: AppConfig['sco'];
  registry?: CourseRegistry;
  /** 只取部分分类，默认两类都取 */
  categories?: readonly CourseCategory[];
};

function resolveScoId(sco: AppConfig['sco'], category: CourseCategory): string {
  return sco[category] || sco.default;
}

function toCourse(raw: PlatformCourse, scoId: string, record?: CourseRecord): Course {
  const durationSeconds = Math.round(raw.durationMinutes * 60);
  const seeded = Math.floor((raw.progressPercent / 100) * durationSeconds);

  // 登记表只在 userCourseId 一致时可信，选课记录变化后以平台为准
  const usable = record && record.userCourseId === raw.userCourseId ? record : undefined;
  const sessionTime = Math.min(durationSeconds, Math.max(seeded, usable?.sessionTime ?? 0));
  const lessonLocation = Math.min(durationSeconds, Math.max(seeded, usable?.lessonLocation ?? 0));

  return {
    id: raw.courseId,
    userCourseId: raw.userCourseId,
    scoId,
    name: raw.name,
    category: raw.category,
    durationSeconds,
    progressPercent: raw.progressPercent,
    completionStatus: raw.progressPercent > 0 || sessionTime > 0 ? 'incomplete' : 'not_started',
    lessonLocation,
    sessionTime,
  };
}

async function discoverCourses(
  api: PlatformApi,
  session: SessionCredentials,
  options: DiscoveryOptions,
): Promise<Course[]> {
  const categories = options.categories ?? ['required', 'elective'];
  const startTime = Date.now();

  const lists: PlatformCourse[] = [];
  if (categories.includes('required')) lists.push(...(await api.listRequiredCourses(session)));
  if (categories.includes('elective')) lists.push(...(await api.listElectiveCourses(session)));

  const records = new Map<number, CourseRecord>();
  for (const r of (await options.registry?.load()) ?? []) records.set(r.id, r);

  const seen = new Set<number>();
  const courses: Course[] = [];
  let completed = 0;
  for (const raw of lists) {
    // 同一门课同时出现在必修和选修里时只保留必修
    if (seen.has(raw.courseId)) continue;
    seen.add(raw.courseId);

    if (raw.completed) {
      completed++;
      continue;
    }
    courses.push(toCourse(raw, resolveScoId(options.sco, raw.category), records.get(raw.courseId)));
  }

  console.log(
    chalk.green(
      `[API] 课程列表：共 ${seen.size} 门，已完成 ${completed} 门，待学习 ${courses.length} 门，` +
        `耗时 ${Date.now() - startTime}ms`,
    ),
  );
  return courses;
}

type VerificationResult = {
  /** 是否成功拿到了平台的最新列表 */
  verified: boolean;
  /** 本地认为已完成、平台仍显示未完成的课程 */
  unconfirmed: Course[];
};

/**
 * 学完之后重新拉取课程列表，确认平台记录的完成情况，并把平台进度写回登记表。
 * 拉取失败只记录警告。
 */
async function verifyCompletion(
  api: PlatformApi,
  session: SessionCredentials,
  done: readonly Course[],
  registry?: CourseRegistry,
): Promise<VerificationResult> {
  if (done.length === 0) return { verified: true, unconfirmed: [] };

  const categories = new Set(done.map((c) => c.category));
  const rows = new Map<number, PlatformCourse>();
  try {
    const lists = [
      ...(categories.has('required') ? await api.listRequiredCourses(session) : []),
      ...(categories.has('elective') ? await api.listElectiveCourses(session) : []),
    ];
    for (const row of lists) if (!rows.has(row.courseId)) rows.set(row.courseId, row);
  } catch (e) {
    console.warn(chalk.yellow(`⚠️ 无法从平台确认完成情况: ${errorMessage(e)}`));
    return { verified: false, unconfirmed: [] };
  }

  const unconfirmed: Course[] = [];
  for (const course of done) {
    const row = rows.get(course.id);
    const confirmed = row?.completed === true;
    const updated: Course = {
      ...course,
      progressPercent: row?.progressPercent ?? course.progressPercent,
      completionStatus: confirmed ? 'completed' : 'incomplete',
    };
    if (!confirmed) {
      unconfirmed.push(updated);
      console.warn(
        chalk.yellow(
          `⚠️ ${course.name} 平台仍显示未完成 (${row ? `${updated.progressPercent.toFixed(1)}%` : '不在课程列表中'})，下次运行会重新提交`,
        ),
      );
    }
    try {
      await registry?.save(toCourseRecord(updated));
    } catch (e) {
      console.warn(chalk.yellow(`⚠️ 写入课程登记表失败: ${errorMessage(e)}`));
    }
  }

  console.log(chalk.green(`[API] 平台确认完成 ${done.length - unconfirmed.length}/${done.length} 门`));
  return { verified: true, unconfirmed };
}

export { discoverCourses, resolveScoId, toCourse, verifyCompletion };
export type { DiscoveryOptions, VerificationResult };
