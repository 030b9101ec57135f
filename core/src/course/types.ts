import type { CourseCategory } from '../config.js';

type CompletionStatus = 'not_started' | 'incomplete' | 'completed';

type Course = {
  /** 平台课程 ID */
  id: number;
  /** 选课记录 ID，进度提交使用 */
  userCourseId: number;
  scoId: string;
  name: string;
  category: CourseCategory;
  durationSeconds: number;
  progressPercent: number;
  completionStatus: CompletionStatus;
  /** 播放位置（秒） */
  lessonLocation: number;
  /** 已被服务端接受的累计观看时长（秒） */
  sessionTime: number;
};

type ProgressEvent = {
  lessonLocation: number;
  sessionTimeDelta: number;
  timestamp: Date;
  completionStatus: CompletionStatus;
};

/** 持久化到课程登记表的记录 */
type CourseRecord = Pick<
  Course,
  | 'id'
  | 'userCourseId'
  | 'name'
  | 'category'
  | 'durationSeconds'
  | 'progressPercent'
  | 'completionStatus'
  | 'lessonLocation'
  | 'sessionTime'
> & { updatedAt: string };

function toCourseRecord(course: Course, now: Date = new Date()): CourseRecord {
  return {
    id: course.id,
    userCourseId: course.userCourseId,
    name: course.name,
    category: course.category,
    durationSeconds: course.durationSeconds,
    progressPercent: course.progressPercent,
    completionStatus: course.completionStatus,
    lessonLocation: course.lessonLocation,
    sessionTime: course.sessionTime,
    updatedAt: now.toISOString(),
  };
}

export { toCourseRecord };
export type { CompletionStatus, Course, CourseCategory, CourseRecord, ProgressEvent };
