/**
 * 进度上报报文编解码（study_new!seek.do）。
 *
 * 表单三个字段：
 * - id           选课记录 ID
 * - duration     本次提交的观看秒数
 * - serializeSco 一个 JSON 字符串（整体作为单个表单字段值，二次编码）：
 *   {"<sco>":{"lesson_location":n,"session_time":n,"last_learn_time":"YYYY-MM-DD+HH:MM:SS"},"last_study_sco":"<sco>"}
 *
 * last_learn_time 的日期与时间之间是字面量 '+'，不是空格。
 * 服务端按字节比较格式，JSON 必须紧凑且字段顺序固定。
 */
import { ProtocolError } from '../errors.js';
import { pad } from '../utils.js';
import type { Course, ProgressEvent } from './types.js';

type ScoEntry = {
  lesson_location: number;
  session_time: number;
  last_learn_time: string;
};

type WirePayload = {
  id: string;
  serializeSco: string;
  duration: string;
};

type SubmissionResult = {
  accepted: boolean;
  /** 服务端原始状态码；0 表示接受 */
  statusCode: number;
  message?: string;
};

function formatLearnTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `+${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function toWholeSeconds(n: number): number {
  return Number.isFinite(n) ? Math.max(0, Math.floor(n)) : 0;
}

function encode(course: Pick<Course, 'userCourseId' | 'scoId'>, event: ProgressEvent): WirePayload {
  const delta = toWholeSeconds(event.sessionTimeDelta);
  const entry: ScoEntry = {
    lesson_location: toWholeSeconds(event.lessonLocation),
    session_time: delta,
    last_learn_time: formatLearnTime(event.timestamp),
  };

  // 字段插入顺序即序列化顺序：sco 条目在前，last_study_sco 在后
  const sco: Record<string, ScoEntry | string> = {};
  sco[course.scoId] = entry;
  sco.last_study_sco = course.scoId;

  return {
    id: String(course.userCourseId),
    serializeSco: JSON.stringify(sco),
    duration: String(delta),
  };
}

function toForm(payload: WirePayload): Record<string, string> {
  return {
    id: payload.id,
    serializeSco: payload.serializeSco,
    duration: payload.duration,
  };
}

function readStatus(data: unknown): number | null {
  if (typeof data !== 'object' || data === null) return null;
  for (const field of ['status', 'code'] as const) {
    if (!(field in data)) continue;
    const raw: unknown = Reflect.get(data, field);
    const n = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
    if (typeof n === 'number' && Number.isFinite(n)) return n;
  }
  return null;
}

function readMessage(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null) return void 0;
  for (const field of ['message', 'msg', 'errorMsg'] as const) {
    const raw: unknown = Reflect.get(data, field);
    if (typeof raw === 'string' && raw) return raw;
  }
  return void 0;
}

/**
 * 解析进度提交的响应体。无法解析出状态码时抛出 MalformedResponse；
 * 非 0 状态码原样返回，是否重试由 RetryPolicy 决定。
 */
function decode(body: Buffer | string): SubmissionResult {
  const text = (typeof body === 'string' ? body : body.toString('utf-8')).trim();

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    // 有些版本直接返回裸数字
    if (/^-?\d+$/.test(text)) data = { status: Number(text) };
    else {
      throw new ProtocolError('MalformedResponse', `无法解析进度提交响应: ${text.slice(0, 80)}`, {
        cause: e,
        body: text,
      });
    }
  }

  if (typeof data === 'number') data = { status: data };

  const statusCode = readStatus(data);
  if (statusCode === null) {
    throw new ProtocolError('MalformedResponse', `进度提交响应缺少状态字段: ${text.slice(0, 80)}`, {
      body: text,
    });
  }

  return { accepted: statusCode === 0, statusCode, message: readMessage(data) };
}

const ProgressCodec = { encode, decode, toForm, formatLearnTime };

export default ProgressCodec;

export { decode, encode, formatLearnTime, toForm };
export type { SubmissionResult, WirePayload };
