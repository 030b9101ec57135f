import type { AppConfig, CourseCategory } from '../config.js';
import { ProtocolError, TransportError } from '../errors.js';
import ProgressCodec, { type SubmissionResult, type WirePayload } from '../course/codec.js';
import {
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
  mergeCookies,
  parseSetCookie,
} from './axiosInstance.js';

type JsonObject = Record<string, unknown>;

/** 请求所需的会话凭据（token 头 + cookie） */
type SessionCredentials = {
  readonly token: string;
  readonly cookies: Readonly<Record<string, string>>;
};

/**
 * 课程列表归一化后的结构
 */
type PlatformCourse = {
  userCourseId: number;
  courseId: number;
  name: string;
  durationMinutes: number;
  progressPercent: number;
  category: CourseCategory;
  completed: boolean;
};

type LoginResponse = {
  /** 1 = 成功 */
  status: number | null;
  message: string;
  userId?: number;
  /** system_uuid，登录后作为 token 头 */
  token?: string;
  cookies: Record<string, string>;
};

type CaptchaChallenge = {
  image: Buffer;
  cookies: Record<string, string>;
};

/** play_status: 1 = 可播放, 3 = 已完成但仍可播放 */
const PLAYABLE_STATUSES = new Set([1, 3]);

// 时长缺失或明显不合理时按 30 分钟处理
const DEFAULT_DURATION_MINUTES = 30;

function isRecord(v: unknown): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function toNumber(v: unknown): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function toArray(v: unknown): unknown[] {
  return Array.isArray(v) ? v : [];
}

function normalizeDurationMinutes(raw: JsonObject): number {
  const minutes = toNumber(raw.duration_minutes);
  if (minutes !== null && minutes > 0) return minutes;

  const d = toNumber(raw.duration);
  if (d === null || d <= 0) return DEFAULT_DURATION_MINUTES;
  // 一小时以上的数值只可能是秒
  return d >= 3600 ? d / 60 : d;
}

/**
 * 平台返回的 progress 有两种：0~1 的小数或 progress_percent 百分比
 */
function normalizeProgressPercent(raw: JsonObject): number {
  const percent = toNumber(raw.progress_percent);
  if (percent !== null) return Math.min(100, Math.max(0, percent));
  const ratio = toNumber(raw.progress) ?? 0;
  return Math.min(100, Math.max(0, ratio * 100));
}

function normalizeCourse(
  raw: unknown,
  category: CourseCategory,
  userCourseIdField: 'user_course_id' | 'id',
): PlatformCourse | null {
  if (!isRecord(raw)) return null;

  const userCourseId = toNumber(raw[userCourseIdField]) ?? toNumber(raw.user_course_id);
  const courseId = toNumber(raw.course_id);
  if (userCourseId === null || courseId === null) return null;

  const progressPercent = normalizeProgressPercent(raw);
  return {
    userCourseId,
    courseId,
    name: String(raw.course_name ?? raw.name ?? courseId),
    durationMinutes: normalizeDurationMinutes(raw),
    progressPercent,
    category,
    completed: toNumber(raw.status) === 1 || progressPercent >= 100,
  };
}

function ensureOk(res: HttpResponse, where: string): HttpResponse {
  if (res.status !== 200) {
    throw new TransportError('UnexpectedStatus', `${where} 返回 HTTP ${res.status}`, {
      status: res.status,
    });
  }
  return res;
}

function parseJson(res: HttpResponse, where: string): JsonObject {
  const text = res.body.toString('utf-8');
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new ProtocolError('MalformedResponse', `${where} 响应不是 JSON: ${text.slice(0, 80)}`, {
      cause: e,
      body: text,
    });
  }
  if (!isRecord(data)) {
    throw new ProtocolError('MalformedResponse', `${where} 响应结构异常`, { body: text });
  }
  return data;
}

class PlatformApi {
  readonly #transport: HttpTransport;
  readonly #config: AppConfig;

  constructor(transport: HttpTransport, config: AppConfig) {
    this.#transport = transport;
    this.#config = config;
  }

  private authed(session: SessionCredentials, req: HttpRequest): HttpRequest {
    return {
      ...req,
      headers: { token: session.token, ...req.headers },
      cookies: session.cookies,
    };
  }

  /**
   * 获取一次性验证码图片。验证码与响应下发的 cookie 绑定，登录时必须带回。
   */
  async fetchCaptcha(cookies: Readonly<Record<string, string>> = {}): Promise<CaptchaChallenge> {
    const res = await this.#transport.request({
      method: 'GET',
      url: this.#config.urls.captcha(),
      params: { terminal: 1, code: Math.floor(Math.random() * 100) },
      headers: {
        Accept: 'image/avif,image/webp,image/png,image/*;q=0.8,*/*;q=0.5',
        ...(this.#config.authToken ? { token: this.#config.authToken } : {}),
      },
      cookies,
    });
    ensureOk(res, '获取验证码');
    return {
      image: res.body,
      cookies: mergeCookies(cookies, parseSetCookie(res.setCookie)),
    };
  }

  async login(
    form: { username: string; password: string; verifyCode: string },
    cookies: Readonly<Record<string, string>>,
  ): Promise<LoginResponse> {
    const res = await this.#transport.request({
      method: 'POST',
      url: this.#config.urls.login(),
      form: {
        username: form.username,
        password: form.password,
        verify_code: form.verifyCode,
        terminal: '1',
      },
      headers: this.#config.authToken ? { token: this.#config.authToken } : {},
      cookies,
    });
    ensureOk(res, '登录');
    const data = parseJson(res, '登录');

    const userId = toNumber(data.user_id);
    const token = typeof data.system_uuid === 'string' && data.system_uuid ? data.system_uuid : void 0;
    return {
      status: toNumber(data.status),
      message: String(data.message ?? data.errorMsg ?? ''),
      userId: userId ?? void 0,
      token,
      cookies: mergeCookies(cookies, parseSetCookie(res.setCookie)),
    };
  }

  /**
   * 轻量登录态探测：返回 HTTP 状态与响应中的 status 字段
   */
  async loginStatus(session: SessionCredentials): Promise<{ httpStatus: number; status: number | null }> {
    const res = await this.#transport.request(
      this.authed(session, {
        method: 'GET',
        url: this.#config.urls.loginStatus(),
        params: { terminal: 1 },
      }),
    );
    if (res.status !== 200) return { httpStatus: res.status, status: null };
    try {
      return { httpStatus: res.status, status: toNumber(parseJson(res, '登录态探测').status) };
    } catch (e) {
      if (e instanceof ProtocolError) return { httpStatus: res.status, status: 0 };
      throw e;
    }
  }

  async listRequiredCourses(session: SessionCredentials): Promise<PlatformCourse[]> {
    const res = await this.#transport.request(
      this.authed(session, {
        method: 'GET',
        url: this.#config.urls.requiredCourses(),
        params: { course_type: 0, class_id: this.#config.classId, terminal: 1 },
      }),
    );
    const data = parseJson(ensureOk(res, '必修课列表'), '必修课列表');

    return toArray(data.module_course)
      .flatMap((module) => (isRecord(module) ? toArray(module.course) : []))
      .map((c) => normalizeCourse(c, 'required', 'user_course_id'))
      .filter((c): c is PlatformCourse => c !== null);
  }

  async listElectiveCourses(session: SessionCredentials): Promise<PlatformCourse[]> {
    const res = await this.#transport.request(
      this.authed(session, {
        method: 'GET',
        url: this.#config.urls.electiveCourses(),
        params: { course_type: 1, current: 1, limit: 99999, terminal: 1 },
      }),
    );
    const data = parseJson(ensureOk(res, '选修课列表'), '选修课列表');

    // 选修课用 id 字段作为 user_course_id
    return toArray(data.courses)
      .map((c) => normalizeCourse(c, 'elective', 'id'))
      .filter((c): c is PlatformCourse => c !== null);
  }

  async checkCourse(
    session: SessionCredentials,
    userCourseId: number,
  ): Promise<{ playable: boolean; playStatus: number | null }> {
    const res = await this.#transport.request(
      this.authed(session, {
        method: 'GET',
        url: this.#config.urls.checkCourse(),
        params: { user_course_id: userCourseId, study_times: 1, terminal: 1 },
      }),
    );
    const data = parseJson(ensureOk(res, '课程权限检查'), '课程权限检查');
    const playStatus = toNumber(data.play_status);
    return { playable: playStatus !== null && PLAYABLE_STATUSES.has(playStatus), playStatus };
  }

  /** 打开 SCORM 播放页，部分课程需要先访问一次才接受进度 */
  async openPlayer(session: SessionCredentials, userCourseId: number): Promise<void> {
    const res = await this.#transport.request(
      this.authed(session, {
        method: 'GET',
        url: this.#config.urls.scormPlay(),
        params: { terminal: 1, id: userCourseId },
        headers: { Accept: 'text/html,application/xhtml+xml,*/*;q=0.8' },
      }),
    );
    ensureOk(res, '打开播放页');
  }

  async submitProgress(session: SessionCredentials, payload: WirePayload): Promise<SubmissionResult> {
    const res = await this.#transport.request(
      this.authed(session, {
        method: 'POST',
        url: this.#config.urls.seek(),
        form: ProgressCodec.toForm(payload),
        headers: {
          Referer: `${this.#config.baseUrl}${this.#config.urls.scormPlay()}?terminal=1&id=${payload.id}`,
        },
      }),
    );
    ensureOk(res, '进度提交');
    return ProgressCodec.decode(res.body);
  }
}

export { PlatformApi };
export type { CaptchaChallenge, LoginResponse, PlatformCourse, SessionCredentials };
