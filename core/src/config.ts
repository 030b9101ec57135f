import chalk from 'chalk';
import 'dotenv/config';

type Env = Record<string, string | undefined>;

type CourseCategory = 'required' | 'elective';

type Credential = Readonly<{
  username: string;
  password: string;
  /** 平台固定的 DES 密钥（8 字节） */
  cipherKey: string;
}>;

type AppConfig = Readonly<{
  credential: Credential;
  baseUrl: string;
  /** 请求头 token，登录成功后会被 system_uuid 替换 */
  authToken: string;
  classId: number;
  sco: Readonly<{ default: string } & Partial<Record<CourseCategory, string>>>;
  urls: Readonly<{
    captcha: () => string;
    login: () => string;
    loginStatus: () => string;
    requiredCourses: () => string;
    electiveCourses: () => string;
    checkCourse: () => string;
    scormPlay: () => string;
    seek: () => string;
  }>;
  proxy?: Readonly<{ host: string; port: number }>;
  ai: Readonly<{ api?: string; key?: string; model?: string; qps: number; timeoutMs: number }>;
  scheduler: Readonly<{
    concurrency: number;
    cadenceMs: number;
    taskIntervalMs: number;
    globalIntervalMs: number;
    drainTimeoutMs: number;
    queueCapacity: number;
    completionRatio: number;
  }>;
  retry: Readonly<{
    maxAttempts: number;
    captchaAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitterMs: number;
  }>;
  session: Readonly<{ probeIntervalMs: number }>;
  registryPath: string;
  requestTimeoutMs: number;
  /** 控制台进度条（非 TTY 环境建议关闭） */
  progressBar: boolean;
}>;

const DEFAULT_BASE_URL = 'https://edu.nxgbjy.org.cn';

// 功能开关
const parseEnvBool = (val: string | undefined, defaultVal: boolean): boolean => {
  if (val === undefined || val === '') return defaultVal;
  const v = val.trim().toLowerCase();
  return v === '1' || v === 'true' || v === 'yes';
};

const parseEnvNumber = (
  val: string | undefined,
  defaultVal: number,
  min = Number.NEGATIVE_INFINITY,
  max = Number.POSITIVE_INFINITY,
): number => {
  if (val === undefined || val.trim() === '') return defaultVal;
  const n = Number(val.trim());
  if (!Number.isFinite(n)) return defaultVal;
  return Math.min(Math.max(n, min), max);
};

function loadConfig(env: Env = process.env): AppConfig {
  const baseUrl = (env._BASE_URL ?? DEFAULT_BASE_URL).trim().replace(/\/+$/, '');
  const { _PROXY_HOST: host, _PROXY_PORT: port } = env;

  const credential: Credential = Object.freeze({
    username: env._ACCOUNT ?? '',
    password: env._PASSWORD ?? '',
    cipherKey: env._CIPHER_KEY ?? 'CCR!@#$%',
  });

  // 过高的并发更容易触发风控/限流，硬上限 6
  const concurrency = Math.floor(parseEnvNumber(env._CONCURRENCY, 3, 1, 6));

  const device = (path: string) => `/device/${path}`;

  return Object.freeze({
    credential,
    baseUrl,
    authToken: env._AUTH_TOKEN ?? '',
    classId: Math.floor(parseEnvNumber(env._CLASS_ID, 275, 0)),
    sco: Object.freeze({
      default: env._SCO_ID || 'res01',
      ...(env._SCO_ID_REQUIRED ? { required: env._SCO_ID_REQUIRED } : {}),
      ...(env._SCO_ID_ELECTIVE ? { elective: env._SCO_ID_ELECTIVE } : {}),
    }),
    urls: Object.freeze({
      captcha: () => device('login!get_auth_code.do'),
      login: () => device('login.do'),
      loginStatus: () => device('user!study_center_stat.do'),
      requiredCourses: () => device('clazz!class_detail.do'),
      electiveCourses: () => device('course!optional_course_list.do'),
      checkCourse: () => device('course!check_course.do'),
      scormPlay: () => device('study_new!scorm_play.do'),
      seek: () => device('study_new!seek.do'),
    }),
    proxy: host && port ? Object.freeze({ host, port: Number(port) }) : void 0,
    ai: Object.freeze({
      api: env._API,
      key: env._KEY,
      model: env._MODEL,
      qps: parseEnvNumber(env._Qps, 1, 0.1),
      // 最小 5s，误配为 0 时模型请求会立即超时
      timeoutMs: parseEnvNumber(env._AI_TIMEOUT_MS, 30_000, 5_000),
    }),
    scheduler: Object.freeze({
      concurrency,
      cadenceMs: parseEnvNumber(env._CADENCE_SEC, 30, 1) * 1000,
      taskIntervalMs: parseEnvNumber(env._TASK_INTERVAL_MS, 25_000, 0),
      globalIntervalMs: parseEnvNumber(env._GLOBAL_INTERVAL_MS, 1_500, 0),
      drainTimeoutMs: parseEnvNumber(env._DRAIN_TIMEOUT_MS, 15_000, 0),
      queueCapacity: Math.floor(parseEnvNumber(env._QUEUE_CAPACITY, 500, 1)),
      completionRatio: parseEnvNumber(env._COMPLETION_RATIO, 0.9, 0.01, 1),
    }),
    retry: Object.freeze({
      maxAttempts: Math.floor(parseEnvNumber(env._MAX_RETRIES, 5, 1)),
      captchaAttempts: Math.floor(parseEnvNumber(env._CAPTCHA_MAX_RETRIES, 5, 1)),
      baseDelayMs: parseEnvNumber(env._BACKOFF_BASE_MS, 2_000, 0),
      maxDelayMs: parseEnvNumber(env._BACKOFF_MAX_MS, 120_000, 0),
      jitterMs: parseEnvNumber(env._BACKOFF_JITTER_MS, 1_000, 0),
    }),
    session: Object.freeze({
      probeIntervalMs: parseEnvNumber(env._SESSION_PROBE_MS, 10 * 60_000, 0),
    }),
    registryPath: env._REGISTRY_PATH ?? 'data/courses.json',
    requestTimeoutMs: parseEnvNumber(env._REQUEST_TIMEOUT_MS, 20_000, 1_000),
    progressBar: parseEnvBool(env._PROGRESS_BAR, true),
  });
}

function printConfigStatus(config: AppConfig) {
  const { scheduler, retry } = config;
  console.log('\n========== 运行配置 ==========');
  console.log('🌐 平台地址:', config.baseUrl);
  console.log('👤 账号:', config.credential.username || chalk.red('未设置 (_ACCOUNT)'));
  console.log('🔑 密码:', config.credential.password ? '*'.repeat(config.credential.password.length) : chalk.red('未设置 (_PASSWORD)'));
  if (!config.authToken) {
    console.log(chalk.yellow('⚠️ 未设置 _AUTH_TOKEN，登录前的请求不携带 token 头'));
  }
  console.log('📚 必修班级 ID:', config.classId);
  console.log('🎞️ SCO:', config.sco.default, config.sco.required || config.sco.elective ? chalk.gray(`(必修=${config.sco.required ?? '-'} 选修=${config.sco.elective ?? '-'})`) : '');
  console.log('================================\n');
  console.log('并发数:', scheduler.concurrency);
  console.log('上报间隔(秒):', scheduler.cadenceMs / 1000);
  console.log('单课程/全局最小提交间隔(ms):', scheduler.taskIntervalMs, '/', scheduler.globalIntervalMs);
  console.log('完成阈值:', `${Math.round(scheduler.completionRatio * 100)}%`);
  console.log('最多连续失败次数:', retry.maxAttempts, ' 验证码最多尝试:', retry.captchaAttempts);

  if (config.ai.api && config.ai.key && config.ai.model) {
    console.log('AI 验证码识别已启用:');
    console.log('API', config.ai.api);
    console.log('Key', '*'.repeat(config.ai.key.length));
    console.log('Model', config.ai.model);
  }

  if (config.proxy) {
    console.log('代理:', chalk.green(`http://${config.proxy.host}:${config.proxy.port}`));
  }
}

const Config = loadConfig(process.env);

export default Config;

export { DEFAULT_BASE_URL, loadConfig, parseEnvBool, parseEnvNumber, printConfigStatus };
export type { AppConfig, Credential, CourseCategory, Env };
