import axios, { type AxiosInstance } from 'axios';
import { TransportError } from '../errors.js';

type HttpMethod = 'GET' | 'POST';

type HttpRequest = {
  method: HttpMethod;
  /** 相对 baseURL 的路径 */
  url: string;
  params?: Record<string, string | number>;
  /** application/x-www-form-urlencoded 表单 */
  form?: Record<string, string>;
  headers?: Record<string, string>;
  cookies?: Readonly<Record<string, string>>;
};

type HttpResponse = {
  status: number;
  setCookie: string[];
  body: Buffer;
};

/**
 * 平台 HTTP 能力：发送请求并返回状态码与响应体。
 * 不跟随重定向，也不按状态码抛错，状态码的含义由调用方解释。
 */
interface HttpTransport {
  request(req: HttpRequest): Promise<HttpResponse>;
}

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/132.0.0.0 Safari/537.36';

function normalizeCookieHeaderValue(v: string) {
  return String(v ?? '')
    .trim()
    .replace(/;\s*$/, '');
}

function buildCookieHeader(cookies: Readonly<Record<string, string>>): string {
  return Object.entries(cookies)
    .map(([name, value]) => normalizeCookieHeaderValue(`${name}=${value}`))
    .filter(Boolean)
    .join('; ');
}

/**
 * 解析 Set-Cookie，只保留 name=value；Max-Age=0 / 过期的视为删除（值为空串）。
 */
function parseSetCookie(lines: string[]): Record<string, string> {
  const jar: Record<string, string> = {};
  for (const line of lines) {
    const [pair, ...attrs] = line.split(';');
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    const name = pair.slice(0, eq).trim();
    const value = pair.slice(eq + 1).trim();
    const expired = attrs.some((a) => /^\s*max-age\s*=\s*0\s*$/i.test(a));
    jar[name] = expired ? '' : value;
  }
  return jar;
}

function mergeCookies(
  base: Readonly<Record<string, string>>,
  incoming: Readonly<Record<string, string>>,
): Record<string, string> {
  const merged: Record<string, string> = { ...base };
  for (const [name, value] of Object.entries(incoming)) {
    if (value === '') delete merged[name];
    else merged[name] = value;
  }
  return merged;
}

function readSetCookie(raw: unknown): string[] {
  if (Array.isArray(raw)) return raw.filter((v): v is string => typeof v === 'string');
  if (typeof raw === 'string') return [raw];
  return [];
}

function newAxiosInstance(options: {
  baseUrl: string;
  timeoutMs: number;
  proxy?: { host: string; port: number };
}) {
  const { baseUrl, timeoutMs, proxy } = options;

  const axiosInstance = axios.create({
    baseURL: baseUrl,
    timeout: timeoutMs,
    maxRedirects: 0,
    responseType: 'arraybuffer',
    // 状态码交给调用方解释（302 通常意味着登录失效）
    validateStatus: () => true,
    proxy: proxy && {
      ...proxy,
      protocol: 'http',
    },
  });

  axiosInstance.interceptors.request.use((config) => {
    // 伪造请求头, 尽量贴近浏览器中的正常请求
    config.headers['User-Agent'] = USER_AGENT;
    config.headers['Accept'] ??= 'application/json, text/plain, */*';
    config.headers['Accept-Language'] = 'zh-CN,zh;q=0.9,en;q=0.8';
    config.headers['X-Requested-With'] = 'XMLHttpRequest';

    config.headers['Origin'] = baseUrl;
    // 某些接口会校验 Referer；未显式指定时给一个稳定的站内 Referer
    config.headers['Referer'] ??= `${baseUrl}/nxxzxy/index.html`;

    config.headers['Pragma'] = 'no-cache';
    config.headers['Cache-Control'] = 'no-cache';
    config.headers['Sec-Fetch-Site'] = 'same-origin';
    config.headers['Sec-Fetch-Mode'] = 'cors';
    config.headers['Sec-Fetch-Dest'] = 'empty';

    return config;
  });

  return axiosInstance;
}

function toTransportError(e: unknown, req: HttpRequest): unknown {
  if (!axios.isAxiosError(e)) return e;

  const where = `${req.method} ${req.url}`;
  switch (e.code) {
    case 'ECONNABORTED':
    case 'ETIMEDOUT':
      return new TransportError('Timeout', `${where} 请求超时`, { cause: e });
    default:
      return new TransportError(
        'ConnectionReset',
        `${where} 连接失败: ${e.code ?? e.message}`,
        { cause: e },
      );
  }
}

class AxiosTransport implements HttpTransport {
  readonly #axios: AxiosInstance;

  constructor(options: Parameters<typeof newAxiosInstance>[0]) {
    this.#axios = newAxiosInstance(options);
  }

  async request(req: HttpRequest): Promise<HttpResponse> {
    const headers: Record<string, string> = { ...req.headers };
    if (req.cookies) {
      const cookie = buildCookieHeader(req.cookies);
      if (cookie) headers['Cookie'] = cookie;
    }

    let data: string | undefined;
    if (req.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded; charset=UTF-8';
      data = new URLSearchParams(req.form).toString();
    }

    try {
      const resp = await this.#axios.request<ArrayBuffer>({
        method: req.method,
        url: req.url,
        params: req.params,
        data,
        headers,
      });
      return {
        status: resp.status,
        setCookie: readSetCookie(resp.headers['set-cookie']),
        body: Buffer.from(resp.data),
      };
    } catch (e) {
      throw toTransportError(e, req);
    }
  }
}

export {
  AxiosTransport,
  buildCookieHeader,
  mergeCookies,
  newAxiosInstance,
  parseSetCookie,
};

export type { HttpMethod, HttpRequest, HttpResponse, HttpTransport };
