import OpenAI from 'openai';
import chalk from 'chalk';
import https from 'https';

import type { AppConfig } from '../config.js';
import type { CaptchaClassifier } from '../auth/captcha.js';
import { sleep } from '../utils.js';

type ChatCompletionCreateParams = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;

/**
 * 从模型回答中提取 4 位数字。
 * 允许 "1234"、"验证码：1234"、"1 2 3 4" 等形式；提取失败时返回去空白后的原文。
 */
function extractDigits(text: string): string {
  const raw = String(text ?? '')
    .replace(/验证码[:：]?/g, ' ')
    .trim();

  const direct = raw.match(/\b\d{4}\b/);
  if (direct) return direct[0];

  const digits = raw.replace(/\D/g, '');
  if (digits.length === 4) return digits;

  return raw.replace(/\s+/g, '');
}

/**
 * 借助 OpenAI 兼容的多模态接口识别登录验证码。
 */
class AICaptchaModel implements CaptchaClassifier {
  static init(config: AppConfig): AICaptchaModel | null {
    const { api, key, model, qps } = config.ai;

    if (!(api && key && model)) {
      console.log(chalk.yellow('⚠️ 未配置 AI (_API/_KEY/_MODEL)，无法自动识别验证码'));
      return null;
    }

    return new AICaptchaModel(config, api, key, model, qps);
  }

  readonly #openai: OpenAI;
  readonly #model: string;
  readonly #qps: number;
  readonly #timeoutMs: number;
  #lastCallAt = 0;
  #tail: Promise<unknown> = Promise.resolve();

  private constructor(config: AppConfig, api: string, key: string, model: string, qps: number) {
    const proxy = config.proxy;
    this.#model = model;
    this.#qps = qps;

    this.#timeoutMs = config.ai.timeoutMs;

    this.#openai = new OpenAI({
      baseURL: api,
      apiKey: key,
      timeout: this.#timeoutMs,
      httpAgent:
        proxy &&
        new https.Agent({
          host: proxy.host,
          port: proxy.port,
        }),
    });
  }

  private async chatCreate(params: ChatCompletionCreateParams): Promise<OpenAI.Chat.ChatCompletion> {
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.#timeoutMs);

    try {
      return await this.#openai.chat.completions.create(params, { signal: controller.signal });
    } catch (e) {
      // 统一将 AbortError 提示为“超时”，让上层兜底更直观。
      const name = e instanceof Error ? e.name : '';
      const msg = e instanceof Error ? e.message : String(e);
      if (name === 'AbortError' || /aborted|abort|canceled|cancelled/i.test(msg)) {
        throw new Error(`AI 请求超时：${this.#timeoutMs}ms (captcha)`, { cause: e });
      }
      throw e;
    } finally {
      clearTimeout(t);
    }
  }

  /**
   * 串行调用并按 QPS 限速：上一个请求结束后至少间隔 1000 / qps 毫秒
   */
  private throttled<T>(task: () => Promise<T>): Promise<T> {
    const run = this.#tail.then(async () => {
      const wait = this.#lastCallAt + 1000 / this.#qps - Date.now();
      await sleep(wait);
      try {
        return await task();
      } finally {
        this.#lastCallAt = Date.now();
      }
    });
    this.#tail = run.catch(() => undefined);
    return run;
  }

  async classify(image: Buffer): Promise<string> {
    const dataUrl = `data:image/png;base64,${image.toString('base64')}`;

    const content = await this.throttled(() =>
      this.chatCreate({
        model: this.#model,
        temperature: 0,
        messages: [
          {
            role: 'system',
            content: '你是验证码识别器。图片中是 4 位数字验证码，只返回这 4 个数字，不要任何解释。',
          },
          {
            role: 'user',
            content: [
              { type: 'text', text: '识别这张验证码' },
              { type: 'image_url', image_url: { url: dataUrl } },
            ],
          },
        ],
      }),
    );

    const raw = content.choices[0]?.message?.content?.trim() ?? '';
    return extractDigits(raw);
  }
}

export default AICaptchaModel;

export { extractDigits };
