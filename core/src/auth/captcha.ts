/**
 * 验证码识别能力。实现可能识别错误，调用方需要容忍重复调用。
 */
interface CaptchaClassifier {
  classify(image: Buffer): Promise<string>;
}

/** 平台验证码固定为 4 位数字 */
const CAPTCHA_PATTERN = /^\d{4}$/;

function isPlausibleCaptcha(code: string): boolean {
  return CAPTCHA_PATTERN.test(code);
}

export { isPlausibleCaptcha };
export type { CaptchaClassifier };
