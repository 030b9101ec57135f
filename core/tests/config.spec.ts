import { describe, expect, test } from 'vitest';
import AICaptchaModel, { extractDigits } from '../src/ai/CaptchaModel.js';
import { isPlausibleCaptcha } from '../src/auth/captcha.js';
import { loadConfig, parseEnvBool } from '../src/config.js';
import { testConfig } from './support/fakePlatform.js';

describe('配置读取', () => {
    test('未设置时使用默认值', () => {
        const config = loadConfig({});
        expect(config.baseUrl).toBe('https://edu.nxgbjy.org.cn');
        expect(config.classId).toBe(275);
        expect(config.sco).toEqual({ default: 'res01' });
        expect(config.proxy).toBeUndefined();
        expect(config.registryPath).toBe('data/courses.json');
        expect(config.scheduler).toEqual({
            concurrency: 3,
            cadenceMs: 30_000,
            taskIntervalMs: 25_000,
            globalIntervalMs: 1_500,
            drainTimeoutMs: 15_000,
            queueCapacity: 500,
            completionRatio: 0.9,
        });
        expect(config.retry.maxAttempts).toBe(5);
        expect(config.urls.seek()).toBe('/device/study_new!seek.do');
    });

    test('并发数限制在 1 到 6 之间', () => {
        expect(loadConfig({ _CONCURRENCY: '10' }).scheduler.concurrency).toBe(6);
        expect(loadConfig({ _CONCURRENCY: '0' }).scheduler.concurrency).toBe(1);
        expect(loadConfig({ _CONCURRENCY: 'abc' }).scheduler.concurrency).toBe(3);
    });

    test('地址、代理与超时', () => {
        const config = loadConfig({
            _BASE_URL: 'http://platform.test///',
            _PROXY_HOST: '127.0.0.1',
            _PROXY_PORT: '7890',
            _AI_TIMEOUT_MS: '100',
        });
        expect(config.baseUrl).toBe('http://platform.test');
        expect(config.proxy).toEqual({ host: '127.0.0.1', port: 7890 });
        expect(config.ai.timeoutMs).toBe(5_000);
    });

    test('布尔开关', () => {
        expect(parseEnvBool('1', false)).toBe(true);
        expect(parseEnvBool('YES', false)).toBe(true);
        expect(parseEnvBool('no', true)).toBe(false);
        expect(parseEnvBool('', true)).toBe(true);
        expect(parseEnvBool(undefined, false)).toBe(false);
    });
});

describe('验证码识别', () => {
    test('从模型回答中提取 4 位数字', () => {
        expect(extractDigits('1234')).toBe('1234');
        expect(extractDigits('验证码：5678')).toBe('5678');
        expect(extractDigits('1 2 3 4')).toBe('1234');
        expect(extractDigits('看不清')).toBe('看不清');
        expect(extractDigits('12345')).toBe('12345');
    });

    test('只接受 4 位数字', () => {
        expect(isPlausibleCaptcha('0042')).toBe(true);
        expect(isPlausibleCaptcha('12345')).toBe(false);
        expect(isPlausibleCaptcha('12a4')).toBe(false);
    });

    test('未配置模型时不创建识别器', () => {
        expect(AICaptchaModel.init(testConfig())).toBeNull();
    });
});
