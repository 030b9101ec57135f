import { describe, expect, test } from 'vitest';
import { AuthError, ProtocolError, SchedulingError, TransportError } from '../src/errors.js';
import { RetryPolicy } from '../src/retry.js';

const policy = new RetryPolicy({
    maxAttempts: 5,
    captchaAttempts: 3,
    baseDelayMs: 100,
    maxDelayMs: 1000,
    jitterMs: 10,
    random: () => 0.5,
});

describe('退避', () => {
    test('指数增长加上抖动，总延迟封顶', () => {
        expect([0, 1, 2, 3, 4, 10].map((a) => policy.backoff(a))).toEqual([105, 205, 405, 805, 1000, 1000]);
    });

    test('抖动随机时延迟也不递减', () => {
        const draws = [0.9, 0, 0.9, 0, 0.9, 0, 0.9, 0];
        const jittery = new RetryPolicy({
            maxAttempts: 8,
            captchaAttempts: 1,
            baseDelayMs: 100,
            maxDelayMs: 500,
            jitterMs: 200,
            random: () => draws.shift() ?? 0,
        });
        const delays = Array.from({ length: 8 }, (_, a) => jittery.backoff(a));
        expect(delays).toEqual([190, 200, 500, 500, 500, 500, 500, 500]);
        expect(delays.every((d, i) => i === 0 || d >= (delays[i - 1] ?? 0))).toBe(true);
    });

    test('重试次数上限', () => {
        expect(policy.shouldRetry(4)).toBe(true);
        expect(policy.shouldRetry(5)).toBe(false);
        expect(policy.shouldRetryCaptcha(2)).toBe(true);
        expect(policy.shouldRetryCaptcha(3)).toBe(false);
    });
});

describe('错误分类', () => {
    const status = (s: number) => new TransportError('UnexpectedStatus', `HTTP ${s}`, { status: s });
    const rejected = (code: number) => new ProtocolError('RejectedByServer', `status=${code}`, { code });

    test('传输层', () => {
        expect(policy.classify(new TransportError('Timeout', 'timeout'))).toBe('Transient');
        expect(policy.classify(new TransportError('ConnectionReset', 'reset'))).toBe('Transient');
        expect(policy.classify(status(401))).toBe('AuthExpired');
        expect(policy.classify(status(302))).toBe('AuthExpired');
        expect(policy.classify(status(404))).toBe('Permanent');
        expect(policy.classify(status(422))).toBe('Permanent');
        expect(policy.classify(status(503))).toBe('Transient');
        expect(policy.classify(status(429))).toBe('Transient');
    });

    test('认证', () => {
        expect(policy.classify(new AuthError('SessionExpired', 'x'))).toBe('AuthExpired');
        expect(policy.classify(new AuthError('NetworkError', 'x'))).toBe('Transient');
        expect(policy.classify(new AuthError('CaptchaRejected', 'x'))).toBe('Transient');
        expect(policy.classify(new AuthError('InvalidCredentials', 'x'))).toBe('Permanent');
    });

    test('协议', () => {
        expect(policy.classify(new ProtocolError('MalformedResponse', 'x'))).toBe('Transient');
        expect(policy.classify(rejected(-1))).toBe('AuthExpired');
        expect(policy.classify(rejected(502))).toBe('Transient');
        expect(policy.classify(rejected(7))).toBe('Permanent');
    });

    test('可配置的服务端状态码', () => {
        const custom = new RetryPolicy({
            maxAttempts: 3,
            captchaAttempts: 3,
            baseDelayMs: 0,
            maxDelayMs: 0,
            jitterMs: 0,
            authExpiredCodes: [-2],
            transientCodes: [7],
        });
        expect(custom.classify(rejected(-2))).toBe('AuthExpired');
        expect(custom.classify(rejected(-1))).toBe('Permanent');
        expect(custom.classify(rejected(7))).toBe('Transient');
    });

    test('调度错误与未知错误不重试', () => {
        expect(policy.classify(new SchedulingError('QueueFull', 'x'))).toBe('Permanent');
        expect(policy.classify(new Error('boom'))).toBe('Permanent');
        expect(policy.classify('boom')).toBe('Permanent');
    });
});
