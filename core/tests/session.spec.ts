import { describe, expect, test } from 'vitest';
import { PlatformApi } from '../src/api/platform.js';
import type { HttpRequest, HttpResponse } from '../src/api/axiosInstance.js';
import { encryptPassword } from '../src/auth/cipher.js';
import { AuthSessionManager, type Session } from '../src/auth/session.js';
import { AuthError, TransportError } from '../src/errors.js';
import { RetryPolicy } from '../src/retry.js';
import { FakePlatform, ScriptedCaptcha, testConfig } from './support/fakePlatform.js';

const config = testConfig();

function setup(options: { answers?: string[]; captchaAttempts?: number; probeIntervalMs?: number; clock?: () => number } = {}) {
    const platform = new FakePlatform();
    const classifier = new ScriptedCaptcha(...(options.answers ?? []));
    const renewed: number[] = [];
    const auth = new AuthSessionManager({
        api: new PlatformApi(platform, config),
        credential: config.credential,
        classifier,
        policy: new RetryPolicy({
            maxAttempts: 5,
            captchaAttempts: options.captchaAttempts ?? 5,
            baseDelayMs: 0,
            maxDelayMs: 0,
            jitterMs: 0,
        }),
        fallbackToken: config.authToken,
        probeIntervalMs: options.probeIntervalMs,
        clock: options.clock,
        onRenewed: (s: Session) => renewed.push(s.id),
    });
    return { platform, classifier, auth, renewed };
}

async function rejection(p: Promise<unknown>): Promise<unknown> {
    try {
        await p;
    } catch (e) {
        return e;
    }
    throw new Error('expected rejection');
}

describe('登录', () => {
    test('提交加密后的密码与验证码，带回验证码 cookie', async () => {
        const { platform, auth } = setup({ answers: ['4821'] });
        const session = await auth.login();

        expect(session.token).toBe('test-token-1');
        expect(session.userId).toBe(42);
        expect(session.cookies).toEqual({ JSESSIONID: 'session-1' });

        const [post] = platform.loginPosts;
        expect(post?.form).toEqual({
            username: 'tester',
            password: encryptPassword('test-secret', 'CCR!@#$%'),
            verify_code: '4821',
            terminal: '1',
        });
        expect(post?.cookies).toEqual({ JSESSIONID: 'pre-login' });
        expect(post?.headers).toEqual({ token: 'test-auth-token' });
    });

    test('识别结果不是 4 位数字时换一张验证码，不提交登录', async () => {
        const { platform, auth, classifier } = setup({ answers: ['abcd', '12', '1234'] });
        await auth.login();
        expect(classifier.calls).toBe(3);
        expect(platform.captchaFetches).toBe(3);
        expect(platform.loginPosts).toHaveLength(1);
    });

    test('服务端提示验证码错误时立即重试', async () => {
        const { platform, auth } = setup();
        platform.loginReplies = [{ json: { status: 0, message: '验证码错误' } }];
        const session = await auth.login();
        expect(session.token).toBe('test-token-2');
        expect(platform.captchaFetches).toBe(2);
        expect(platform.loginPosts).toHaveLength(2);
    });

    test('验证码连续失败达到上限', async () => {
        const { platform, auth } = setup({ answers: ['xx'], captchaAttempts: 3 });
        const e = await rejection(auth.login());
        expect(e).toBeInstanceOf(AuthError);
        expect(e instanceof AuthError && e.kind).toBe('CaptchaRejected');
        expect(platform.captchaFetches).toBe(3);
        expect(platform.loginPosts).toHaveLength(0);
    });

    test('账号密码错误不重试', async () => {
        const { platform, auth } = setup();
        platform.loginReplies = [{ json: { status: 0, message: '用户名或密码错误' } }];
        const e = await rejection(auth.login());
        expect(e instanceof AuthError && e.kind).toBe('InvalidCredentials');
        expect(platform.loginPosts).toHaveLength(1);
    });

    test('未返回 system_uuid 时沿用配置的 token', async () => {
        const { platform, auth } = setup();
        platform.loginReplies = [{ json: { status: 1, message: 'ok' } }];
        const session = await auth.login();
        expect(session.token).toBe('test-auth-token');
        expect(session.userId).toBeUndefined();
    });

    test('网络错误包装为 NetworkError', async () => {
        const { auth } = setup();
        const broken = new FakePlatform();
        broken.request = async (req: HttpRequest): Promise<HttpResponse> => {
            throw new TransportError('Timeout', `${req.url} 请求超时`);
        };
        const offline = new AuthSessionManager({
            api: new PlatformApi(broken, config),
            credential: config.credential,
            classifier: new ScriptedCaptcha(),
            policy: new RetryPolicy({ maxAttempts: 1, captchaAttempts: 1, baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0 }),
        });
        const e = await rejection(offline.login());
        expect(e instanceof AuthError && e.kind).toBe('NetworkError');
        expect(e instanceof Error && e.cause).toBeInstanceOf(TransportError);
        expect(auth.current).toBeNull();
    });
});

describe('会话管理', () => {
    test('并发续期只登录一次', async () => {
        const { platform, auth, renewed } = setup();
        const sessions = await Promise.all([auth.getSession(), auth.getSession(), auth.renew()]);
        expect(new Set(sessions).size).toBe(1);
        expect(platform.loginPosts).toHaveLength(1);
        expect(renewed).toEqual([1]);
    });

    test('旧会话的持有者续期时直接拿到新会话', async () => {
        const { platform, auth } = setup();
        const first = await auth.getSession();
        const [a, b] = await Promise.all([auth.renew(first), auth.renew(first)]);
        expect(a).toBe(b);
        expect(a.id).toBe(2);
        expect(first.valid).toBe(false);

        // first 已经被替换，不会再次登录
        const c = await auth.renew(first);
        expect(c).toBe(a);
        expect(platform.loginPosts).toHaveLength(2);
    });

    test('同一时刻只有一个有效会话', async () => {
        const { auth } = setup();
        const first = await auth.getSession();
        const second = await auth.renew(first);
        expect([first.valid, second.valid]).toEqual([false, true]);
    });

    test('invalidate 后下一次 getSession 重新登录', async () => {
        const { platform, auth } = setup();
        const first = await auth.getSession();
        auth.invalidate(first);
        const second = await auth.getSession();
        expect(second.id).toBe(2);
        expect(platform.loginPosts).toHaveLength(2);
    });

    test('登录失败时所有等待者都收到同一个错误', async () => {
        const { platform, auth } = setup();
        platform.loginReplies = [{ json: { status: 0, message: '账号已停用' } }];
        const results = await Promise.allSettled([auth.getSession(), auth.getSession()]);
        expect(results.map((r) => r.status)).toEqual(['rejected', 'rejected']);
        expect(platform.loginPosts).toHaveLength(1);
    });
});

describe('登录态探测', () => {
    test('根据 HTTP 状态与 status 判断', async () => {
        const { platform, auth } = setup();
        const session = await auth.getSession();

        expect(await auth.isValid(session)).toBe(true);
        platform.loginStatusReply = { json: { status: -1 } };
        expect(await auth.isValid(session)).toBe(false);
        platform.loginStatusReply = { json: { total: 3 } };
        expect(await auth.isValid(session)).toBe(true);
        platform.loginStatusReply = { status: 302, text: '' };
        expect(await auth.isValid(session)).toBe(false);
        platform.loginStatusReply = { text: '<html>login</html>' };
        expect(await auth.isValid(session)).toBe(false);
    });

    test('超过探测间隔且会话失效时重新登录', async () => {
        let now = 0;
        const { platform, auth } = setup({ probeIntervalMs: 1000, clock: () => now });
        const first = await auth.getSession();

        now = 500;
        expect(await auth.getSession()).toBe(first);

        now = 2000;
        platform.loginStatusReply = { json: { status: 0 } };
        const second = await auth.getSession();
        expect(second.id).toBe(2);
        expect(platform.loginPosts).toHaveLength(2);
    });
});
