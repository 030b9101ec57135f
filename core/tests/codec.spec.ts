import { describe, expect, test } from 'vitest';
import ProgressCodec, { decode, encode, formatLearnTime } from '../src/course/codec.js';
import { ProtocolError } from '../src/errors.js';

describe('进度报文编码', () => {
    test('last_learn_time 使用字面量 +', () => {
        expect(formatLearnTime(new Date(2024, 0, 5, 9, 3, 7))).toBe('2024-01-05+09:03:07');
        expect(formatLearnTime(new Date(2023, 11, 31, 23, 59, 59))).toBe('2023-12-31+23:59:59');
    });

    test('serializeSco 紧凑且字段顺序固定', () => {
        const payload = encode(
            { userCourseId: 9001, scoId: 'res01' },
            {
                lessonLocation: 120.7,
                sessionTimeDelta: 30.9,
                timestamp: new Date(2024, 0, 5, 9, 3, 7),
                completionStatus: 'incomplete',
            },
        );
        expect(payload).toEqual({
            id: '9001',
            duration: '30',
            serializeSco:
                '{"res01":{"lesson_location":120,"session_time":30,"last_learn_time":"2024-01-05+09:03:07"},"last_study_sco":"res01"}',
        });
        expect(ProgressCodec.toForm(payload)).toEqual({
            id: '9001',
            serializeSco: payload.serializeSco,
            duration: '30',
        });
    });

    test('负数与非有限值按 0 处理', () => {
        const payload = encode(
            { userCourseId: 1, scoId: 'sco_a' },
            {
                lessonLocation: -5,
                sessionTimeDelta: Number.NaN,
                timestamp: new Date(2024, 5, 1, 0, 0, 0),
                completionStatus: 'completed',
            },
        );
        expect(payload.duration).toBe('0');
        expect(payload.serializeSco).toBe(
            '{"sco_a":{"lesson_location":0,"session_time":0,"last_learn_time":"2024-06-01+00:00:00"},"last_study_sco":"sco_a"}',
        );
    });
});

describe('进度响应解码', () => {
    test('status 0 表示接受', () => {
        expect(decode('{"status":0}')).toEqual({ accepted: true, statusCode: 0, message: undefined });
    });

    test('非 0 状态码原样返回', () => {
        expect(decode(Buffer.from('{"status":-1,"message":"请重新登录"}'))).toEqual({
            accepted: false,
            statusCode: -1,
            message: '请重新登录',
        });
        expect(decode('{"code":"503","msg":"busy"}')).toEqual({ accepted: false, statusCode: 503, message: 'busy' });
    });

    test('裸数字响应', () => {
        expect(decode(' 0 \n')).toEqual({ accepted: true, statusCode: 0, message: undefined });
        expect(decode('-1').statusCode).toBe(-1);
    });

    test('无法解析时抛出 MalformedResponse', () => {
        for (const body of ['<html>login</html>', '{"message":"no status"}', '', '[1,2]']) {
            let caught: unknown;
            try {
                decode(body);
            } catch (e) {
                caught = e;
            }
            expect(caught).toBeInstanceOf(ProtocolError);
            expect(caught instanceof ProtocolError && caught.kind).toBe('MalformedResponse');
        }
    });
});
