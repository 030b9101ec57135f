import { describe, expect, test } from 'vitest';
import CourseTask from '../src/course/task.js';
import type { Course } from '../src/course/types.js';
import { SchedulingError } from '../src/errors.js';
import { TaskQueue } from '../src/scheduler/queue.js';
import RateLimiter from '../src/scheduler/rateLimiter.js';
import { makeCourse } from './support/fakePlatform.js';

function task(id: number, progressPercent: number, category: Course['category']) {
    return new CourseTask(makeCourse({ id, progressPercent, category }), { completionRatio: 0.9 });
}

describe('任务队列', () => {
    test('进度低的优先，其次必修，最后按 ID', () => {
        const queue = new TaskQueue(10);
        queue.push(task(3, 50, 'elective'));
        queue.push(task(1, 10, 'elective'));
        queue.push(task(4, 10, 'required'));
        queue.push(task(2, 10, 'required'));
        queue.push(task(5, 0, 'elective'));

        const order: number[] = [];
        for (let t = queue.takeReady(0); t; t = queue.takeReady(0)) order.push(t.id);
        expect(order).toEqual([5, 2, 4, 1, 3]);
    });

    test('退避中的任务不可派发', () => {
        const queue = new TaskQueue(10);
        queue.push(task(1, 0, 'required'), 5000);
        queue.push(task(2, 80, 'elective'), 1000);

        expect(queue.takeReady(500)).toBeNull();
        expect(queue.nextAvailableAt()).toBe(1000);
        expect(queue.takeReady(1000)?.id).toBe(2);
        expect(queue.takeReady(4999)).toBeNull();
        expect(queue.takeReady(5000)?.id).toBe(1);
        expect(queue.nextAvailableAt()).toBeNull();
    });

    test('容量已满时拒绝入队', () => {
        const queue = new TaskQueue(2);
        queue.push(task(1, 0, 'required'));
        queue.push(task(2, 0, 'required'));
        let caught: unknown;
        try {
            queue.push(task(3, 0, 'required'));
        } catch (e) {
            caught = e;
        }
        expect(caught instanceof SchedulingError && caught.kind).toBe('QueueFull');
        expect(queue.size).toBe(2);
    });

    test('同一课程不会重复入队', () => {
        const queue = new TaskQueue(5);
        const t = task(1, 0, 'required');
        queue.push(t);
        expect(() => queue.push(t)).toThrow();
        expect(queue.has(1)).toBe(true);
        expect(queue.size).toBe(1);
    });
});

describe('提交限速', () => {
    test('按课程与全局两级间隔发放名额', async () => {
        let now = 10_000;
        const limiter = new RateLimiter({ taskIntervalMs: 25_000, globalIntervalMs: 1_500, clock: () => now });

        expect(await limiter.acquire(1)).toBe(true);
        expect(limiter.waitTime(1)).toBe(25_000);
        expect(limiter.waitTime(2)).toBe(1_500);

        now += 1_500;
        expect(limiter.waitTime(2)).toBe(0);
        expect(await limiter.acquire(2)).toBe(true);
        expect(limiter.waitTime(1)).toBe(23_500);

        limiter.forget(1);
        expect(limiter.waitTime(1)).toBe(1_500);
    });

    test('等待可以被取消，且不占用名额', async () => {
        const limiter = new RateLimiter({ taskIntervalMs: 60_000, globalIntervalMs: 0 });
        expect(await limiter.acquire(1)).toBe(true);

        const controller = new AbortController();
        const pending = limiter.acquire(1, controller.signal);
        controller.abort();
        expect(await pending).toBe(false);

        const aborted = new AbortController();
        aborted.abort();
        expect(await limiter.acquire(2, aborted.signal)).toBe(false);
        expect(await limiter.acquire(2)).toBe(true);
    });
});
