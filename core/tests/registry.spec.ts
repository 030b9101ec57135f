import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { JsonFileCourseRegistry, MemoryCourseRegistry } from '../src/course/registry.js';
import { type CourseRecord, toCourseRecord } from '../src/course/types.js';
import { makeCourse } from './support/fakePlatform.js';

function record(id: number, sessionTime = 0): CourseRecord {
    return toCourseRecord(makeCourse({ id, sessionTime, lessonLocation: sessionTime }), new Date(Date.UTC(2024, 0, 5, 1, 2, 3)));
}

describe('JSON 文件登记表', () => {
    let dir = '';

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'pacer-registry-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    test('文件不存在时为空', async () => {
        expect(await new JsonFileCourseRegistry(join(dir, 'missing.json')).load()).toEqual([]);
    });

    test('并发写入全部落盘，重启后可读回', async () => {
        const path = join(dir, 'nested', 'courses.json');
        const registry = new JsonFileCourseRegistry(path);
        await Promise.all([1, 2, 3, 4, 5].map((id) => registry.save(record(id, id * 10))));
        await registry.save(record(3, 300));

        const reloaded = await new JsonFileCourseRegistry(path).load();
        expect(reloaded.map((r) => [r.id, r.sessionTime])).toEqual([
            [1, 10],
            [2, 20],
            [3, 300],
            [4, 40],
            [5, 50],
        ]);
        expect(reloaded[0]?.updatedAt).toBe('2024-01-05T01:02:03.000Z');
    });

    test('损坏的文件与非法记录被忽略', async () => {
        const broken = join(dir, 'broken.json');
        await writeFile(broken, '{not json', 'utf-8');
        expect(await new JsonFileCourseRegistry(broken).load()).toEqual([]);

        const mixed = join(dir, 'mixed.json');
        await writeFile(mixed, JSON.stringify([record(7), { id: 'x' }, null]), 'utf-8');
        const registry = new JsonFileCourseRegistry(mixed);
        expect((await registry.load()).map((r) => r.id)).toEqual([7]);

        await registry.save(record(8));
        const saved: unknown = JSON.parse(await readFile(mixed, 'utf-8'));
        expect(Array.isArray(saved) && saved.length).toBe(2);
    });
});

test('内存登记表返回副本', async () => {
    const registry = new MemoryCourseRegistry([record(1)]);
    const [first] = await registry.load();
    if (first) first.sessionTime = 999;
    expect(registry.get(1)?.sessionTime).toBe(0);

    await registry.save(record(2, 60));
    expect((await registry.load()).map((r) => r.id)).toEqual([1, 2]);
});
