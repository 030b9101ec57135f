import { afterEach, expect, test, vi } from 'vitest';
import { ProgressEmitter, type RunnerProgressEvent } from '../src/events.js';

afterEach(() => {
    vi.restoreAllMocks();
});

test('监听器抛错时记录警告，其他监听器照常收到事件', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const emitter = new ProgressEmitter();
    const received: string[] = [];
    emitter.on(() => {
        throw new Error('render failed');
    });
    const off = emitter.on((e) => received.push(e.kind));

    const event: RunnerProgressEvent = { kind: 'sessionRenewed', sessionId: 1, ts: 0 };
    emitter.emit(event);
    expect(received).toEqual(['sessionRenewed']);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toContain('render failed');

    off();
    emitter.emit(event);
    expect(received).toEqual(['sessionRenewed']);
});
