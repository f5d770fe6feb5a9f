import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const mockLogger = vi.hoisted(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    verbose: vi.fn(),
}));

vi.mock('../../src/logging', () => ({
    getLogger: () => mockLogger,
}));

import * as Watch from '../../src/watch';

const deferred = (): { promise: Promise<void>; resolve: () => void } => {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((done) => {
        resolve = done;
    });
    return { promise, resolve };
};

describe('Inbox Watcher', () => {
    const processFile = vi.fn<(filePath: string) => Promise<unknown>>();
    let watcher: Watch.WatcherInstance;

    beforeEach(() => {
        vi.clearAllMocks();
        vi.useFakeTimers();
        processFile.mockResolvedValue(undefined);
        watcher = Watch.create({
            inboxDirectory: '/inbox',
            debounceMs: 1000,
            accept: (filePath) => filePath.endsWith('.md'),
            process: processFile,
        });
    });

    afterEach(async () => {
        await watcher.stop();
        vi.useRealTimers();
    });

    it('waits for the debounce window to pass', async () => {
        watcher.handleEvent('/inbox/a.md');
        await vi.advanceTimersByTimeAsync(500);
        watcher.handleEvent('/inbox/a.md');
        await vi.advanceTimersByTimeAsync(999);

        expect(processFile).not.toHaveBeenCalled();

        await vi.advanceTimersByTimeAsync(1);
        await watcher.idle();

        expect(processFile).toHaveBeenCalledTimes(1);
        expect(processFile).toHaveBeenCalledWith('/inbox/a.md');
    });

    it('ignores hidden, skipped and unsupported files', async () => {
        watcher.handleEvent('/inbox/.draft.md');
        watcher.handleEvent('/inbox/README.md');
        watcher.handleEvent('/inbox/tool.exe');
        await vi.advanceTimersByTimeAsync(1000);
        await watcher.idle();

        expect(processFile).not.toHaveBeenCalled();
    });

    it('processes one document at a time', async () => {
        const first = deferred();
        processFile.mockImplementationOnce(() => first.promise);

        watcher.handleEvent('/inbox/a.md');
        watcher.handleEvent('/inbox/b.md');
        await vi.advanceTimersByTimeAsync(1000);

        expect(processFile).toHaveBeenCalledTimes(1);
        expect(watcher.inProgress().has('/inbox/b.md')).toBe(true);

        first.resolve();
        await watcher.idle();

        expect(processFile.mock.calls.map(([filePath]) => filePath)).toEqual(['/inbox/a.md', '/inbox/b.md']);
        expect(watcher.inProgress().size).toBe(0);
    });

    it('ignores events for a document already in flight', async () => {
        const first = deferred();
        processFile.mockImplementationOnce(() => first.promise);

        watcher.handleEvent('/inbox/a.md');
        await vi.advanceTimersByTimeAsync(1000);
        watcher.handleEvent('/inbox/a.md');
        await vi.advanceTimersByTimeAsync(1000);
        first.resolve();
        await watcher.idle();

        expect(processFile).toHaveBeenCalledTimes(1);
    });

    it('logs a failure and keeps going', async () => {
        processFile.mockRejectedValueOnce(new Error('disk full'));

        watcher.handleEvent('/inbox/a.md');
        watcher.handleEvent('/inbox/b.md');
        await vi.advanceTimersByTimeAsync(1000);
        await watcher.idle();

        expect(mockLogger.error).toHaveBeenCalledWith('Failed to processFile %s: %s', '/inbox/a.md', 'disk full');
        expect(processFile).toHaveBeenCalledTimes(2);
    });

    it('drops pending events on stop', async () => {
        watcher.handleEvent('/inbox/a.md');
        await watcher.stop();
        await vi.advanceTimersByTimeAsync(1000);

        expect(processFile).not.toHaveBeenCalled();
    });
});
