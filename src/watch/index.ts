/**
 * Inbox Watcher
 *
 * Each `add` event waits out a fixed debounce so the writer can finish,
 * then joins a single queue: one document is processed at a time and a
 * path already queued or in flight is ignored.
 */

import path from 'node:path';
import chokidar, { FSWatcher } from 'chokidar';
import * as Logging from '@/logging';
import { SKIPPED_FILE_NAMES } from '@/constants';

export interface WatchConfig {
    inboxDirectory: string;
    debounceMs: number;
    accept: (filePath: string) => boolean;
    process: (filePath: string) => Promise<unknown>;
}

export interface WatcherInstance {
    start(): Promise<void>;
    stop(): Promise<void>;
    /** Entry point for filesystem events; exposed so tests can drive it. */
    handleEvent(filePath: string): void;
    /** Resolves once every queued document has been processed. */
    idle(): Promise<void>;
    inProgress(): ReadonlySet<string>;
}

export const create = (config: WatchConfig): WatcherInstance => {
    const logger = Logging.getLogger();
    const pending = new Map<string, NodeJS.Timeout>();
    const active = new Set<string>();
    let queue: Promise<void> = Promise.resolve();
    let watcher: FSWatcher | null = null;

    const run = async (filePath: string): Promise<void> => {
        try {
            await config.process(filePath);
        } catch (error: unknown) {
            logger.error('Failed to process %s: %s', filePath, error instanceof Error ? error.message : String(error));
        } finally {
            active.delete(filePath);
        }
    };

    const enqueue = (filePath: string): void => {
        pending.delete(filePath);
        if (active.has(filePath)) {
            logger.debug('%s is already being processed', filePath);
            return;
        }
        active.add(filePath);
        queue = queue.then(() => run(filePath));
    };

    const handleEvent = (filePath: string): void => {
        const name = path.basename(filePath);
        if (name.startsWith('.') || SKIPPED_FILE_NAMES.includes(name) || !config.accept(filePath)) {
            logger.debug('Ignoring %s', filePath);
            return;
        }
        if (active.has(filePath)) {
            logger.debug('Ignoring event for %s, already in progress', filePath);
            return;
        }

        const existing = pending.get(filePath);
        if (existing) {
            clearTimeout(existing);
        }
        pending.set(filePath, setTimeout(() => enqueue(filePath), config.debounceMs));
    };

    const start = async (): Promise<void> => {
        if (watcher) {
            return;
        }
        const instance = chokidar.watch(config.inboxDirectory, {
            depth: 0,
            ignoreInitial: true,
            persistent: true,
        });
        watcher = instance;
        instance.on('add', handleEvent);
        instance.on('error', (error: unknown) => {
            logger.error('Watcher error: %s', error instanceof Error ? error.message : String(error));
        });
        await new Promise<void>((resolve) => {
            instance.once('ready', () => resolve());
        });
        logger.info('Watching %s for new documents', config.inboxDirectory);
    };

    const stop = async (): Promise<void> => {
        for (const timeout of pending.values()) {
            clearTimeout(timeout);
        }
        pending.clear();
        if (watcher) {
            await watcher.close();
            watcher = null;
        }
        await queue;
    };

    return {
        start,
        stop,
        handleEvent,
        idle: () => queue,
        inProgress: () => active,
    };
};
