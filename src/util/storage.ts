import * as fs from 'node:fs';

/**
 * Thin wrapper around node's fs promises API. Every method logs through the
 * supplied `log` callback so callers decide how chatty file access is.
 */
export interface Utility {
    exists: (path: string) => Promise<boolean>;
    isDirectory: (path: string) => Promise<boolean>;
    isFile: (path: string) => Promise<boolean>;
    createDirectory: (path: string) => Promise<void>;
    readFile: (path: string, encoding: BufferEncoding) => Promise<string>;
    writeFile: (path: string, data: string, encoding: BufferEncoding) => Promise<void>;
    copyFile: (source: string, destination: string) => Promise<void>;
    moveFile: (source: string, destination: string) => Promise<void>;
    listDirectories: (directory: string) => Promise<string[]>;
    listFiles: (directory: string) => Promise<string[]>;
    stat: (path: string) => Promise<fs.Stats>;
}

const hasCode = (error: unknown, code: string): boolean =>
    error instanceof Error && 'code' in error && error.code === code;

export const create = (params: { log?: (message: string, ...args: unknown[]) => void }): Utility => {
    const log = params.log || (() => { });

    const exists = async (target: string): Promise<boolean> => {
        try {
            await fs.promises.stat(target);
            return true;
        } catch {
            return false;
        }
    };

    const isDirectory = async (target: string): Promise<boolean> => {
        try {
            const stats = await fs.promises.stat(target);
            if (!stats.isDirectory()) {
                log('%s is not a directory', target);
                return false;
            }
            return true;
        } catch {
            return false;
        }
    };

    const isFile = async (target: string): Promise<boolean> => {
        try {
            const stats = await fs.promises.stat(target);
            return stats.isFile();
        } catch {
            return false;
        }
    };

    const createDirectory = async (target: string): Promise<void> => {
        try {
            await fs.promises.mkdir(target, { recursive: true });
        } catch (error: unknown) {
            throw new Error(`Failed to create directory ${target}: ${error instanceof Error ? error.message : String(error)}`);
        }
    };

    const readFile = async (target: string, encoding: BufferEncoding): Promise<string> => {
        return fs.promises.readFile(target, { encoding });
    };

    const writeFile = async (target: string, data: string, encoding: BufferEncoding): Promise<void> => {
        await fs.promises.writeFile(target, data, { encoding });
    };

    const copyFile = async (source: string, destination: string): Promise<void> => {
        log('Copying %s to %s', source, destination);
        await fs.promises.copyFile(source, destination);
    };

    // rename fails with EXDEV across devices; fall back to copy + unlink
    const moveFile = async (source: string, destination: string): Promise<void> => {
        log('Moving %s to %s', source, destination);
        try {
            await fs.promises.rename(source, destination);
        } catch (error: unknown) {
            if (!hasCode(error, 'EXDEV')) {
                throw error;
            }
            await fs.promises.copyFile(source, destination);
            await fs.promises.unlink(source);
        }
    };

    const listDirectories = async (directory: string): Promise<string[]> => {
        const entries = await fs.promises.readdir(directory, { withFileTypes: true });
        return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name).sort();
    };

    const listFiles = async (directory: string): Promise<string[]> => {
        const entries = await fs.promises.readdir(directory, { withFileTypes: true });
        return entries.filter((entry) => entry.isFile()).map((entry) => entry.name).sort();
    };

    const stat = async (target: string): Promise<fs.Stats> => fs.promises.stat(target);

    return {
        exists,
        isDirectory,
        isFile,
        createDirectory,
        readFile,
        writeFile,
        copyFile,
        moveFile,
        listDirectories,
        listFiles,
        stat,
    };
};
