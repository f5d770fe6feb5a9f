/**
 * Archive
 *
 * The archive's directory tree is the only durable state. It is scanned
 * fresh for every decision so manual edits between runs are always seen.
 */

import path from 'node:path';
import * as Logging from '@/logging';
import * as Dates from '@/util/dates';
import * as Storage from '@/util/storage';
import { DEFAULT_TIMEZONE } from '@/constants';
import { normalizeFolderPath } from '@/routing/paths';
import { FolderCatalog } from '@/routing/types';
import { renderStructure } from './structure';
import { ArchiveConfig, ArchiveInstance, FolderNode } from './types';

const isHidden = (name: string): boolean => name.startsWith('.');

/** True for a relative path that climbs out of its base; "..draft" is a plain name. */
export const isOutside = (relative: string): boolean =>
    relative === '..' || relative.startsWith(`..${path.sep}`);

export const create = (config: ArchiveConfig, timezone: string = DEFAULT_TIMEZONE): ArchiveInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });
    const dates = Dates.create({ timezone });
    const root = path.resolve(config.root);
    const excluded = new Set(config.excludedFolders ?? []);

    const absolutePath = (folder: string): string => {
        const normalized = normalizeFolderPath(folder);
        const resolved = path.resolve(root, ...normalized.split('/').filter(Boolean));
        const relative = path.relative(root, resolved);
        if (isOutside(relative) || path.isAbsolute(relative)) {
            throw new Error(`Folder ${folder} is outside the archive`);
        }
        return resolved;
    };

    const listFiles = async (folder: string): Promise<string[]> => {
        const directory = absolutePath(folder);
        if (!await storage.isDirectory(directory)) {
            return [];
        }
        const files = await storage.listFiles(directory);
        return files.filter((name) => !isHidden(name) && !(folder === '' && name === config.structureFile));
    };

    const scanTree = async (): Promise<FolderNode[]> => {
        const nodes: FolderNode[] = [];
        if (!await storage.isDirectory(root)) {
            return nodes;
        }

        // Sorted pre-order walk; siblings come back sorted from listDirectories.
        const walk = async (relative: string, depth: number): Promise<void> => {
            const directory = relative ? path.join(root, ...relative.split('/')) : root;
            for (const name of await storage.listDirectories(directory)) {
                if (isHidden(name) || (depth === 0 && excluded.has(name))) continue;
                const child = relative ? `${relative}/${name}` : name;
                const files = await listFiles(child);
                nodes.push({ path: child, name, depth, fileCount: files.length });
                await walk(child, depth + 1);
            }
        };

        await walk('', 0);
        return nodes;
    };

    const scanCatalog = async (): Promise<FolderCatalog> => {
        const nodes = await scanTree();
        logger.debug('Archive %s holds %d folders', root, nodes.length);
        return Object.freeze(nodes.map((node) => node.path));
    };

    const ensureFolder = async (folder: string): Promise<string> => {
        const directory = absolutePath(folder);
        await storage.createDirectory(directory);
        return directory;
    };

    const summarize = async (): Promise<string> => renderStructure(await scanTree());

    const writeStructure = async (): Promise<string> => {
        const target = path.join(root, config.structureFile);
        await storage.createDirectory(root);
        const content = renderStructure(await scanTree(), dates.format(dates.now(), 'YYYY-MM-DD HH:mm:ss'));
        await storage.writeFile(target, content, 'utf-8');
        logger.debug('Wrote archive structure to %s', target);
        return target;
    };

    return {
        root,
        scanCatalog,
        scanTree,
        listFiles,
        absolutePath,
        ensureFolder,
        summarize,
        writeStructure,
    };
};

export * from './types';
export { renderStructure } from './structure';
