/**
 * Complete Phase
 *
 * Carries out a plan: creates the target folder, backs up any file already
 * at the target path, then moves the document into the archive. With a
 * processed directory configured the document is copied into the archive
 * and the original is moved there instead.
 */

import * as path from 'node:path';
import * as Logging from '@/logging';
import * as Archive from '@/archive';
import * as Dates from '@/util/dates';
import * as Storage from '@/util/storage';
import { DATE_FORMAT_BACKUP_STAMP } from '@/constants';
import { ProcessingPlan } from '@/pipeline/types';

export interface CompleteConfig {
    archive: Archive.ArchiveInstance;
    processedDirectory?: string;
    maintainStructureFile: boolean;
    timezone: string;
}

export interface Completion {
    targetPath: string;
    backupPath?: string;
    processedPath?: string;
}

export interface Instance {
    complete(plan: ProcessingPlan): Promise<Completion>;
}

export const backupName = (filename: string, stamp: string): string => {
    const extension = path.extname(filename);
    const stem = path.basename(filename, extension);
    return `${stem}_backup_${stamp}${extension}`;
};

export const create = (config: CompleteConfig): Instance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });
    const dates = Dates.create({ timezone: config.timezone });

    // Moves an existing file aside so nothing is overwritten.
    const backupExisting = async (target: string): Promise<string | undefined> => {
        if (!await storage.exists(target)) {
            return undefined;
        }
        const stamp = dates.format(dates.now(), DATE_FORMAT_BACKUP_STAMP);
        const backupPath = path.join(path.dirname(target), backupName(path.basename(target), stamp));
        await storage.moveFile(target, backupPath);
        logger.warn('Backed up existing %s to %s', path.basename(target), path.basename(backupPath));
        return backupPath;
    };

    const complete = async (plan: ProcessingPlan): Promise<Completion> => {
        // Awaited before the next document so its catalog scan sees the folder
        const folder = await config.archive.ensureFolder(plan.targetFolder);
        if (plan.createFolder) {
            logger.info('Created folder %s', plan.targetFolder);
        }

        const targetPath = path.join(folder, plan.filename);
        const backupPath = await backupExisting(targetPath);

        let processedPath: string | undefined;
        if (config.processedDirectory) {
            await storage.copyFile(plan.sourcePath, targetPath);
            await storage.createDirectory(config.processedDirectory);
            processedPath = path.join(config.processedDirectory, plan.originalName);
            await backupExisting(processedPath);
            await storage.moveFile(plan.sourcePath, processedPath);
        } else {
            await storage.moveFile(plan.sourcePath, targetPath);
        }

        logger.info('Filed %s as %s/%s', plan.originalName, plan.targetFolder, plan.filename);

        if (config.maintainStructureFile) {
            try {
                await config.archive.writeStructure();
            } catch (error: unknown) {
                logger.warn('Could not refresh the archive structure file: %s', error instanceof Error ? error.message : String(error));
            }
        }

        return { targetPath, backupPath, processedPath };
    };

    return { complete };
};
