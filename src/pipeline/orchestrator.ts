/**
 * Pipeline Orchestrator
 *
 * locate -> analyze -> classify -> complete, one document at a time. Any
 * failure is returned as an error result for that document only.
 */

import path from 'node:path';
import * as Archive from '@/archive';
import * as Dates from '@/dates';
import * as Logging from '@/logging';
import * as Oracle from '@/oracle';
import * as Reader from '@/reader';
import * as Routing from '@/routing';
import * as Rules from '@/rules';
import * as AnalyzePhase from '@/phases/analyze';
import * as ClassifyPhase from '@/phases/classify';
import * as CompletePhase from '@/phases/complete';
import * as LocatePhase from '@/phases/locate';
import { PipelineConfig, ProcessingPlan, ProcessingResult } from './types';

export interface OrchestratorInstance {
    plan(filePath: string): Promise<ProcessingPlan>;
    process(filePath: string): Promise<ProcessingResult>;
    isSupported(filePath: string): boolean;
}

export interface OrchestratorDependencies {
    rules: Rules.RuleCatalog;
    oracle: Oracle.OracleInstance | null;
}

const asError = (error: unknown): Error => error instanceof Error ? error : new Error(String(error));

/** Top-level archive folder holding the processed directory, if it lives inside the archive. */
export const processedFolderInArchive = (archiveRoot: string, processedDirectory?: string): string | undefined => {
    if (!processedDirectory) {
        return undefined;
    }
    const relative = path.relative(path.resolve(archiveRoot), path.resolve(processedDirectory));
    if (!relative || Archive.isOutside(relative) || path.isAbsolute(relative)) {
        return undefined;
    }
    return relative.split(path.sep)[0];
};

export const create = (config: PipelineConfig, dependencies: OrchestratorDependencies): OrchestratorInstance => {
    const logger = Logging.getLogger();

    const reader = Reader.create({ supportedExtensions: config.supportedExtensions });
    const processedFolder = processedFolderInArchive(config.archiveRoot, config.processedDirectory);
    const archive = Archive.create({
        root: config.archiveRoot,
        structureFile: config.structureFile,
        excludedFolders: processedFolder ? [processedFolder] : [],
    }, config.timezone);

    const locate = LocatePhase.create(reader);
    const analyze = AnalyzePhase.create({
        dateResolver: Dates.create({
            format: config.dateFormat,
            timezone: config.timezone,
            priority: config.datePriority,
        }),
        oracle: dependencies.oracle,
        fallbackSubject: config.fallbackSubject,
    });
    const classify = ClassifyPhase.create({
        archive,
        routing: Routing.create(dependencies.rules),
        oracle: dependencies.oracle,
        version: { format: config.versionFormat, initialVersion: config.initialVersion },
        maxFilenameLength: config.maxFilenameLength,
        similarityCheck: config.similarityCheck,
        readArchived: async (filePath) => (await reader.read(filePath)).content,
    });
    const complete = CompletePhase.create({
        archive,
        processedDirectory: config.processedDirectory,
        maintainStructureFile: config.maintainStructureFile,
        timezone: config.timezone,
    });

    const plan = async (filePath: string): Promise<ProcessingPlan> => {
        const document = await locate.locate(filePath);
        const analysis = await analyze.analyze(document);
        const result = await classify.classify(document, analysis);
        logger.verbose('%s -> %s/%s (%s)', result.originalName, result.targetFolder, result.filename, result.stage);
        return result;
    };

    const process = async (filePath: string): Promise<ProcessingResult> => {
        try {
            const planned = await plan(filePath);
            if (config.dryRun) {
                logger.info('[dry run] %s -> %s/%s', planned.originalName, planned.targetFolder, planned.filename);
                return { status: 'planned', plan: planned };
            }
            const completion = await complete.complete(planned);
            return { status: 'success', plan: planned, ...completion };
        } catch (error: unknown) {
            const failure = asError(error);
            logger.error('Failed to process %s: %s', filePath, failure.message);
            return { status: 'error', sourcePath: filePath, error: failure };
        }
    };

    return {
        plan,
        process,
        isSupported: reader.isSupported,
    };
};
