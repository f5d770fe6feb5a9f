/**
 * Classify Phase
 *
 * Scans the archive fresh, resolves the target folder, derives the version
 * from the files already in that folder and builds the final filename.
 */

import path from 'node:path';
import * as Logging from '@/logging';
import * as Archive from '@/archive';
import * as Naming from '@/naming';
import * as Oracle from '@/oracle';
import * as Routing from '@/routing';
import { NormalizedDocument } from '@/types';
import { ProcessingPlan } from '@/pipeline/types';
import { Analysis } from './analyze';

export interface ClassifyConfig {
    archive: Archive.ArchiveInstance;
    routing: Routing.RoutingInstance;
    oracle: Oracle.OracleInstance | null;
    version: Naming.VersionOptions;
    maxFilenameLength: number;
    /** Ask the oracle to confirm keyword-similar files before versioning. */
    similarityCheck: boolean;
    /** Text of an archived file, for the similarity check. */
    readArchived: (absolutePath: string) => Promise<string>;
}

export interface Instance {
    classify(document: NormalizedDocument, analysis: Analysis): Promise<ProcessingPlan>;
}

export const create = (config: ClassifyConfig): Instance => {
    const logger = Logging.getLogger();

    const confirmSimilar = async (document: NormalizedDocument, folderPath: string, candidates: string[]): Promise<string[]> => {
        const oracle = config.oracle;
        if (!config.similarityCheck || !oracle || candidates.length === 0 || !document.content) {
            return candidates;
        }

        const confirmed: string[] = [];
        for (const candidate of candidates) {
            try {
                const content = await config.readArchived(path.join(folderPath, candidate));
                const judgement = await oracle.judgeSimilarity(document.content, content);
                // No verdict leaves the keyword match standing
                if (judgement === null || judgement.isSimilar) {
                    confirmed.push(candidate);
                }
            } catch (error: unknown) {
                logger.debug('Similarity check for %s failed, keeping it: %s', candidate, error instanceof Error ? error.message : String(error));
                confirmed.push(candidate);
            }
        }
        return confirmed;
    };

    const classify = async (document: NormalizedDocument, analysis: Analysis): Promise<ProcessingPlan> => {
        const catalog = await config.archive.scanCatalog();
        const structure = config.oracle ? await config.archive.summarize() : undefined;
        const decision = await config.routing.resolveFolder(analysis.subject, catalog, config.oracle ?? undefined, { structure });

        const folderPath = config.archive.absolutePath(decision.suggestedPath);
        const archived = decision.createNew ? [] : await config.archive.listFiles(decision.suggestedPath);
        const similar = await confirmSimilar(document, folderPath, Naming.findSimilarFiles(analysis.subject, archived));
        const version = Naming.formatVersion(Naming.nextVersion(similar, config.version));

        const filename = Naming.buildFilename(
            analysis.subject,
            analysis.date.date,
            version,
            document.extension,
            { maxLength: config.maxFilenameLength },
        );
        const targetPath = path.join(folderPath, filename);

        const plan: ProcessingPlan = {
            sourcePath: document.path,
            originalName: document.name,
            subject: analysis.subject,
            subjectSource: analysis.subjectSource,
            subjectConfidence: analysis.subjectConfidence,
            date: analysis.date.date,
            dateSource: analysis.date.source,
            dateConfidence: analysis.date.confidence,
            version,
            filename,
            targetFolder: decision.suggestedPath,
            targetPath,
            createFolder: decision.createNew,
            reasoning: decision.reasoning,
            stage: decision.stage,
        };

        if (archived.includes(filename)) {
            plan.warning = `${filename} already exists in ${decision.suggestedPath}; it will be backed up`;
            logger.warn('%s', plan.warning);
        }

        return plan;
    };

    return { classify };
};
