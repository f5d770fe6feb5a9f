/**
 * Folder Resolution Engine
 *
 * Runs the stages in a fixed order and returns the first decision produced:
 * exact name, rule category, rule category as a new folder, similarity,
 * oracle, then forced resolution. Without an oracle the result depends only
 * on the subject, the catalog and the rules.
 */

import * as Logging from '@/logging';
import * as Rules from '@/rules';
import { sanitizeSubject } from '@/naming/filename';
import {
    exactMatch,
    genericFolder,
    genericRuleMatch,
    newCategoryFolder,
    semanticMatch,
    similarityMatch,
} from './matchers';
import { findInCatalog } from './paths';
import { ClassificationDecision, FolderCatalog, FolderOracle, ResolveOptions } from './types';

export interface ResolverInstance {
    resolveFolder(
        subject: string,
        catalog: FolderCatalog,
        oracle?: FolderOracle,
        options?: ResolveOptions,
    ): Promise<ClassificationDecision>;
    resolveLocally(subject: string, catalog: FolderCatalog): ClassificationDecision | null;
    forceResolve(subject: string, catalog: FolderCatalog): ClassificationDecision;
}

export const create = (rules: Rules.RuleCatalog): ResolverInstance => {
    const logger = Logging.getLogger();
    const { strategy } = rules;

    /** Stages 1 to 4. */
    const resolveLocally = (subject: string, catalog: FolderCatalog): ClassificationDecision | null => {
        const exact = exactMatch(subject, catalog);
        if (exact) return exact;

        const scored = Rules.bestCategory(subject, rules);
        if (scored) {
            const semantic = semanticMatch(scored, catalog);
            if (semantic) return semantic;

            if (strategy.allowNewFolders && !strategy.forceExisting) {
                const created = newCategoryFolder(scored, 'semantic-new');
                if (created) return created;
            }
        }

        return similarityMatch(subject, catalog);
    };

    const forceResolve = (subject: string, catalog: FolderCatalog): ClassificationDecision => {
        if (catalog.length > 0) {
            return genericRuleMatch(subject, catalog, rules.genericRules)
                ?? genericFolder(catalog, rules.fallbackFolders)
                ?? subjectFolder(subject);
        }

        if (strategy.allowNewFolders) {
            const scored = Rules.bestCategory(subject, rules);
            const created = scored ? newCategoryFolder(scored, 'forced-new-category') : null;
            if (created) return created;
        }

        return subjectFolder(subject);
    };

    const subjectFolder = (subject: string): ClassificationDecision => {
        const folder = sanitizeSubject(subject);
        return {
            suggestedPath: folder,
            createNew: true,
            reasoning: `Archive has no folders; creating "${folder}" from the subject`,
            stage: 'forced-subject',
        };
    };

    const consultOracle = async (
        subject: string,
        catalog: FolderCatalog,
        oracle: FolderOracle,
        options: ResolveOptions,
    ): Promise<ClassificationDecision | null> => {
        try {
            const suggestion = await oracle.suggestFolder({ subject, catalog, structure: options.structure });
            if (!suggestion) {
                logger.debug('Oracle gave no usable answer for "%s"', subject);
                return null;
            }
            const member = findInCatalog(suggestion.suggestedPath, catalog);
            if (member === undefined) {
                logger.info('Oracle suggested "%s", which is not an existing folder; ignoring it', suggestion.suggestedPath);
                return null;
            }
            return {
                suggestedPath: member,
                createNew: false,
                reasoning: suggestion.reasoning || `Oracle suggested "${member}"`,
                stage: 'oracle',
            };
        } catch (error: unknown) {
            logger.warn('Oracle consultation failed, falling back: %s', error instanceof Error ? error.message : String(error));
            return null;
        }
    };

    const resolveFolder = async (
        subject: string,
        catalog: FolderCatalog,
        oracle?: FolderOracle,
        options: ResolveOptions = {},
    ): Promise<ClassificationDecision> => {
        const local = resolveLocally(subject, catalog);
        if (local) {
            logger.debug('Resolved "%s" at stage %s: %s', subject, local.stage, local.suggestedPath);
            return local;
        }

        // An empty catalog has no member the oracle could name.
        if (oracle && catalog.length > 0) {
            const suggested = await consultOracle(subject, catalog, oracle, options);
            if (suggested) {
                logger.debug('Resolved "%s" via oracle: %s', subject, suggested.suggestedPath);
                return suggested;
            }
        }

        const forced = forceResolve(subject, catalog);
        logger.debug('Resolved "%s" at stage %s: %s', subject, forced.stage, forced.suggestedPath);
        return forced;
    };

    return {
        resolveFolder,
        resolveLocally,
        forceResolve,
    };
};
