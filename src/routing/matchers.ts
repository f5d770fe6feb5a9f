/**
 * Local resolution stages. Each returns a decision or null and never looks
 * outside the subject, the catalog and the rules it is handed.
 */

import { SIMILARITY_ACCEPT_SCORE, SIMILARITY_CONTAINMENT_SCORE, SIMILARITY_TOKEN_SCORE } from '@/constants';
import * as Rules from '@/rules';
import { ClassificationDecision, FolderCatalog } from './types';
import { isTopLevel, leafName, pathContains, tokenize } from './paths';

export const exactMatch = (subject: string, catalog: FolderCatalog): ClassificationDecision | null => {
    const lowered = subject.toLocaleLowerCase();
    const tokens = new Set(tokenize(subject));

    for (const folder of catalog) {
        const leaf = leafName(folder).toLocaleLowerCase();
        if (!leaf) continue;
        if (lowered.includes(leaf) || tokens.has(leaf)) {
            return {
                suggestedPath: folder,
                createNew: false,
                reasoning: `Folder name "${leafName(folder)}" appears in the subject`,
                stage: 'exact',
            };
        }
    }
    return null;
};

/** First catalog folder containing one of `patterns`, pattern order first. */
export const firstPatternHit = (patterns: readonly string[], catalog: FolderCatalog): { folder: string; pattern: string } | null => {
    for (const pattern of patterns) {
        const folder = catalog.find((candidate) => pathContains(candidate, pattern));
        if (folder !== undefined) {
            return { folder, pattern };
        }
    }
    return null;
};

export const semanticMatch = (
    scored: Rules.CategoryScore,
    catalog: FolderCatalog,
): ClassificationDecision | null => {
    const hit = firstPatternHit(scored.category.targetPatterns, catalog);
    if (!hit) {
        return null;
    }
    return {
        suggestedPath: hit.folder,
        createNew: false,
        reasoning: `Category "${scored.category.name}" (score ${scored.score.toFixed(2)}, keywords: ${scored.matchedKeywords.join(', ')}) matched pattern "${hit.pattern}"`,
        stage: 'semantic',
    };
};

export const newCategoryFolder = (
    scored: Rules.CategoryScore,
    stage: 'semantic-new' | 'forced-new-category',
): ClassificationDecision | null => {
    const [pattern] = scored.category.targetPatterns;
    if (pattern === undefined) {
        return null;
    }
    return {
        suggestedPath: pattern,
        createNew: true,
        reasoning: `Category "${scored.category.name}" has no folder yet; creating "${pattern}"`,
        stage,
    };
};

export const similarityScore = (subject: string, folder: string): number => {
    const leaf = leafName(folder).toLocaleLowerCase();
    const lowered = subject.trim().toLocaleLowerCase();
    if (!leaf || !lowered) {
        return 0;
    }

    let score = 0;
    if (lowered.includes(leaf) || leaf.includes(lowered)) {
        score += SIMILARITY_CONTAINMENT_SCORE;
    }
    const subjectTokens = new Set(tokenize(lowered));
    if (tokenize(leaf).some((token) => subjectTokens.has(token))) {
        score += SIMILARITY_TOKEN_SCORE;
    }
    return score;
};

export const similarityMatch = (subject: string, catalog: FolderCatalog): ClassificationDecision | null => {
    let bestFolder: string | null = null;
    let bestScore = 0;

    for (const folder of catalog) {
        const score = similarityScore(subject, folder);
        if (score > bestScore) {
            bestScore = score;
            bestFolder = folder;
        }
    }

    if (bestFolder === null || bestScore < SIMILARITY_ACCEPT_SCORE) {
        return null;
    }
    return {
        suggestedPath: bestFolder,
        createNew: false,
        reasoning: `Folder "${bestFolder}" is similar to the subject (score ${bestScore.toFixed(1)})`,
        stage: 'similarity',
    };
};

export const genericRuleMatch = (
    subject: string,
    catalog: FolderCatalog,
    rules: readonly Rules.GenericRule[],
): ClassificationDecision | null => {
    const lowered = subject.toLocaleLowerCase();

    for (const rule of rules) {
        if (!rule.keywords.some((keyword) => lowered.includes(keyword.toLocaleLowerCase()))) {
            continue;
        }
        const hit = firstPatternHit(rule.targetPatterns, catalog);
        if (hit) {
            return {
                suggestedPath: hit.folder,
                createNew: false,
                reasoning: `Generic rule "${rule.name}" matched pattern "${hit.pattern}"`,
                stage: 'forced-generic-rule',
            };
        }
    }
    return null;
};

/**
 * The most generic folder: a configured fallback name, else the first
 * top-level folder, else the first folder. Null only for an empty catalog.
 */
export const genericFolder = (catalog: FolderCatalog, fallbackFolders: readonly string[]): ClassificationDecision | null => {
    for (const name of fallbackFolders) {
        const folder = catalog.find((candidate) => pathContains(candidate, name));
        if (folder !== undefined) {
            return {
                suggestedPath: folder,
                createNew: false,
                reasoning: `Using fallback folder "${folder}"`,
                stage: 'forced-fallback',
            };
        }
    }

    const folder = catalog.find(isTopLevel) ?? catalog[0];
    if (folder === undefined) {
        return null;
    }
    return {
        suggestedPath: folder,
        createNew: false,
        reasoning: `No better match; using "${folder}"`,
        stage: 'forced-fallback',
    };
};
