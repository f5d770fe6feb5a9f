/**
 * Oracle Adapter
 *
 * Wraps a chat model behind the three questions the pipeline asks: which
 * folder, what subject, and whether two documents are the same topic.
 * Transport failures surface as OracleError; unusable replies as null.
 */

import * as Logging from '@/logging';
import { FolderSuggestion, FolderSuggestionRequest } from '@/routing/types';
import { NormalizedDocument } from '@/types';
import { createCompletionFn } from './client';
import { parseFolderResponse, parseSimilarityResponse, parseSubjectResponse } from './parsers';
import { buildFolderMessages, buildSimilarityMessages, buildSubjectMessages } from './prompts';
import {
    CompletionFn,
    OracleConfig,
    OracleInstance,
    SimilarityJudgement,
    SubjectSuggestion,
} from './types';

export const create = (complete: CompletionFn): OracleInstance => {
    const logger = Logging.getLogger();

    const suggestFolder = async (request: FolderSuggestionRequest): Promise<FolderSuggestion | null> => {
        const reply = await complete(buildFolderMessages(request));
        const suggestion = parseFolderResponse(reply, request.catalog);
        if (!suggestion) {
            logger.debug('Could not interpret folder reply: %s', reply);
        }
        return suggestion;
    };

    const extractSubject = async (document: NormalizedDocument): Promise<SubjectSuggestion | null> => {
        const reply = await complete(buildSubjectMessages(document));
        const suggestion = parseSubjectResponse(reply);
        if (!suggestion) {
            logger.debug('Could not interpret subject reply: %s', reply);
        }
        return suggestion;
    };

    const judgeSimilarity = async (contentA: string, contentB: string): Promise<SimilarityJudgement | null> => {
        const reply = await complete(buildSimilarityMessages(contentA, contentB));
        return parseSimilarityResponse(reply);
    };

    return {
        suggestFolder,
        extractSubject,
        judgeSimilarity,
    };
};

/** An oracle backed by the OpenAI SDK, or null when no API key is set. */
export const fromConfig = (config: Partial<OracleConfig> & Omit<OracleConfig, 'apiKey'>): OracleInstance | null => {
    if (!config.apiKey) {
        Logging.getLogger().debug('No API key configured; oracle disabled');
        return null;
    }
    return create(createCompletionFn({ ...config, apiKey: config.apiKey }));
};

export * from './types';
export { parseFolderResponse, parseSimilarityResponse, parseSubjectResponse, repairJson } from './parsers';
export { buildFolderMessages, buildSimilarityMessages, buildSubjectMessages } from './prompts';
