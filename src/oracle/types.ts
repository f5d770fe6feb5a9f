import { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { FolderOracle } from '@/routing/types';
import { NormalizedDocument } from '@/types';

export class OracleError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'OracleError';
    }
}

export interface OracleConfig {
    apiKey: string;
    model: string;
    baseUrl?: string;
    /** Milliseconds before a request is abandoned. */
    timeout: number;
}

/** Sends chat messages, resolves with the reply text. */
export type CompletionFn = (messages: ChatCompletionMessageParam[]) => Promise<string>;

export interface SubjectSuggestion {
    subject: string;
    suggestedFolder?: string;
    confidence: number;
    reasoning: string;
}

export interface SimilarityJudgement {
    isSimilar: boolean;
    score: number;
    reasoning: string;
}

export interface OracleInstance extends FolderOracle {
    extractSubject(document: NormalizedDocument): Promise<SubjectSuggestion | null>;
    judgeSimilarity(contentA: string, contentB: string): Promise<SimilarityJudgement | null>;
}
