/**
 * Oracle response parsing
 *
 * Replies are free text that usually contains JSON. Each parser returns a
 * value or null; `firstParsed` walks the chain and stops at the first hit.
 * Objects are validated with zod, so a well-formed but wrong-shaped reply
 * falls through to the next parser.
 */

import { z } from 'zod';
import { UNTRUSTED_SUBJECT_CONFIDENCE } from '@/constants';
import { normalizeFolderPath } from '@/routing/paths';
import { FolderSuggestion } from '@/routing/types';
import { SimilarityJudgement, SubjectSuggestion } from './types';

export type Parser<T> = (text: string) => T | null;

export const firstParsed = <T>(text: string, parsers: readonly Parser<T>[]): T | null => {
    for (const parser of parsers) {
        const result = parser(text);
        if (result !== null) {
            return result;
        }
    }
    return null;
};

/** Drops trailing commas and escapes raw newlines inside strings. */
export const repairJson = (jsonText: string): string => {
    const withoutTrailingCommas = jsonText.replace(/,(\s*[}\]])/g, '$1');

    let inString = false;
    let escaped = false;
    let out = '';
    for (const char of withoutTrailingCommas) {
        if (escaped) {
            out += char;
            escaped = false;
        } else if (char === '\\') {
            out += char;
            escaped = inString;
        } else if (char === '"') {
            inString = !inString;
            out += char;
        } else if (inString && (char === '\n' || char === '\r')) {
            out += char === '\n' ? '\\n' : '';
        } else {
            out += char;
        }
    }
    return out;
};

export const parseJsonLoosely = (text: string): unknown => {
    try {
        return JSON.parse(text);
    } catch {
        try {
            return JSON.parse(repairJson(text));
        } catch {
            return null;
        }
    }
};

const FENCED_BLOCK = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/i;

const looseObject = (field: string): RegExp => new RegExp(`\\{[^{}]*"${field}"[^{}]*\\}`);

const validated = <S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> | null => {
    if (value === null || value === undefined) {
        return null;
    }
    const result = schema.safeParse(value);
    return result.success ? result.data : null;
};

/** The three JSON stages: whole reply, fenced block, loose `{...field...}`. */
export const jsonParsers = <S extends z.ZodTypeAny>(schema: S, field: string): Parser<z.infer<S>>[] => [
    (text) => validated(schema, parseJsonLoosely(text.trim())),
    (text) => {
        const match = FENCED_BLOCK.exec(text);
        return match?.[1] ? validated(schema, parseJsonLoosely(match[1])) : null;
    },
    (text) => {
        const match = looseObject(field).exec(text);
        return match ? validated(schema, parseJsonLoosely(match[0])) : null;
    },
];

const stripQuotes = (value: string): string => value.trim().replace(/^["'“”‘’`]+|["'“”‘’`,]+$/g, '').trim();

/** Value of the first `label: value` line whose label matches. */
export const labelledValue = (text: string, labels: RegExp): string | null => {
    for (const rawLine of text.split(/\r?\n/)) {
        const line = rawLine.trim();
        const separator = line.search(/[:：]/);
        if (separator <= 0) continue;
        const label = line.slice(0, separator);
        if (!labels.test(label)) continue;
        const value = stripQuotes(line.slice(separator + 1));
        if (value) {
            return value;
        }
    }
    return null;
};

// Folder answers

const FolderAnswerSchema = z.object({
    suggested_path: z.string().trim().min(1),
    create_new: z.boolean().default(false),
    reasoning: z.string().default(''),
});

const toFolderSuggestion = (answer: z.infer<typeof FolderAnswerSchema>): FolderSuggestion => ({
    suggestedPath: normalizeFolderPath(answer.suggested_path),
    createNew: answer.create_new,
    reasoning: answer.reasoning,
});

/**
 * Earliest catalog path mentioned in `text`; the longer path wins when two
 * start at the same place.
 */
export const mentionedFolder = (text: string, catalog: readonly string[]): string | null => {
    const lowered = text.replace(/\\/g, '/').toLocaleLowerCase();
    let best: { folder: string; index: number } | null = null;
    for (const folder of catalog) {
        const index = lowered.indexOf(normalizeFolderPath(folder).toLocaleLowerCase());
        if (index < 0) continue;
        if (best === null || index < best.index || (index === best.index && folder.length > best.folder.length)) {
            best = { folder, index };
        }
    }
    return best?.folder ?? null;
};

export const parseFolderResponse = (text: string, catalog: readonly string[] = []): FolderSuggestion | null => {
    const keywordScan: Parser<FolderSuggestion> = (reply) => {
        const labelled = labelledValue(reply, /suggested_path|path|folder|路径|文件夹/i);
        const found = labelled ?? mentionedFolder(reply, catalog);
        if (!found) {
            return null;
        }
        return {
            suggestedPath: normalizeFolderPath(found),
            createNew: true,
            reasoning: labelledValue(reply, /reason|理由/i) ?? 'Recovered from an unstructured reply',
        };
    };

    return firstParsed(text, [
        ...jsonParsers(FolderAnswerSchema, 'suggested_path').map((parser): Parser<FolderSuggestion> => (reply) => {
            const answer = parser(reply);
            return answer ? toFolderSuggestion(answer) : null;
        }),
        keywordScan,
    ]);
};

// Subject answers

const SubjectAnswerSchema = z.object({
    subject: z.string().trim().min(1),
    suggested_folder: z.string().optional(),
    confidence: z.number().min(0).max(1).default(0.5),
    reasoning: z.string().default(''),
});

const SKIPPED_QUOTES = ['json', 'format', '格式', '示例'];

export const parseSubjectResponse = (text: string): SubjectSuggestion | null => {
    const keywordScan: Parser<SubjectSuggestion> = (reply) => {
        let subject = labelledValue(reply, /subject|主体|主题/i);
        if (!subject) {
            const quoted = Array.from(reply.matchAll(/["'“]([^"'“”]{3,50})["'”]/g), (match) => match[1] ?? '');
            subject = quoted.find((candidate) => !SKIPPED_QUOTES.some((skip) => candidate.toLowerCase().includes(skip))) ?? null;
        }
        if (!subject) {
            return null;
        }
        return {
            subject,
            suggestedFolder: labelledValue(reply, /folder|文件夹/i) ?? undefined,
            confidence: UNTRUSTED_SUBJECT_CONFIDENCE,
            reasoning: 'Recovered from an unstructured reply',
        };
    };

    return firstParsed(text, [
        ...jsonParsers(SubjectAnswerSchema, 'subject').map((parser): Parser<SubjectSuggestion> => (reply) => {
            const answer = parser(reply);
            return answer
                ? {
                    subject: answer.subject,
                    suggestedFolder: answer.suggested_folder,
                    confidence: answer.confidence,
                    reasoning: answer.reasoning,
                }
                : null;
        }),
        keywordScan,
    ]);
};

// Similarity answers

const SimilarityAnswerSchema = z.object({
    is_similar: z.boolean(),
    similarity_score: z.number().min(0).max(1).default(0),
    reasoning: z.string().default(''),
});

export const parseSimilarityResponse = (text: string): SimilarityJudgement | null =>
    firstParsed(text, jsonParsers(SimilarityAnswerSchema, 'is_similar').map((parser): Parser<SimilarityJudgement> => (reply) => {
        const answer = parser(reply);
        return answer ? { isSimilar: answer.is_similar, score: answer.similarity_score, reasoning: answer.reasoning } : null;
    }));
