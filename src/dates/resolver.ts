/**
 * Date Resolver
 *
 * Picks one date per document from its text, its file timestamps or the
 * clock. Sources are tried in the configured order and the first one that
 * yields a date wins; extraction never throws.
 */

import * as Logging from '@/logging';
import * as Dates from '@/util/dates';
import { DATE_KEYWORD_BONUS, DATE_SCAN_WINDOW } from '@/constants';
import { NormalizedDocument } from '@/types';
import { DATE_PATTERNS, findMatches, hasDateKeyword } from './patterns';
import {
    ContentDateMatch,
    DateExtractionResult,
    DatePrioritySource,
    DateResolverConfig,
} from './types';

const SOURCE_CONFIDENCE: Record<Exclude<DatePrioritySource, 'content'>, number> = {
    creation: 0.7,
    modification: 0.6,
    current: 0.5,
};

const FALLBACK_CONFIDENCE = 0.1;

const usable = (value: Date | undefined): value is Date =>
    value !== undefined && !Number.isNaN(value.getTime());

export interface DateResolverInstance {
    extractDate(document: NormalizedDocument): DateExtractionResult;
    extractFromContent(content: string): ContentDateMatch | null;
    formatDate(date: Date): string;
    validateDate(value: string): boolean;
}

export const create = (config: DateResolverConfig): DateResolverInstance => {
    const logger = Logging.getLogger();
    const dates = Dates.create({ timezone: config.timezone });

    const validMatches = (text: string): ContentDateMatch[] => {
        const found: ContentDateMatch[] = [];
        for (const pattern of DATE_PATTERNS) {
            for (const match of findMatches(pattern, text)) {
                const calendar = pattern.toDate(match);
                if (!dates.isCalendarDate(calendar.year, calendar.month, calendar.day)) {
                    logger.debug('Ignoring impossible date %s', match[0]);
                    continue;
                }
                found.push({ ...calendar, rawMatch: match[0], confidence: pattern.confidence, pattern: pattern.name });
            }
        }
        return found;
    };

    const extractFromContent = (content: string): ContentDateMatch | null => {
        if (!content) {
            return null;
        }

        let best: ContentDateMatch | null = null;
        for (const line of content.split(/\r?\n/)) {
            if (!hasDateKeyword(line)) {
                continue;
            }
            for (const match of validMatches(line)) {
                const boosted = Math.min(1, match.confidence + DATE_KEYWORD_BONUS);
                if (best === null || boosted > best.confidence) {
                    best = { ...match, confidence: boosted };
                }
            }
        }
        if (best) {
            return best;
        }

        // validMatches returns pattern precedence order, so the head is the answer
        const [first] = validMatches(content.slice(0, DATE_SCAN_WINDOW));
        return first ?? null;
    };

    const formatDate = (date: Date): string => dates.format(date, config.format);

    const validateDate = (value: string): boolean => dates.isValid(value, config.format);

    const fromSource = (source: DatePrioritySource, document: NormalizedDocument): DateExtractionResult | null => {
        switch (source) {
            case 'content': {
                const match = extractFromContent(document.content);
                if (!match) return null;
                return {
                    date: dates.formatCalendar(match.year, match.month, match.day, config.format),
                    source: 'content',
                    confidence: match.confidence,
                    rawMatch: match.rawMatch,
                };
            }
            case 'creation':
                return usable(document.creationTime)
                    ? { date: formatDate(document.creationTime), source, confidence: SOURCE_CONFIDENCE.creation }
                    : null;
            case 'modification':
                return usable(document.modificationTime)
                    ? { date: formatDate(document.modificationTime), source, confidence: SOURCE_CONFIDENCE.modification }
                    : null;
            case 'current':
                return { date: formatDate(dates.now()), source, confidence: SOURCE_CONFIDENCE.current };
        }
    };

    const extractDate = (document: NormalizedDocument): DateExtractionResult => {
        for (const source of config.priority) {
            try {
                const result = fromSource(source, document);
                if (result) {
                    logger.debug('Date %s from %s (confidence %d)', result.date, source, result.confidence);
                    return result;
                }
            } catch (error: unknown) {
                logger.warn('Date source %s failed for %s: %s', source, document.name, error instanceof Error ? error.message : String(error));
            }
        }

        return {
            date: formatDate(dates.now()),
            source: 'fallback',
            confidence: FALLBACK_CONFIDENCE,
        };
    };

    return {
        extractDate,
        extractFromContent,
        formatDate,
        validateDate,
    };
};
