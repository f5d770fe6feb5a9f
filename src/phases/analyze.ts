/**
 * Analyze Phase
 *
 * Settles the subject and the date of a document. The subject comes from the
 * oracle when one is configured, then the document title, then the file
 * name; the date comes from the Date Resolver.
 */

import * as Logging from '@/logging';
import * as Dates from '@/dates';
import * as Oracle from '@/oracle';
import { NormalizedDocument } from '@/types';
import { SubjectSource } from '@/pipeline/types';

export interface Analysis {
    subject: string;
    subjectSource: SubjectSource;
    subjectConfidence: number;
    suggestedFolder?: string;
    date: Dates.DateExtractionResult;
}

export interface AnalyzeConfig {
    dateResolver: Dates.DateResolverInstance;
    oracle: Oracle.OracleInstance | null;
    fallbackSubject: string;
}

export interface Instance {
    analyze(document: NormalizedDocument): Promise<Analysis>;
}

const METADATA_CONFIDENCE = 0.6;
const FILENAME_CONFIDENCE = 0.4;
const FALLBACK_CONFIDENCE = 0.1;

export const create = (config: AnalyzeConfig): Instance => {
    const logger = Logging.getLogger();

    const localSubject = (document: NormalizedDocument): Pick<Analysis, 'subject' | 'subjectSource' | 'subjectConfidence'> => {
        const title = document.metadata.title?.trim();
        if (title) {
            return { subject: title, subjectSource: 'metadata', subjectConfidence: METADATA_CONFIDENCE };
        }
        const stem = document.stem.trim();
        if (stem) {
            return { subject: stem, subjectSource: 'filename', subjectConfidence: FILENAME_CONFIDENCE };
        }
        return { subject: config.fallbackSubject, subjectSource: 'fallback', subjectConfidence: FALLBACK_CONFIDENCE };
    };

    const analyze = async (document: NormalizedDocument): Promise<Analysis> => {
        const date = config.dateResolver.extractDate(document);

        if (config.oracle) {
            try {
                const suggestion = await config.oracle.extractSubject(document);
                if (suggestion) {
                    logger.debug('Oracle subject for %s: %s (%d)', document.name, suggestion.subject, suggestion.confidence);
                    return {
                        subject: suggestion.subject,
                        subjectSource: 'oracle',
                        subjectConfidence: suggestion.confidence,
                        suggestedFolder: suggestion.suggestedFolder,
                        date,
                    };
                }
            } catch (error: unknown) {
                logger.warn('Subject extraction failed for %s, using local signals: %s', document.name, error instanceof Error ? error.message : String(error));
            }
        }

        return { ...localSubject(document), date };
    };

    return { analyze };
};
