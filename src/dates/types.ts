export type DateSource = 'content' | 'creation' | 'modification' | 'current' | 'fallback';

/** Sources that may appear in the configured priority list. */
export type DatePrioritySource = Exclude<DateSource, 'fallback'>;

export interface DateExtractionResult {
    date: string;
    source: DateSource;
    confidence: number;
    rawMatch?: string;
}

export interface CalendarDate {
    year: number;
    month: number;
    day: number;
}

export interface ContentDateMatch extends CalendarDate {
    rawMatch: string;
    confidence: number;
    pattern: string;
}

export interface DateResolverConfig {
    /** dayjs format string, e.g. `YYYYMMDD`. */
    format: string;
    timezone: string;
    priority: readonly DatePrioritySource[];
}
