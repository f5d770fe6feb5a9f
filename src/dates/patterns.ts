import { CalendarDate } from './types';

export interface DatePattern {
    name: string;
    regex: RegExp;
    confidence: number;
    toDate: (match: RegExpExecArray) => CalendarDate;
}

const ymd = (match: RegExpExecArray): CalendarDate => ({
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
});

// Listed in precedence order.
export const DATE_PATTERNS: readonly DatePattern[] = [
    {
        name: 'iso',
        regex: /(?<!\d)(\d{4})[/-](\d{1,2})[/-](\d{1,2})(?!\d)/g,
        confidence: 0.9,
        toDate: ymd,
    },
    {
        name: 'localized',
        regex: /(\d{4})\s*年\s*(\d{1,2})\s*月\s*(\d{1,2})\s*日/g,
        confidence: 0.9,
        toDate: ymd,
    },
    {
        name: 'compact',
        regex: /(?<!\d)(\d{4})(\d{2})(\d{2})(?!\d)/g,
        confidence: 0.8,
        toDate: ymd,
    },
    {
        name: 'us',
        regex: /(?<![\d.])(\d{1,2})\/(\d{1,2})\/(\d{4})(?!\d)/g,
        confidence: 0.7,
        toDate: (match) => ({ year: Number(match[3]), month: Number(match[1]), day: Number(match[2]) }),
    },
    {
        name: 'eu',
        regex: /(?<![\d.])(\d{1,2})\.(\d{1,2})\.(\d{4})(?!\d)/g,
        confidence: 0.7,
        toDate: (match) => ({ year: Number(match[3]), month: Number(match[2]), day: Number(match[1]) }),
    },
];

export const DATE_KEYWORDS: readonly string[] = [
    'date',
    'dated',
    'created',
    'modified',
    'updated',
    'published',
    'meeting time',
    'report time',
    '日期',
    '时间',
    '创建时间',
    '修改时间',
    '撰写时间',
    '会议时间',
    '报告时间',
    '记录时间',
    '发布时间',
];

// Latin keywords match whole words only, so "update" is not "date".
const keywordMatcher = (keyword: string): ((line: string) => boolean) => {
    if (/^[a-z ]+$/.test(keyword)) {
        const regex = new RegExp(`\\b${keyword}\\b`);
        return (line) => regex.test(line);
    }
    return (line) => line.includes(keyword);
};

const KEYWORD_MATCHERS = DATE_KEYWORDS.map(keywordMatcher);

export const hasDateKeyword = (line: string): boolean => {
    const lowered = line.toLocaleLowerCase();
    return KEYWORD_MATCHERS.some((matches) => matches(lowered));
};

/** All matches of one pattern in `text`, in order of appearance. */
export const findMatches = (pattern: DatePattern, text: string): RegExpExecArray[] => {
    const regex = new RegExp(pattern.regex.source, pattern.regex.flags);
    const matches: RegExpExecArray[] = [];
    let match: RegExpExecArray | null;
    while ((match = regex.exec(text)) !== null) {
        matches.push(match);
    }
    return matches;
};
