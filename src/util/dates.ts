import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import timezone from 'dayjs/plugin/timezone';
import utc from 'dayjs/plugin/utc';

dayjs.extend(utc);
dayjs.extend(timezone);
dayjs.extend(customParseFormat);

export type DateInput = Date | string | number | null | undefined;

export interface Utility {
    now: () => Date;
    format: (date: DateInput, format: string) => string;
    formatCalendar: (year: number, month: number, day: number, format: string) => string;
    isValid: (value: string, format: string) => boolean;
    isCalendarDate: (year: number, month: number, day: number) => boolean;
}

export const create = (parameters: { timezone: string }): Utility => {
    const { timezone } = parameters;

    const now = (): Date => new Date();

    const format = (input: DateInput, format: string): string => {
        const base = input === null || input === undefined ? dayjs() : dayjs(input);
        return base.tz(timezone).format(format);
    };

    // Calendar dates read from text carry no zone; format them as-is.
    const formatCalendar = (year: number, month: number, day: number, format: string): string =>
        dayjs.utc(Date.UTC(year, month - 1, day)).format(format);

    const isValid = (value: string, format: string): boolean =>
        value.length > 0 && dayjs(value, format, true).isValid();

    const isCalendarDate = (year: number, month: number, day: number): boolean => {
        if (month < 1 || month > 12 || day < 1) {
            return false;
        }
        const candidate = new Date(Date.UTC(year, month - 1, day));
        return candidate.getUTCFullYear() === year
            && candidate.getUTCMonth() === month - 1
            && candidate.getUTCDate() === day;
    };

    return {
        now,
        format,
        formatCalendar,
        isValid,
        isCalendarDate,
    };
};

export const isValidTimezone = (zone: string): boolean => {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone: zone });
        return true;
    } catch {
        return false;
    }
};
