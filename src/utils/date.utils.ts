// src/utils/date.utils.ts
import { startOfDay, endOfDay, parseISO, isValid, formatISO } from 'date-fns';
import httpStatus from 'http-status';
import ApiError from './ApiError';

export interface DayRange {
    start: Date;
    end: Date;
    /** `YYYY-MM-DD` of the first and last day, for report headers. */
    dateFrom: string;
    dateTo: string;
}

const parseDay = (value: string, field: string): Date => {
    const parsed = parseISO(value);
    if (!isValid(parsed)) {
        throw new ApiError(httpStatus.BAD_REQUEST, `${field} must be a date in YYYY-MM-DD format.`);
    }
    return parsed;
};

/**
 * Whole-day range from optional ISO dates: a missing `dateFrom` means today, a
 * missing `dateTo` means the same day as `dateFrom`. Both ends are inclusive
 * (00:00:00.000 to 23:59:59.999 local time).
 */
export function getDayRange(dateFromISO?: string | null, dateToISO?: string | null, now: Date = new Date()): DayRange {
    const fromDay = dateFromISO ? parseDay(dateFromISO, 'dateFrom') : now;
    const toDay = dateToISO ? parseDay(dateToISO, 'dateTo') : fromDay;

    const start = startOfDay(fromDay);
    const end = endOfDay(toDay);
    if (end < start) {
        throw new ApiError(httpStatus.BAD_REQUEST, 'dateTo cannot be before dateFrom.');
    }

    return {
        start,
        end,
        dateFrom: formatISO(start, { representation: 'date' }),
        dateTo: formatISO(end, { representation: 'date' }),
    };
}

/** Optional start-time bounds for list filters; either side may be open. */
export function getOptionalBounds(dateFromISO?: string, dateToISO?: string): { from?: Date; to?: Date } {
    return {
        from: dateFromISO ? startOfDay(parseDay(dateFromISO, 'dateFrom')) : undefined,
        to: dateToISO ? endOfDay(parseDay(dateToISO, 'dateTo')) : undefined,
    };
}
