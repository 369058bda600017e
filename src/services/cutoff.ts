import type { CutoffRule, ReportDate } from '../types';

export const DEFAULT_CUTOFF: CutoffRule = {
    timeZone: 'America/New_York',
    hour: 17,
};

interface ZonedParts extends ReportDate {
    hour: number;
}

function toZonedParts(instant: Date, timeZone: string): ZonedParts {
    const formatter = new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: 'numeric',
        day: 'numeric',
        hour: 'numeric',
        hourCycle: 'h23',
    });

    const parts: Record<string, number> = {};
    for (const part of formatter.formatToParts(instant)) {
        if (part.type !== 'literal') {
            parts[part.type] = parseInt(part.value, 10);
        }
    }

    return {
        year: parts.year,
        month: parts.month,
        day: parts.day,
        hour: parts.hour,
    };
}

/**
 * Shift a calendar date by whole days, rolling over months and years.
 */
export function addDays(date: ReportDate, days: number): ReportDate {
    const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
    return {
        year: shifted.getUTCFullYear(),
        month: shifted.getUTCMonth() + 1,
        day: shifted.getUTCDate(),
    };
}

/**
 * Date of the latest report that should exist at `now`.
 *
 * Before the cutoff hour (local to the rule's time zone) that is yesterday's
 * report; from the cutoff hour on it is today's. Only the hour is compared, so
 * 16:59 and 17:00 differ while 17:00 and 17:59 do not.
 */
export function getExpectedReportDate(now: Date = new Date(), rule: CutoffRule = DEFAULT_CUTOFF): ReportDate {
    const local = toZonedParts(now, rule.timeZone);
    const today: ReportDate = { year: local.year, month: local.month, day: local.day };

    if (local.hour < rule.hour) {
        return addDays(today, -1);
    }
    return today;
}

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0');
}

/** `DD-MM-YYYY` */
export function formatReportDate(date: ReportDate): string {
    return `${pad(date.day, 2)}-${pad(date.month, 2)}-${pad(date.year, 4)}`;
}

export function formatReportFileName(date: ReportDate): string {
    return `${formatReportDate(date)}.csv`;
}
