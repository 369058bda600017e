import * as fs from 'fs';
import * as path from 'path';
import type { CutoffRule, ReportCheck, ReportDate } from '../types';
import { DEFAULT_CUTOFF, formatReportFileName, getExpectedReportDate } from './cutoff';

export function expectedReportPath(directory: string, date: ReportDate): string {
    return path.join(directory, formatReportFileName(date));
}

/**
 * True if `DD-MM-YYYY.csv` for `date` is a file directly inside `directory`.
 */
export function reportExists(directory: string, date: ReportDate): boolean {
    const stat = fs.statSync(expectedReportPath(directory, date), { throwIfNoEntry: false });
    return stat !== undefined && stat.isFile();
}

/**
 * Check a directory for the latest report expected at `now`.
 * The expected date is recomputed on every call.
 */
export function checkLatestReport(
    directory: string,
    now: Date = new Date(),
    rule: CutoffRule = DEFAULT_CUTOFF
): ReportCheck {
    const expectedDate = getExpectedReportDate(now, rule);
    return {
        directory,
        expectedDate,
        path: expectedReportPath(directory, expectedDate),
        exists: reportExists(directory, expectedDate),
    };
}
