import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { checkLatestReport, expectedReportPath, reportExists } from './report-checker';

describe('reportExists', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sentinel-reports-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('finds DD-MM-YYYY.csv directly inside the directory', () => {
        fs.writeFileSync(path.join(dir, '14-01-2026.csv'), '');
        expect(reportExists(dir, { year: 2026, month: 1, day: 14 })).toBe(true);
    });

    it('returns false for an empty directory', () => {
        expect(reportExists(dir, { year: 2026, month: 1, day: 14 })).toBe(false);
    });

    it('ignores unrelated files and other date formats', () => {
        fs.writeFileSync(path.join(dir, '2026-01-14.csv'), '');
        fs.writeFileSync(path.join(dir, '14-01-2026.txt'), '');
        fs.writeFileSync(path.join(dir, '13-01-2026.csv'), '');
        fs.writeFileSync(path.join(dir, 'notes.md'), '');
        expect(reportExists(dir, { year: 2026, month: 1, day: 14 })).toBe(false);
    });

    it('does not look into subdirectories', () => {
        fs.mkdirSync(path.join(dir, 'archive'));
        fs.writeFileSync(path.join(dir, 'archive', '14-01-2026.csv'), '');
        expect(reportExists(dir, { year: 2026, month: 1, day: 14 })).toBe(false);
    });

    it('does not count a directory with the report name', () => {
        fs.mkdirSync(path.join(dir, '14-01-2026.csv'));
        expect(reportExists(dir, { year: 2026, month: 1, day: 14 })).toBe(false);
    });

    it('returns false when the directory itself is missing', () => {
        expect(reportExists(path.join(dir, 'missing'), { year: 2026, month: 1, day: 14 })).toBe(false);
    });
});

describe('checkLatestReport', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sentinel-reports-'));
        fs.writeFileSync(path.join(dir, '14-01-2026.csv'), '');
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it("accepts yesterday's report at 16:59 Eastern", () => {
        const check = checkLatestReport(dir, new Date('2026-01-15T21:59:00Z'));
        expect(check).toEqual({
            directory: dir,
            expectedDate: { year: 2026, month: 1, day: 14 },
            path: expectedReportPath(dir, { year: 2026, month: 1, day: 14 }),
            exists: true,
        });
    });

    it("requires today's report from 17:00:00 Eastern", () => {
        const check = checkLatestReport(dir, new Date('2026-01-15T22:00:00Z'));
        expect(check.expectedDate).toEqual({ year: 2026, month: 1, day: 15 });
        expect(check.path).toBe(path.join(dir, '15-01-2026.csv'));
        expect(check.exists).toBe(false);
    });

    it('sees a report created between two checks', () => {
        const now = new Date('2026-01-15T23:00:00Z');
        expect(checkLatestReport(dir, now).exists).toBe(false);
        fs.writeFileSync(path.join(dir, '15-01-2026.csv'), 'a,b\n');
        expect(checkLatestReport(dir, now).exists).toBe(true);
    });
});
