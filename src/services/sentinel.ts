import { errorMessage } from '../errors';
import type { SentinelConfig, SentinelResult } from '../types';
import { type AlertSender, buildMissingReportAlert } from './email-sender';
import type { Logger } from './logger';
import type { Recovery } from './recovery-runner';
import { checkLatestReport } from './report-checker';

export interface SentinelDependencies {
    config: SentinelConfig;
    logger: Logger;
    alerts: AlertSender;
    recovery: Recovery;
    clock?: () => Date;
}

/**
 * Walks the configured report directories in order. The first directory
 * missing its latest report gets one alert and one recovery attempt, and the
 * run ends there; the next scheduled run checks again.
 */
export class ReportSentinel {
    private readonly clock: () => Date;

    constructor(private readonly deps: SentinelDependencies) {
        this.clock = deps.clock ?? (() => new Date());
    }

    async run(): Promise<SentinelResult> {
        const { config, logger, alerts, recovery } = this.deps;

        try {
            for (const directory of config.reportPaths) {
                const check = checkLatestReport(directory, this.clock(), config.cutoff);
                if (check.exists) {
                    logger.debug(`Found ${check.path}`);
                    continue;
                }

                const alert = buildMissingReportAlert(directory, check.expectedDate);
                logger.warn(alert.body);
                await alerts.sendEmail(alert);
                logger.debug('Email sent.');

                const outcome = await recovery.run();
                return { status: 'recovering', directory, expectedDate: check.expectedDate, recovery: outcome };
            }

            logger.info(`All ${config.reportPaths.length} report directories are up to date`);
            return { status: 'ok', checked: config.reportPaths.length };
        } catch (error) {
            logger.critical(`Execution failed: ${errorMessage(error)}`);
            return { status: 'failed', error: error instanceof Error ? error : new Error(String(error)) };
        }
    }
}
