import { Command } from 'commander';
import { getConfigPath, loadConfig } from './config';
import { DEFAULT_CUTOFF, formatReportDate, formatReportFileName, getExpectedReportDate } from './services/cutoff';
import { EmailSender } from './services/email-sender';
import { Logger, LogLevel, parseLogLevel } from './services/logger';
import { RecoveryRunner } from './services/recovery-runner';
import { ReportSentinel } from './services/sentinel';
import type { SentinelConfig } from './types';

function loadOrExit(configPath: string): SentinelConfig {
    try {
        return loadConfig(configPath);
    } catch (error) {
        new Logger().critical('Failed to load configuration', error);
        process.exit(1);
    }
}

/**
 * Build the report-sentinel command line. Only a configuration that cannot be
 * loaded ends the process with a non-zero code; faults during a check are
 * logged and the command returns normally.
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name('report-sentinel')
        .description('Checks report directories for the latest daily report and triggers recovery when one is missing')
        .version('1.0.0');

    // Check command (cron entry point)
    program
        .command('check', { isDefault: true })
        .description('Check every report directory once; alert and recover on the first missing report')
        .option('-c, --config <path>', 'Path to configuration file', getConfigPath())
        .option('--no-recovery', 'Send the alert but do not run the report generator')
        .action(async (options: { config: string; recovery: boolean }) => {
            const config = loadOrExit(options.config);
            const logger = new Logger({ level: parseLogLevel(config.logging.level) });

            try {
                if (config.logging.dir) {
                    logger.init(config.logging.dir);
                }
                logger.info(`Checking ${config.reportPaths.length} report directories`);

                const recoverySettings = options.recovery ? config.recovery : { ...config.recovery, enabled: false };
                const sentinel = new ReportSentinel({
                    config,
                    logger,
                    alerts: new EmailSender(config.smtp, config.sender, config.recipients, logger),
                    recovery: new RecoveryRunner(recoverySettings, logger),
                });

                const result = await sentinel.run();
                if (result.status === 'recovering') {
                    logger.info(`Recovery for ${result.directory}: ${result.recovery.status}`);
                }
            } catch (error) {
                logger.critical('Execution failed', error);
            } finally {
                logger.close();
            }
        });

    // Expected date command
    program
        .command('expected-date')
        .description('Print the date and file name of the latest report expected right now')
        .option('-c, --config <path>', 'Read the cutoff rule from this configuration file')
        .action((options: { config?: string }) => {
            const rule = options.config ? loadOrExit(options.config).cutoff : DEFAULT_CUTOFF;
            const date = getExpectedReportDate(new Date(), rule);
            const logger = new Logger({ level: LogLevel.INFO });
            logger.info(`Expected report date: ${formatReportDate(date)} (${formatReportFileName(date)})`);
        });

    // Test SMTP command
    program
        .command('test-smtp')
        .description('Test the SMTP connection and credentials')
        .option('-c, --config <path>', 'Path to configuration file', getConfigPath())
        .action(async (options: { config: string }) => {
            const config = loadOrExit(options.config);
            const logger = new Logger({ level: parseLogLevel(config.logging.level) });

            try {
                if (config.logging.dir) {
                    logger.init(config.logging.dir);
                }
                logger.info(`Testing connection to ${config.smtp.host}:${config.smtp.port}...`);
                const sender = new EmailSender(config.smtp, config.sender, config.recipients, logger);
                if (await sender.testConnection()) {
                    logger.info(`✓ Connected: ${config.smtp.username}`);
                } else {
                    logger.error(`✗ Failed: ${config.smtp.username}`);
                    process.exitCode = 1;
                }
            } finally {
                logger.close();
            }
        });

    return program;
}
