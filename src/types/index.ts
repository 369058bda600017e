// SMTP connection settings
export interface SmtpSettings {
    host: string;
    port: number;
    secure: boolean;
    username: string;
    password: string;
}

// Daily cutoff: before `hour` (local to `timeZone`) yesterday's report is still the latest
export interface CutoffRule {
    timeZone: string;
    hour: number;
}

// External report generator
export interface RecoverySettings {
    enabled: boolean;
    projectDir: string;
    entryPoint: string;
    venvDir: string;
    python: string;
    timeoutMs?: number;
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'critical';

// Application configuration
export interface SentinelConfig {
    smtp: SmtpSettings;
    sender: string;
    recipients: string[];
    reportPaths: string[];
    recovery: RecoverySettings;
    cutoff: CutoffRule;
    logging: {
        level: LogLevelName;
        dir?: string;
    };
}

// Calendar date, month is 1-12
export interface ReportDate {
    year: number;
    month: number;
    day: number;
}

export interface ReportCheck {
    directory: string;
    expectedDate: ReportDate;
    path: string;
    exists: boolean;
}

export interface EmailAttachment {
    filename: string;
    content: Buffer;
}

export interface AlertMessage {
    subject: string;
    body: string;
    attachments?: EmailAttachment[];
}

export type RecoveryFailureReason =
    | 'missing-entry-point'
    | 'timeout'
    | 'exit-code'
    | 'interrupted'
    | 'unexpected';

export type RecoveryOutcome =
    | { status: 'succeeded'; stdout: string }
    | { status: 'failed'; reason: RecoveryFailureReason; detail: string }
    | { status: 'skipped' };

// Result of one sentinel run
export type SentinelResult =
    | { status: 'ok'; checked: number }
    | { status: 'recovering'; directory: string; expectedDate: ReportDate; recovery: RecoveryOutcome }
    | { status: 'failed'; error: Error };
