import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigNotFoundError, ConfigSyntaxError, ConfigValidationError, errorMessage } from '../errors';
import { DEFAULT_CUTOFF } from '../services/cutoff';
import type { SentinelConfig } from '../types';

// Load environment variables
dotenv.config();

export const DEFAULT_CONFIG_PATH = path.join(process.cwd(), 'config', 'sentinel.config.json');

const isTimeZone = (value: string): boolean => {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone: value });
        return true;
    } catch {
        return false;
    }
};

const ConfigSchema = z.object({
    smtp: z.object({
        host: z.string().min(1),
        port: z.number().int().positive(),
        secure: z.boolean().default(true),
        username: z.string().min(1).optional(),
        password: z.string().min(1).optional(),
    }),
    sender: z.string().min(1),
    recipients: z.array(z.string().min(1)).min(1),
    reportPaths: z.array(z.string().min(1)).min(1),
    recovery: z.object({
        enabled: z.boolean().default(true),
        projectDir: z.string().min(1),
        entryPoint: z.string().min(1).default('main.py'),
        venvDir: z.string().min(1).optional(),
        python: z.string().min(1).default('python3'),
        timeoutMs: z.number().int().positive().optional(),
    }),
    cutoff: z
        .object({
            timeZone: z.string().refine(isTimeZone, 'Unknown time zone').default(DEFAULT_CUTOFF.timeZone),
            hour: z.number().int().min(0).max(23).default(DEFAULT_CUTOFF.hour),
        })
        .default({}),
    logging: z
        .object({
            level: z.enum(['debug', 'info', 'warn', 'error', 'critical']).default('info'),
            dir: z.string().min(1).optional(),
        })
        .default({}),
});

export function getConfigPath(): string {
    return process.env.SENTINEL_CONFIG || DEFAULT_CONFIG_PATH;
}

/**
 * Expand a leading `~` and resolve relative paths against `baseDir`.
 */
export function resolvePath(value: string, baseDir: string): string {
    const expanded = value === '~' || value.startsWith('~/') ? path.join(os.homedir(), value.slice(1)) : value;
    return path.resolve(baseDir, expanded);
}

function readJson(filePath: string): unknown {
    let content: string;
    try {
        content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw new ConfigNotFoundError(filePath);
        }
        throw error;
    }

    try {
        return JSON.parse(content);
    } catch (error) {
        throw new ConfigSyntaxError(filePath, errorMessage(error));
    }
}

/**
 * Load and validate the sentinel configuration. SMTP credentials may come from
 * the environment (SMTP_USERNAME / SMTP_PASSWORD), which wins over the file.
 */
export function loadConfig(configPath: string = getConfigPath()): SentinelConfig {
    const filePath = path.resolve(configPath);
    const raw = readJson(filePath);

    const parsed = ConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigValidationError(filePath, issues);
    }

    const data = parsed.data;
    const username = process.env.SMTP_USERNAME || data.smtp.username;
    const password = process.env.SMTP_PASSWORD || data.smtp.password;

    const missing: string[] = [];
    if (!username) missing.push('smtp.username: Required (or set SMTP_USERNAME)');
    if (!password) missing.push('smtp.password: Required (or set SMTP_PASSWORD)');
    if (!username || !password) {
        throw new ConfigValidationError(filePath, missing);
    }

    const baseDir = path.dirname(filePath);
    const projectDir = resolvePath(data.recovery.projectDir, baseDir);

    const config: SentinelConfig = {
        smtp: {
            host: data.smtp.host,
            port: data.smtp.port,
            secure: data.smtp.secure,
            username,
            password,
        },
        sender: data.sender,
        recipients: data.recipients,
        reportPaths: data.reportPaths.map(reportPath => resolvePath(reportPath, baseDir)),
        recovery: {
            enabled: data.recovery.enabled,
            projectDir,
            entryPoint: data.recovery.entryPoint,
            venvDir: data.recovery.venvDir
                ? resolvePath(data.recovery.venvDir, baseDir)
                : path.join(path.dirname(projectDir), '.venv'),
            python: data.recovery.python,
            timeoutMs: data.recovery.timeoutMs,
        },
        cutoff: data.cutoff,
        logging: {
            level: data.logging.level,
            dir: data.logging.dir ? resolvePath(data.logging.dir, baseDir) : undefined,
        },
    };

    return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): T {
    for (const child of Object.values(value)) {
        if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
            deepFreeze(child);
        }
    }
    return Object.freeze(value);
}
