import * as fs from 'fs';
import * as path from 'path';
import { errorMessage, RecoverySetupError } from '../errors';
import type { RecoveryOutcome, RecoverySettings } from '../types';
import type { Logger } from './logger';
import { type ProcessRunner, runProcess } from './process-runner';

const INTERRUPT_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export const REQUIREMENTS_FILE = 'requirements.txt';

export function venvPython(venvDir: string, platform: NodeJS.Platform = process.platform): string {
    return platform === 'win32'
        ? path.join(venvDir, 'Scripts', 'python.exe')
        : path.join(venvDir, 'bin', 'python');
}

export interface Recovery {
    run(): Promise<RecoveryOutcome>;
}

/**
 * Runs the external report generator once inside its own Python virtualenv.
 */
export class RecoveryRunner implements Recovery {
    constructor(
        private readonly settings: RecoverySettings,
        private readonly logger: Logger,
        private readonly exec: ProcessRunner = runProcess
    ) {}

    get entryPointPath(): string {
        return path.resolve(this.settings.projectDir, this.settings.entryPoint);
    }

    get pythonPath(): string {
        return venvPython(this.settings.venvDir);
    }

    /**
     * Create the virtualenv if it does not exist yet and install the
     * project's requirements into it. Throws RecoverySetupError on failure,
     * after removing the half-built venv so the next run starts over.
     */
    async ensureEnvironment(): Promise<void> {
        const { venvDir } = this.settings;
        if (fs.existsSync(venvDir)) {
            return;
        }

        try {
            await this.createEnvironment();
        } catch (error) {
            this.logger.warn(`Removing incomplete venv at ${venvDir}`);
            fs.rmSync(venvDir, { recursive: true, force: true });
            throw error;
        }
    }

    private async createEnvironment(): Promise<void> {
        const { venvDir, projectDir, python } = this.settings;

        this.logger.info(`Creating venv for ${venvDir}`);
        const created = await this.execSetup(python, ['-m', 'venv', venvDir], projectDir);
        if (created.exitCode !== 0) {
            throw new RecoverySetupError(`Failed to create venv at ${venvDir} (code ${created.exitCode})`, created.stderr);
        }

        const requirements = path.join(projectDir, REQUIREMENTS_FILE);
        if (!fs.existsSync(requirements)) {
            return;
        }

        this.logger.info(`Installing requirements from ${requirements}`);
        const installed = await this.execSetup(this.pythonPath, ['-m', 'pip', 'install', '-r', requirements], projectDir);
        if (installed.exitCode !== 0) {
            throw new RecoverySetupError(
                `Failed to install ${requirements} (code ${installed.exitCode}): ${installed.stderr.trim()}`,
                installed.stderr
            );
        }
    }

    private async execSetup(command: string, args: string[], cwd: string) {
        try {
            return await this.exec(command, args, { cwd });
        } catch (error) {
            throw new RecoverySetupError(`Could not run ${command}: ${errorMessage(error)}`);
        }
    }

    async run(): Promise<RecoveryOutcome> {
        if (!this.settings.enabled) {
            this.logger.info('Recovery disabled, skipping report generator');
            return { status: 'skipped' };
        }

        const entryPoint = this.entryPointPath;
        if (!fs.existsSync(entryPoint)) {
            this.logger.error(`${entryPoint} not found`);
            return { status: 'failed', reason: 'missing-entry-point', detail: `${entryPoint} not found` };
        }

        await this.ensureEnvironment();

        this.logger.info(`Runner activated at: ${entryPoint}`);
        try {
            const result = await this.exec(this.pythonPath, [entryPoint], {
                cwd: this.settings.projectDir,
                timeoutMs: this.settings.timeoutMs,
                interruptSignals: INTERRUPT_SIGNALS,
            });

            if (result.timedOut) {
                const detail = `Report generator timed out after ${this.settings.timeoutMs}ms`;
                this.logger.error(detail);
                return { status: 'failed', reason: 'timeout', detail };
            }

            const killedBy = result.signal && INTERRUPT_SIGNALS.includes(result.signal) ? result.signal : null;
            const interrupt = result.interrupted ?? killedBy;
            if (interrupt) {
                this.logger.debug(`Stopped runner (${interrupt})`);
                return { status: 'failed', reason: 'interrupted', detail: interrupt };
            }

            if (result.exitCode !== 0) {
                const code = result.exitCode ?? result.signal;
                this.logger.error(`Report generator failed (code ${code}): ${result.stderr}`);
                return { status: 'failed', reason: 'exit-code', detail: result.stderr };
            }

            this.logger.debug(`Report generator output: ${result.stdout}`);
            return { status: 'succeeded', stdout: result.stdout };
        } catch (error) {
            this.logger.error(`Unexpected report generator error: ${errorMessage(error)}`);
            return { status: 'failed', reason: 'unexpected', detail: errorMessage(error) };
        }
    }
}

/**
 * Boolean form of RecoveryRunner.run: true only when the generator exited cleanly.
 */
export async function runRecovery(settings: RecoverySettings, logger: Logger, exec?: ProcessRunner): Promise<boolean> {
    const outcome = await new RecoveryRunner(settings, logger, exec).run();
    return outcome.status === 'succeeded';
}
