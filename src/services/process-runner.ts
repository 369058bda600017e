import { spawn } from 'child_process';

export interface ProcessOptions {
    cwd?: string;
    timeoutMs?: number;
    // Signals to this process that stop the child instead of this process
    interruptSignals?: NodeJS.Signals[];
}

export interface ProcessResult {
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
    timedOut: boolean;
    interrupted: NodeJS.Signals | null;
}

export type ProcessRunner = (command: string, args: string[], options?: ProcessOptions) => Promise<ProcessResult>;

/**
 * Spawn a command and collect its output once it exits.
 * Rejects only when the process could not be started; a non-zero exit,
 * a signal, a timeout or an interrupt are reported in the result.
 */
export const runProcess: ProcessRunner = (command, args, options = {}) => {
    return new Promise((resolve, reject) => {
        const child = spawn(command, args, {
            cwd: options.cwd,
            stdio: ['ignore', 'pipe', 'pipe'],
        });

        let stdout = '';
        let stderr = '';
        let timedOut = false;
        let interrupted: NodeJS.Signals | null = null;
        let timer: NodeJS.Timeout | null = null;

        const onInterrupt = (signal: NodeJS.Signals) => {
            interrupted = signal;
            child.kill(signal);
        };
        const interruptSignals = options.interruptSignals ?? [];
        for (const signal of interruptSignals) {
            process.once(signal, onInterrupt);
        }
        const cleanup = () => {
            if (timer) clearTimeout(timer);
            for (const signal of interruptSignals) {
                process.removeListener(signal, onInterrupt);
            }
        };

        child.stdout.setEncoding('utf-8');
        child.stderr.setEncoding('utf-8');
        child.stdout.on('data', (chunk: string) => {
            stdout += chunk;
        });
        child.stderr.on('data', (chunk: string) => {
            stderr += chunk;
        });

        if (options.timeoutMs !== undefined) {
            timer = setTimeout(() => {
                timedOut = true;
                child.kill('SIGTERM');
            }, options.timeoutMs);
        }

        child.on('error', (error) => {
            cleanup();
            reject(error);
        });

        child.on('close', (exitCode, signal) => {
            cleanup();
            resolve({ exitCode, signal, stdout, stderr, timedOut, interrupted });
        });
    });
};
