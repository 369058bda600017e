import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, expect, it } from 'vitest';

import { runProcess } from './process-runner';

// The running Node binary stands in for the external tool.
const node = process.execPath;

describe('runProcess', () => {
    it('captures output and the exit code', async () => {
        const result = await runProcess(node, [
            '-e',
            "process.stdout.write('generated'); process.stderr.write('warning'); process.exit(3)",
        ]);

        expect(result).toEqual({
            exitCode: 3,
            signal: null,
            stdout: 'generated',
            stderr: 'warning',
            timedOut: false,
            interrupted: null,
        });
    });

    it('runs in the requested working directory', async () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sentinel-cwd-'));
        try {
            const result = await runProcess(node, ['-e', 'process.stdout.write(process.cwd())'], { cwd: dir });
            expect(fs.realpathSync(result.stdout)).toBe(fs.realpathSync(dir));
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });

    it('terminates the process once the timeout elapses', async () => {
        const result = await runProcess(node, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutMs: 200 });

        expect(result.timedOut).toBe(true);
        expect(result.exitCode).toBeNull();
        expect(result.signal).toBe('SIGTERM');
    });

    it('stops the child when this process is interrupted', async () => {
        const listenersBefore = process.listenerCount('SIGINT');
        const running = runProcess(node, ['-e', 'setTimeout(() => {}, 10000)'], {
            interruptSignals: ['SIGINT', 'SIGTERM'],
        });
        expect(process.listenerCount('SIGINT')).toBe(listenersBefore + 1);

        // deliver the signal to the runner's listener only, not to the test worker's own handlers
        const onInterrupt = process.listeners('SIGINT')[listenersBefore];
        setTimeout(() => onInterrupt('SIGINT'), 100);
        const result = await running;

        expect(result.interrupted).toBe('SIGINT');
        expect(result.signal).toBe('SIGINT');
        expect(result.exitCode).toBeNull();
        expect(process.listenerCount('SIGINT')).toBe(listenersBefore);
    });

    it('removes its signal listeners once the child exits', async () => {
        const sigtermBefore = process.listenerCount('SIGTERM');

        await runProcess(node, ['-e', 'process.exit(0)'], { interruptSignals: ['SIGTERM'] });

        expect(process.listenerCount('SIGTERM')).toBe(sigtermBefore);
    });

    it('rejects when the command cannot be spawned', async () => {
        await expect(runProcess(path.join(os.tmpdir(), 'no-such-binary-for-sentinel'), [])).rejects.toMatchObject({
            code: 'ENOENT',
        });
    });
});
