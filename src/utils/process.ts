import { spawn } from 'child_process';

export interface ProcessResult {
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
    timedOut: boolean;
}

export interface RunProcessOptions {
    /** Kill the child with SIGKILL once this many milliseconds have passed. */
    timeoutMs?: number;
}

export type ProcessRunner = (command: string, args: string[], options?: RunProcessOptions) => Promise<ProcessResult>;

/**
 * Runs a command as a separate process and resolves with its exit status and
 * captured output. Rejects only when the process cannot be spawned.
 */
export const runProcess: ProcessRunner = (command, args, options = {}) => {
    return new Promise((resolve, reject) => {
        const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let timedOut = false;
        let timer: NodeJS.Timeout | undefined;

        if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
            timer = setTimeout(() => {
                timedOut = true;
                child.kill('SIGKILL');
            }, options.timeoutMs);
        }

        child.stdout.on('data', (data: Buffer) => stdout.push(data));
        child.stderr.on('data', (data: Buffer) => stderr.push(data));

        child.on('error', (error) => {
            clearTimeout(timer);
            reject(error);
        });

        child.on('close', (code, signal) => {
            clearTimeout(timer);
            resolve({
                exitCode: code,
                signal,
                stdout: Buffer.concat(stdout).toString('utf8'),
                stderr: Buffer.concat(stderr).toString('utf8'),
                timedOut,
            });
        });
    });
};
