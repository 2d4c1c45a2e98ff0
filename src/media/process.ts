/**
 * External tool runner
 * Spawns a CLI, collects its output and kills it when the signal aborts.
 */
import { spawn } from 'child_process';

export interface ToolResult {
    code: number | null;
    stdout: string;
    stderr: string;
}

export interface RunToolOptions {
    signal?: AbortSignal;
    cwd?: string;
}

export function runTool(
    command: string,
    args: string[],
    options: RunToolOptions = {}
): Promise<ToolResult> {
    return new Promise((resolve, reject) => {
        const proc = spawn(command, args, {
            stdio: ['ignore', 'pipe', 'pipe'],
            cwd: options.cwd,
            signal: options.signal,
            killSignal: 'SIGKILL',
        });

        let stdout = '';
        let stderr = '';

        // Decode as streams so multi-byte characters split across chunks survive
        proc.stdout.setEncoding('utf8');
        proc.stderr.setEncoding('utf8');

        proc.stdout.on('data', (data: string) => {
            stdout += data;
        });

        proc.stderr.on('data', (data: string) => {
            stderr += data;
        });

        // 'error' covers a missing binary and an aborted signal
        proc.on('error', reject);

        proc.on('close', (code) => {
            resolve({ code, stdout, stderr });
        });
    });
}
