/**
 * Sandbox process launcher. Runs the validation harness in a child process
 * with a hard wall-clock timeout.
 */

import { spawn } from 'node:child_process';

/** Max stdout/stderr capture per stream, in characters */
const MAX_OUTPUT_SIZE = 1024 * 1024;

export interface LaunchRequest {
  executable: string;
  args: string[];
  cwd: string;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
  /** Aborting kills the process and resolves with what was captured */
  signal?: AbortSignal;
}

export interface LaunchResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
  durationMs: number;
  /** Set when the executable could not be started */
  spawnError: string | null;
}

/**
 * Launches a process and waits for it. Tests substitute an in-process fake.
 */
export interface ProcessLauncher {
  launch(request: LaunchRequest): Promise<LaunchResult>;
}

function append(buffer: string, chunk: string): string {
  if (buffer.length >= MAX_OUTPUT_SIZE) return buffer;
  return buffer + chunk.slice(0, MAX_OUTPUT_SIZE - buffer.length);
}

/**
 * Spawns the executable in its own process group so a timeout or abort can
 * kill the whole tree.
 */
export class ChildProcessLauncher implements ProcessLauncher {
  launch(request: LaunchRequest): Promise<LaunchResult> {
    const started = Date.now();

    return new Promise<LaunchResult>((resolve) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let aborted = false;
      let settled = false;

      const proc = spawn(request.executable, request.args, {
        cwd: request.cwd,
        env: request.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: process.platform !== 'win32',
      });

      const killTree = (): void => {
        if (proc.pid === undefined || proc.exitCode !== null) return;
        try {
          if (process.platform === 'win32') proc.kill('SIGKILL');
          else process.kill(-proc.pid, 'SIGKILL');
        } catch {
          // group already gone; fall back to the direct child
          proc.kill('SIGKILL');
        }
      };

      const timer = setTimeout(() => {
        timedOut = true;
        killTree();
      }, request.timeoutMs);

      const onAbort = (): void => {
        aborted = true;
        killTree();
      };
      if (request.signal?.aborted) onAbort();
      request.signal?.addEventListener('abort', onAbort, { once: true });

      const finish = (result: Pick<LaunchResult, 'exitCode' | 'signal' | 'spawnError'>): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        request.signal?.removeEventListener('abort', onAbort);
        resolve({
          ...result,
          stdout,
          stderr,
          timedOut,
          aborted,
          durationMs: Date.now() - started,
        });
      };

      proc.stdout.setEncoding('utf-8');
      proc.stderr.setEncoding('utf-8');
      proc.stdout.on('data', (chunk: string) => {
        stdout = append(stdout, chunk);
      });
      proc.stderr.on('data', (chunk: string) => {
        stderr = append(stderr, chunk);
      });

      proc.on('error', (error) => {
        finish({ exitCode: null, signal: null, spawnError: error.message });
      });
      // 'close' fires after both streams end, so output is complete
      proc.on('close', (code, signal) => {
        finish({ exitCode: code, signal, spawnError: null });
      });
    });
  }
}
