/**
 * Command runner
 *
 * Spawns an executable with an argument array (never through a shell) and
 * collects its output. Non-zero exits resolve normally; the caller decides
 * what a failure means. Tests substitute an in-process fake.
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  /** null when the process was killed by a signal (including the timeout) */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(executable: string, args: readonly string[]): Promise<CommandResult>;
}

export class SpawnCommandRunner implements CommandRunner {
  constructor(private timeoutMs: number) {}

  run(executable: string, args: readonly string[]): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const proc = spawn(executable, [...args], {
        shell: false,
        env: { ...process.env },
        timeout: this.timeoutMs,
      });

      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('close', (code) => {
        resolve({ exitCode: code, stdout, stderr: stderr.trim() });
      });

      proc.on('error', (err) => {
        reject(err);
      });
    });
  }
}
