import { spawn } from 'child_process';
import { CommandError } from '../orchestration/errors';
import type { CommandOptions, CommandResult, CommandRunner } from './types';

const DEFAULT_TIMEOUT_MS = 30 * 60 * 1000;
export const EXIT_TIMED_OUT = 124;
export const EXIT_NOT_INSTALLED = 127;

/**
 * Runs external tools as child processes and collects their output. A
 * missing binary resolves with code 127 instead of rejecting, so callers can
 * tell "not installed" apart from "failed".
 */
export class ProcessRunner implements CommandRunner {
  constructor(private readonly baseEnv: NodeJS.ProcessEnv = process.env) {}

  run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    return new Promise(resolve => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: { ...this.baseEnv, ...options.env },
        stdio: [options.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
        signal: options.signal
      });

      let stdout = '';
      let stderr = '';
      let settled = false;
      const finish = (result: CommandResult) => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          resolve(result);
        }
      };

      const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
      const timer = setTimeout(() => {
        child.kill();
        finish({ code: EXIT_TIMED_OUT, stdout, stderr: `${stderr}\n${command} timed out after ${timeoutMs / 1000}s` });
      }, timeoutMs);

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'ENOENT') {
          finish({ code: EXIT_NOT_INSTALLED, stdout, stderr: `${command}: command not found` });
          return;
        }
        finish({ code: 1, stdout, stderr: `${stderr}${error.message}` });
      });

      child.on('close', code => {
        finish({ code: code ?? 1, stdout, stderr });
      });

      if (options.input !== undefined) {
        child.stdin?.end(options.input);
      }
    });
  }
}

/**
 * True when the tool never produced an answer: it is missing or timed out.
 * Such output must not be read as "resource absent".
 */
export function didNotRun(result: CommandResult): boolean {
  return result.code === EXIT_NOT_INSTALLED || result.code === EXIT_TIMED_OUT;
}

/**
 * Runs a command and returns its stdout, throwing CommandError on a non-zero exit.
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: CommandOptions
): Promise<string> {
  const result = await runner.run(command, args, options);
  if (result.code !== 0) {
    throw new CommandError(`${command} ${args.slice(0, 2).join(' ')}`.trim(), result.code, result.stderr);
  }
  return result.stdout;
}
