/**
 * runExternalCommand - the single way this service starts a process.
 *
 * Arguments always travel as an argv array straight to spawn(); no shell is
 * involved, so metacharacters in project or backtest names stay literal.
 * The shell-quoted `command` string is only for logs and responses.
 */

import { spawn } from 'child_process';
import { quote } from 'shell-quote';
import type { ExecutionResult } from '../../types/backtest';
import { createLogger } from '../utils/logger';

const log = createLogger('Command');

const REDACTED = 'REDACTED';

// Time a process gets to exit after SIGTERM before it is force killed
export const DEFAULT_KILL_GRACE_MS = 5000;

export type CommandArgv = readonly [string, ...string[]];

export interface CommandOptions {
  cwd?: string;
  /** Kill the process after this many milliseconds. 0 or undefined waits forever. */
  timeoutMs?: number;
  /** After a timeout, wait this long for exit before SIGKILL and giving up on the pipes */
  killGraceMs?: number;
  /** Argument values masked in the logged and returned command string */
  secrets?: readonly string[];
}

export type CommandRunner = (argv: CommandArgv, options?: CommandOptions) => Promise<ExecutionResult>;

/**
 * Shell-quoted display form of an argv, with secrets masked
 */
export function formatCommand(argv: readonly string[], secrets: readonly string[] = []): string {
  return quote(argv.map((arg) => (secrets.includes(arg) ? REDACTED : arg)));
}

function failure(command: string, error: string, output = ''): ExecutionResult {
  return { success: false, output, error, return_code: -1, command };
}

export const runExternalCommand: CommandRunner = (argv, options = {}) => {
  const [executable, ...args] = argv;
  const command = formatCommand(argv, options.secrets);
  log.info(`Executing: ${command}`);

  return new Promise<ExecutionResult>((resolve) => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    let graceTimer: NodeJS.Timeout | undefined;

    const settle = (result: ExecutionResult) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      if (graceTimer) clearTimeout(graceTimer);
      resolve(result);
    };

    const child = spawn(executable, args, {
      cwd: options.cwd,
      env: process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      shell: false,
    });

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    if (options.timeoutMs && options.timeoutMs > 0) {
      const timeoutMs = options.timeoutMs;
      timer = setTimeout(() => {
        timedOut = true;
        log.warn(`Timed out after ${timeoutMs}ms, sending SIGTERM: ${command}`);
        child.kill('SIGTERM');

        // Force kill if still running; a grandchild may also hold the pipes open, so stop waiting for 'close'
        graceTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            log.warn(`Process still running, sending SIGKILL: ${command}`);
            child.kill('SIGKILL');
          }
          child.stdout.destroy();
          child.stderr.destroy();
          settle(failure(command, `Command timed out after ${timeoutMs}ms`, Buffer.concat(stdout).toString('utf-8')));
        }, options.killGraceMs ?? DEFAULT_KILL_GRACE_MS);
      }, timeoutMs);
    }

    // Handle spawn error
    child.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT') {
        log.error(`'${executable}' command not found`);
        settle(failure(command, `'${executable}' command not found. Check the installation and PATH.`));
        return;
      }
      log.error(`Spawn error: ${err.message}`);
      settle(failure(command, `An unexpected error occurred: ${err.message}`));
    });

    child.on('close', (code, signal) => {
      const output = Buffer.concat(stdout).toString('utf-8');
      const errorText = Buffer.concat(stderr).toString('utf-8');

      if (timedOut) {
        settle(failure(command, `Command timed out after ${options.timeoutMs}ms`, output));
        return;
      }

      const returnCode = code ?? -1;
      log.info(`Return code ${returnCode}${signal ? ` (signal ${signal})` : ''}: ${command}`);
      log.debug(`STDOUT:\n${output}`);
      log.debug(`STDERR:\n${errorText}`);

      settle({
        success: returnCode === 0,
        output,
        error: signal && !errorText ? `Process terminated by ${signal}` : errorText,
        return_code: returnCode,
        command,
      });
    });
  });
};
