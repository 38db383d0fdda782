/**
 * Cloud Integration Bridge
 *
 * Drives the cloud subcommands of the LEAN CLI. The CLI must already be
 * logged in (see configureCredentials) in the environment this runs in.
 */

import type { LeanConfig } from '../../config/env';
import type { ExecutionResult } from '../../types/backtest';
import type { ProjectLanguage } from '../validation/schemas';
import { createLogger } from '../utils/logger';
import { runExternalCommand, type CommandOptions, type CommandRunner } from './commandRunner';

const log = createLogger('CloudBridge');

/**
 * Backtest id as printed by `lean cloud backtest`, e.g.
 *   "Started backtest named 'Alpha' for project 'SPY' with backtestId 8f3a21c0"
 *   "Backtest id: 8f3a21c0"
 * A label (backtestId / backtest id / backtest_id, any case), a separator
 * (':', '=' or whitespace), then an alphanumeric token that may contain '-' or '_'
 * and has at least one digit, so prose like "backtest id to be assigned" is no id.
 */
export const BACKTEST_ID_PATTERN = /\bbacktest[ _]?id\b[\s:=]+(?=[A-Za-z0-9_-]*\d)([A-Za-z0-9][A-Za-z0-9_-]*)/i;

export function extractBacktestId(cliOutput: string): string | null {
  const match = BACKTEST_ID_PATTERN.exec(cliOutput);
  if (match?.[1]) {
    return match[1];
  }
  log.warn(`Could not extract backtest ID from output: ${cliOutput.slice(0, 100)}...`);
  return null;
}

export class CloudBridge {
  constructor(
    private readonly config: Readonly<LeanConfig>,
    private readonly run: CommandRunner = runExternalCommand
  ) {}

  private execute(args: readonly string[], options: Omit<CommandOptions, 'cwd' | 'timeoutMs'> = {}): Promise<ExecutionResult> {
    return this.run([this.config.cliPath, ...args], {
      ...options,
      cwd: this.config.projectsDir,
      timeoutMs: this.config.commandTimeoutMs,
    });
  }

  /**
   * Push local project changes to the cloud. Required before a cloud backtest sees new code.
   */
  async pushChanges(projectName: string): Promise<ExecutionResult> {
    log.info(`Pushing project: ${projectName}`);
    return this.execute(['cloud', 'push', '--project', projectName]);
  }

  /**
   * Start a cloud backtest. Returns as soon as the CLI does; the backtest keeps running remotely.
   */
  async submitCloudBacktest(projectName: string, backtestName?: string): Promise<ExecutionResult> {
    const args = ['cloud', 'backtest', projectName];
    if (backtestName) {
      args.push('--backtest-name', backtestName);
    }
    log.info(`Submitting backtest for project: ${projectName}`);
    return this.execute(args);
  }

  async getBacktestStatus(projectName: string, backtestId: string): Promise<ExecutionResult> {
    return this.execute(['cloud', 'status', projectName, '--backtest-id', backtestId]);
  }

  async getProjectStatus(projectName: string): Promise<ExecutionResult> {
    return this.execute(['cloud', 'status', projectName]);
  }

  async createProject(projectName: string, language: ProjectLanguage = 'python'): Promise<ExecutionResult> {
    log.info(`Creating ${language} project: ${projectName}`);
    return this.execute(['project-create', '--language', language, projectName]);
  }

  // TODO: fetch results through the cloud REST API once credentials are plumbed through; the CLI has no results command
  async getBacktestResults(projectName: string, backtestId: string): Promise<ExecutionResult> {
    log.info(`Fetching results for backtest ${backtestId} in project ${projectName} (not implemented)`);
    return {
      success: false,
      output: '',
      error: 'Fetching cloud backtest results is not available yet.',
      return_code: -1,
    };
  }

  /**
   * Store cloud credentials in the CLI's config. Both values are masked in logs.
   */
  async configureCredentials(userId: string, apiToken: string): Promise<ExecutionResult> {
    const secrets = [userId, apiToken];
    const userResult = await this.execute(['config', 'set', 'user-id', userId], { secrets });
    if (!userResult.success) {
      return userResult;
    }
    return this.execute(['config', 'set', 'api-token', apiToken], { secrets });
  }
}
