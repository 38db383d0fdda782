/**
 * Local Execution Bridge
 * Runs `lean backtest <algorithm>` against the local engine and captures the whole output
 */

import type { LeanConfig } from '../../config/env';
import type { ExecutionResult, StrategyConfig } from '../../types/backtest';
import { createLogger } from '../utils/logger';
import { runExternalCommand, type CommandRunner } from './commandRunner';

const log = createLogger('LeanBridge');

/**
 * Pick the algorithm to run: explicit path, then strategy type, then the default template
 */
export function resolveAlgorithm(
  config: Pick<StrategyConfig, 'algorithm_path' | 'strategy_type'>,
  defaultAlgorithm: string
): string {
  const candidates = [config.algorithm_path, config.strategy_type];
  for (const candidate of candidates) {
    const trimmed = candidate?.trim();
    // A leading dash would be read by the CLI as an option
    if (trimmed && !trimmed.startsWith('-')) {
      return trimmed;
    }
  }
  return defaultAlgorithm;
}

export class LeanBridge {
  constructor(
    private readonly config: Readonly<LeanConfig>,
    private readonly run: CommandRunner = runExternalCommand
  ) {}

  get defaultAlgorithm(): string {
    return this.config.defaultAlgorithm;
  }

  /**
   * Run a local backtest. Success is exit code 0 and nothing else.
   */
  async backtest(algorithm: string): Promise<ExecutionResult> {
    log.info(`Running local backtest for ${algorithm}`);
    const result = await this.run([this.config.cliPath, 'backtest', algorithm], {
      cwd: this.config.projectsDir,
      timeoutMs: this.config.commandTimeoutMs,
    });

    if (!result.success) {
      log.warn(`Local backtest for ${algorithm} failed with code ${result.return_code}`);
    }
    return result;
  }
}
