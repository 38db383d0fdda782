/**
 * Tool Handlers
 *
 * Each tool validates its input, delegates to a bridge and maps the
 * ExecutionResult into a ToolResponse. Validation, parse and transport
 * errors are converted to the error envelope here; anything else is a bug
 * and propagates to the HTTP layer.
 */

import type { RiskSettings } from '../../config/riskSettings';
import type { ErrorResponse, ExecutionResult, ToolResponse } from '../../types/backtest';
import { extractBacktestId, type CloudBridge } from '../bridges/cloudBridge';
import { resolveAlgorithm, type LeanBridge } from '../bridges/leanBridge';
import { BridgeError, NotImplementedError } from '../errors';
import type { StrategyParser } from '../nlp/strategyParser';
import { createLogger } from '../utils/logger';
import {
  BacktestRefArgsSchema,
  CloudBacktestArgsSchema,
  CreateProjectArgsSchema,
  LocalBacktestArgsSchema,
  PushProjectArgsSchema,
  assertAllowedSymbol,
  validateInput,
  type SymbolPolicy,
} from '../validation/schemas';
import type { ToolName } from './toolDefinitions';

const log = createLogger('Tools');

// Push output quoted in the error message is cut to this many characters
const PUSH_OUTPUT_PREVIEW = 200;

export interface TradingToolsDeps {
  parser: StrategyParser;
  lean: LeanBridge;
  cloud: CloudBridge;
  riskSettings: RiskSettings;
  caseInsensitiveSymbols: boolean;
}

/**
 * Standard error envelope for tools
 */
export function formatError(
  context: string,
  message: string,
  extra: Pick<ErrorResponse, 'details' | 'backtest_id'> = {}
): ErrorResponse {
  log.error(`Context: ${context}, Message: ${message}`);
  return {
    status: 'error',
    context,
    message,
    timestamp: new Date().toISOString(),
    ...extra,
  };
}

function fromExecution(context: string, result: ExecutionResult): ToolResponse<ExecutionResult> {
  if (result.success) {
    return { status: 'success', details: result };
  }
  return formatError(context, result.error || `Command exited with code ${result.return_code}`, { details: result });
}

export class TradingTools {
  private readonly symbolPolicy: SymbolPolicy;

  constructor(private readonly deps: TradingToolsDeps) {
    this.symbolPolicy = {
      allowedSymbols: deps.riskSettings.allowed_symbols,
      caseInsensitive: deps.caseInsensitiveSymbols,
    };
  }

  /**
   * Run a tool body, turning known errors into an error envelope
   */
  private async guard<T>(
    run: () => Promise<ToolResponse<T>>,
    onError: (error: BridgeError) => ErrorResponse = (error) => formatError(error.context, error.message)
  ): Promise<ToolResponse<T>> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof BridgeError) {
        return onError(error);
      }
      throw error;
    }
  }

  private validateStrategySymbols(parameters: Readonly<Record<string, unknown>>): void {
    let checked = 0;

    if (parameters.symbol !== undefined) {
      assertAllowedSymbol(parameters.symbol, this.symbolPolicy);
      checked++;
    }

    const listed = parameters.symbols;
    if (listed !== undefined) {
      for (const symbol of Array.isArray(listed) ? listed : [listed]) {
        assertAllowedSymbol(symbol, this.symbolPolicy);
        checked++;
      }
    }

    if (checked === 0) {
      log.warn('No symbol provided in strategy_parameters for validation.');
    } else {
      log.info(`Validated ${checked} symbol(s) against the allow-list`);
    }
  }

  // --------------------------
  // Core Trading Operations
  // --------------------------

  async localBacktestStrategy(rawArgs: unknown): Promise<ToolResponse<string>> {
    return this.guard<string>(
      async () => {
        const { strategy_description } = validateInput(
          LocalBacktestArgsSchema,
          rawArgs,
          'local_backtest_strategy arguments'
        );

        const config = await this.deps.parser.parse(strategy_description);
        const algorithm = resolveAlgorithm(config, this.deps.lean.defaultAlgorithm);
        log.info(`Resolved algorithm: ${algorithm}`);

        const result = await this.deps.lean.backtest(algorithm);
        if (result.success) {
          return { status: 'success', details: result.output };
        }
        const reason = result.error || `Command exited with code ${result.return_code}`;
        return formatError('Local backtest failed', reason, { details: result.error || result.output || reason });
      },
      (error) => formatError(error.context, error.message, { details: error.message })
    );
  }

  /**
   * Validate symbols, push the project, then start a cloud backtest.
   * A failed push stops before anything is submitted.
   */
  async cloudBacktest(rawArgs: unknown): Promise<ToolResponse<ExecutionResult>> {
    return this.guard<ExecutionResult>(async () => {
      const args = validateInput(CloudBacktestArgsSchema, rawArgs, 'cloud_backtest arguments');
      this.validateStrategySymbols(args.strategy_parameters);

      // Parameters are validated and logged only; algorithms read their own parameters in the cloud
      log.info('Received strategy parameters:', args.strategy_parameters);

      const pushResult = await this.deps.cloud.pushChanges(args.project_name);
      if (!pushResult.success) {
        let errorDetails = pushResult.error || 'Unknown push error';
        if (pushResult.output) {
          errorDetails += ` | Output: ${pushResult.output.slice(0, PUSH_OUTPUT_PREVIEW)}...`;
        }
        return formatError('Push failed', errorDetails, { details: pushResult });
      }
      log.info(`Push successful for project: ${args.project_name}`);

      const backtestResult = await this.deps.cloud.submitCloudBacktest(args.project_name, args.backtest_name);
      if (!backtestResult.success) {
        return formatError('Backtest submission failed', backtestResult.error || 'Unknown submission error', {
          backtest_id: null,
          details: backtestResult,
        });
      }

      const backtestId = extractBacktestId(backtestResult.output);
      log.info(`Backtest submitted successfully. ID: ${backtestId}`);
      return { status: 'success', backtest_id: backtestId, details: backtestResult };
    });
  }

  async downloadMarketData(_rawArgs: unknown): Promise<ToolResponse<never>> {
    const notImplemented = new NotImplementedError('Market data download');
    return formatError(notImplemented.context, notImplemented.message);
  }

  // --------------------------
  // Project Management Tools
  // --------------------------

  async pushProject(rawArgs: unknown): Promise<ToolResponse<ExecutionResult>> {
    return this.guard<ExecutionResult>(async () => {
      const { project_name } = validateInput(PushProjectArgsSchema, rawArgs, 'push_project arguments');
      const result = await this.deps.cloud.pushChanges(project_name);
      return fromExecution('Push failed', result);
    });
  }

  async backtestStatus(rawArgs: unknown): Promise<ToolResponse<ExecutionResult>> {
    return this.guard<ExecutionResult>(async () => {
      const args = validateInput(BacktestRefArgsSchema, rawArgs, 'backtest_status arguments');
      const result = await this.deps.cloud.getBacktestStatus(args.project_name, args.backtest_id);
      return fromExecution('Backtest status failed', result);
    });
  }

  async backtestResults(rawArgs: unknown): Promise<ToolResponse<ExecutionResult>> {
    return this.guard<ExecutionResult>(async () => {
      const args = validateInput(BacktestRefArgsSchema, rawArgs, 'backtest_results arguments');
      const result = await this.deps.cloud.getBacktestResults(args.project_name, args.backtest_id);
      return fromExecution('Backtest results unavailable', result);
    });
  }

  async projectStatus(rawArgs: unknown): Promise<ToolResponse<ExecutionResult>> {
    return this.guard<ExecutionResult>(async () => {
      const { project_name } = validateInput(PushProjectArgsSchema, rawArgs, 'project_status arguments');
      const result = await this.deps.cloud.getProjectStatus(project_name);
      return fromExecution('Project status failed', result);
    });
  }

  async createProject(rawArgs: unknown): Promise<ToolResponse<ExecutionResult>> {
    return this.guard<ExecutionResult>(async () => {
      const args = validateInput(CreateProjectArgsSchema, rawArgs, 'create_project arguments');
      const result = await this.deps.cloud.createProject(args.project_name, args.language);
      return fromExecution('Project creation failed', result);
    });
  }
}

/**
 * Dispatch a tool call by name
 */
export async function executeTool(tools: TradingTools, name: ToolName, args: unknown): Promise<ToolResponse> {
  log.info(`Executing tool: ${name}`);
  switch (name) {
    case 'local_backtest_strategy':
      return tools.localBacktestStrategy(args);
    case 'cloud_backtest':
      return tools.cloudBacktest(args);
    case 'push_project':
      return tools.pushProject(args);
    case 'download_market_data':
      return tools.downloadMarketData(args);
    case 'backtest_status':
      return tools.backtestStatus(args);
    case 'backtest_results':
      return tools.backtestResults(args);
    case 'project_status':
      return tools.projectStatus(args);
    case 'create_project':
      return tools.createProject(args);
  }
}
