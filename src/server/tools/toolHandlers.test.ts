import { describe, expect, it, vi } from 'vitest';
import type { LeanConfig } from '../../config/env';
import type { RiskSettings } from '../../config/riskSettings';
import type { ExecutionResult } from '../../types/backtest';
import { CloudBridge } from '../bridges/cloudBridge';
import type { CommandArgv, CommandOptions } from '../bridges/commandRunner';
import { LeanBridge } from '../bridges/leanBridge';
import { ExternalCallError } from '../errors';
import { StrategyParser } from '../nlp/strategyParser';
import { TradingTools, executeTool, formatError } from './toolHandlers';

const leanConfig: LeanConfig = {
  cliPath: 'lean',
  projectsDir: '/projects',
  commandTimeoutMs: 0,
  defaultAlgorithm: 'BasicTemplateAlgorithm',
};

const riskSettings: RiskSettings = {
  max_position_size: 10000,
  max_drawdown_percent: 20,
  allowed_symbols: ['SPY', 'QQQ', 'AAPL'],
  default_stop_loss_percent: 2,
  default_take_profit_percent: 5,
  max_trades_per_day: 10,
};

function ok(output: string): ExecutionResult {
  return { success: true, output, error: '', return_code: 0 };
}

function failed(error: string, output = '', returnCode = 1): ExecutionResult {
  return { success: false, output, error, return_code: returnCode };
}

function setup(options: { reply?: string; caseInsensitiveSymbols?: boolean } = {}) {
  const run = vi.fn(async (_argv: CommandArgv, _options?: CommandOptions): Promise<ExecutionResult> => ok(''));
  const complete = vi.fn(async (_prompt: string) => options.reply ?? '{"symbols": ["SPY"]}');
  const parser = new StrategyParser({ provider: 'google', model: 'test-model', complete }, 'BasicTemplateAlgorithm');
  const tools = new TradingTools({
    parser,
    lean: new LeanBridge(leanConfig, run),
    cloud: new CloudBridge(leanConfig, run),
    riskSettings,
    caseInsensitiveSymbols: options.caseInsensitiveSymbols ?? false,
  });
  const argvs = () => run.mock.calls.map(([argv]) => argv);
  return { tools, run, complete, argvs };
}

describe('formatError', () => {
  it('builds the error envelope with an ISO timestamp', () => {
    const response = formatError('Push failed', 'auth required', { details: 'raw' });

    expect(response).toMatchObject({ status: 'error', context: 'Push failed', message: 'auth required', details: 'raw' });
    expect(new Date(response.timestamp).toISOString()).toBe(response.timestamp);
  });
});

describe('local_backtest_strategy', () => {
  it('parses the description and returns the engine output', async () => {
    const { tools, run, argvs } = setup({ reply: '{"symbols": ["SPY"], "strategy_type": "momentum"}' });
    run.mockResolvedValueOnce(ok('STATISTICS:: Total Trades 12'));

    const response = await tools.localBacktestStrategy({ strategy_description: 'Momentum on SPY' });

    expect(response).toEqual({ status: 'success', details: 'STATISTICS:: Total Trades 12' });
    expect(argvs()).toEqual([['lean', 'backtest', 'momentum']]);
  });

  it('falls back to the default algorithm without a strategy type', async () => {
    const { tools, argvs } = setup();

    await tools.localBacktestStrategy({ strategy_description: 'Something on SPY' });

    expect(argvs()).toEqual([['lean', 'backtest', 'BasicTemplateAlgorithm']]);
  });

  it('reports a failed run with the CLI error', async () => {
    const { tools, run } = setup();
    run.mockResolvedValueOnce(failed('Project not found'));

    expect(await tools.localBacktestStrategy({ strategy_description: 'SPY' })).toMatchObject({
      status: 'error',
      context: 'Local backtest failed',
      message: 'Project not found',
      details: 'Project not found',
    });
  });

  it('uses the exit code and output when stderr is empty', async () => {
    const { tools, run } = setup();
    run.mockResolvedValueOnce(failed('', 'partial log', 3));

    expect(await tools.localBacktestStrategy({ strategy_description: 'SPY' })).toMatchObject({
      status: 'error',
      message: 'Command exited with code 3',
      details: 'partial log',
    });
  });

  it('returns a parse error without running the engine', async () => {
    const { tools, run } = setup({ reply: 'I am not sure what you mean.' });

    expect(await tools.localBacktestStrategy({ strategy_description: 'do something' })).toMatchObject({
      status: 'error',
      context: 'Parse Error',
      message: 'Failed to parse model response as JSON: no JSON object found',
      details: 'Failed to parse model response as JSON: no JSON object found',
    });
    expect(run).not.toHaveBeenCalled();
  });

  it('rejects missing arguments before calling the model', async () => {
    const { tools, run, complete } = setup();

    expect(await tools.localBacktestStrategy({})).toMatchObject({
      status: 'error',
      context: 'Validation Error',
      message: 'Invalid local_backtest_strategy arguments: strategy_description: Required',
    });
    expect(complete).not.toHaveBeenCalled();
    expect(run).not.toHaveBeenCalled();
  });

  it('reports a model API failure', async () => {
    const { tools, complete, run } = setup();
    complete.mockRejectedValueOnce(new ExternalCallError('Model API', 'GEMINI_API_KEY is not set'));

    expect(await tools.localBacktestStrategy({ strategy_description: 'SPY' })).toMatchObject({
      status: 'error',
      context: 'Model API',
      message: 'GEMINI_API_KEY is not set',
    });
    expect(run).not.toHaveBeenCalled();
  });
});

describe('cloud_backtest', () => {
  it('pushes, submits and returns the backtest id', async () => {
    const { tools, run, argvs } = setup();
    const submitted = ok("Started backtest named 'Run 1' for project 'Alpha' with backtestId BT-12345");
    run.mockResolvedValueOnce(ok('Pushed')).mockResolvedValueOnce(submitted);

    const response = await tools.cloudBacktest({
      project_name: 'Alpha',
      strategy_parameters: { symbol: 'SPY' },
      backtest_name: 'Run 1',
    });

    expect(response).toEqual({ status: 'success', backtest_id: 'BT-12345', details: submitted });
    expect(argvs()).toEqual([
      ['lean', 'cloud', 'push', '--project', 'Alpha'],
      ['lean', 'cloud', 'backtest', 'Alpha', '--backtest-name', 'Run 1'],
    ]);
  });

  it('succeeds with a null id when the output has none', async () => {
    const { tools, run } = setup();
    run.mockResolvedValueOnce(ok('Pushed')).mockResolvedValueOnce(ok('Backtest started'));

    expect(await tools.cloudBacktest({ project_name: 'Alpha' })).toMatchObject({
      status: 'success',
      backtest_id: null,
    });
  });

  it('rejects a symbol outside the allow-list before any command', async () => {
    const { tools, run } = setup();

    expect(
      await tools.cloudBacktest({ project_name: 'Alpha', strategy_parameters: { symbols: ['SPY', 'TSLA'] } })
    ).toMatchObject({
      status: 'error',
      context: 'Validation Error',
      message: 'Symbol TSLA not permitted in current configuration.',
    });
    expect(run).not.toHaveBeenCalled();
  });

  it('rejects a non-string symbol', async () => {
    const { tools, run } = setup();

    expect(await tools.cloudBacktest({ project_name: 'Alpha', strategy_parameters: { symbol: 42 } })).toMatchObject({
      message: 'Symbol must be a non-empty string.',
    });
    expect(run).not.toHaveBeenCalled();
  });

  it('matches symbols case-insensitively when configured', async () => {
    const { tools, run } = setup({ caseInsensitiveSymbols: true });
    run.mockResolvedValueOnce(ok('Pushed')).mockResolvedValueOnce(ok('backtestId BT-1'));

    expect(await tools.cloudBacktest({ project_name: 'Alpha', strategy_parameters: { symbol: 'spy' } })).toMatchObject({
      status: 'success',
      backtest_id: 'BT-1',
    });
  });

  it('stops after a failed push and never submits', async () => {
    const { tools, run } = setup();
    const pushResult = failed('Not logged in', 'Pushing Alpha');
    run.mockResolvedValueOnce(pushResult);

    const response = await tools.cloudBacktest({ project_name: 'Alpha', strategy_parameters: { symbol: 'SPY' } });

    expect(response).toMatchObject({
      status: 'error',
      context: 'Push failed',
      message: 'Not logged in | Output: Pushing Alpha...',
      details: pushResult,
    });
    expect('backtest_id' in response).toBe(false);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('truncates push output in the message', async () => {
    const { tools, run } = setup();
    run.mockResolvedValueOnce(failed('', 'x'.repeat(300)));

    expect(await tools.cloudBacktest({ project_name: 'Alpha' })).toMatchObject({
      message: `Unknown push error | Output: ${'x'.repeat(200)}...`,
    });
  });

  it('reports a failed submission with a null backtest id', async () => {
    const { tools, run } = setup();
    const submitResult = failed('Project has compile errors');
    run.mockResolvedValueOnce(ok('Pushed')).mockResolvedValueOnce(submitResult);

    expect(await tools.cloudBacktest({ project_name: 'Alpha' })).toMatchObject({
      status: 'error',
      context: 'Backtest submission failed',
      message: 'Project has compile errors',
      backtest_id: null,
      details: submitResult,
    });
  });

  it('rejects a project name that reads as an option', async () => {
    const { tools, run } = setup();

    expect(await tools.cloudBacktest({ project_name: '--help' })).toMatchObject({
      context: 'Validation Error',
      message: "Invalid cloud_backtest arguments: project_name: project_name must not start with '-'",
    });
    expect(run).not.toHaveBeenCalled();
  });
});

describe('project tools', () => {
  it('download_market_data is not implemented', async () => {
    const { tools, run } = setup();

    expect(await tools.downloadMarketData({ symbol: 'SPY' })).toMatchObject({
      status: 'error',
      context: 'Market data download',
      message: 'not implemented',
    });
    expect(run).not.toHaveBeenCalled();
  });

  it('push_project returns the execution result', async () => {
    const { tools, run } = setup();
    run.mockResolvedValueOnce(ok('Pushed'));

    expect(await tools.pushProject({ project_name: 'Alpha' })).toEqual({ status: 'success', details: ok('Pushed') });
  });

  it('backtest_status fails with the exit code when stderr is empty', async () => {
    const { tools, run, argvs } = setup();
    run.mockResolvedValueOnce(failed('', '', 2));

    expect(await tools.backtestStatus({ project_name: 'Alpha', backtest_id: 'BT-1' })).toMatchObject({
      context: 'Backtest status failed',
      message: 'Command exited with code 2',
    });
    expect(argvs()).toEqual([['lean', 'cloud', 'status', 'Alpha', '--backtest-id', 'BT-1']]);
  });

  it('backtest_results is unavailable', async () => {
    const { tools, run } = setup();

    expect(await tools.backtestResults({ project_name: 'Alpha', backtest_id: 'BT-1' })).toMatchObject({
      status: 'error',
      context: 'Backtest results unavailable',
      message: 'Fetching cloud backtest results is not available yet.',
    });
    expect(run).not.toHaveBeenCalled();
  });

  it('create_project defaults to python', async () => {
    const { tools, argvs } = setup();

    expect(await tools.createProject({ project_name: 'Alpha' })).toMatchObject({ status: 'success' });
    expect(argvs()).toEqual([['lean', 'project-create', '--language', 'python', 'Alpha']]);
  });
});

describe('executeTool', () => {
  it('dispatches by name', async () => {
    const { tools, argvs } = setup();

    await executeTool(tools, 'project_status', { project_name: 'Alpha' });

    expect(argvs()).toEqual([['lean', 'cloud', 'status', 'Alpha']]);
  });
});
