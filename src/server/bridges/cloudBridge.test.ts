import { describe, expect, it, vi } from 'vitest';
import type { LeanConfig } from '../../config/env';
import type { ExecutionResult } from '../../types/backtest';
import { CloudBridge, extractBacktestId } from './cloudBridge';
import type { CommandArgv, CommandOptions } from './commandRunner';

const config: LeanConfig = {
  cliPath: 'lean',
  projectsDir: '/projects',
  commandTimeoutMs: 0,
  defaultAlgorithm: 'BasicTemplateAlgorithm',
};

const ok: ExecutionResult = { success: true, output: '', error: '', return_code: 0 };

function setup() {
  const run = vi.fn(async (_argv: CommandArgv, _options?: CommandOptions): Promise<ExecutionResult> => ok);
  return { run, bridge: new CloudBridge(config, run) };
}

describe('extractBacktestId', () => {
  it.each([
    ["Started backtest named 'Test Backtest' for project 'Test Project' with backtestId BT-12345", 'BT-12345'],
    ['BacktestId: 8f3a21c0e7', '8f3a21c0e7'],
    ['Backtest id = abc_123.', 'abc_123'],
    ['backtest_id:\tXYZ9', 'XYZ9'],
  ])('finds the id in %j', (output, id) => {
    expect(extractBacktestId(output)).toBe(id);
  });

  it.each(['Backtest started', 'backtestIdentifier 123', 'Backtest id to be assigned', ''])('returns null for %j', (output) => {
    expect(extractBacktestId(output)).toBeNull();
  });
});

describe('CloudBridge', () => {
  it('pushes with --project and the name as a single argument', async () => {
    const { run, bridge } = setup();

    await bridge.pushChanges('My Project; rm -rf /');

    expect(run).toHaveBeenCalledWith(['lean', 'cloud', 'push', '--project', 'My Project; rm -rf /'], {
      cwd: '/projects',
      timeoutMs: 0,
    });
  });

  it('submits a backtest without a name', async () => {
    const { run, bridge } = setup();

    await bridge.submitCloudBacktest('Alpha');

    expect(run.mock.calls[0]?.[0]).toEqual(['lean', 'cloud', 'backtest', 'Alpha']);
  });

  it('submits a backtest with --backtest-name', async () => {
    const { run, bridge } = setup();

    await bridge.submitCloudBacktest('Alpha', 'Run `1` $(date)');

    expect(run.mock.calls[0]?.[0]).toEqual(['lean', 'cloud', 'backtest', 'Alpha', '--backtest-name', 'Run `1` $(date)']);
  });

  it('checks backtest and project status', async () => {
    const { run, bridge } = setup();

    await bridge.getBacktestStatus('Alpha', 'BT-1');
    await bridge.getProjectStatus('Alpha');

    expect(run.mock.calls.map(([argv]) => argv)).toEqual([
      ['lean', 'cloud', 'status', 'Alpha', '--backtest-id', 'BT-1'],
      ['lean', 'cloud', 'status', 'Alpha'],
    ]);
  });

  it('creates a project in the requested language', async () => {
    const { run, bridge } = setup();

    await bridge.createProject('Alpha', 'csharp');

    expect(run.mock.calls[0]?.[0]).toEqual(['lean', 'project-create', '--language', 'csharp', 'Alpha']);
  });

  it('never runs a command for backtest results and always fails', async () => {
    const { run, bridge } = setup();

    const result = await bridge.getBacktestResults('Alpha', 'BT-1');

    expect(run).not.toHaveBeenCalled();
    expect(result).toEqual({
      success: false,
      output: '',
      error: 'Fetching cloud backtest results is not available yet.',
      return_code: -1,
    });
  });

  it('configures credentials with both values masked', async () => {
    const { run, bridge } = setup();

    const result = await bridge.configureCredentials('test-user', 'test-secret');

    expect(result.success).toBe(true);
    expect(run.mock.calls).toEqual([
      [
        ['lean', 'config', 'set', 'user-id', 'test-user'],
        { secrets: ['test-user', 'test-secret'], cwd: '/projects', timeoutMs: 0 },
      ],
      [
        ['lean', 'config', 'set', 'api-token', 'test-secret'],
        { secrets: ['test-user', 'test-secret'], cwd: '/projects', timeoutMs: 0 },
      ],
    ]);
  });

  it('stops configuring after the first failure', async () => {
    const { run, bridge } = setup();
    run.mockResolvedValueOnce({ success: false, output: '', error: 'config locked', return_code: 2 });

    const result = await bridge.configureCredentials('test-user', 'test-secret');

    expect(result.error).toBe('config locked');
    expect(run).toHaveBeenCalledTimes(1);
  });
});
