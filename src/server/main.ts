/**
 * Process entry point: load .env, build every component from one frozen
 * config, log in the LEAN CLI when credentials are present, and serve HTTP.
 */

import dotenv from 'dotenv';
import path from 'path';
import { serve } from '@hono/node-server';
import { loadAppConfig } from '../config/env';
import { loadRiskSettings } from '../config/riskSettings';
import { createApp, SERVICE_NAME } from './app';
import { CloudBridge } from './bridges/cloudBridge';
import { LeanBridge } from './bridges/leanBridge';
import { errorMessage } from './errors';
import { createCompletionClient } from './llm/llmClient';
import { StrategyParser } from './nlp/strategyParser';
import { Authenticator } from './security/authenticator';
import { TradingTools } from './tools/toolHandlers';
import { createLogger, setLogLevel } from './utils/logger';

const log = createLogger('Main');

async function main(): Promise<void> {
  const envPath = path.resolve(process.cwd(), '.env');
  const loaded = dotenv.config({ path: envPath });
  if (loaded.error) {
    log.warn(`Could not load .env from ${envPath}, using the process environment only`);
  } else {
    log.info(`Loaded .env from: ${envPath}`);
  }

  const config = loadAppConfig();
  setLogLevel(config.logLevel);

  const riskSettings = loadRiskSettings(
    config.validation.riskSettingsPath,
    config.validation.allowedSymbolsOverride
  );
  log.info(`Allowed symbols: ${riskSettings.allowed_symbols.join(', ')}`);

  const lean = new LeanBridge(config.lean);
  const cloud = new CloudBridge(config.lean);

  if (config.lean.userId && config.lean.apiToken) {
    const result = await cloud.configureCredentials(config.lean.userId, config.lean.apiToken);
    if (result.success) {
      log.info('LEAN CLI configured successfully');
    } else {
      log.warn(`LEAN CLI configuration failed: ${result.error}`);
    }
  } else {
    log.warn('QC_USER_ID or QC_API_TOKEN not set; cloud tools rely on an existing CLI login');
  }

  const parser = new StrategyParser(createCompletionClient(config.parser), config.lean.defaultAlgorithm);
  const tools = new TradingTools({
    parser,
    lean,
    cloud,
    riskSettings,
    caseInsensitiveSymbols: config.validation.caseInsensitiveSymbols,
  });

  const authenticator = new Authenticator({
    apiToken: config.server.apiToken,
    autoApproveTools: config.server.autoApproveTools,
  });
  if (config.server.autoApproveTools.length > 0) {
    log.info(`Auto-approved tools: ${config.server.autoApproveTools.join(', ')}`);
  }
  if (authenticator.prototypeMode) {
    log.warn('SERVER_API_TOKEN not set; tools that require auth are refused unless auto-approved');
  }

  const app = createApp({ tools, riskSettings, authenticator });

  const server = serve({ fetch: app.fetch, hostname: config.server.host, port: config.server.port }, (info) => {
    log.info(`${SERVICE_NAME} listening on ${config.server.host}:${info.port}`);
  });

  // One failed request must never take the process down
  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled rejection:', reason);
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  log.error(`Startup failed: ${errorMessage(error)}`);
  process.exitCode = 1;
});
