/**
 * Process configuration
 *
 * Read once from the environment at startup, validated, frozen and passed
 * into every component that needs it. Nothing else reads process.env.
 */

import path from 'path';
import { z } from 'zod';
import { PROVIDER_NAMES, resolveModel, type ProviderName } from './models';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_ALGORITHM = 'BasicTemplateAlgorithm';
export const DEFAULT_COMMAND_TIMEOUT_MS = 600_000;

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const flag = z
  .string()
  .optional()
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LEAN_CLI_PATH: z.string().min(1).default('lean'),
  QC_PROJECTS_DIR: optionalString,
  QC_USER_ID: optionalString,
  QC_API_TOKEN: optionalString,
  PARSER_PROVIDER: z.enum(PROVIDER_NAMES).default('google'),
  PARSER_MODEL: optionalString,
  GEMINI_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  DEEPSEEK_API_KEY: optionalString,
  RISK_SETTINGS_PATH: z.string().min(1).default('config/risk_settings.json'),
  ALLOWED_SYMBOLS: optionalString,
  ALLOWED_SYMBOLS_CASE_INSENSITIVE: flag,
  DEFAULT_ALGORITHM: z.string().min(1).default(DEFAULT_ALGORITHM),
  COMMAND_TIMEOUT_MS: z.coerce.number().int().min(0).default(DEFAULT_COMMAND_TIMEOUT_MS),
  SERVER_API_TOKEN: optionalString,
  AUTO_APPROVE_TOOLS: optionalString,
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface ServerConfig {
  host: string;
  port: number;
  apiToken?: string;
  /** Tools authorized without a valid token */
  autoApproveTools: readonly string[];
}

export interface LeanConfig {
  cliPath: string;
  projectsDir: string;
  userId?: string;
  apiToken?: string;
  commandTimeoutMs: number;
  defaultAlgorithm: string;
}

export interface ParserConfig {
  provider: ProviderName;
  model: string;
  apiKeys: Readonly<Partial<Record<ProviderName, string>>>;
}

export interface ValidationConfig {
  riskSettingsPath: string;
  allowedSymbolsOverride?: readonly string[];
  caseInsensitiveSymbols: boolean;
}

export interface AppConfig {
  server: Readonly<ServerConfig>;
  lean: Readonly<LeanConfig>;
  parser: Readonly<ParserConfig>;
  validation: Readonly<ValidationConfig>;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Split a comma-separated list, dropping blanks
 */
export function parseCsvList(raw: string): string[] {
  return raw
    .split(',')
    .map((symbol) => symbol.trim())
    .filter((symbol) => symbol.length > 0);
}

/**
 * Build the immutable AppConfig from an environment map
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment configuration:\n  ${issues.join('\n  ')}`);
  }
  const vars = parsed.data;

  const apiKeys: Partial<Record<ProviderName, string>> = {};
  if (vars.GEMINI_API_KEY) apiKeys.google = vars.GEMINI_API_KEY;
  if (vars.OPENAI_API_KEY) apiKeys.openai = vars.OPENAI_API_KEY;
  if (vars.DEEPSEEK_API_KEY) apiKeys.deepseek = vars.DEEPSEEK_API_KEY;

  const config: AppConfig = {
    server: Object.freeze({
      host: vars.HOST,
      port: vars.PORT,
      apiToken: vars.SERVER_API_TOKEN,
      autoApproveTools: Object.freeze(vars.AUTO_APPROVE_TOOLS ? parseCsvList(vars.AUTO_APPROVE_TOOLS) : []),
    }),
    lean: Object.freeze({
      cliPath: vars.LEAN_CLI_PATH,
      projectsDir: path.resolve(cwd, vars.QC_PROJECTS_DIR ?? '.'),
      userId: vars.QC_USER_ID,
      apiToken: vars.QC_API_TOKEN,
      commandTimeoutMs: vars.COMMAND_TIMEOUT_MS,
      defaultAlgorithm: vars.DEFAULT_ALGORITHM,
    }),
    parser: Object.freeze({
      provider: vars.PARSER_PROVIDER,
      model: resolveModel(vars.PARSER_PROVIDER, vars.PARSER_MODEL).model,
      apiKeys: Object.freeze(apiKeys),
    }),
    validation: Object.freeze({
      riskSettingsPath: path.resolve(cwd, vars.RISK_SETTINGS_PATH),
      allowedSymbolsOverride: vars.ALLOWED_SYMBOLS
        ? Object.freeze(parseCsvList(vars.ALLOWED_SYMBOLS))
        : undefined,
      caseInsensitiveSymbols: vars.ALLOWED_SYMBOLS_CASE_INSENSITIVE,
    }),
    logLevel: vars.LOG_LEVEL,
  };

  return Object.freeze(config);
}
