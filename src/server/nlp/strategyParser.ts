/**
 * Strategy Parser
 *
 * Natural-language strategy -> StrategyConfig. The model is asked for JSON
 * matching a fixed template; its reply is searched for the first JSON object,
 * which is validated and completed with defaults. The pure half of this
 * (interpretCompletion) yields a tagged result and never a partial config.
 */

import { z } from 'zod';
import type { StrategyConfig } from '../../types/backtest';
import { ParseError, ValidationError, type BridgeError } from '../errors';
import type { CompletionClient } from '../llm/llmClient';
import { createLogger } from '../utils/logger';
import { isCalendarDate } from '../validation/schemas';

const log = createLogger('Parser');

export const DEFAULT_START_DATE = '2020-01-01';

export type ParseResult =
  | { ok: true; config: StrategyConfig }
  | { ok: false; error: ParseError | ValidationError };

export function buildStrategyPrompt(userInput: string): string {
  return `
[SYSTEM] You convert natural language trading strategy requests into a structured JSON object for the LEAN backtesting engine. Extract only the parameters needed to run a backtest.

USER: ${userInput}

TEMPLATE: {"action": "backtest", "strategy_details": "<description>", "symbols": ["<symbol1>", "<symbol2>"], "start_date": "YYYY-MM-DD", "end_date": "YYYY-MM-DD", "strategy_type": "<e.g. mean_reversion, trend_following, custom_indicator>", "parameters": {"<param_name>": "<param_value>"}}

Fill the TEMPLATE from the USER input only. Omit a key rather than inventing a value; end_date may be omitted for an open-ended backtest. Reply with the JSON object and nothing else.

Example:
USER: Backtest a simple moving average crossover on SPY from 2021-01-01 to 2023-12-31 using 50 and 200 day SMAs.
JSON_OUTPUT: {"action": "backtest", "strategy_details": "simple moving average crossover using 50 and 200 day SMAs", "symbols": ["SPY"], "start_date": "2021-01-01", "end_date": "2023-12-31", "strategy_type": "moving_average_crossover", "parameters": {"short_window": 50, "long_window": 200}}

Now process the actual user input:
USER: ${userInput}
JSON_OUTPUT:
`.trim();
}

/**
 * End index (inclusive) of the balanced object starting at `start`, or -1.
 * Braces inside JSON strings are ignored.
 */
function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === '{') depth++;
    else if (char === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * First well-formed JSON object embedded in the text (markdown fences and prose around it are skipped)
 */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const end = findObjectEnd(text, start);
    if (end === -1) continue;
    try {
      const value: unknown = JSON.parse(text.slice(start, end + 1));
      if (isPlainObject(value)) return value;
    } catch {
      // Not JSON from this brace; try the next one
    }
  }
  return null;
}

// Models write null for "not mentioned"; treat it as absent so defaults apply
const absentIfNull = (value: unknown) => (value === null ? undefined : value);
const absentIfBlank = (value: unknown) =>
  value === null || (typeof value === 'string' && value.trim() === '') ? undefined : value;

// Anything but a YYYY-MM-DD calendar date ("today", "2021") counts as not given
const dateOrAbsent = (key: string) => (value: unknown) => {
  if (value === null || value === undefined || value === '') return undefined;
  if (typeof value === 'string' && isCalendarDate(value.trim())) return value.trim();
  log.warn(`Ignoring ${key} from model response, not a YYYY-MM-DD date: ${JSON.stringify(value)}`);
  return undefined;
};

const ModelStrategySchema = z.object({
  action: z.preprocess(absentIfBlank, z.string().trim().default('backtest')),
  strategy_details: z.preprocess(absentIfNull, z.string().default('')),
  symbols: z.preprocess(
    (value) => (typeof value === 'string' ? [value] : value),
    z
      .array(z.string().trim().min(1, 'symbols must be non-empty strings'))
      .min(1, 'at least one symbol is required')
      .transform((symbols) => [...new Set(symbols)])
  ),
  start_date: z.preprocess(dateOrAbsent('start_date'), z.string().default(DEFAULT_START_DATE)),
  end_date: z.preprocess(dateOrAbsent('end_date'), z.string().nullable().default(null)),
  strategy_type: z.preprocess(absentIfNull, z.string().trim().optional()),
  parameters: z.preprocess(absentIfNull, z.record(z.unknown()).default({})),
  algorithm_path: z.preprocess(absentIfNull, z.string().trim().min(1).optional()),
});

/**
 * Turn a raw model reply into a StrategyConfig or a typed error
 */
export function interpretCompletion(text: string, defaultStrategyType: string): ParseResult {
  const json = extractJsonObject(text);
  if (!json) {
    return {
      ok: false,
      error: new ParseError('Failed to parse model response as JSON: no JSON object found', text),
    };
  }

  const parsed = ModelStrategySchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'response'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error: new ValidationError(`Model response failed validation: ${issues}`) };
  }

  const data = parsed.data;
  const config: StrategyConfig = {
    action: data.action,
    strategy_details: data.strategy_details,
    symbols: Object.freeze(data.symbols),
    start_date: data.start_date,
    end_date: data.end_date,
    strategy_type: data.strategy_type || defaultStrategyType,
    parameters: Object.freeze({ ...data.parameters }),
    ...(data.algorithm_path ? { algorithm_path: data.algorithm_path } : {}),
  };
  return { ok: true, config: Object.freeze(config) };
}

export class StrategyParser {
  constructor(
    private readonly client: CompletionClient,
    private readonly defaultStrategyType: string
  ) {}

  /**
   * One model call per invocation. Throws ValidationError, ParseError or ExternalCallError.
   */
  async parse(strategyDescription: string): Promise<StrategyConfig> {
    const description = strategyDescription.trim();
    if (description === '') {
      throw new ValidationError('strategy_description must not be empty');
    }

    const prompt = buildStrategyPrompt(description);
    log.debug(`Sending prompt to ${this.client.provider}:\n${prompt}`);

    const text = await this.client.complete(prompt);
    log.debug(`Raw model response:\n${text}`);

    const result = interpretCompletion(text, this.defaultStrategyType);
    if (!result.ok) {
      const error: BridgeError = result.error;
      log.warn(`${error.name}: ${error.message}`);
      throw error;
    }

    log.info(`Parsed strategy: ${result.config.strategy_type} on ${result.config.symbols.join(', ')}`);
    return result.config;
  }
}
