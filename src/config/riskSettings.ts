/**
 * Risk settings - static limits and the tradable-symbol allow-list
 * Loaded once at startup, read-only afterwards
 */

import fs from 'fs';
import { z } from 'zod';
import { ConfigError } from './env';

export const RiskSettingsSchema = z.object({
  max_position_size: z.number().positive(),
  max_drawdown_percent: z.number().min(0).max(100),
  allowed_symbols: z.array(z.string().min(1)),
  default_stop_loss_percent: z.number().min(0).max(100),
  default_take_profit_percent: z.number().min(0),
  max_trades_per_day: z.number().int().min(0),
});

export type RiskSettings = Readonly<
  Omit<z.infer<typeof RiskSettingsSchema>, 'allowed_symbols'> & {
    allowed_symbols: readonly string[];
  }
>;

/**
 * Read and validate the risk settings file.
 * A non-empty override replaces the file's allow-list.
 */
export function loadRiskSettings(filePath: string, allowedSymbolsOverride?: readonly string[]): RiskSettings {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not read risk settings at ${filePath}: ${reason}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'Invalid JSON';
    throw new ConfigError(`Risk settings at ${filePath} are not valid JSON: ${reason}`);
  }

  const parsed = RiskSettingsSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid risk settings at ${filePath}: ${issues.join('; ')}`);
  }

  const allowed =
    allowedSymbolsOverride && allowedSymbolsOverride.length > 0
      ? allowedSymbolsOverride
      : parsed.data.allowed_symbols;

  return Object.freeze({
    ...parsed.data,
    allowed_symbols: Object.freeze([...new Set(allowed)]),
  });
}
