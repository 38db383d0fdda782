/**
 * Input schemas for every tool, and the shared symbol allow-list rule
 * Validation happens here, at the tool boundary, before any external call
 */

import { z } from 'zod';
import { ValidationError } from '../errors';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isCalendarDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

// A leading dash would reach the CLI as an option rather than a name
const ProjectNameSchema = z
  .string()
  .trim()
  .min(1, 'project_name must not be empty')
  .refine((name) => !name.startsWith('-'), { message: "project_name must not start with '-'" });

export const LocalBacktestArgsSchema = z.object({
  strategy_description: z.string().trim().min(1, 'strategy_description must not be empty'),
});

export const CloudBacktestArgsSchema = z.object({
  project_name: ProjectNameSchema,
  strategy_parameters: z.record(z.unknown()).default({}),
  backtest_name: z.string().trim().min(1).optional(),
});

export const PushProjectArgsSchema = z.object({
  project_name: ProjectNameSchema,
});

export const BacktestRefArgsSchema = z.object({
  project_name: ProjectNameSchema,
  backtest_id: z
    .string()
    .trim()
    .min(1, 'backtest_id must not be empty')
    .refine((id) => !id.startsWith('-'), { message: "backtest_id must not start with '-'" }),
});

export const ProjectLanguageSchema = z.enum(['python', 'csharp']);
export type ProjectLanguage = z.infer<typeof ProjectLanguageSchema>;

export const CreateProjectArgsSchema = z.object({
  project_name: ProjectNameSchema,
  language: ProjectLanguageSchema.default('python'),
});

/**
 * Validate untrusted input against a schema.
 * Throws ValidationError listing every issue.
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, data: unknown, label: string): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid ${label}: ${issues}`);
  }
  return result.data;
}

export interface SymbolPolicy {
  allowedSymbols: readonly string[];
  caseInsensitive: boolean;
}

/**
 * A symbol is valid only if it is a non-empty string on the allow-list
 */
export function assertAllowedSymbol(symbol: unknown, policy: SymbolPolicy): string {
  if (typeof symbol !== 'string' || symbol.trim() === '') {
    throw new ValidationError('Symbol must be a non-empty string.');
  }

  const permitted = policy.caseInsensitive
    ? policy.allowedSymbols.some((allowed) => allowed.toUpperCase() === symbol.toUpperCase())
    : policy.allowedSymbols.includes(symbol);

  if (!permitted) {
    throw new ValidationError(`Symbol ${symbol} not permitted in current configuration.`);
  }
  return symbol;
}
