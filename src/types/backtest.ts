/**
 * Shared TypeScript types for the backtest bridge
 * These types are the contract between the parser, the bridges and the HTTP surface
 */

/**
 * Action named by the model, kept as written. Defaults to 'backtest'.
 */
export type StrategyAction = string;

/**
 * Structured strategy produced by the parser
 * Created per request, frozen, never persisted
 */
export interface StrategyConfig {
  readonly action: StrategyAction;
  readonly strategy_details: string;
  readonly symbols: readonly string[];
  readonly start_date: string;        // 'YYYY-MM-DD' format
  readonly end_date: string | null;   // 'YYYY-MM-DD' format, null = open ended or not a date
  readonly strategy_type: string;
  readonly parameters: Readonly<Record<string, unknown>>;
  readonly algorithm_path?: string;   // Explicit algorithm to run, wins over strategy_type
}

/**
 * Outcome of one external CLI invocation
 * success is true only when the process exited with code 0
 */
export interface ExecutionResult {
  success: boolean;
  output: string;
  error: string;
  return_code: number;
  command?: string;   // Display form of the argv, secrets masked
}

export interface SuccessResponse<T = unknown> {
  status: 'success';
  details: T;
  backtest_id?: string | null;
}

export interface ErrorResponse {
  status: 'error';
  context: string;
  message: string;
  timestamp: string;  // ISO-8601, UTC
  details?: unknown;
  backtest_id?: string | null;
}

export type ToolResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;

export interface CloudProjectsListing {
  implemented: false;
  message: string;
  projects: never[];
}
