/**
 * Error taxonomy for the tool boundary.
 *
 * Every error carries a short `context` label; the registry turns it into
 * `{ status: 'error', context, message }` without inspecting the class.
 */

export class BridgeError extends Error {
  readonly context: string;

  constructor(context: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BridgeError';
    this.context = context;
  }
}

/** Bad or disallowed input. Raised before any external call. */
export class ValidationError extends BridgeError {
  constructor(message: string, context = 'Validation Error') {
    super(context, message);
    this.name = 'ValidationError';
  }
}

/** The model's reply held no usable JSON object. */
export class ParseError extends BridgeError {
  readonly rawResponse: string;

  constructor(message: string, rawResponse: string) {
    super('Parse Error', message);
    this.name = 'ParseError';
    this.rawResponse = rawResponse;
  }
}

/** Network or process-level failure talking to something outside this process. */
export class ExternalCallError extends BridgeError {
  constructor(context: string, message: string, options?: { cause?: unknown }) {
    super(context, message, options);
    this.name = 'ExternalCallError';
  }
}

export class NotImplementedError extends BridgeError {
  constructor(capability: string) {
    super(capability, 'not implemented');
    this.name = 'NotImplementedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
