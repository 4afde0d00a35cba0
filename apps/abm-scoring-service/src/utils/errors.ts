/**
 * Error taxonomy shared by nodes, the pipeline and the HTTP layer.
 * Every error carries a free-form context object that ends up in the logs.
 */

export type ErrorContext = Record<string, unknown>;

export class FlowError extends Error {
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.context = context;
  }
}

/** Malformed or missing required input */
export class ValidationError extends FlowError {}

/** A node's own logic failed after its inputs were valid */
export class ProcessingError extends FlowError {}

/** A call to an external dependency (CRM, enrichment provider) failed */
export class IntegrationError extends FlowError {}

/** The final write to the document store failed */
export class PersistenceError extends FlowError {}

/** A referenced resource (scheduled task, cache) does not exist */
export class NotFoundError extends FlowError {}

export interface ErrorReport {
  status: "error";
  message: string;
  error_type: string;
  context: ErrorContext & { timestamp: string };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Format any thrown value for logs and API responses
 */
export function describeError(error: unknown, context: ErrorContext = {}): ErrorReport {
  const ownContext = error instanceof FlowError ? error.context : {};
  return {
    status: "error",
    message: errorMessage(error),
    error_type: error instanceof Error ? error.name : typeof error,
    context: {
      ...ownContext,
      ...context,
      timestamp: new Date().toISOString(),
    },
  };
}

/**
 * HTTP status for an error raised behind an admin route
 */
export function httpStatusFor(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof NotFoundError) return 404;
  return 500;
}
