/**
 * Error taxonomy for the assignment engine.
 *
 * Every failure surfaces to the caller unchanged. The `status` field is the
 * HTTP status the server maps the error to.
 */

export class FlowLabError extends Error {
  readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = "FlowLabError";
    this.status = status;
  }
}

/** Start/end node missing from the graph, or an unusable vehicle demand */
export class NotFoundError extends FlowLabError {
  constructor(message: string) {
    super(message, 404);
    this.name = "NotFoundError";
  }
}

/** The social-optimum solver did not reach a converged, feasible point */
export class ConvergenceError extends FlowLabError {
  readonly iterations: number;
  readonly residual: number;

  constructor(message: string, iterations: number, residual: number) {
    super(message, 422);
    this.name = "ConvergenceError";
    this.iterations = iterations;
    this.residual = residual;
  }
}

/** No simple path connects start and end (only thrown when a route is required) */
export class EmptyPathSetError extends FlowLabError {
  readonly start: string;
  readonly end: string;

  constructor(start: string, end: string) {
    super(`No route from ${start} to ${end}`, 404);
    this.name = "EmptyPathSetError";
    this.start = start;
    this.end = end;
  }
}

/** Malformed graph input */
export class GraphLoadError extends FlowLabError {
  /** 1-based line of the offending token, when known */
  readonly line: number | undefined;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `${message} (line ${line})`, 400);
    this.name = "GraphLoadError";
    this.line = line;
  }
}

/** Unreadable or invalid solver configuration on disk; a server-side fault */
export class ConfigError extends FlowLabError {
  /** Config file that failed to load */
  readonly filePath: string;

  constructor(message: string, filePath: string) {
    super(`${message} (${filePath})`, 500);
    this.name = "ConfigError";
    this.filePath = filePath;
  }
}

/** Bad command-line usage */
export class UsageError extends FlowLabError {
  constructor(message: string) {
    super(message, 400);
    this.name = "UsageError";
  }
}
