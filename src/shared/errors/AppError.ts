/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of errors reach the global error handler:
 *
 *   1. Operational errors: expected problems such as an unknown route. They
 *      carry their own HTTP status and a message safe to show the client.
 *
 *   2. Programmer/startup errors: a malformed capture configuration, a buffer
 *      released twice. These are flagged non-operational so the handler
 *      answers with a generic 500 and logs the details instead.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses whatever the compilation target.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 404);
  }
}

/** Missing or malformed settings; raised at startup, never per request. */
export class ConfigurationError extends AppError {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 500, false);
    this.issues = issues;
  }
}

export class BufferPoolError extends AppError {
  constructor(message: string) {
    super(message, 500, false);
  }
}

/** The client hung up before the response was complete (nginx's 499). */
export class ClientClosedError extends AppError {
  constructor() {
    super('Client closed the connection before the response was complete', 499);
  }
}
