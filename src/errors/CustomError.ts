export type ErrorDetails = Record<string, unknown>;

export class CustomError extends Error {
  public code: string;
  public statusCode: number;
  public details?: ErrorDetails;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    details?: ErrorDetails,
  ) {
    super(message);
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
  }
}

export class NotFoundError extends CustomError {
  constructor(message: string = 'Resource not found') {
    super(message, 'NOT_FOUND', 404);
  }
}

export class ValidationError extends CustomError {
  constructor(message: string = 'Validation error', details?: ErrorDetails) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

export class ConflictError extends CustomError {
  constructor(message: string = 'Conflict') {
    super(message, 'CONFLICT', 409);
  }
}

/* -------------------------------------------------------------------------------------------------
 * Harness errors
 * ------------------------------------------------------------------------------------------------- */

export class ConfigError extends CustomError {
  public key: string;

  constructor(key: string, message: string = `Invalid configuration: ${key}`) {
    super(message, 'CONFIG_ERROR', 500, { key });
    this.key = key;
  }
}

/** The node process could not be launched (launcher exited non-zero). */
export class LaunchError extends CustomError {
  constructor(message: string = 'Failed to launch node', details?: ErrorDetails) {
    super(message, 'LAUNCH_ERROR', 500, details);
  }
}

/**
 * The node launched but was gone by the time the settle delay elapsed.
 * Under fault injection this is expected from time to time; callers retry it.
 */
export class TransientLaunchError extends LaunchError {
  constructor(message: string = 'Node exited shortly after start') {
    super(message);
    this.code = 'TRANSIENT_LAUNCH_ERROR';
    this.statusCode = 503;
  }
}

export class CommandError extends CustomError {
  public command: string;
  public exitCode: number | null;
  public stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string) {
    super(
      `CLI command failed: ${command} (exit ${exitCode ?? 'timeout'}): ${stderr.trim()}`,
      'COMMAND_ERROR',
      502,
      { command, exitCode },
    );
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class TimeoutError extends CustomError {
  public timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message, 'TIMEOUT', 504, { timeoutMs });
    this.timeoutMs = timeoutMs;
  }
}
