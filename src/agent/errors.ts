/**
 * Agent Errors
 *
 * Only model transport failures, cancellation and misuse of the loop escape
 * a run. Tool failures become observations (see dispatcher.ts).
 */

export class ActloopError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ActloopError';
  }
}

export class DuplicateCapabilityError extends ActloopError {
  readonly capabilityName: string;

  constructor(name: string) {
    super(`Capability "${name}" is already registered`);
    this.name = 'DuplicateCapabilityError';
    this.capabilityName = name;
  }
}

/**
 * Thrown by a capability when its arguments have the wrong shape.
 * The dispatcher reports it together with the expected schema.
 */
export class InvalidArgumentsError extends ActloopError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentsError';
  }
}

export class ModelTransportError extends ActloopError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ModelTransportError';
    this.status = options?.status;
  }
}

export class RunCancelledError extends ActloopError {
  constructor(message = 'Run was cancelled') {
    super(message);
    this.name = 'RunCancelledError';
  }
}

export class ConcurrentRunError extends ActloopError {
  constructor() {
    super('A run is already in progress on this agent loop');
    this.name = 'ConcurrentRunError';
  }
}

export class ConfigError extends ActloopError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

/**
 * Extract a short error type name from a thrown value, e.g. "TypeError".
 * Never returns a stack trace.
 */
export function errorTypeOf(error: unknown): string {
  if (error instanceof Error) {
    return error.name || error.constructor.name || 'Error';
  }
  return 'Error';
}

export function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
