/**
 * Base error class for all scheduling engine errors.
 */
export class StepLoadError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, code: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StepLoadError';
    this.code = code;
    this.retryable = retryable;
  }
}

/**
 * Malformed or incomplete configuration. Carries the offending path and,
 * where the schema declares one, the expected-format hint.
 */
export class ValidationError extends StepLoadError {
  public readonly path: string;
  public readonly hint: string | undefined;

  constructor(
    message: string,
    path: string = '',
    hint?: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'VALIDATION_ERROR', false, options);
    this.name = 'ValidationError';
    this.path = path;
    this.hint = hint;
  }
}

/**
 * Numeric or semantic invariant violated while building run context or a schedule.
 */
export class ConstraintError extends StepLoadError {
  constructor(message: string, code: string = 'CONSTRAINT_VIOLATION', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'ConstraintError';
  }
}

/**
 * Structural schedule check failed.
 */
export class ScheduleError extends StepLoadError {
  constructor(message: string, code: string = 'INVALID_SCHEDULE', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'ScheduleError';
  }
}

/**
 * A node could not be reached. Retryable: probes may succeed on a later attempt.
 */
export class ConnectivityError extends StepLoadError {
  public readonly node: string;

  constructor(node: string, message?: string, options?: { cause?: unknown }) {
    super(message ?? `Cannot connect to node: ${node}`, 'NODE_UNREACHABLE', true, options);
    this.name = 'ConnectivityError';
    this.node = node;
  }
}

/**
 * A workload folder or module does not satisfy the workload contract.
 */
export class IntegrityError extends StepLoadError {
  constructor(message: string, code: string = 'WORKLOAD_INTEGRITY', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'IntegrityError';
  }
}

/**
 * A workload name has no registered implementation.
 */
export class ResolutionError extends StepLoadError {
  constructor(message: string, code: string = 'WORKLOAD_NOT_FOUND', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'ResolutionError';
  }
}

/**
 * Remote execution was requested but no deployment transport exists.
 */
export class DispatchError extends StepLoadError {
  constructor(message: string, code: string = 'REMOTE_DISPATCH_UNAVAILABLE', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'DispatchError';
  }
}

/**
 * A workload's own verify step rejected its output.
 */
export class VerificationError extends StepLoadError {
  constructor(message: string, code: string = 'WORKLOAD_VERIFY_FAILED', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'VerificationError';
  }
}
