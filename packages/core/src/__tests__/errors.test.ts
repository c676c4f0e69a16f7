import { describe, expect, it } from 'vitest';

import {
  ConnectivityError,
  ConstraintError,
  DispatchError,
  IntegrityError,
  ResolutionError,
  ScheduleError,
  StepLoadError,
  ValidationError,
  VerificationError,
} from '../errors.js';

describe('StepLoadError', () => {
  it('has code and retryable properties', () => {
    const err = new StepLoadError('test', 'TEST_CODE', false);
    expect(err.message).toBe('test');
    expect(err.code).toBe('TEST_CODE');
    expect(err.retryable).toBe(false);
    expect(err.name).toBe('StepLoadError');
  });

  it('is an instance of Error', () => {
    const err = new StepLoadError('test', 'TEST', false);
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(StepLoadError);
  });

  it('keeps the cause', () => {
    const cause = new Error('root');
    const err = new StepLoadError('wrapped', 'TEST', false, { cause });
    expect(err.cause).toBe(cause);
  });
});

describe('ValidationError', () => {
  it('carries the path and hint', () => {
    const err = new ValidationError('bad config', 'workloads.0', 'use a name');
    expect(err.code).toBe('VALIDATION_ERROR');
    expect(err.path).toBe('workloads.0');
    expect(err.hint).toBe('use a name');
    expect(err.retryable).toBe(false);
    expect(err.name).toBe('ValidationError');
  });

  it('defaults to an empty path and no hint', () => {
    const err = new ValidationError('bad config');
    expect(err.path).toBe('');
    expect(err.hint).toBeUndefined();
  });
});

describe('ConnectivityError', () => {
  it('is retryable and names the node', () => {
    const err = new ConnectivityError('node-7');
    expect(err.retryable).toBe(true);
    expect(err.code).toBe('NODE_UNREACHABLE');
    expect(err.node).toBe('node-7');
    expect(err.message).toBe('Cannot connect to node: node-7');
  });

  it('accepts a custom message', () => {
    expect(new ConnectivityError('n', 'probe timed out').message).toBe('probe timed out');
  });
});

describe('non-retryable errors', () => {
  const cases = [
    [new ConstraintError('x'), 'ConstraintError', 'CONSTRAINT_VIOLATION'],
    [new ScheduleError('x'), 'ScheduleError', 'INVALID_SCHEDULE'],
    [new IntegrityError('x'), 'IntegrityError', 'WORKLOAD_INTEGRITY'],
    [new ResolutionError('x'), 'ResolutionError', 'WORKLOAD_NOT_FOUND'],
    [new DispatchError('x'), 'DispatchError', 'REMOTE_DISPATCH_UNAVAILABLE'],
    [new VerificationError('x'), 'VerificationError', 'WORKLOAD_VERIFY_FAILED'],
  ] as const;

  it.each(cases)('%s has its name and code', (err, name, code) => {
    expect(err).toBeInstanceOf(StepLoadError);
    expect(err.name).toBe(name);
    expect(err.code).toBe(code);
    expect(err.retryable).toBe(false);
  });

  it('accepts a custom code', () => {
    expect(new ConstraintError('x', 'SEED_RANGE').code).toBe('SEED_RANGE');
  });
});
