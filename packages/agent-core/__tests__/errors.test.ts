import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  CollaboratorError,
  ResumeMisuseError,
  RouterInconsistencyError,
  callCollaborator,
  classifyCollaboratorFailure,
  isOrchestrationError,
  toCollaboratorError,
} from '../src/errors';

function namedError(name: string, message = 'failed'): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

describe('error classes', () => {
  it('carry a kind and their class name', () => {
    const collaborator = new CollaboratorError('researcher', 'timeout', 'no reply');
    expect(collaborator.kind).toBe('collaborator_failure');
    expect(collaborator.name).toBe('CollaboratorError');
    expect(collaborator.message).toBe('[researcher] timeout: no reply');

    const inconsistency = new RouterInconsistencyError('bad state', 'validator');
    expect(inconsistency.kind).toBe('router_inconsistency');
    expect(inconsistency.step).toBe('validator');

    const misuse = new ResumeMisuseError('used twice');
    expect(misuse.kind).toBe('resume_misuse');
    expect(misuse.name).toBe('ResumeMisuseError');
    expect(isOrchestrationError(misuse)).toBe(true);
    expect(isOrchestrationError(new Error('plain'))).toBe(false);
  });
});

describe('classifyCollaboratorFailure', () => {
  it('treats parser and schema errors as malformed output', () => {
    expect(classifyCollaboratorFailure(namedError('OutputParserException'))).toBe('malformed_output');
    expect(classifyCollaboratorFailure(new SyntaxError('Unexpected token'))).toBe('malformed_output');
    const zodError = z.object({ score: z.number() }).safeParse({ score: 'high' });
    expect(zodError.success).toBe(false);
    if (!zodError.success) {
      expect(classifyCollaboratorFailure(zodError.error)).toBe('malformed_output');
    }
  });

  it('recognizes timeouts by name or message', () => {
    expect(classifyCollaboratorFailure(namedError('AbortError'))).toBe('timeout');
    expect(classifyCollaboratorFailure(namedError('APIConnectionTimeoutError'))).toBe('timeout');
    expect(classifyCollaboratorFailure(new Error('Request timed out.'))).toBe('timeout');
  });

  it('falls back to transport', () => {
    expect(classifyCollaboratorFailure(new Error('ECONNRESET'))).toBe('transport');
    expect(classifyCollaboratorFailure('not even an error')).toBe('transport');
  });

  it('keeps the kind of an existing collaborator error', () => {
    expect(classifyCollaboratorFailure(new CollaboratorError('clarifier', 'empty_result', 'x'))).toBe('empty_result');
  });
});

describe('toCollaboratorError', () => {
  it('wraps foreign errors with the step and cause', () => {
    const cause = new Error('503 Service Unavailable');
    const wrapped = toCollaboratorError('synthesizer', cause);
    expect(wrapped).toBeInstanceOf(CollaboratorError);
    expect(wrapped.message).toBe('[synthesizer] transport: 503 Service Unavailable');
    expect(wrapped.cause).toBe(cause);
  });

  it('passes orchestration errors through untouched', () => {
    const original = new RouterInconsistencyError('bad');
    expect(toCollaboratorError('researcher', original)).toBe(original);
  });
});

describe('callCollaborator', () => {
  it('returns the result of a successful call', async () => {
    await expect(callCollaborator('validator', async () => 42)).resolves.toBe(42);
  });

  it('converts a failed call', async () => {
    await expect(
      callCollaborator('validator', async () => {
        throw namedError('TimeoutError');
      })
    ).rejects.toMatchObject({ step: 'validator', failure: 'timeout' });
  });
});
