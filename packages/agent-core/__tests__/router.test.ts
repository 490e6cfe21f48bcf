/**
 * Router Tests
 *
 * decide() is pure, so every rule is checked directly on a routing view.
 */

import { describe, it, expect } from 'vitest';
import { decide, DEFAULT_ROUTER_OPTIONS, type RoutingView } from '../src/router';
import { CollaboratorError, RouterInconsistencyError } from '../src/errors';
import type { StepName } from '../src/steps/types';

function view(overrides: Partial<RoutingView> = {}): RoutingView {
  return {
    clarityStatus: null,
    clarificationQuestion: null,
    confidenceScore: null,
    validation: null,
    attempts: 0,
    ...overrides,
  };
}

const sufficient = { verdict: 'sufficient' as const, critique: 'ok', suggestions: '' };
const insufficient = { verdict: 'insufficient' as const, critique: 'thin', suggestions: 'more numbers' };

describe('decide', () => {
  describe('after clarifier', () => {
    it('suspends with the clarification question', () => {
      const action = decide(
        'clarifier',
        view({ clarityStatus: 'needs_clarification', clarificationQuestion: 'Which company?' })
      );
      expect(action).toEqual({ type: 'suspend', question: 'Which company?' });
    });

    it('goes to the researcher when clear', () => {
      expect(decide('clarifier', view({ clarityStatus: 'clear' }))).toEqual({
        type: 'goto',
        step: 'researcher',
        retry: false,
      });
    });

    it('rejects needs_clarification without a question', () => {
      expect(() => decide('clarifier', view({ clarityStatus: 'needs_clarification' }))).toThrow(
        RouterInconsistencyError
      );
    });

    it('rejects a missing clarity status', () => {
      expect(() => decide('clarifier', view())).toThrow('Clarifier finished without a clarity status');
    });
  });

  describe('after researcher', () => {
    it('treats the threshold as inclusive', () => {
      expect(decide('researcher', view({ confidenceScore: 6.0 }))).toEqual({
        type: 'goto',
        step: 'synthesizer',
        retry: false,
      });
    });

    it('sends a score just below the threshold to the validator', () => {
      expect(decide('researcher', view({ confidenceScore: 5.999 }))).toEqual({
        type: 'goto',
        step: 'validator',
        retry: false,
      });
    });

    it('honors a custom threshold', () => {
      const action = decide('researcher', view({ confidenceScore: 7 }), {
        ...DEFAULT_ROUTER_OPTIONS,
        confidenceThreshold: 8,
      });
      expect(action).toEqual({ type: 'goto', step: 'validator', retry: false });
    });

    it.each([null, Number.NaN])('rejects score %s as a contract violation', (score) => {
      try {
        decide('researcher', view({ confidenceScore: score }));
        expect.unreachable('decide should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(CollaboratorError);
        if (error instanceof CollaboratorError) {
          expect(error.step).toBe('researcher');
          expect(error.failure).toBe('contract_violation');
        }
      }
    });
  });

  describe('after validator', () => {
    it('goes to the synthesizer on a sufficient verdict', () => {
      expect(decide('validator', view({ validation: sufficient, attempts: 0 }))).toEqual({
        type: 'goto',
        step: 'synthesizer',
        retry: false,
      });
    });

    it('retries research on an insufficient verdict below the cap', () => {
      expect(decide('validator', view({ validation: insufficient, attempts: 2 }))).toEqual({
        type: 'goto',
        step: 'researcher',
        retry: true,
      });
    });

    it('goes to the synthesizer once attempts reach the cap, whatever the verdict', () => {
      expect(decide('validator', view({ validation: insufficient, attempts: 3 }))).toEqual({
        type: 'goto',
        step: 'synthesizer',
        retry: false,
      });
    });

    it('never retries with a cap of zero', () => {
      const action = decide('validator', view({ validation: insufficient, attempts: 0 }), {
        ...DEFAULT_ROUTER_OPTIONS,
        maxAttempts: 0,
      });
      expect(action).toEqual({ type: 'goto', step: 'synthesizer', retry: false });
    });

    it('rejects a missing verdict', () => {
      expect(() => decide('validator', view())).toThrow(RouterInconsistencyError);
    });
  });

  it('terminates after the synthesizer', () => {
    expect(decide('synthesizer', view())).toEqual({ type: 'terminate' });
  });

  it('rejects attempts above the cap for any step', () => {
    const steps: StepName[] = ['clarifier', 'researcher', 'validator', 'synthesizer'];
    for (const step of steps) {
      expect(() => decide(step, view({ attempts: 4, clarityStatus: 'clear' }))).toThrow(
        'attempts=4 exceeds maxAttempts=3'
      );
    }
  });
});
