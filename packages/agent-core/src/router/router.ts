/**
 * Router
 *
 * Pure decision function: given the step that just ran and the state
 * after its delta, pick what happens next. No I/O, no mutation; the
 * orchestrator carries out the action (including bumping `attempts`
 * on a retry).
 *
 *   clarifier   -> suspend | researcher
 *   researcher  -> synthesizer (score >= threshold) | validator
 *   validator   -> synthesizer (sufficient or attempts exhausted) | researcher
 *   synthesizer -> terminate
 */

import { CollaboratorError, RouterInconsistencyError } from '../errors';
import type { ConversationState } from '../state';
import type { StepName } from '../steps/types';

export const MAX_ATTEMPTS = 3;
export const CONFIDENCE_THRESHOLD = 6.0;

export type RouterAction =
    | { type: 'goto'; step: StepName; retry: boolean }
    | { type: 'suspend'; question: string }
    | { type: 'terminate' };

export interface RouterOptions {
    /** Cap on validator -> researcher retries per turn */
    maxAttempts: number;
    /** Inclusive score at which research goes straight to synthesis */
    confidenceThreshold: number;
}

export const DEFAULT_ROUTER_OPTIONS: RouterOptions = {
    maxAttempts: MAX_ATTEMPTS,
    confidenceThreshold: CONFIDENCE_THRESHOLD,
};

/**
 * The slice of state routing depends on
 */
export type RoutingView = Pick<
    ConversationState,
    'clarityStatus' | 'clarificationQuestion' | 'confidenceScore' | 'validation' | 'attempts'
>;

function goTo(step: StepName, retry = false): RouterAction {
    return { type: 'goto', step, retry };
}

export function decide(
    previousStep: StepName,
    state: RoutingView,
    options: RouterOptions = DEFAULT_ROUTER_OPTIONS
): RouterAction {
    if (state.attempts > options.maxAttempts) {
        throw new RouterInconsistencyError(
            `attempts=${state.attempts} exceeds maxAttempts=${options.maxAttempts}`,
            previousStep
        );
    }

    switch (previousStep) {
        case 'clarifier':
            return afterClarifier(state);
        case 'researcher':
            return afterResearcher(state, options);
        case 'validator':
            return afterValidator(state, options);
        case 'synthesizer':
            return { type: 'terminate' };
        default:
            return unreachable(previousStep);
    }
}

function afterClarifier(state: RoutingView): RouterAction {
    if (state.clarityStatus === 'needs_clarification') {
        if (!state.clarificationQuestion) {
            throw new RouterInconsistencyError('Clarification needed but no question was produced', 'clarifier');
        }
        return { type: 'suspend', question: state.clarificationQuestion };
    }
    if (state.clarityStatus === 'clear') {
        return goTo('researcher');
    }
    throw new RouterInconsistencyError('Clarifier finished without a clarity status', 'clarifier');
}

function afterResearcher(state: RoutingView, options: RouterOptions): RouterAction {
    const score = state.confidenceScore;
    if (score === null || !Number.isFinite(score)) {
        throw new CollaboratorError('researcher', 'contract_violation', 'Research produced no confidence score');
    }
    return score >= options.confidenceThreshold ? goTo('synthesizer') : goTo('validator');
}

function afterValidator(state: RoutingView, options: RouterOptions): RouterAction {
    if (!state.validation) {
        throw new RouterInconsistencyError('Validator finished without a verdict', 'validator');
    }
    // The cap wins over the verdict so the loop always ends
    if (state.validation.verdict === 'sufficient' || state.attempts >= options.maxAttempts) {
        return goTo('synthesizer');
    }
    return goTo('researcher', true);
}

function unreachable(step: never): never {
    throw new RouterInconsistencyError(`No routing rule for step "${String(step)}"`);
}
