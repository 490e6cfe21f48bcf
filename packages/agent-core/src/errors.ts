/**
 * Orchestration Errors
 *
 * Everything `start` / `resume` can throw. The `kind` discriminator lets a
 * caller tell the failure families apart without instanceof checks.
 * Running out of research attempts is not in here: it is a normal route
 * to the synthesizer.
 */

import type { StepName } from './steps/types';

export type OrchestrationErrorKind =
    | 'collaborator_failure'
    | 'router_inconsistency'
    | 'resume_misuse';

/**
 * How a collaborator call failed
 */
export type CollaboratorFailureKind =
    | 'malformed_output' // structured output did not match its schema
    | 'empty_result' // call succeeded but produced nothing usable
    | 'transport' // network / provider error
    | 'timeout'
    | 'contract_violation'; // result is well-formed but breaks the step contract

export abstract class OrchestrationError extends Error {
    abstract readonly kind: OrchestrationErrorKind;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * A step's collaborator failed. Ends the session; the core never
 * substitutes default data or retries the call.
 */
export class CollaboratorError extends OrchestrationError {
    readonly kind = 'collaborator_failure';

    constructor(
        readonly step: StepName,
        readonly failure: CollaboratorFailureKind,
        message: string,
        options?: ErrorOptions
    ) {
        super(`[${step}] ${failure}: ${message}`, options);
    }
}

/**
 * The router (or the loop around it) reached a state it has no rule for.
 */
export class RouterInconsistencyError extends OrchestrationError {
    readonly kind = 'router_inconsistency';

    constructor(
        message: string,
        readonly step?: StepName,
        options?: ErrorOptions
    ) {
        super(message, options);
    }
}

/**
 * `resume` called with a handle that is not suspended or was already used,
 * or `start` called on a suspended state.
 */
export class ResumeMisuseError extends OrchestrationError {
    readonly kind = 'resume_misuse';
}

export function isOrchestrationError(error: unknown): error is OrchestrationError {
    return error instanceof OrchestrationError;
}

const MALFORMED_ERROR_NAMES = new Set(['OutputParserException', 'ZodError', 'SyntaxError']);
const TIMEOUT_ERROR_NAMES = new Set(['AbortError', 'TimeoutError', 'APIConnectionTimeoutError']);

/**
 * Classify a raw collaborator failure
 */
export function classifyCollaboratorFailure(error: unknown): CollaboratorFailureKind {
    if (error instanceof CollaboratorError) {
        return error.failure;
    }
    if (error instanceof Error) {
        if (MALFORMED_ERROR_NAMES.has(error.name)) return 'malformed_output';
        if (TIMEOUT_ERROR_NAMES.has(error.name) || /timed? ?out/i.test(error.message)) return 'timeout';
    }
    return 'transport';
}

/**
 * Wrap anything a collaborator threw as a CollaboratorError for `step`.
 * Orchestration errors pass through untouched.
 */
export function toCollaboratorError(step: StepName, error: unknown): OrchestrationError {
    if (error instanceof OrchestrationError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new CollaboratorError(step, classifyCollaboratorFailure(error), message, { cause: error });
}

/**
 * Await a collaborator call, converting its failure into a CollaboratorError
 */
export async function callCollaborator<T>(step: StepName, call: () => Promise<T>): Promise<T> {
    try {
        return await call();
    } catch (error) {
        throw toCollaboratorError(step, error);
    }
}
