/**
 * Orchestrator Types
 */

import type { ConversationState } from '../state';
import type { Step, StepName } from '../steps/types';

/**
 * One step implementation per graph node
 */
export type ConversationSteps = { [N in StepName]: Step<N> };

/**
 * Opaque token for a suspended session. Valid for exactly one resume,
 * on the orchestrator instance that issued it.
 *
 * Single use is tracked by object identity in that instance's memory: a
 * copy of the handle, one rebuilt from a stored snapshot, or one passed
 * to another orchestrator is refused with `ResumeMisuseError`. Callers
 * that persist a suspended session outside the process should store the
 * snapshot and open a new turn with `start` on the restored state once
 * its `pendingQuestion` has been answered and cleared.
 */
export interface SuspensionHandle {
    readonly sessionId: string;
    readonly question: string;
    readonly snapshot: ConversationState;
}

export interface CompletedOutcome {
    kind: 'completed';
    response: string;
    /** Steps executed during this call, in order */
    trace: StepName[];
    /** State to pass to the next `start` for a follow-up turn */
    state: ConversationState;
}

export interface SuspendedOutcome {
    kind: 'suspended';
    question: string;
    handle: SuspensionHandle;
    trace: StepName[];
}

export type Outcome = CompletedOutcome | SuspendedOutcome;
