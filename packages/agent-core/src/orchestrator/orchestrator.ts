/**
 * Research Orchestrator
 *
 * Two-phase entry point for a research conversation:
 * - `start` begins a turn (new session or follow-up on a completed one)
 * - `resume` answers a clarification question and continues the turn
 *
 * The orchestrator keeps no session state of its own beyond the handles
 * it has issued, so independent sessions can run concurrently on one
 * instance.
 */

import { GraphRecursionError } from '@langchain/langgraph';
import { loadOrchestrationConfig, type OrchestrationConfig } from '../config/orchestration-config';
import { ResumeMisuseError, RouterInconsistencyError, isOrchestrationError } from '../errors';
import {
    createConversationState,
    resetTurnFields,
    userTurn,
    type ConversationState,
} from '../state';
import { createConversationSteps } from '../steps/create-steps';
import type { StepCollaborators } from '../steps/types';
import {
    createAgentLogger,
    createChildSpan,
    createTraceContext,
    startTimer,
    type TraceContext,
} from '../tracing';
import { createConversationGraph, type ConversationGraph } from './graph';
import type { Outcome, SuspensionHandle } from './types';

const log = createAgentLogger('Orchestrator');

export interface ResearchOrchestratorOptions {
    collaborators: StepCollaborators;
    /** Overrides on top of ORCHESTRATOR_* env vars and defaults */
    orchestration?: Partial<OrchestrationConfig>;
}

export class ResearchOrchestrator {
    readonly config: OrchestrationConfig;
    private readonly graph: ConversationGraph;
    // Handles that may still be resumed, by identity; removed on first use
    private readonly openHandles = new WeakSet<SuspensionHandle>();

    constructor(options: ResearchOrchestratorOptions) {
        this.config = loadOrchestrationConfig(options.orchestration);
        const steps = createConversationSteps(options.collaborators, this.config.confidenceThreshold);
        this.graph = createConversationGraph(steps, {
            maxAttempts: this.config.maxAttempts,
            confidenceThreshold: this.config.confidenceThreshold,
        });

        log.debug('Orchestrator ready', { ...this.config });
    }

    /**
     * Begin a turn. Without `priorState` this opens a new session.
     *
     * @throws ResumeMisuseError when `priorState` is waiting on a clarification answer
     */
    async start(userMessage: string, priorState?: ConversationState): Promise<Outcome> {
        if (priorState && priorState.pendingQuestion !== null) {
            throw new ResumeMisuseError('Session is suspended on a clarification question; call resume instead');
        }

        const traceContext = priorState?.traceContext
            ? createChildSpan(priorState.traceContext, 'turn', { turnMessage: userMessage.slice(0, 100) })
            : createTraceContext(userMessage);
        const base = priorState ?? createConversationState();

        log.infoWithTrace(traceContext, priorState ? 'Starting follow-up turn' : 'Starting session', {
            historyLength: base.history.length,
            lastDiscussedEntity: base.lastDiscussedEntity,
        });

        return this.runPass(
            {
                ...base,
                ...resetTurnFields(),
                history: [...base.history, userTurn(userMessage)],
                pendingQuestion: null,
                traceContext,
            },
            traceContext
        );
    }

    /**
     * Answer the pending clarification question and continue the turn
     * from the clarifier.
     *
     * @throws ResumeMisuseError for a handle that is not suspended or was already resumed
     */
    async resume(userAnswer: string, handle: SuspensionHandle): Promise<Outcome> {
        const snapshot = handle.snapshot;
        if (snapshot.pendingQuestion === null) {
            throw new ResumeMisuseError('Handle does not hold a suspended session');
        }
        if (!this.openHandles.has(handle)) {
            throw new ResumeMisuseError(`Handle for session ${handle.sessionId} was already resumed or not issued here`);
        }
        this.openHandles.delete(handle);

        const traceContext = snapshot.traceContext
            ? createChildSpan(snapshot.traceContext, 'resume', { question: snapshot.pendingQuestion })
            : createTraceContext(userAnswer);

        log.infoWithTrace(traceContext, 'Resuming session', { question: snapshot.pendingQuestion });

        return this.runPass(
            {
                ...snapshot,
                history: [...snapshot.history, userTurn(userAnswer)],
                pendingQuestion: null,
                clarityStatus: null,
                clarificationQuestion: null,
                traceContext,
            },
            traceContext
        );
    }

    private async runPass(input: ConversationState, traceContext: TraceContext): Promise<Outcome> {
        const timer = startTimer(log, 'pass', traceContext);
        const traceOffset = input.trace.length;

        let result: ConversationState;
        try {
            result = await this.graph.invoke(input, { recursionLimit: this.config.stepLimit });
        } catch (error) {
            const failure =
                error instanceof GraphRecursionError
                    ? new RouterInconsistencyError(
                          `Pass exceeded the step limit of ${this.config.stepLimit}`,
                          undefined,
                          { cause: error }
                      )
                    : error;
            log.errorWithTrace(traceContext, 'Pass failed', {
                kind: isOrchestrationError(failure) ? failure.kind : 'unexpected',
                error: failure instanceof Error ? failure.message : String(failure),
            });
            throw failure;
        }

        const trace = result.trace.slice(traceOffset);

        if (result.pendingQuestion !== null) {
            const handle: SuspensionHandle = Object.freeze({
                sessionId: traceContext.traceId,
                question: result.pendingQuestion,
                snapshot: Object.freeze(result),
            });
            this.openHandles.add(handle);
            timer.end('Suspended', { trace, question: handle.question });
            return { kind: 'suspended', question: handle.question, handle, trace };
        }

        if (result.finalResponse !== null) {
            timer.end('Completed', {
                trace,
                attempts: result.attempts,
                subjectEntity: result.subjectEntity,
            });
            return { kind: 'completed', response: result.finalResponse, trace, state: result };
        }

        const inconsistency = new RouterInconsistencyError('Pass ended with neither a question nor a response');
        log.errorWithTrace(traceContext, 'Pass failed', { kind: inconsistency.kind, trace });
        throw inconsistency;
    }
}
