/**
 * Conversation State Definition
 *
 * The record threaded through every step of a research session.
 * Uses LangGraph's Annotation system so each field carries its own
 * reducer: `history` and `trace` append, everything else is replaced.
 */

import { Annotation, messagesStateReducer } from '@langchain/langgraph';
import { AIMessage, HumanMessage, type BaseMessage } from '@langchain/core/messages';
import type { TraceContext } from './tracing';
import type { StepName } from './steps/types';

/**
 * Outcome of the clarity assessment for the current turn
 */
export type ClarityStatus = 'clear' | 'needs_clarification';

export type ValidationVerdict = 'sufficient' | 'insufficient';

/**
 * Structured output of one research pass
 */
export interface ResearchFindings {
    entity: string;
    /** User message the research answered */
    query: string;
    summary: string;
    keyFacts: string[];
    sources: string[];
    retrievedAt: string;
}

export interface ValidationResult {
    verdict: ValidationVerdict;
    critique: string;
    suggestions: string;
}

function replace<T>(_: T, newValue: T): T {
    return newValue;
}

function append<T>(existing: T[], update: T[]): T[] {
    return [...existing, ...update];
}

/**
 * Conversation State Annotation
 */
export const ConversationStateAnnotation = Annotation.Root({
    // Turn records, oldest first; order drives reference resolution
    history: Annotation<BaseMessage[]>({
        reducer: messagesStateReducer,
        default: () => [],
    }),

    // Set only by the clarifier
    clarityStatus: Annotation<ClarityStatus | null>({
        reducer: replace,
        default: () => null,
    }),

    clarificationQuestion: Annotation<string | null>({
        reducer: replace,
        default: () => null,
    }),

    subjectEntity: Annotation<string | null>({
        reducer: replace,
        default: () => null,
    }),

    // Set only by the researcher on success, never cleared
    lastDiscussedEntity: Annotation<string | null>({
        reducer: replace,
        default: () => null,
    }),

    // Distinct researched entities, most recent last
    discussedEntities: Annotation<string[]>({
        reducer: replace,
        default: () => [],
    }),

    findings: Annotation<ResearchFindings | null>({
        reducer: replace,
        default: () => null,
    }),

    // 0-10, meaningful only right after a research pass
    confidenceScore: Annotation<number | null>({
        reducer: replace,
        default: () => null,
    }),

    validation: Annotation<ValidationResult | null>({
        reducer: replace,
        default: () => null,
    }),

    // Validator -> researcher retries in the current turn
    attempts: Annotation<number>({
        reducer: replace,
        default: () => 0,
    }),

    trace: Annotation<StepName[]>({
        reducer: append,
        default: () => [],
    }),

    // Non-null exactly while the session is suspended
    pendingQuestion: Annotation<string | null>({
        reducer: replace,
        default: () => null,
    }),

    finalResponse: Annotation<string | null>({
        reducer: replace,
        default: () => null,
    }),

    traceContext: Annotation<TraceContext | null>({
        reducer: (existing, newValue) => newValue ?? existing,
        default: () => null,
    }),
});

export type ConversationState = typeof ConversationStateAnnotation.State;

export type ConversationUpdate = typeof ConversationStateAnnotation.Update;

/**
 * Fields a step may return. Trace, attempts and the pending question are
 * owned by the orchestrator.
 */
export type StateDelta = Partial<
    Omit<ConversationState, 'trace' | 'attempts' | 'pendingQuestion' | 'traceContext'>
>;

/**
 * Build a fresh state with every field at its default
 */
export function createConversationState(
    overrides: Partial<ConversationState> = {}
): ConversationState {
    return {
        history: [],
        clarityStatus: null,
        clarificationQuestion: null,
        subjectEntity: null,
        lastDiscussedEntity: null,
        discussedEntities: [],
        findings: null,
        confidenceScore: null,
        validation: null,
        attempts: 0,
        trace: [],
        pendingQuestion: null,
        finalResponse: null,
        traceContext: null,
        ...overrides,
    };
}

/**
 * Merge a step delta into a state the way the reducers do.
 * Used to show the router the state it will act on.
 */
export function applyDelta(
    state: ConversationState,
    delta: StateDelta,
    step?: StepName
): ConversationState {
    return {
        ...state,
        ...delta,
        history: delta.history ? [...state.history, ...delta.history] : state.history,
        trace: step ? [...state.trace, step] : state.trace,
    };
}

/**
 * Fields that start over with every user turn
 */
export function resetTurnFields(): Pick<
    ConversationState,
    | 'clarityStatus'
    | 'clarificationQuestion'
    | 'subjectEntity'
    | 'findings'
    | 'confidenceScore'
    | 'validation'
    | 'attempts'
    | 'finalResponse'
> {
    return {
        clarityStatus: null,
        clarificationQuestion: null,
        subjectEntity: null,
        findings: null,
        confidenceScore: null,
        validation: null,
        attempts: 0,
        finalResponse: null,
    };
}

export function messageText(message: BaseMessage): string {
    return typeof message.content === 'string'
        ? message.content
        : JSON.stringify(message.content);
}

/**
 * Text of the most recent user turn, or '' when there is none
 */
export function latestUserMessage(history: BaseMessage[]): string {
    for (let i = history.length - 1; i >= 0; i--) {
        if (history[i]._getType() === 'human') {
            return messageText(history[i]);
        }
    }
    return '';
}

export function userTurn(text: string): HumanMessage {
    return new HumanMessage(text);
}

export function assistantTurn(text: string): AIMessage {
    return new AIMessage(text);
}
