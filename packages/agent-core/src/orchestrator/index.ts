/**
 * Orchestrator module exports
 */

export { ResearchOrchestrator, type ResearchOrchestratorOptions } from './orchestrator';
export { createConversationGraph, type ConversationGraph } from './graph';
export type {
    ConversationSteps,
    SuspensionHandle,
    CompletedOutcome,
    SuspendedOutcome,
    Outcome,
} from './types';
