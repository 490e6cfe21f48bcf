/**
 * Agent Core Package
 *
 * LangGraph-based company research agent:
 * - Clarifier: resolves which company the user means (or asks)
 * - Researcher: gathers findings and scores them
 * - Validator: reviews low-confidence findings
 * - Synthesizer: writes the answer
 *
 * A pure router picks the next step; the orchestrator exposes the
 * two-phase start / resume API around it.
 */

// State types and utilities
export * from './state';

// Orchestrator
export {
  ResearchOrchestrator,
  createConversationGraph,
  type ResearchOrchestratorOptions,
  type ConversationGraph,
  type ConversationSteps,
  type SuspensionHandle,
  type CompletedOutcome,
  type SuspendedOutcome,
  type Outcome,
} from './orchestrator';

// Agent factory
export { createResearchAgent, type ResearchAgentOptions } from './agent';

// Router
export {
  decide,
  MAX_ATTEMPTS,
  CONFIDENCE_THRESHOLD,
  DEFAULT_ROUTER_OPTIONS,
  type RouterAction,
  type RouterOptions,
  type RoutingView,
} from './router';

// Steps and collaborator contracts
export * from './steps';

// Default collaborators
export * from './collaborators';

// Errors
export {
  OrchestrationError,
  CollaboratorError,
  RouterInconsistencyError,
  ResumeMisuseError,
  isOrchestrationError,
  classifyCollaboratorFailure,
  toCollaboratorError,
  callCollaborator,
  type OrchestrationErrorKind,
  type CollaboratorFailureKind,
} from './errors';

// Configuration
export {
  loadLLMConfig,
  getConfigPath,
  clearConfigCache,
  DEFAULT_LLM_CONFIG,
  ENV_MAPPINGS,
  loadOrchestrationConfig,
  longestPass,
  OrchestrationConfigSchema,
  DEFAULT_ORCHESTRATION_CONFIG,
  type LLMConfig,
  type OrchestrationConfig,
} from './config';

// Tracing and logging
export {
  createTraceContext,
  createChildSpan,
  formatTraceContext,
  createAgentLogger,
  configureAgentLogger,
  resetAgentLogger,
  formatLogEntry,
  startTimer,
  type TraceContext,
  type LogLevel,
  type LogLayer,
  type StructuredLogEntry,
  type AgentLoggerConfig,
  type ModuleAgentLogger,
  type OperationTimer,
} from './tracing';
