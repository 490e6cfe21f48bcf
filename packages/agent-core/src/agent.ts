/**
 * Research Agent
 *
 * Wires configuration, the default Anthropic collaborators and the
 * orchestrator together.
 */

import { createAnthropicCollaborators } from './collaborators';
import { loadLLMConfig, type LLMConfig, type OrchestrationConfig } from './config';
import { ResearchOrchestrator } from './orchestrator';
import type { StepCollaborators } from './steps/types';
import { createAgentLogger } from './tracing';

const log = createAgentLogger('Agent');

export interface ResearchAgentOptions {
  /** Overrides on top of env vars and the config file */
  llm?: Partial<LLMConfig>;
  /** Explicit config file path, searched before the default locations */
  configPath?: string;
  orchestration?: Partial<OrchestrationConfig>;
  /** Replace some or all of the default collaborators */
  collaborators?: Partial<StepCollaborators>;
}

/**
 * Create a ready-to-use orchestrator
 *
 * @throws Error when no API key is configured and the defaults are needed
 */
export function createResearchAgent(options: ResearchAgentOptions = {}): ResearchOrchestrator {
  const custom = options.collaborators ?? {};
  const collaborators = isComplete(custom)
    ? custom
    : { ...createAnthropicCollaborators(loadLLMConfig(options.llm, options.configPath)), ...custom };

  log.info('Research agent created', {
    customCollaborators: Object.keys(custom),
    defaultCollaborators: !isComplete(custom),
  });

  return new ResearchOrchestrator({ collaborators, orchestration: options.orchestration });
}

function isComplete(collaborators: Partial<StepCollaborators>): collaborators is StepCollaborators {
  return Boolean(
    collaborators.clarityAssessor &&
      collaborators.informationSource &&
      collaborators.confidenceAssessor &&
      collaborators.researchCritic &&
      collaborators.responseWriter
  );
}
