/**
 * Configuration module exports
 */

export {
  loadLLMConfig,
  getConfigPath,
  clearConfigCache,
  DEFAULT_LLM_CONFIG,
  ENV_MAPPINGS,
  type LLMConfig,
} from './llm-config';

export {
  loadOrchestrationConfig,
  longestPass,
  OrchestrationConfigSchema,
  DEFAULT_ORCHESTRATION_CONFIG,
  type OrchestrationConfig,
} from './orchestration-config';
