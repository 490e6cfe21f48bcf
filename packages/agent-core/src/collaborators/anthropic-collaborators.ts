/**
 * Anthropic Collaborators
 *
 * Default implementations of the five collaborator interfaces on top of
 * ChatAnthropic. Structured answers go through `withStructuredOutput`
 * with zod schemas, so a reply that does not fit the schema surfaces as
 * a parser error (classified as malformed_output by the steps).
 */

import { ChatAnthropic } from '@langchain/anthropic';
import { HumanMessage, SystemMessage, type BaseMessage } from '@langchain/core/messages';
import { z } from 'zod';
import type { LLMConfig } from '../config';
import type {
  ClarityAssessment,
  ClarityAssessmentInput,
  ClarityAssessor,
  ConfidenceAssessment,
  ConfidenceAssessmentInput,
  ConfidenceAssessor,
  InformationSource,
  ResearchCritic,
  ResearchRequest,
  ResearchReviewInput,
  ResponseRequest,
  ResponseWriter,
  SourceFindings,
  StepCollaborators,
} from '../steps/types';
import type { ValidationResult } from '../state';
import { createAgentLogger } from '../tracing';
import {
  CLARITY_SYSTEM_PROMPT,
  CONFIDENCE_SYSTEM_PROMPT,
  CRITIC_SYSTEM_PROMPT,
  LOW_CONFIDENCE_NOTE,
  RESEARCH_SYSTEM_PROMPT,
  SYNTHESIS_SYSTEM_PROMPT,
  buildClarityContext,
  buildResearchMessage,
  formatFindings,
} from './prompts';

const log = createAgentLogger('Anthropic', 'collaborator');

// ============================================
// Schemas
// ============================================

export const ClarityAssessmentSchema = z.object({
  status: z.enum(['clear', 'needs_clarification']),
  entity: z.string().nullable().describe('Company the message refers to, if any'),
  question: z.string().nullable().describe('Follow-up question when clarification is needed'),
});

export const SourceFindingsSchema = z.object({
  summary: z.string().describe('Research brief on the company'),
  keyFacts: z.array(z.string()).describe('Short, specific facts with dates or figures'),
  sources: z.array(z.string()).describe('Where the facts come from'),
});

export const ConfidenceAssessmentSchema = z.object({
  score: z.number().min(0).max(10).describe('0-10: how well the findings answer the question'),
  reasoning: z.string(),
});

export const ValidationResultSchema = z.object({
  verdict: z.enum(['sufficient', 'insufficient']),
  critique: z.string(),
  suggestions: z.string(),
});

// ============================================
// Model
// ============================================

/**
 * Create the chat model from LLM configuration
 *
 * @throws Error when no API key is configured
 */
export function createChatModel(llmConfig: LLMConfig): ChatAnthropic {
  if (!llmConfig.apiKey) {
    throw new Error('LLM not configured: set ANTHROPIC_API_KEY or apiKey in the config file');
  }

  log.info('Initializing chat model', { model: llmConfig.model, baseUrl: llmConfig.baseUrl });

  return new ChatAnthropic({
    anthropicApiKey: llmConfig.apiKey,
    anthropicApiUrl: llmConfig.baseUrl,
    model: llmConfig.model,
    temperature: llmConfig.temperature,
    maxTokens: llmConfig.maxTokens,
    maxRetries: llmConfig.maxRetries,
    clientOptions: { timeout: llmConfig.timeout },
  });
}

/**
 * Plain text of a model reply, ignoring non-text content blocks
 */
export function replyText(message: BaseMessage): string {
  if (typeof message.content === 'string') {
    return message.content;
  }
  return message.content
    .map((part) => (part.type === 'text' && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

// ============================================
// Collaborators
// ============================================

export class AnthropicClarityAssessor implements ClarityAssessor {
  private readonly model;

  constructor(llm: ChatAnthropic) {
    this.model = llm.withStructuredOutput(ClarityAssessmentSchema, { name: 'clarity_assessment' });
  }

  async assess(input: ClarityAssessmentInput): Promise<ClarityAssessment> {
    const system = `${CLARITY_SYSTEM_PROMPT}\n\n${buildClarityContext(input.lastDiscussedEntity, input.discussedEntities)}`;
    // The latest user message is the last entry of history
    return this.model.invoke([new SystemMessage(system), ...input.history]);
  }
}

export class AnthropicInformationSource implements InformationSource {
  private readonly model;

  constructor(llm: ChatAnthropic) {
    this.model = llm.withStructuredOutput(SourceFindingsSchema, { name: 'research_findings' });
  }

  async research(request: ResearchRequest): Promise<SourceFindings> {
    const started = Date.now();
    const findings = await this.model.invoke([
      new SystemMessage(RESEARCH_SYSTEM_PROMPT),
      new HumanMessage(buildResearchMessage(request.entity, request.query, request.guidance)),
    ]);
    log.debug('Research call finished', {
      entity: request.entity,
      duration: Date.now() - started,
      factCount: findings.keyFacts.length,
    });
    return findings;
  }
}

export class AnthropicConfidenceAssessor implements ConfidenceAssessor {
  private readonly model;

  constructor(llm: ChatAnthropic) {
    this.model = llm.withStructuredOutput(ConfidenceAssessmentSchema, { name: 'confidence_assessment' });
  }

  async assess(input: ConfidenceAssessmentInput): Promise<ConfidenceAssessment> {
    return this.model.invoke([
      new SystemMessage(CONFIDENCE_SYSTEM_PROMPT),
      new HumanMessage(`User question: ${input.query}\n\n${formatFindings(input.findings)}`),
    ]);
  }
}

export class AnthropicResearchCritic implements ResearchCritic {
  private readonly model;

  constructor(llm: ChatAnthropic) {
    this.model = llm.withStructuredOutput(ValidationResultSchema, { name: 'research_review' });
  }

  async review(input: ResearchReviewInput): Promise<ValidationResult> {
    const score = input.confidenceScore === null ? 'unknown' : input.confidenceScore.toFixed(1);
    return this.model.invoke([
      new SystemMessage(CRITIC_SYSTEM_PROMPT),
      new HumanMessage(
        `User question: ${input.query}\nResearcher confidence: ${score}/10\n\n${formatFindings(input.findings)}`
      ),
    ]);
  }
}

export class AnthropicResponseWriter implements ResponseWriter {
  constructor(private readonly llm: ChatAnthropic) {}

  async write(request: ResponseRequest): Promise<string> {
    const sections = [SYNTHESIS_SYSTEM_PROMPT, `## Research findings\n${formatFindings(request.findings)}`];
    if (request.validation) {
      sections.push(`## Reviewer notes\n${request.validation.critique}`);
    }
    if (request.lowConfidence) {
      sections.push(LOW_CONFIDENCE_NOTE);
    }

    const reply = await this.llm.invoke([new SystemMessage(sections.join('\n\n')), ...request.history]);
    return replyText(reply);
  }
}

/**
 * Build all five collaborators on one chat model
 */
export function createAnthropicCollaborators(llmConfig: LLMConfig): StepCollaborators {
  const llm = createChatModel(llmConfig);
  return {
    clarityAssessor: new AnthropicClarityAssessor(llm),
    informationSource: new AnthropicInformationSource(llm),
    confidenceAssessor: new AnthropicConfidenceAssessor(llm),
    researchCritic: new AnthropicResearchCritic(llm),
    responseWriter: new AnthropicResponseWriter(llm),
  };
}
