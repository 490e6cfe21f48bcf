/**
 * Step Types
 *
 * The four reasoning steps and the collaborators they call. Step bodies
 * only enforce contracts; all language work happens behind the
 * collaborator interfaces so tests can swap in deterministic fakes.
 */

import type { BaseMessage } from '@langchain/core/messages';
import type {
    ClarityStatus,
    ConversationState,
    ResearchFindings,
    StateDelta,
    ValidationResult,
} from '../state';

export const STEP_NAMES = ['clarifier', 'researcher', 'validator', 'synthesizer'] as const;

export type StepName = (typeof STEP_NAMES)[number];

export function isStepName(value: unknown): value is StepName {
    return typeof value === 'string' && STEP_NAMES.some((name) => name === value);
}

export interface StepResult {
    delta: StateDelta;
}

/**
 * A reasoning step. Throws CollaboratorError on failure; a failed run
 * contributes no delta.
 */
export interface Step<N extends StepName = StepName> {
    readonly name: N;
    run(state: ConversationState): Promise<StepResult>;
}

// ============================================
// Collaborators
// ============================================

export interface ClarityAssessmentInput {
    /** Latest user message */
    message: string;
    history: BaseMessage[];
    lastDiscussedEntity: string | null;
    discussedEntities: string[];
}

export interface ClarityAssessment {
    status: ClarityStatus;
    /** Entity named by the message, if any */
    entity: string | null;
    /** Follow-up question when the message is ambiguous */
    question: string | null;
}

export interface ClarityAssessor {
    assess(input: ClarityAssessmentInput): Promise<ClarityAssessment>;
}

export interface ResearchRequest {
    entity: string;
    query: string;
    /** Critique of the previous pass in this turn, when retrying */
    guidance: ValidationResult | null;
}

export type SourceFindings = Pick<ResearchFindings, 'summary' | 'keyFacts' | 'sources'>;

export interface InformationSource {
    research(request: ResearchRequest): Promise<SourceFindings>;
}

export interface ConfidenceAssessmentInput {
    entity: string;
    query: string;
    findings: ResearchFindings;
}

export interface ConfidenceAssessment {
    score: number;
    reasoning: string;
}

/**
 * Scores findings in a pass separate from the one that produced them
 */
export interface ConfidenceAssessor {
    assess(input: ConfidenceAssessmentInput): Promise<ConfidenceAssessment>;
}

export interface ResearchReviewInput {
    entity: string;
    query: string;
    findings: ResearchFindings;
    confidenceScore: number | null;
}

export interface ResearchCritic {
    review(input: ResearchReviewInput): Promise<ValidationResult>;
}

export interface ResponseRequest {
    history: BaseMessage[];
    query: string;
    findings: ResearchFindings;
    validation: ValidationResult | null;
    /** Findings never cleared the bar; the answer should say so */
    lowConfidence: boolean;
}

export interface ResponseWriter {
    write(request: ResponseRequest): Promise<string>;
}

/**
 * Everything the four steps need
 */
export interface StepCollaborators {
    clarityAssessor: ClarityAssessor;
    informationSource: InformationSource;
    confidenceAssessor: ConfidenceAssessor;
    researchCritic: ResearchCritic;
    responseWriter: ResponseWriter;
}
