import type { ConversationSteps } from '../orchestrator/types';
import { ClarifierStep } from './clarifier';
import { ResearcherStep } from './researcher';
import { SynthesizerStep } from './synthesizer';
import type { StepCollaborators } from './types';
import { ValidatorStep } from './validator';

/**
 * Build the four steps on top of a set of collaborators
 */
export function createConversationSteps(
    collaborators: StepCollaborators,
    confidenceThreshold: number
): ConversationSteps {
    return {
        clarifier: new ClarifierStep(collaborators.clarityAssessor),
        researcher: new ResearcherStep(collaborators.informationSource, collaborators.confidenceAssessor),
        validator: new ValidatorStep(collaborators.researchCritic),
        synthesizer: new SynthesizerStep(collaborators.responseWriter, confidenceThreshold),
    };
}
