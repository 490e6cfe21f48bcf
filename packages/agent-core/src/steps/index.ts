/**
 * Steps module exports
 */

export * from './types';
export { ClarifierStep, DEFAULT_CLARIFICATION_QUESTION } from './clarifier';
export { ResearcherStep, MIN_CONFIDENCE, MAX_CONFIDENCE } from './researcher';
export { ValidatorStep } from './validator';
export { SynthesizerStep, isLowConfidence } from './synthesizer';
export {
    resolveReference,
    findReferenceCue,
    rememberEntity,
    type ReferenceKind,
    type EntityMemory,
    type ResolvedReference,
} from './reference-resolver';
export { createConversationSteps } from './create-steps';
