export {
  createAnthropicCollaborators,
  createChatModel,
  replyText,
  AnthropicClarityAssessor,
  AnthropicInformationSource,
  AnthropicConfidenceAssessor,
  AnthropicResearchCritic,
  AnthropicResponseWriter,
  ClarityAssessmentSchema,
  SourceFindingsSchema,
  ConfidenceAssessmentSchema,
  ValidationResultSchema,
} from './anthropic-collaborators';
