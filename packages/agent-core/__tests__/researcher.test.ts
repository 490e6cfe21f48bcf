import { describe, it, expect } from 'vitest';
import { ResearcherStep } from '../src/steps/researcher';
import { CollaboratorError, RouterInconsistencyError } from '../src/errors';
import { createConversationState, userTurn } from '../src/state';
import { FakeConfidenceAssessor, FakeInformationSource } from './mocks/fake-collaborators';

function researchState(overrides: Parameters<typeof createConversationState>[0] = {}) {
  return createConversationState({
    history: [userTurn('Tell me about TCS')],
    clarityStatus: 'clear',
    subjectEntity: 'TCS',
    ...overrides,
  });
}

describe('ResearcherStep', () => {
  it('produces findings, a separate confidence score and updates entity memory', async () => {
    const source = new FakeInformationSource();
    const assessor = new FakeConfidenceAssessor(7.5);
    const step = new ResearcherStep(source, assessor);

    const { delta } = await step.run(researchState({ lastDiscussedEntity: 'Infosys', discussedEntities: ['Infosys'] }));

    expect(delta.findings).toMatchObject({
      entity: 'TCS',
      query: 'Tell me about TCS',
      summary: 'TCS research summary',
      keyFacts: ['TCS key fact'],
      sources: ['test-source'],
    });
    expect(delta.confidenceScore).toBe(7.5);
    expect(delta.lastDiscussedEntity).toBe('TCS');
    expect(delta.discussedEntities).toEqual(['Infosys', 'TCS']);
    expect(assessor.calls).toHaveLength(1);
    expect(assessor.calls[0].findings.summary).toBe('TCS research summary');
  });

  it('sends no guidance on the first attempt', async () => {
    const source = new FakeInformationSource();
    const validation = { verdict: 'insufficient' as const, critique: 'stale', suggestions: 'newer data' };
    await new ResearcherStep(source, new FakeConfidenceAssessor()).run(researchState({ validation, attempts: 0 }));
    expect(source.calls[0].guidance).toBeNull();
  });

  it('passes the last critique as guidance on a retry', async () => {
    const source = new FakeInformationSource();
    const validation = { verdict: 'insufficient' as const, critique: 'stale', suggestions: 'newer data' };
    await new ResearcherStep(source, new FakeConfidenceAssessor()).run(researchState({ validation, attempts: 1 }));
    expect(source.calls[0].guidance).toEqual(validation);
  });

  it('clears the verdict on the findings it replaces', async () => {
    const validation = { verdict: 'insufficient' as const, critique: 'stale', suggestions: 'newer data' };
    const { delta } = await new ResearcherStep(new FakeInformationSource(), new FakeConfidenceAssessor()).run(
      researchState({ validation, attempts: 1 })
    );
    expect(delta.validation).toBeNull();
  });

  it('trims the summary', async () => {
    const source = new FakeInformationSource();
    source.queue({ summary: '  padded  ', keyFacts: [], sources: [] });
    const { delta } = await new ResearcherStep(source, new FakeConfidenceAssessor()).run(researchState());
    expect(delta.findings?.summary).toBe('padded');
  });

  it('rejects an empty summary without asking for a score', async () => {
    const source = new FakeInformationSource();
    const assessor = new FakeConfidenceAssessor();
    source.queue({ summary: '   ', keyFacts: [], sources: [] });
    await expect(new ResearcherStep(source, assessor).run(researchState())).rejects.toMatchObject({
      step: 'researcher',
      failure: 'empty_result',
    });
    expect(assessor.calls).toHaveLength(0);
  });

  it.each([-0.5, 10.5, Number.NaN, Number.POSITIVE_INFINITY])('rejects score %s as malformed', async (score) => {
    const assessor = new FakeConfidenceAssessor();
    assessor.queueScores(score);
    await expect(
      new ResearcherStep(new FakeInformationSource(), assessor).run(researchState())
    ).rejects.toMatchObject({ failure: 'malformed_output' });
  });

  it('accepts the bounds of the score range', async () => {
    const assessor = new FakeConfidenceAssessor();
    assessor.queueScores(0, 10);
    const step = new ResearcherStep(new FakeInformationSource(), assessor);
    expect((await step.run(researchState())).delta.confidenceScore).toBe(0);
    expect((await step.run(researchState())).delta.confidenceScore).toBe(10);
  });

  it('classifies a timeout from the source', async () => {
    const source = new FakeInformationSource();
    const timeout = new Error('Request timed out');
    source.queue(timeout);
    const error = await new ResearcherStep(source, new FakeConfidenceAssessor())
      .run(researchState())
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CollaboratorError);
    if (error instanceof CollaboratorError) {
      expect(error.failure).toBe('timeout');
      expect(error.cause).toBe(timeout);
    }
  });

  it('refuses to run without a subject entity', async () => {
    await expect(
      new ResearcherStep(new FakeInformationSource(), new FakeConfidenceAssessor()).run(
        researchState({ subjectEntity: null })
      )
    ).rejects.toBeInstanceOf(RouterInconsistencyError);
  });
});
