/**
 * Researcher Step
 *
 * Gathers findings about the subject entity, then has a separate
 * assessor score them. The score is never taken from the call that
 * produced the findings. New findings clear the previous verdict.
 */

import { CollaboratorError, RouterInconsistencyError, callCollaborator } from '../errors';
import type { ConversationState, ResearchFindings } from '../state';
import { latestUserMessage } from '../state';
import { createAgentLogger, startTimer } from '../tracing';
import { rememberEntity } from './reference-resolver';
import type { ConfidenceAssessor, InformationSource, Step, StepResult } from './types';

const log = createAgentLogger('Researcher', 'step');

export const MIN_CONFIDENCE = 0;
export const MAX_CONFIDENCE = 10;

export class ResearcherStep implements Step<'researcher'> {
    readonly name = 'researcher';

    constructor(
        private readonly source: InformationSource,
        private readonly confidenceAssessor: ConfidenceAssessor
    ) {}

    async run(state: ConversationState): Promise<StepResult> {
        const entity = state.subjectEntity;
        if (!entity) {
            throw new RouterInconsistencyError('Researcher scheduled without a subject entity', 'researcher');
        }

        const timer = startTimer(log, 'researcher', state.traceContext);
        const query = latestUserMessage(state.history);

        log.infoWithTrace(state.traceContext, 'Researching', {
            entity,
            attempt: state.attempts,
            hasGuidance: state.validation !== null,
        });

        const sourceFindings = await callCollaborator(this.name, () =>
            this.source.research({
                entity,
                query,
                guidance: state.attempts > 0 ? state.validation : null,
            })
        );

        const summary = sourceFindings.summary.trim();
        if (!summary) {
            throw new CollaboratorError('researcher', 'empty_result', `No findings returned for ${entity}`);
        }

        const findings: ResearchFindings = {
            entity,
            query,
            summary,
            keyFacts: sourceFindings.keyFacts,
            sources: sourceFindings.sources,
            retrievedAt: new Date().toISOString(),
        };

        const assessment = await callCollaborator(this.name, () =>
            this.confidenceAssessor.assess({ entity, query, findings })
        );
        const score = assessment.score;
        if (!Number.isFinite(score) || score < MIN_CONFIDENCE || score > MAX_CONFIDENCE) {
            throw new CollaboratorError(
                'researcher',
                'malformed_output',
                `Confidence score ${String(score)} is outside [${MIN_CONFIDENCE}, ${MAX_CONFIDENCE}]`
            );
        }

        timer.end('Research complete', {
            entity,
            confidenceScore: score,
            factCount: findings.keyFacts.length,
        });
        log.debugWithTrace(state.traceContext, 'Confidence reasoning', { reasoning: assessment.reasoning });

        return {
            delta: {
                findings,
                confidenceScore: score,
                // The critique described the findings just replaced
                validation: null,
                lastDiscussedEntity: entity,
                discussedEntities: rememberEntity(state.discussedEntities, entity),
            },
        };
    }
}
