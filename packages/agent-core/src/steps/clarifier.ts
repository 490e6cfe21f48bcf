/**
 * Clarifier Step
 *
 * Decides whether the latest user message names a company clearly
 * enough to research. Every turn enters here, including the answer to
 * a clarification question, so entity extraction and reference
 * resolution behave the same regardless of entry point.
 */

import { callCollaborator } from '../errors';
import type { ConversationState } from '../state';
import { latestUserMessage } from '../state';
import { createAgentLogger, startTimer } from '../tracing';
import { resolveReference } from './reference-resolver';
import type { ClarityAssessor, Step, StepResult } from './types';

const log = createAgentLogger('Clarifier', 'step');

export const DEFAULT_CLARIFICATION_QUESTION = 'Which company are you asking about?';

export class ClarifierStep implements Step<'clarifier'> {
    readonly name = 'clarifier';

    constructor(private readonly assessor: ClarityAssessor) {}

    async run(state: ConversationState): Promise<StepResult> {
        const timer = startTimer(log, 'clarifier', state.traceContext);
        const message = latestUserMessage(state.history);

        const assessment = await callCollaborator(this.name, () =>
            this.assessor.assess({
                message,
                history: state.history,
                lastDiscussedEntity: state.lastDiscussedEntity,
                discussedEntities: state.discussedEntities,
            })
        );

        const reference = resolveReference(message, {
            lastDiscussedEntity: state.lastDiscussedEntity,
            discussedEntities: state.discussedEntities,
        });

        log.debugWithTrace(state.traceContext, 'Assessment received', {
            status: assessment.status,
            entity: assessment.entity,
            reference: reference ? `${reference.kind}:${reference.cue}` : null,
        });

        const explicitEntity = assessment.status === 'clear' ? assessment.entity?.trim() : undefined;
        const namesNewEntity =
            explicitEntity !== undefined && explicitEntity !== '' && !isDiscussed(explicitEntity, state.discussedEntities);

        // "the other one" is relative to conversation order, which the
        // assessor does not track. A company not discussed before was
        // named by the user, not guessed from the cue.
        if (reference?.kind === 'contrastive' && !namesNewEntity) {
            timer.end('Resolved contrastive reference', { entity: reference.entity });
            return { delta: clear(reference.entity) };
        }

        if (explicitEntity) {
            timer.end('Clear', { entity: explicitEntity });
            return { delta: clear(explicitEntity) };
        }

        if (reference) {
            timer.end('Resolved anaphoric reference', { entity: reference.entity, cue: reference.cue });
            return { delta: clear(reference.entity) };
        }

        const question = assessment.question?.trim() || DEFAULT_CLARIFICATION_QUESTION;
        timer.end('Needs clarification', { question });
        return {
            delta: {
                clarityStatus: 'needs_clarification',
                clarificationQuestion: question,
                subjectEntity: null,
            },
        };
    }
}

function clear(entity: string): StepResult['delta'] {
    return {
        clarityStatus: 'clear',
        clarificationQuestion: null,
        subjectEntity: entity,
    };
}

function isDiscussed(entity: string, discussedEntities: string[]): boolean {
    const key = entity.toLowerCase();
    return discussedEntities.some((discussed) => discussed.toLowerCase() === key);
}
