/**
 * Validator Step
 *
 * Reviews the latest findings. Only produces a verdict; whether a
 * retry happens is the router's call.
 */

import { RouterInconsistencyError, callCollaborator } from '../errors';
import type { ConversationState } from '../state';
import { createAgentLogger, startTimer } from '../tracing';
import type { ResearchCritic, Step, StepResult } from './types';

const log = createAgentLogger('Validator', 'step');

export class ValidatorStep implements Step<'validator'> {
    readonly name = 'validator';

    constructor(private readonly critic: ResearchCritic) {}

    async run(state: ConversationState): Promise<StepResult> {
        const findings = state.findings;
        if (!findings) {
            throw new RouterInconsistencyError('Validator scheduled without findings', 'validator');
        }

        const timer = startTimer(log, 'validator', state.traceContext);
        const validation = await callCollaborator(this.name, () =>
            this.critic.review({
                entity: findings.entity,
                query: findings.query,
                findings,
                confidenceScore: state.confidenceScore,
            })
        );

        timer.end('Validation complete', {
            verdict: validation.verdict,
            attempts: state.attempts,
            critique: validation.critique.slice(0, 200),
        });

        return { delta: { validation } };
    }
}
