/**
 * Synthesizer Step
 *
 * Writes the user-facing answer from the conversation and the latest
 * findings. Terminal: runs once per completed turn.
 */

import { CollaboratorError, RouterInconsistencyError, callCollaborator } from '../errors';
import type { ConversationState } from '../state';
import { assistantTurn, latestUserMessage } from '../state';
import { createAgentLogger, startTimer } from '../tracing';
import type { ResponseWriter, Step, StepResult } from './types';

const log = createAgentLogger('Synthesizer', 'step');

export class SynthesizerStep implements Step<'synthesizer'> {
    readonly name = 'synthesizer';

    /**
     * @param confidenceThreshold - score below which findings count as low confidence
     */
    constructor(
        private readonly writer: ResponseWriter,
        private readonly confidenceThreshold: number
    ) {}

    async run(state: ConversationState): Promise<StepResult> {
        const findings = state.findings;
        if (!findings) {
            throw new RouterInconsistencyError('Synthesizer scheduled without findings', 'synthesizer');
        }

        const timer = startTimer(log, 'synthesizer', state.traceContext);
        const lowConfidence = isLowConfidence(state, this.confidenceThreshold);

        const text = await callCollaborator(this.name, () =>
            this.writer.write({
                history: state.history,
                query: latestUserMessage(state.history),
                findings,
                validation: state.validation,
                lowConfidence,
            })
        );

        const response = text.trim();
        if (!response) {
            throw new CollaboratorError('synthesizer', 'empty_result', 'Response writer returned an empty answer');
        }

        timer.end('Response written', { length: response.length, lowConfidence });

        return {
            delta: {
                finalResponse: response,
                history: [assistantTurn(response)],
            },
        };
    }
}

/**
 * True when the turn reached synthesis without findings anyone vouched for
 */
export function isLowConfidence(state: ConversationState, confidenceThreshold: number): boolean {
    if (state.confidenceScore !== null && state.confidenceScore >= confidenceThreshold) {
        return false;
    }
    return state.validation?.verdict !== 'sufficient';
}
