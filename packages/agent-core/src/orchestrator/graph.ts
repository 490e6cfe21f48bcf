/**
 * Conversation Graph
 *
 * LangGraph StateGraph over the four steps. The only static edge is
 * START -> clarifier; after that every node asks the router where to go
 * and hands LangGraph a Command.
 *
 * Flow: START -> clarifier -> researcher -> (validator -> researcher)* -> synthesizer -> END
 *                          \-> END (suspended on a clarification question)
 */

import { Command, END, START, StateGraph } from '@langchain/langgraph';
import { decide, type RouterOptions } from '../router';
import { ConversationStateAnnotation, applyDelta, type ConversationState, type ConversationUpdate } from '../state';
import type { Step, StepName } from '../steps/types';
import { createAgentLogger } from '../tracing';
import type { ConversationSteps } from './types';

const log = createAgentLogger('Graph');

/**
 * Wrap a step as a graph node: run it, route on the merged state,
 * and return the delta together with the routing decision.
 */
function createStepNode(step: Step, routerOptions: RouterOptions) {
    return async (state: ConversationState): Promise<Command> => {
        const { delta } = await step.run(state);
        const update: ConversationUpdate = { ...delta, trace: [step.name] };

        const action = decide(step.name, applyDelta(state, delta, step.name), routerOptions);

        switch (action.type) {
            case 'goto': {
                const attempts = action.retry ? state.attempts + 1 : state.attempts;
                log.debugWithTrace(state.traceContext, 'Route', {
                    from: step.name,
                    to: action.step,
                    attempts,
                });
                return new Command({
                    update: action.retry ? { ...update, attempts } : update,
                    goto: action.step,
                });
            }
            case 'suspend':
                log.infoWithTrace(state.traceContext, 'Suspending for clarification', {
                    from: step.name,
                    question: action.question,
                });
                return new Command({
                    update: { ...update, pendingQuestion: action.question },
                    goto: END,
                });
            case 'terminate':
                log.debugWithTrace(state.traceContext, 'Terminate', { from: step.name });
                return new Command({ update, goto: END });
        }
    };
}

/**
 * Build and compile the conversation graph. No checkpointer: the caller
 * owns the state between passes.
 */
export function createConversationGraph(steps: ConversationSteps, routerOptions: RouterOptions) {
    const successors: Record<StepName, (StepName | typeof END)[]> = {
        clarifier: ['researcher', END],
        researcher: ['validator', 'synthesizer'],
        validator: ['researcher', 'synthesizer'],
        synthesizer: [END],
    };

    return new StateGraph(ConversationStateAnnotation)
        .addNode('clarifier', createStepNode(steps.clarifier, routerOptions), {
            ends: successors.clarifier,
        })
        .addNode('researcher', createStepNode(steps.researcher, routerOptions), {
            ends: successors.researcher,
        })
        .addNode('validator', createStepNode(steps.validator, routerOptions), {
            ends: successors.validator,
        })
        .addNode('synthesizer', createStepNode(steps.synthesizer, routerOptions), {
            ends: successors.synthesizer,
        })
        .addEdge(START, 'clarifier')
        .compile();
}

export type ConversationGraph = ReturnType<typeof createConversationGraph>;
