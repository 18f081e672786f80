/**
 * Advisor Graph
 *
 * Supervisor-centred state machine over the specialist workers:
 *
 *   START ──► supervisor ──► risk | fraud | projection | visualize ──► supervisor
 *                 │
 *                 ├──► consolidate ──► finish ──► END
 *                 └──► finish ──► END
 */

import { END, START, StateGraph } from '@langchain/langgraph';
import type { Rasterizer, Synthesizer } from '../collaborators/types';
import type { RoutingPolicy } from '../routing';
import { ConversationStateAnnotation } from '../state';
import type { WorkerRegistry } from '../workers';
import {
    createConsolidateNode,
    createFinishNode,
    createVisualizeNode,
    createWorkerNode,
    type StepNodeSettings,
} from './step-nodes';
import { createSupervisorNode, routeAfterSupervisor } from './supervisor-node';

export interface AdvisorGraphConfig extends StepNodeSettings {
    policy: RoutingPolicy;
    registry: WorkerRegistry;
    synthesizer: Synthesizer;
    rasterizer?: Rasterizer;
    maxTurns: number;
}

/**
 * Build the (uncompiled) advisor state graph
 */
export function buildAdvisorGraph(config: AdvisorGraphConfig) {
    const settings: StepNodeSettings = {
        retries: config.retries,
        retryDelayMs: config.retryDelayMs,
        previewLength: config.previewLength,
    };

    return new StateGraph(ConversationStateAnnotation)
        .addNode('supervisor', createSupervisorNode({ policy: config.policy, maxTurns: config.maxTurns }))
        .addNode('risk', createWorkerNode('risk', config.registry, settings))
        .addNode('fraud', createWorkerNode('fraud', config.registry, settings))
        .addNode('projection', createWorkerNode('projection', config.registry, settings))
        .addNode('visualize', createVisualizeNode({ ...settings, rasterizer: config.rasterizer }))
        .addNode('consolidate', createConsolidateNode({ ...settings, synthesizer: config.synthesizer }))
        .addNode('finish', createFinishNode(settings))
        .addEdge(START, 'supervisor')
        .addConditionalEdges('supervisor', routeAfterSupervisor, {
            risk: 'risk',
            fraud: 'fraud',
            projection: 'projection',
            visualize: 'visualize',
            consolidate: 'consolidate',
            finish: 'finish',
        })
        .addEdge('risk', 'supervisor')
        .addEdge('fraud', 'supervisor')
        .addEdge('projection', 'supervisor')
        .addEdge('visualize', 'supervisor')
        .addEdge('consolidate', 'finish')
        .addEdge('finish', END);
}

/**
 * LangGraph step limit for a turn cap: two steps per turn plus the terminal steps
 */
export function recursionLimitFor(maxTurns: number): number {
    return maxTurns * 2 + 5;
}

export type AdvisorGraph = ReturnType<typeof buildAdvisorGraph>;

export type CompiledAdvisorGraph = ReturnType<AdvisorGraph['compile']>;
