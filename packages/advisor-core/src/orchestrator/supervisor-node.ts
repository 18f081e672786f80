/**
 * Supervisor Node
 *
 * The decision point of every turn. Counts the turn, enforces the turn cap,
 * and asks the routing policy where to go next.
 */

import type { LangGraphRunnableConfig } from '@langchain/langgraph';
import { HARD_TURN_CAP } from '../config';
import type { RoutingPolicy } from '../routing';
import { isStepName, type ConversationState, type ConversationStateUpdate, type StepName } from '../state';
import { createAgentLogger, startTimer } from '../tracing';

const log = createAgentLogger('SupervisorNode');

// ============================================================
// Types
// ============================================================

export interface SupervisorNodeConfig {
    policy: RoutingPolicy;
    /** Turn cap, never above HARD_TURN_CAP */
    maxTurns?: number;
}

// ============================================================
// Implementation
// ============================================================

/**
 * Create the Supervisor Node
 */
export function createSupervisorNode(config: SupervisorNodeConfig) {
    const { policy } = config;
    const maxTurns = Math.min(config.maxTurns ?? HARD_TURN_CAP, HARD_TURN_CAP);

    return async (
        state: ConversationState,
        runConfig?: LangGraphRunnableConfig
    ): Promise<ConversationStateUpdate> => {
        const traceContext = state.traceContext;
        const turn = state.turnCount + 1;
        const ledgerMark = state.ledger.length;

        if (turn >= maxTurns) {
            log.warnWithTrace(traceContext, '[SUPERVISOR] Turn cap reached, finishing', { turn, maxTurns });
            return { next: 'finish', turnCount: turn, ledgerMark };
        }

        const timer = startTimer(log, 'supervisor', traceContext);
        const decision = await policy.evaluate(state, runConfig?.signal);
        const next: StepName = isStepName(decision.next) ? decision.next : 'finish';

        timer.end('[SUPERVISOR] Routed', {
            turn,
            next,
            reason: decision.reason,
            ...(decision.matchedRules ? { matchedRules: decision.matchedRules } : {}),
        });

        return { next, turnCount: turn, ledgerMark };
    };
}

/**
 * Route after supervisor node
 * - Follows `next`; anything missing ends the run through the finish step
 */
export function routeAfterSupervisor(state: Pick<ConversationState, 'next'>): StepName {
    return state.next ?? 'finish';
}
