/**
 * Routing Module
 */

export {
    type VisualizationRule,
    type ClassifiedRoute,
    type ClassifierRule,
    VISUALIZATION_RULES,
    ROUTE_ALIASES,
    DEFAULT_CLASSIFIER_RULES,
    matchVisualizationRules,
    coerceRoute,
} from './intent-table';

export {
    type RoutingReason,
    type RoutingDecision,
    type RoutingState,
    type RoutingPolicy,
    type RoutingPolicyOptions,
    workerJustRan,
    routeFromState,
    createRoutingPolicy,
} from './routing-policy';

export {
    type LLMClassifierOptions,
    SUPERVISOR_PROMPT,
    classifyByKeywords,
    createHeuristicClassifier,
    parseRouteResponse,
    createLLMClassifier,
} from './classifiers';
