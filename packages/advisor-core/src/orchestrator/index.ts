/**
 * Orchestrator Module
 */

export {
    type FinancialAdvisorOptions,
    type RunOptions,
    type AdvisorStep,
    type AdvisorStreamEvent,
    FinancialAdvisor,
} from './financial-advisor';

export {
    type AdvisorGraphConfig,
    type AdvisorGraph,
    type CompiledAdvisorGraph,
    buildAdvisorGraph,
    recursionLimitFor,
} from './graph';

export { type SupervisorNodeConfig, createSupervisorNode, routeAfterSupervisor } from './supervisor-node';

export {
    type StepNodeSettings,
    createWorkerNode,
    createVisualizeNode,
    createConsolidateNode,
    createFinishNode,
} from './step-nodes';
