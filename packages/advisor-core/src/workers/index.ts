/**
 * Workers Module
 */

export {
    type Worker,
    type WorkerOutput,
    type TextWorkerOutput,
    type StructuredWorkerOutput,
    textResult,
    structuredResult,
    createWorker,
    normalizeWorkerOutput,
    normalizeToolTraceStep,
} from './types';

export { WorkerRegistry } from './registry';

export {
    type WorkerStateDelta,
    type InvokeWorkerOptions,
    invokeWorker,
    summarizeWorkerOutput,
} from './worker-adapter';

export {
    type ToolCallingWorkerConfig,
    createToolCallingWorker,
    executeToolCalls,
} from './tool-calling-worker';

export {
    type RiskAssessment,
    type FraudAssessment,
    type PensionOverview,
    type ToolError,
    type FinancialDataSource,
    type FinancialTools,
    FINANCIAL_TOOL_NAMES,
    createFinancialTools,
    coerceUserId,
    resolveUserId,
    parseKnowledgeQuery,
} from './financial-tools';

export {
    type FixtureData,
    type FixtureProfile,
    fixtureDataSchema,
    parseFixtureData,
    createFixtureDataSource,
} from './fixture-data-source';

export {
    type SpecialistWorkerOptions,
    SPECIALIST_PROMPTS,
    createSpecialistWorker,
    createSpecialistWorkers,
} from './specialists';
