/**
 * Advisor Core Package
 *
 * LangGraph supervisor over the risk, fraud and projection specialists.
 * A run routes one query through the workers, optionally builds charts from
 * the gathered tool results, and consolidates everything into one answer.
 */

// State types and utilities
export * from './state';

// Messages and run context
export {
    type MessageRole,
    type ConversationMessage,
    type MessageLike,
    createMessage,
    userMessage,
    workerMessage,
    systemNote,
    userTextOf,
    contentToText,
    findLatestUserText,
    renderTranscript,
} from './messages';

export { type RunContext, createRunContext } from './context';

export { OrchestrationError, ConfigError } from './errors';

// Orchestrator
export * from './orchestrator';

// Collaborators
export type { IntentClassifier, Synthesizer, Rasterizer, AdvisorCollaborators } from './collaborators/types';
export { type RetryOptions, isAbortError, withRetry } from './collaborators/retry';

// Building blocks
export * from './routing';
export * from './workers';
export * from './ledger';
export * from './visualization';
export * from './consolidation';

// LLM
export { createChatModel } from './llm/chat-model';

// Config and tracing
export * from './config';
export * from './tracing';
