/**
 * Tracing Module
 *
 * Trace context and structured logging for advisor runs.
 */

// Trace Context
export {
  type TraceContext,
  generateTraceId,
  generateSpanId,
  createTraceContext,
  createChildSpan,
} from './trace-context';

// Agent Logger
export {
  type LogLevel,
  type LogLayer,
  type StructuredLogEntry,
  type AgentLoggerConfig,
  type ModuleAgentLogger,
  type OperationTimer,
  configureAgentLogger,
  formatLogEntry,
  createAgentLogger,
  startTimer,
} from './agent-logger';

// LangSmith Integration (Optional)
export {
  type LangSmithConfig,
  getLangSmithConfig,
  initLangSmith,
} from './langsmith';
