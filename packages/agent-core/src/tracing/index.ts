/**
 * Tracing: session trace context and structured logging
 */

export {
  generateTraceId,
  generateSpanId,
  createTraceContext,
  createChildSpan,
  formatTraceContext,
  type TraceContext,
  type SpanName,
} from './trace-context';

export {
  configureAgentLogger,
  resetAgentLogger,
  formatLogEntry,
  createAgentLogger,
  startTimer,
  type LogLevel,
  type LogLayer,
  type StructuredLogEntry,
  type AgentLoggerConfig,
  type ModuleAgentLogger,
  type OperationTimer,
} from './agent-logger';
