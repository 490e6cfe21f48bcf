/**
 * Agent Logger
 *
 * Structured, layer-aware logging for the research agent. Lines carry
 * the session traceId so a conversation can be followed across
 * suspend/resume and follow-up turns:
 *
 *   2024-01-01T00:00:00.000Z INFO  [step:Researcher] traceId=trace_… Research complete (812ms) {"entity":"TCS"}
 *
 * Output goes to the console (text or JSON lines) and/or a custom handler.
 */

import type { TraceContext } from './trace-context';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Which part of the agent produced a line
 */
export type LogLayer = 'orchestrator' | 'step' | 'collaborator' | 'config';

export interface StructuredLogEntry {
  timestamp: string;
  level: LogLevel;
  layer: LogLayer;
  module: string;
  traceId?: string;
  spanId?: string;
  message: string;
  duration?: number;
  data?: Record<string, unknown>;
}

export interface AgentLoggerConfig {
  /** Minimum level for every layer without an override */
  level: LogLevel;
  /** Per-layer minimum levels, e.g. `{ collaborator: 'debug' }` */
  layerLevels: Partial<Record<LogLayer, LogLevel>>;
  consoleOutput: boolean;
  /** `text` for humans, `json` for one JSON object per line */
  consoleFormat: 'text' | 'json';
  /** Receives every entry that passes the level filter */
  customHandler?: (entry: StructuredLogEntry) => void;
}

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function parseLevel(raw: string | undefined): LogLevel | undefined {
  const candidate = raw?.trim().toLowerCase();
  return candidate === 'debug' || candidate === 'info' || candidate === 'warn' || candidate === 'error'
    ? candidate
    : undefined;
}

function initialConfig(): AgentLoggerConfig {
  return {
    level: parseLevel(process.env.AGENT_LOG_LEVEL) ?? 'info',
    layerLevels: {},
    consoleOutput: true,
    consoleFormat: 'text',
  };
}

// Kept on globalThis so every copy of this module (workspace link and
// relative import) shares one configuration
declare global {
  // eslint-disable-next-line no-var
  var __researchAgentLoggerConfig: AgentLoggerConfig | undefined;
}

function currentConfig(): AgentLoggerConfig {
  globalThis.__researchAgentLoggerConfig ??= initialConfig();
  return globalThis.__researchAgentLoggerConfig;
}

/**
 * Merge settings into the active logger configuration
 */
export function configureAgentLogger(config: Partial<AgentLoggerConfig>): void {
  globalThis.__researchAgentLoggerConfig = { ...currentConfig(), ...config };
}

/**
 * Back to defaults, with the level re-read from AGENT_LOG_LEVEL
 */
export function resetAgentLogger(): void {
  globalThis.__researchAgentLoggerConfig = initialConfig();
}

/**
 * Render an entry as one text line
 */
export function formatLogEntry(entry: StructuredLogEntry): string {
  const parts = [entry.timestamp, entry.level.toUpperCase().padEnd(5), `[${entry.layer}:${entry.module}]`];
  if (entry.traceId) parts.push(`traceId=${entry.traceId}`);
  if (entry.spanId) parts.push(`spanId=${entry.spanId}`);
  parts.push(entry.message);
  if (entry.duration !== undefined) parts.push(`(${entry.duration}ms)`);
  if (entry.data && Object.keys(entry.data).length > 0) parts.push(JSON.stringify(entry.data));
  return parts.join(' ');
}

function enabled(config: AgentLoggerConfig, level: LogLevel, layer: LogLayer): boolean {
  const threshold = config.layerLevels[layer] ?? config.level;
  return SEVERITY[level] >= SEVERITY[threshold];
}

function emit(entry: StructuredLogEntry, config: AgentLoggerConfig): void {
  if (config.consoleOutput) {
    const line = config.consoleFormat === 'json' ? JSON.stringify(entry) : formatLogEntry(entry);
    if (entry.level === 'error') console.error(line);
    else if (entry.level === 'warn') console.warn(line);
    else console.log(line);
  }
  config.customHandler?.(entry);
}

interface LogCall {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  traceContext?: TraceContext | null;
  duration?: number;
}

function log(layer: LogLayer, module: string, call: LogCall): void {
  const config = currentConfig();
  if (!enabled(config, call.level, layer)) {
    return;
  }
  emit(
    {
      timestamp: new Date().toISOString(),
      level: call.level,
      layer,
      module,
      traceId: call.traceContext?.traceId,
      spanId: call.traceContext?.spanId,
      message: call.message,
      duration: call.duration,
      data: call.data,
    },
    config
  );
}

type LogMethod = (message: string, data?: Record<string, unknown>) => void;
type TracedLogMethod = (ctx: TraceContext | null, message: string, data?: Record<string, unknown>) => void;

export interface ModuleAgentLogger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;

  /** Tagged with a session trace; `null` before the session has one */
  debugWithTrace: TracedLogMethod;
  infoWithTrace: TracedLogMethod;
  warnWithTrace: TracedLogMethod;
  errorWithTrace: TracedLogMethod;

  infoWithDuration(
    message: string,
    duration: number,
    data?: Record<string, unknown>,
    ctx?: TraceContext | null
  ): void;

  /** Same layer, module name `parent:sub` */
  child(subModule: string): ModuleAgentLogger;
}

export function createAgentLogger(module: string, layer: LogLayer = 'orchestrator'): ModuleAgentLogger {
  const plain = (level: LogLevel): LogMethod => (message, data) => log(layer, module, { level, message, data });
  const traced = (level: LogLevel): TracedLogMethod => (traceContext, message, data) =>
    log(layer, module, { level, message, data, traceContext });

  return {
    debug: plain('debug'),
    info: plain('info'),
    warn: plain('warn'),
    error: plain('error'),
    debugWithTrace: traced('debug'),
    infoWithTrace: traced('info'),
    warnWithTrace: traced('warn'),
    errorWithTrace: traced('error'),
    infoWithDuration: (message, duration, data, traceContext) =>
      log(layer, module, { level: 'info', message, data, traceContext, duration }),
    child: (subModule) => createAgentLogger(`${module}:${subModule}`, layer),
  };
}

export interface OperationTimer {
  /** Log at info with the elapsed time; returns it */
  end(message?: string, data?: Record<string, unknown>): number;
  endSilent(): number;
}

/**
 * Time an operation; `end` logs `<operation> completed` unless given a message
 */
export function startTimer(
  logger: ModuleAgentLogger,
  operationName: string,
  traceContext?: TraceContext | null
): OperationTimer {
  const startedAt = Date.now();
  const elapsed = () => Date.now() - startedAt;

  return {
    end: (message, data) => {
      const duration = elapsed();
      logger.infoWithDuration(message ?? `${operationName} completed`, duration, data, traceContext);
      return duration;
    },
    endSilent: elapsed,
  };
}
