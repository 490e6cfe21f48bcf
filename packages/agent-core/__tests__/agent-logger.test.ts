import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  configureAgentLogger,
  createAgentLogger,
  createChildSpan,
  createTraceContext,
  formatLogEntry,
  formatTraceContext,
  resetAgentLogger,
  startTimer,
  type StructuredLogEntry,
} from '../src/tracing';

function capture(level: 'debug' | 'info' | 'warn' | 'error'): StructuredLogEntry[] {
  const entries: StructuredLogEntry[] = [];
  configureAgentLogger({ level, consoleOutput: false, customHandler: (entry) => entries.push(entry) });
  return entries;
}

describe('agent logger', () => {
  afterEach(() => {
    resetAgentLogger();
    vi.restoreAllMocks();
  });

  it('drops entries below the configured level', () => {
    const entries = capture('warn');
    const log = createAgentLogger('Test');
    log.debug('debug line');
    log.info('info line');
    log.warn('warn line');
    log.error('error line');
    expect(entries.map((e) => e.message)).toEqual(['warn line', 'error line']);
  });

  it('tags entries with module, layer and trace ids', () => {
    const entries = capture('debug');
    const ctx = createTraceContext('Tell me about Infosys');
    createAgentLogger('Researcher', 'step').infoWithTrace(ctx, 'Researching', { entity: 'Infosys' });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'info',
      layer: 'step',
      module: 'Researcher',
      traceId: ctx.traceId,
      spanId: ctx.spanId,
      message: 'Researching',
      data: { entity: 'Infosys' },
    });
  });

  it('accepts a missing trace context', () => {
    const entries = capture('debug');
    createAgentLogger('Graph').warnWithTrace(null, 'no trace yet');
    expect(entries[0].traceId).toBeUndefined();
  });

  it('prefixes child module names', () => {
    const entries = capture('debug');
    createAgentLogger('Orchestrator').child('pass').info('hello');
    expect(entries[0].module).toBe('Orchestrator:pass');
  });

  it('writes errors to console.error', () => {
    configureAgentLogger({ level: 'debug', consoleOutput: true });
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createAgentLogger('Test').error('boom');
    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toContain('ERROR [orchestrator:Test] boom');
  });

  it('applies per-layer level overrides', () => {
    const entries = capture('warn');
    configureAgentLogger({ layerLevels: { collaborator: 'debug' } });
    createAgentLogger('Anthropic', 'collaborator').debug('request sent');
    createAgentLogger('Graph').info('route');
    expect(entries.map((e) => `${e.layer}:${e.message}`)).toEqual(['collaborator:request sent']);
  });

  it('can write JSON lines', () => {
    configureAgentLogger({ level: 'info', consoleOutput: true, consoleFormat: 'json' });
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    createAgentLogger('Config', 'config').info('loaded', { source: 'env' });
    expect(JSON.parse(String(spy.mock.calls[0][0]))).toMatchObject({
      level: 'info',
      layer: 'config',
      module: 'Config',
      message: 'loaded',
      data: { source: 'env' },
    });
  });

  it('records durations through startTimer', () => {
    const entries = capture('info');
    const timer = startTimer(createAgentLogger('Test'), 'lookup');
    const duration = timer.end();
    expect(entries[0].message).toBe('lookup completed');
    expect(entries[0].duration).toBe(duration);
  });
});

describe('formatLogEntry', () => {
  it('renders a single line', () => {
    const line = formatLogEntry({
      timestamp: '2024-01-01T00:00:00.000Z',
      level: 'info',
      layer: 'step',
      module: 'Validator',
      traceId: 'trace_1_abc',
      message: 'Validation complete',
      duration: 12,
      data: { verdict: 'sufficient' },
    });
    expect(line).toBe(
      '2024-01-01T00:00:00.000Z INFO  [step:Validator] traceId=trace_1_abc Validation complete (12ms) {"verdict":"sufficient"}'
    );
  });
});

describe('trace context', () => {
  it('opens child spans on the same trace', () => {
    const root = createTraceContext('first message', { channel: 'test' });
    const child = createChildSpan(root, 'resume');
    expect(child.traceId).toBe(root.traceId);
    expect(child.parentSpanId).toBe(root.spanId);
    expect(child.spanId).not.toBe(root.spanId);
    expect(child.name).toBe('resume');
    expect(child.metadata).toEqual({ firstMessage: 'first message', channel: 'test' });
    expect(formatTraceContext(child)).toBe(
      `traceId=${root.traceId} spanId=${child.spanId} parentSpanId=${root.spanId}`
    );
  });
});
