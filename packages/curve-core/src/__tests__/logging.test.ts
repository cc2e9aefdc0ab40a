import { describe, it, expect } from 'vitest';
import { createLogger, createLoggerFromConfig } from '../logging/logger.js';
import { DiagnosticLog } from '../diagnostics.js';

const fixedClock = () => new Date('2026-01-02T03:04:05.000Z');

function capture() {
  const lines: string[] = [];
  return { lines, write: (line: string) => void lines.push(line) };
}

describe('Logger', () => {
  it('writes one JSON line per entry', () => {
    const { lines, write } = capture();
    const logger = createLogger({ level: 'info', scope: 'curve-core', write, now: fixedClock });
    logger.info('filled gap', { points: 4 });
    expect(lines).toEqual([
      '{"ts":"2026-01-02T03:04:05.000Z","level":"info","scope":"curve-core","msg":"filled gap","points":4}\n',
    ]);
  });

  it('drops entries below the configured level', () => {
    const { lines, write } = capture();
    const logger = createLogger({ level: 'warn', scope: 's', write, now: fixedClock });
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');
    expect(lines.map((l) => JSON.parse(l).msg)).toEqual(['c', 'd']);
    expect(logger.isEnabled('info')).toBe(false);
    expect(logger.isEnabled('error')).toBe(true);
  });

  it('writes nothing when silent', () => {
    const { lines, write } = capture();
    const logger = createLogger({ level: 'silent', scope: 's', write });
    logger.error('boom');
    expect(lines).toEqual([]);
  });

  it('nests child scopes', () => {
    const { lines, write } = capture();
    const child = createLogger({ level: 'debug', scope: 'curve-core', write, now: fixedClock }).child('filters');
    child.debug('x');
    expect(child.scope).toBe('curve-core:filters');
    expect(JSON.parse(lines[0]!).scope).toBe('curve-core:filters');
  });

  it('builds from engine config', () => {
    const { lines, write } = capture();
    const logger = createLoggerFromConfig({ logLevel: 'error', logScope: 'batch' }, write);
    expect(logger.level).toBe('error');
    expect(logger.scope).toBe('batch');
    logger.warn('ignored');
    expect(lines).toHaveLength(0);
  });
});

describe('DiagnosticLog', () => {
  it('records and filters by code', () => {
    const log = new DiagnosticLog();
    log.report({ code: 'insufficient-data', operation: 'smooth.gaussian', message: 'short' });
    log.report({ code: 'invalid-selection', operation: 'smooth.gaussian', message: 'bad', index: 8 }, 'debug');
    expect(log.diagnostics).toHaveLength(2);
    expect(log.has('degenerate-fit')).toBe(false);
    expect(log.byCode('invalid-selection')).toEqual([
      { code: 'invalid-selection', operation: 'smooth.gaussian', message: 'bad', index: 8 },
    ]);
    log.clear();
    expect(log.diagnostics).toEqual([]);
  });

  it('forwards to the logger at the given severity', () => {
    const { lines, write } = capture();
    const log = new DiagnosticLog(createLogger({ level: 'debug', scope: 'diag', write, now: fixedClock }));
    log.report({ code: 'method-fallback', operation: 'fill.cubic-spline', message: 'using linear' });
    log.report({ code: 'invalid-selection', operation: 'fill.cubic-spline', message: 'skip', frame: 3 }, 'debug');
    log.trace('done', { points: 2 });

    expect(lines.map((l) => JSON.parse(l))).toEqual([
      {
        ts: '2026-01-02T03:04:05.000Z',
        level: 'warn',
        scope: 'diag',
        msg: 'using linear',
        code: 'method-fallback',
        operation: 'fill.cubic-spline',
      },
      {
        ts: '2026-01-02T03:04:05.000Z',
        level: 'debug',
        scope: 'diag',
        msg: 'skip',
        code: 'invalid-selection',
        operation: 'fill.cubic-spline',
        frame: 3,
      },
      { ts: '2026-01-02T03:04:05.000Z', level: 'debug', scope: 'diag', msg: 'done', points: 2 },
    ]);
    expect(log.diagnostics).toHaveLength(2);
  });
});
