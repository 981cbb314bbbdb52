import { describe, it, expect } from 'vitest';
import { ConsoleLogger } from '../../../src/infrastructure/logging/ConsoleLogger.js';
import { TransientError } from '../../../src/domain/errors/PipelineErrors.js';

const FIXED_CLOCK = (): Date => new Date('2024-03-01T12:00:00.000Z');

function capture(options: ConstructorParameters<typeof ConsoleLogger>[0] = {}): { logger: ConsoleLogger; lines: string[] } {
  const lines: string[] = [];
  const logger = new ConsoleLogger({ clock: FIXED_CLOCK, write: (line) => lines.push(line), ...options });
  return { logger, lines };
}

describe('ConsoleLogger', () => {
  it('should write a text line with level, source and context', () => {
    const { logger, lines } = capture({ source: 'worker' });

    logger.info('Batch completed', { batchIndex: 2, recordCount: 7 });

    expect(lines).toEqual(['2024-03-01T12:00:00.000Z INFO  [worker] Batch completed {"batchIndex":2,"recordCount":7}']);
  });

  it('should omit the context when it is empty or undefined', () => {
    const { logger, lines } = capture();

    logger.warn('Queue closed');
    logger.warn('Nothing to add', { skipped: undefined });

    expect(lines).toEqual(['2024-03-01T12:00:00.000Z WARN  Queue closed', '2024-03-01T12:00:00.000Z WARN  Nothing to add']);
  });

  it('should drop entries below the configured level', () => {
    const { logger, lines } = capture({ level: 'warn' });

    logger.debug('noise');
    logger.info('noise');
    logger.error('Merge failed');

    expect(lines).toEqual(['2024-03-01T12:00:00.000Z ERROR Merge failed']);
  });

  it('should write nothing when silent', () => {
    const { logger, lines } = capture({ level: 'silent' });

    logger.error('ignored');

    expect(lines).toEqual([]);
  });

  it('should write JSON lines and serialise errors', () => {
    const { logger, lines } = capture({ format: 'json', source: 'merge' });

    logger.error('Attempt failed', { jobId: 'job-1', error: new TransientError('HTTP 503') });

    expect(JSON.parse(lines[0] ?? '')).toEqual({
      timestamp: '2024-03-01T12:00:00.000Z',
      level: 'error',
      source: 'merge',
      message: 'Attempt failed',
      jobId: 'job-1',
      error: { name: 'TransientError', message: 'HTTP 503', code: 'TRANSIENT' },
    });
  });

  it('should chain sources in child loggers', () => {
    const { logger, lines } = capture({ source: 'pipeline' });

    logger.child('worker').child('w-1').info('Worker started');

    expect(lines).toEqual(['2024-03-01T12:00:00.000Z INFO  [pipeline:worker:w-1] Worker started']);
  });
});
