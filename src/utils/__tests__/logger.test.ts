import { describe, it, expect, vi } from 'vitest';
import { LogLevel, createLogger } from '../logger';

function capture(level: LogLevel) {
  const lines: string[] = [];
  const logger = createLogger({
    level,
    timestamp: false,
    prefix: 'Test',
    sink: line => {
      lines.push(line);
    }
  });
  return { logger, lines };
}

describe('Logger', () => {
  it('drops messages below its level', () => {
    const { logger, lines } = capture(LogLevel.WARN);

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(lines).toEqual(['\x1b[33mTest [WARN] warn\x1b[0m', '\x1b[31mTest [ERROR] error\x1b[0m']);
  });

  it('passes context through to the sink', () => {
    const sink = vi.fn();
    createLogger({ timestamp: false, prefix: 'Test', sink }).logStage('merge', { sourceTrack: 'HUM_BODY.ASC' });

    expect(sink).toHaveBeenCalledWith('\x1b[36mTest [INFO] Stage: merge\x1b[0m', {
      stage: 'merge',
      sourceTrack: 'HUM_BODY.ASC'
    });
  });

  it('reports failed timed operations and rethrows', async () => {
    const sink = vi.fn();
    const logger = createLogger({ timestamp: false, duration: false, prefix: 'Test', sink });

    await expect(
      logger.withTiming('bake', async () => {
        throw new Error('no samples');
      })
    ).rejects.toThrow('no samples');
    expect(sink).toHaveBeenCalledWith('\x1b[36mTest [INFO] Completed operation: bake\x1b[0m', {
      operation: 'bake',
      success: false,
      error: 'no samples'
    });
  });
});
