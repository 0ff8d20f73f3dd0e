import { Logger, createMemoryLogger, verbosityFromCounts } from '../../../src/utils/logger';

describe('verbosityFromCounts', () => {
  it('moves ten points per flag and clamps at both ends', () => {
    expect(verbosityFromCounts(0, 0)).toBe(30);
    expect(verbosityFromCounts(1, 0)).toBe(20);
    expect(verbosityFromCounts(5, 0)).toBe(10);
    expect(verbosityFromCounts(0, 1)).toBe(40);
    expect(verbosityFromCounts(0, 9)).toBe(50);
    expect(verbosityFromCounts(2, 2)).toBe(30);
  });
});

describe('Logger', () => {
  it('drops messages below its threshold', () => {
    const { logger, lines } = createMemoryLogger(30);

    logger.debug('hidden');
    logger.info('hidden too');
    logger.warn('shown');
    logger.error('also shown');

    expect(lines.map((entry) => entry.level)).toEqual(['warn', 'error']);
    expect(lines[0].line).toContain('shown');
    expect(logger.isEnabled('info')).toBe(false);
    expect(logger.isEnabled('warn')).toBe(true);
  });

  it('is silent at 50', () => {
    const sink = jest.fn();
    const logger = new Logger(50, sink);

    logger.error('nothing');

    expect(sink).not.toHaveBeenCalled();
  });

  it('indents block bodies under their heading and skips empty bodies', () => {
    const { logger, lines } = createMemoryLogger();

    logger.block('info', 'tool output:', 'first\nsecond\n\n');
    logger.block('info', 'empty:', '  \n');

    expect(lines).toHaveLength(1);
    expect(lines[0].line).toContain('tool output:\n    first\n    second');
    expect(lines[0].line.endsWith('    second')).toBe(true);
  });

  it('prefixes debug lines with the program name', () => {
    const { logger, lines } = createMemoryLogger(10);

    logger.debug('gzip -dc');

    expect(lines[0].line).toContain('[peel] gzip -dc');
  });
});
