import {
  type CliFlags,
  DEFAULT_MAX_DEPTH,
  parseMaxDepth,
  parseOneEntry,
  resolveRunOptions,
} from '../../../src/config/run-options';
import { UsageError } from '../../../src/errors/archive-errors';

const flags: CliFlags = {
  mode: 'extract',
  recursive: false,
  overwrite: false,
  flat: false,
  noninteractive: false,
  verbose: 0,
  quiet: 0,
};

const context = { env: {}, stdinIsTTY: true, cwd: '/work' };

describe('resolveRunOptions', () => {
  it('fills in defaults', () => {
    expect(resolveRunOptions(flags, context)).toEqual({
      mode: 'extract',
      recursive: false,
      overwrite: false,
      flat: false,
      interactive: true,
      oneEntry: undefined,
      password: undefined,
      verbosity: 30,
      maxDepth: DEFAULT_MAX_DEPTH,
      workingDir: '/work',
    });
  });

  it('returns a frozen value', () => {
    expect(Object.isFrozen(resolveRunOptions(flags, context))).toBe(true);
  });

  it('is never interactive without a terminal or with -n', () => {
    expect(resolveRunOptions(flags, { ...context, stdinIsTTY: false }).interactive).toBe(false);
    expect(resolveRunOptions({ ...flags, noninteractive: true }, context).interactive).toBe(false);
    expect(
      resolveRunOptions(flags, { ...context, env: { PEEL_NONINTERACTIVE: 'yes' } }).interactive
    ).toBe(false);
    expect(
      resolveRunOptions(flags, { ...context, env: { PEEL_NONINTERACTIVE: '0' } }).interactive
    ).toBe(true);
  });

  it('rejects a malformed boolean in the environment', () => {
    expect(() =>
      resolveRunOptions(flags, { ...context, env: { PEEL_NONINTERACTIVE: 'maybe' } })
    ).toThrow('PEEL_NONINTERACTIVE must be 1 or 0, got "maybe"');
  });

  it('lets flags win over the environment', () => {
    const env = { PEEL_ONE_ENTRY: 'rename', PEEL_PASSWORD: 'env-secret' };

    const fromEnv = resolveRunOptions(flags, { ...context, env });
    const fromFlags = resolveRunOptions(
      { ...flags, oneEntry: 'HERE', password: 'test-secret' },
      { ...context, env }
    );

    expect(fromEnv).toMatchObject({ oneEntry: 'rename', password: 'env-secret' });
    expect(fromFlags).toMatchObject({ oneEntry: 'here', password: 'test-secret' });
  });

  it('ignores an empty password variable', () => {
    expect(
      resolveRunOptions(flags, { ...context, env: { PEEL_PASSWORD: '' } }).password
    ).toBeUndefined();
  });

  it('maps -v and -q counts to a verbosity', () => {
    expect(resolveRunOptions({ ...flags, verbose: 2 }, context).verbosity).toBe(10);
    expect(resolveRunOptions({ ...flags, quiet: 1 }, context).verbosity).toBe(40);
  });

  it('reads the nesting limit from the environment', () => {
    expect(resolveRunOptions(flags, { ...context, env: { PEEL_MAX_DEPTH: '3' } }).maxDepth).toBe(
      3
    );
  });
});

describe('parseOneEntry', () => {
  it('names the source of a bad value', () => {
    expect(() => parseOneEntry('sideways', '--one')).toThrow(
      '--one must be one of inside, rename, here, got "sideways"'
    );
    expect(() => parseOneEntry('x', 'PEEL_ONE_ENTRY')).toThrow(UsageError);
  });

  it('accepts any prefix that names one choice', () => {
    expect(parseOneEntry('h', '--one')).toBe('here');
    expect(parseOneEntry('Ren', '--one')).toBe('rename');
    expect(parseOneEntry(' i ', '--one')).toBe('inside');
    expect(() => parseOneEntry('', '--one')).toThrow(
      '--one must be one of inside, rename, here, got ""'
    );
    expect(() => parseOneEntry('here!', '--one')).toThrow(UsageError);
  });
});

describe('parseMaxDepth', () => {
  it('defaults when unset and rejects non-numbers', () => {
    expect(parseMaxDepth(undefined)).toBe(8);
    expect(parseMaxDepth(' ')).toBe(8);
    expect(parseMaxDepth('0')).toBe(0);
    expect(() => parseMaxDepth('-1')).toThrow(
      'PEEL_MAX_DEPTH must be a non-negative integer, got "-1"'
    );
  });
});
