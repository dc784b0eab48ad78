import { colors, log, logger, useColors } from './debug';

describe('logger', () => {
  test('capture() collects lines logged inside the callback', () => {
    const logs: string[] = [];
    const result = logger.capture(() => {
      log('first', 1);
      log('second');
      return 42;
    }, logs);
    log('outside');
    expect(result).toBe(42);
    expect(logs).toEqual(['first 1', 'second']);
  });

  test('subscribe() returns an unsubscribe function', () => {
    const seen: unknown[][] = [];
    const unsub = logger.subscribe((...args) => seen.push(args));
    log('a');
    unsub();
    log('b');
    expect(seen).toEqual([['a']]);
  });
});

describe('colors', () => {
  afterEach(() => useColors(false));

  test('are plain text unless enabled', () => {
    expect(colors.red('x')).toBe('x');
    useColors();
    expect(colors.red('x')).toBe('\u001b[31mx\u001b[0m');
  });
});
