import fs from 'fs';

/**
 * Shared debug logging. Nothing is printed unless the `DEBUG` environment
 * variable is set, or `DEBUG_FILE` names a file to append to. Listeners see
 * every line regardless.
 */

export function log(...args: unknown[]) {
  logger.log(...args);
}

type Listener = (...args: unknown[]) => void;
class Logger {
  static readonly instance = new Logger();
  private listeners: Set<Listener> = new Set();
  private debugFile: number | undefined = undefined;

  private constructor() {}

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  log(...args: unknown[]) {
    for (const listener of this.listeners) {
      listener(...args);
    }
    if (process.env.DEBUG) {
      console.log(...args);
    } else if (process.env.DEBUG_FILE) {
      if (this.debugFile === undefined) {
        this.debugFile = fs.openSync(process.env.DEBUG_FILE, 'w');
      }
      fs.writeSync(this.debugFile, args.map(String).join(' ') + '\n');
    }
  }

  capture<R>(insideFunc: () => R, logs: string[]): R {
    const unsub = this.subscribe((...args: unknown[]) =>
      logs.push(args.map(String).join(' '))
    );
    try {
      return insideFunc();
    } finally {
      unsub();
    }
  }
}
export const logger = Logger.instance;

let shouldUseColors = false;
export function useColors(enabled: boolean = true) {
  shouldUseColors = enabled;
}

const ColorCodes = {
  red: '\u001b[31m',
  green: '\u001b[32m',
  yellow: '\u001b[33m',
  cyan: '\u001b[36m',
  reset: '\u001b[0m',
  bold: '\u001b[1m',
};

const paint =
  (code: string) =>
  (s: string): string =>
    shouldUseColors ? code + s + ColorCodes.reset : s;

export const colors = {
  red: paint(ColorCodes.red),
  green: paint(ColorCodes.green),
  yellow: paint(ColorCodes.yellow),
  cyan: paint(ColorCodes.cyan),
  bold: paint(ColorCodes.bold),
};
