/**
 * API Assert - Logger
 *
 * Console logger behind the assertion handler and ConsoleReporter.
 * Lines look like "WARN  message arg1 arg2"; levels below the configured one
 * are dropped.
 */

import { inspect } from 'node:util';

import type { Logger } from '../types';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: LogLevel;
  useColors?: boolean;
}

const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export type Color = Exclude<keyof typeof ANSI, 'reset'>;

export function colorize(text: string, color: Color, enabled: boolean): string {
  return enabled ? `${ANSI[color]}${text}${ANSI.reset}` : text;
}

type Method = keyof Logger;

const METHODS: Record<Method, { color: Color; write: (line: string) => void }> = {
  debug: { color: 'gray', write: (line) => console.log(line) },
  info: { color: 'cyan', write: (line) => console.log(line) },
  warn: { color: 'yellow', write: (line) => console.warn(line) },
  error: { color: 'red', write: (line) => console.error(line) },
};

function render(message: string, args: unknown[]): string {
  const parts = args.map((arg) =>
    typeof arg === 'string' ? arg : inspect(arg, { depth: 4, breakLength: Infinity })
  );
  return [message, ...parts].join(' ');
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const colors = options.useColors ?? process.stdout.isTTY === true;

  const method = (name: Method) => {
    const { color, write } = METHODS[name];
    const enabled = LOG_LEVELS.indexOf(name) >= threshold;
    const tag = colorize(name.toUpperCase().padEnd(5), color, colors);

    return (message: string, ...args: unknown[]): void => {
      if (enabled) write(`${tag} ${render(message, args)}`);
    };
  };

  return {
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
  };
}
