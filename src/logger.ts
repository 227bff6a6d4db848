/**
 * Console logging
 */

import type { Logger } from "./types.ts";

const errorReplacer = (_key: string, value: unknown): unknown =>
  value instanceof Error ? { name: value.name, message: value.message } : value;

export const formatLine = (
  prefix: string,
  message: string,
  context?: Record<string, unknown>
): string =>
  context && Object.keys(context).length > 0
    ? `${prefix} ${message} ${JSON.stringify(context, errorReplacer)}`
    : `${prefix} ${message}`;

export const createConsoleLogger = (prefix = "[bucketd]"): Logger => ({
  info: (message, context) => console.log(formatLine(prefix, message, context)),
  warn: (message, context) => console.warn(formatLine(prefix, message, context)),
  error: (message, context) => console.error(formatLine(prefix, message, context)),
});

export const createSilentLogger = (): Logger => ({
  info: () => {},
  warn: () => {},
  error: () => {},
});
