/**
 * @fileoverview Handler module loading and validation
 * @module runtime/handler-loader
 *
 * Imports the user module once at startup and checks that it exposes a
 * callable `handler`. The module's top-level code runs as part of the import;
 * nothing is sandboxed. Every failure here is a StartupError.
 */

import { stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { ErrorCodes, StartupError, serializeError } from './errors.js';
import type { Logger } from './logger.js';
import type { HandlerFunction, LoadedHandler } from './types.js';

/** Arity of `handler(payload, context)` */
const EXPECTED_ARITY = 2;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isHandlerFunction(value: unknown): value is HandlerFunction {
  return typeof value === 'function';
}

/**
 * Finds the `handler` export on an imported module namespace.
 *
 * ES modules expose it as a named export. CommonJS modules expose it either
 * as a detected named export or on `default` (the `module.exports` object).
 */
export function resolveHandlerExport(moduleNamespace: unknown): HandlerFunction | undefined {
  if (!isRecord(moduleNamespace)) {
    return undefined;
  }
  if (isHandlerFunction(moduleNamespace['handler'])) {
    return moduleNamespace['handler'];
  }
  const fallback = moduleNamespace['default'];
  if (isRecord(fallback) && isHandlerFunction(fallback['handler'])) {
    return fallback['handler'];
  }
  return undefined;
}

/**
 * Loads and validates the handler module at `path`
 *
 * @param path - Module location, resolved against the working directory
 * @param logger - Receives load diagnostics
 * @throws StartupError when the file is missing, fails to import, or has no `handler`
 */
export async function loadHandler(path: string, logger: Logger): Promise<LoadedHandler> {
  const absolutePath = resolve(path);

  let stats: Stats;
  try {
    stats = await stat(absolutePath);
  } catch (error) {
    throw new StartupError(
      ErrorCodes.HANDLER_NOT_FOUND,
      `Handler module not found at ${absolutePath}`,
      [],
      { cause: error }
    );
  }
  if (!stats.isFile()) {
    throw new StartupError(
      ErrorCodes.HANDLER_NOT_FOUND,
      `Handler path is not a regular file: ${absolutePath}`
    );
  }

  let moduleNamespace: unknown;
  try {
    moduleNamespace = await import(pathToFileURL(absolutePath).href);
  } catch (error) {
    throw new StartupError(
      ErrorCodes.HANDLER_LOAD_FAILED,
      `Failed to load handler module ${absolutePath}`,
      [serializeError(error).message],
      { cause: error }
    );
  }

  const handler = resolveHandlerExport(moduleNamespace);
  if (!handler) {
    throw new StartupError(
      ErrorCodes.HANDLER_MISSING,
      `Handler module ${absolutePath} must export a callable 'handler' function`
    );
  }

  if (handler.length !== EXPECTED_ARITY) {
    logger.warn(
      { path: absolutePath, arity: handler.length, expected: EXPECTED_ARITY },
      'handler does not declare (payload, context) parameters'
    );
  }

  logger.debug({ path: absolutePath, modifiedAt: stats.mtime.toISOString() }, 'handler module loaded');

  return {
    path: absolutePath,
    modifiedAt: stats.mtime,
    handler,
  };
}
