/**
 * Storage error classification
 *
 * Maps driver failures onto the service taxonomy. Connection-level failures
 * become STORAGE_UNAVAILABLE; anything unrecognised is returned untouched so
 * it surfaces as an internal error.
 */

import { ServiceError } from '@/errors/serviceError';

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'CONNECT_TIMEOUT',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
]);

// SQLSTATE codes that mean the server cannot take work right now
const UNAVAILABLE_SQLSTATES = new Set(['53300', '57P01', '57P02', '57P03']);

const FOREIGN_KEY_VIOLATION = '23503';
const INVALID_TEXT_REPRESENTATION = '22P02';

function readCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object') return undefined;
  const code = (error as { code?: unknown }).code;
  return typeof code === 'string' ? code : undefined;
}

function findCode(error: unknown, depth = 0): string | undefined {
  if (depth > 3 || !error || typeof error !== 'object') return undefined;
  return readCode(error) ?? findCode((error as { cause?: unknown }).cause, depth + 1);
}

export function classifyStorageError(error: unknown, operation: string): unknown {
  if (error instanceof ServiceError) return error;

  const code = findCode(error);
  if (!code) return error;

  if (CONNECTION_ERROR_CODES.has(code) || UNAVAILABLE_SQLSTATES.has(code) || code.startsWith('08')) {
    return new ServiceError('STORAGE_UNAVAILABLE', `Storage unavailable during ${operation}`, {
      cause: error,
    });
  }

  if (code === FOREIGN_KEY_VIOLATION) {
    return new ServiceError('NOT_FOUND', `Referenced record not found during ${operation}`, {
      cause: error,
    });
  }

  if (code === INVALID_TEXT_REPRESENTATION) {
    return new ServiceError('INVALID_INPUT', `Malformed identifier in ${operation}`, {
      cause: error,
    });
  }

  return error;
}

/**
 * Run a storage call and rethrow its failure classified
 */
export async function withStorageErrors<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw classifyStorageError(error, operation);
  }
}
