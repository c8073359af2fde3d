import { inspect } from 'node:util';

import { isError, isNonEmptyString, isObject } from '../type-guards.js';

export function getErrorMessage(error: unknown): string {
  if (isError(error)) return error.message;
  if (isNonEmptyString(error)) return error;
  if (isErrorWithMessage(error)) return error.message;
  return formatUnknownError(error);
}

function isErrorWithMessage(error: unknown): error is { message: string } {
  if (!isObject(error)) return false;
  const { message } = error;
  return isNonEmptyString(message);
}

function formatUnknownError(error: unknown): string {
  if (error === null || error === undefined) return 'Unknown error';
  try {
    return inspect(error, {
      depth: 2,
      maxStringLength: 200,
      breakLength: Infinity,
      compact: true,
      colors: false,
    });
  } catch {
    return 'Unknown error';
  }
}

export function toError(error: unknown): Error {
  return isError(error) ? error : new Error(getErrorMessage(error));
}
