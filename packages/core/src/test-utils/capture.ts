import { isRandomJsonError, type RandomJsonError } from '../types/errors.js';

/** Run `fn` and return the RandomJsonError it throws; anything else fails the test. */
export function captureError(fn: () => unknown): RandomJsonError {
  try {
    fn();
  } catch (error) {
    if (isRandomJsonError(error)) return error;
    throw error;
  }
  throw new Error('Expected a RandomJsonError, but nothing was thrown');
}
