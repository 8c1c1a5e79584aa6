import { expect } from 'vitest';

/**
 * Run `fn` and return the error it throws, checking its class
 */
export function catchError<E extends Error>(fn: () => unknown, type: new (...args: never[]) => E): E {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(type);
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected function to throw');
}
