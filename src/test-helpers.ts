import { BonError } from './types';

export function captureError(fn: () => unknown): BonError {
  try {
    fn();
  } catch (error) {
    if (error instanceof BonError) return error;
    throw error;
  }
  throw new Error('Expected a BonError');
}

export function summary(error: BonError) {
  const { kind, message, line, column, offset } = error;
  return { kind, message, line, column, offset };
}
