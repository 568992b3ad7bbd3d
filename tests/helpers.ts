import type { Result } from '../src/types';

export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${JSON.stringify(result.error)}`);
  }
  return result.value;
}

export function unwrapError<T, E>(result: Result<T, E>): E {
  if (result.ok) {
    throw new Error('Expected a failure, got success');
  }
  return result.error;
}
