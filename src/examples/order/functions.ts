import { ExecutionError } from '../../errors.js';
import type { FunctionRegistry } from '../../capabilities/functions.js';

/**
 * Host functions for the order example. The warehouse turns the first
 * `busyFor` reservations away so the try/retry path gets exercised.
 */
export function orderFunctions(busyFor = 1): FunctionRegistry {
  let calls = 0;
  return {
    reserveStock({ args }) {
      calls++;
      if (calls <= busyFor) throw ExecutionError.taskFailed('warehouse busy', { type: 'OutOfStock', status: 409 });
      return { reserved: args.count ?? 0, attempt: calls };
    }
  };
}
