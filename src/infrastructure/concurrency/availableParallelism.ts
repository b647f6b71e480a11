import { availableParallelism as reportedParallelism } from 'node:os';

/** Number of hardware execution contexts, or `1` when it cannot be determined. */
export function availableParallelism(): number {
  const reported = reportedParallelism();
  return Number.isInteger(reported) && reported > 0 ? reported : 1;
}
