/**
 * Task-batching scheduler
 *
 * Spreads independent async jobs over a fixed number of lanes and drives
 * them with one of five execution strategies:
 * - Sequential lanes (run, runAndCollectResults)
 * - Fan-out lanes (runAllJoined, runAllJoinedAndCollectResults)
 * - Bounded chunks without lanes (runSingleThreaded)
 */

export { Worker, defaultLaneCount } from './worker.js';

export type { Job, WorkerState, WorkerLogger, WorkerOptions, GroupOutcome } from './types.js';
