/**
 * Worker - round-robin task-batching scheduler
 *
 * Jobs pushed into a worker are spread over a fixed number of lanes
 * (job i goes to lane i % laneCount). A single run method then drives
 * every lane to completion and consumes the worker.
 *
 * Execution strategies:
 * - run / runAndCollectResults: lanes run side by side, jobs inside a lane one after another
 * - runAllJoined / runAllJoinedAndCollectResults: lanes run side by side, jobs inside a lane all at once
 * - runSingleThreaded: lanes ignored, jobs run in round-robin chunks, one chunk at a time
 *
 * Collected results are lane-major: lane 0's results, then lane 1's, and so
 * on. With more than one lane this is NOT push order. Callers that need push
 * order must carry an index in their output.
 *
 * Failure policy: a job that rejects stops its own lane. Other lanes keep
 * running to completion, then the run rejects with a LaneFaultError for the
 * lowest faulting lane (every fault is listed in `faults`).
 *
 * @example
 * ```typescript
 * const worker = Worker.withLanes<number>(3);
 * for (let i = 0; i < 7; i++) {
 *   worker.push(async () => i);
 * }
 * await worker.runAndCollectResults(); // [0, 3, 6, 1, 4, 2, 5]
 * ```
 */

import { availableParallelism } from 'node:os';

import { DebugLogger } from '../debug-logger.js';
import {
  ChunkFaultError,
  ConfigurationError,
  LaneFaultError,
  WorkerStateError,
  type JobFault,
} from '../errors.js';
import type { GroupOutcome, Job, WorkerLogger, WorkerOptions, WorkerState } from './types.js';

/**
 * Number of lanes used when none is given
 */
export function defaultLaneCount(): number {
  return availableParallelism();
}

function assertPositiveInteger(key: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(key, `must be a positive integer, got ${value}`, {
      received: value,
    });
  }
}

// async wrapper so a job that throws synchronously still becomes a rejection
async function invoke<T>(job: Job<T>): Promise<T> {
  return job();
}

/**
 * Run jobs one after another, stopping at the first failure
 */
async function runSequential<T>(jobs: Job<T>[], group: number): Promise<GroupOutcome<T>> {
  const results: T[] = [];
  for (let position = 0; position < jobs.length; position++) {
    try {
      results.push(await invoke(jobs[position]));
    } catch (cause) {
      return { ok: false, fault: { group, position, cause } };
    }
  }
  return { ok: true, results };
}

/**
 * Launch all jobs at once and wait for every one of them.
 * Results keep launch order, not completion order.
 */
async function runJoined<T>(jobs: Job<T>[], group: number): Promise<GroupOutcome<T>> {
  const settled = await Promise.allSettled(jobs.map((job) => invoke(job)));
  const results: T[] = [];
  for (let position = 0; position < settled.length; position++) {
    const outcome = settled[position];
    if (outcome.status === 'rejected') {
      return { ok: false, fault: { group, position, cause: outcome.reason } };
    }
    results.push(outcome.value);
  }
  return { ok: true, results };
}

export class Worker<T = void> {
  readonly laneCount: number;
  private lanes: Job<T>[][];
  private pushed = 0;
  private currentState: WorkerState = 'idle';
  private logger: WorkerLogger;

  constructor(options: WorkerOptions = {}) {
    const laneCount = options.lanes ?? defaultLaneCount();
    assertPositiveInteger('lanes', laneCount);

    this.laneCount = laneCount;
    this.lanes = Array.from({ length: laneCount }, () => []);
    this.logger = options.logger ?? new DebugLogger('Worker');
  }

  /**
   * Create a worker with an explicit lane count
   */
  static withLanes<T = void>(lanes: number, options: Omit<WorkerOptions, 'lanes'> = {}): Worker<T> {
    return new Worker<T>({ ...options, lanes });
  }

  get state(): WorkerState {
    return this.currentState;
  }

  /**
   * Total number of jobs pushed so far
   */
  get size(): number {
    return this.pushed;
  }

  /**
   * Append a job to lane `size % laneCount`
   */
  push(job: Job<T>): this {
    if (this.currentState !== 'idle') {
      throw new WorkerStateError('push', this.currentState);
    }
    this.lanes[this.pushed % this.laneCount].push(job);
    this.pushed += 1;
    return this;
  }

  getLaneSizes(): number[] {
    return this.lanes.map((jobs) => jobs.length);
  }

  /**
   * Snapshot of lane membership
   */
  getLanes(): ReadonlyArray<ReadonlyArray<Job<T>>> {
    return this.lanes.map((jobs) => [...jobs]);
  }

  /**
   * One chain per lane, jobs awaited in push order; outputs discarded
   */
  async run(): Promise<void> {
    await this.driveLanes('run', runSequential);
  }

  /**
   * Like run(), collecting outputs lane-major
   */
  async runAndCollectResults(): Promise<T[]> {
    return this.driveLanes('runAndCollectResults', runSequential);
  }

  /**
   * One chain per lane, every job of a lane launched at once; outputs discarded
   */
  async runAllJoined(): Promise<void> {
    await this.driveLanes('runAllJoined', runJoined);
  }

  /**
   * Like runAllJoined(), collecting outputs lane-major (launch order inside a lane)
   */
  async runAllJoinedAndCollectResults(): Promise<T[]> {
    return this.driveLanes('runAllJoinedAndCollectResults', runJoined);
  }

  /**
   * Ignore lanes and bound the number of jobs in flight.
   *
   * Jobs are taken back in push order. If there are no more than `batchSize`
   * of them they all run at once. Otherwise they are dealt round-robin into
   * ceil(total / batchSize) chunks (job i → chunk i % chunks) and the chunks
   * run one after another, each chunk's jobs at once. A failing job stops
   * the chunk sequence once its chunk has settled.
   *
   * @param batchSize - Chunk size (default: laneCount)
   */
  async runSingleThreaded(batchSize?: number): Promise<void> {
    this.begin('runSingleThreaded', () => assertPositiveInteger('batchSize', batchSize ?? this.laneCount));
    const size = batchSize ?? this.laneCount;

    try {
      const chunks = this.chunk(this.flatten(), size);
      this.logger.debug(
        `runSingleThreaded: jobs=${this.pushed} batchSize=${size} chunks=${chunks.length}`
      );

      for (let index = 0; index < chunks.length; index++) {
        const startTime = Date.now();
        const outcome = await runJoined(chunks[index], index);
        if (!outcome.ok) {
          this.logger.error(
            `Chunk fault: chunk=${index} position=${outcome.fault.position} skipped=${chunks.length - index - 1}`
          );
          throw new ChunkFaultError([outcome.fault]);
        }
        this.logger.debug(
          `Chunk done: chunk=${index} jobs=${chunks[index].length} duration=${Date.now() - startTime}ms`
        );
      }
    } finally {
      this.currentState = 'done';
    }
  }

  /**
   * Move idle → running, or fail fast
   */
  private begin(operation: string, validate?: () => void): void {
    if (this.currentState !== 'idle') {
      throw new WorkerStateError(operation, this.currentState);
    }
    validate?.();
    this.currentState = 'running';
  }

  private async driveLanes(
    operation: string,
    drive: (jobs: Job<T>[], lane: number) => Promise<GroupOutcome<T>>
  ): Promise<T[]> {
    this.begin(operation);
    this.logger.debug(`${operation}: lanes=${this.laneCount} jobs=${this.pushed}`);

    try {
      const outcomes = await Promise.all(
        this.lanes.map(async (jobs, lane) => {
          const startTime = Date.now();
          const outcome = await drive(jobs, lane);
          this.logger.debug(
            `Lane ${outcome.ok ? 'done' : 'failed'}: lane=${lane} jobs=${jobs.length} duration=${Date.now() - startTime}ms`
          );
          return outcome;
        })
      );

      const faults: JobFault[] = [];
      const results: T[] = [];
      for (const outcome of outcomes) {
        if (outcome.ok) {
          results.push(...outcome.results);
        } else {
          faults.push(outcome.fault);
        }
      }

      if (faults.length > 0) {
        this.logger.error(`${operation}: ${faults.length} of ${this.laneCount} lane(s) failed`);
        throw new LaneFaultError(faults);
      }
      return results;
    } finally {
      this.currentState = 'done';
    }
  }

  /**
   * Lanes back to global push order: job i sits in lane i % L at position floor(i / L)
   */
  private flatten(): Job<T>[] {
    const flat: Job<T>[] = [];
    for (let index = 0; index < this.pushed; index++) {
      flat.push(this.lanes[index % this.laneCount][Math.floor(index / this.laneCount)]);
    }
    return flat;
  }

  private chunk(jobs: Job<T>[], batchSize: number): Job<T>[][] {
    if (jobs.length <= batchSize) {
      return [jobs];
    }
    const chunkCount = Math.ceil(jobs.length / batchSize);
    const chunks: Job<T>[][] = Array.from({ length: chunkCount }, () => []);
    jobs.forEach((job, index) => {
      chunks[index % chunkCount].push(job);
    });
    return chunks;
  }
}
