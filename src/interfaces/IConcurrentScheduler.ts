/**
 * Concurrent scheduler interface
 *
 * Fans independent tasks out over a bounded pool of async workers and
 * collects their outcomes in completion order.
 */

import { AlgorithmId } from "./IDigestProvider";
import { ICancellationToken } from "./ICancellationToken";

/**
 * Progress callback, invoked once per input item in completion order
 */
export type ProgressSink = (
  completed: number,
  total: number,
  currentPath: string
) => void;

/**
 * Outcome of one pooled task
 *
 * `skipped` items were never started, or were stopped mid-way, because the
 * token was set.
 */
export type SettledTask<T, R> =
  | { item: T; status: "fulfilled"; value: R }
  | { item: T; status: "rejected"; reason: unknown }
  | { item: T; status: "skipped" };

export interface TaskPoolOptions<T, R> {
  /** Number of concurrent workers (clamped to the item count) */
  workerCount: number;
  /** Checked before each new task is started */
  token?: ICancellationToken;
  /** Called by the collector after each task settles */
  onSettled?: (settled: SettledTask<T, R>, completed: number, total: number) => void;
}

export interface FailedPath {
  path: string;
  reason: string;
}

export interface DigestBatchOptions {
  /** Number of concurrent file reads (1-16) */
  workerCount: number;
  /** Bytes per read passed to the digest engine */
  chunkSize?: number;
  progress?: ProgressSink;
  token?: ICancellationToken;
}

export interface DigestBatchResult {
  /** Absolute path to lowercase hex digest */
  digests: Map<string, string>;
  /** Paths that could not be digested */
  failures: FailedPath[];
  /** Paths not digested because the run was cancelled */
  skipped: string[];
  /** True if the token was set at any point during the run */
  cancelled: boolean;
}

export interface IConcurrentScheduler {
  /**
   * Run a task for every item on a bounded worker pool
   *
   * Never rejects because of a task: task errors are captured as `rejected`
   * outcomes.
   */
  runTasks<T, R>(
    items: readonly T[],
    task: (item: T) => Promise<R>,
    options: TaskPoolOptions<T, R>
  ): Promise<SettledTask<T, R>[]>;

  /**
   * Digest every path with the given algorithm
   *
   * @throws UnsupportedAlgorithmError before any file is opened
   * @throws ValidationError if workerCount is out of range
   */
  run(
    paths: readonly string[],
    algorithm: AlgorithmId | string,
    options: DigestBatchOptions
  ): Promise<DigestBatchResult>;
}
