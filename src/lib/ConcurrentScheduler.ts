/**
 * Concurrent scheduler implementation
 *
 * A fixed number of async worker loops share one submission cursor. Each
 * loop takes the next item, awaits its task and hands the outcome to the
 * collector. Every mutation of the shared accumulators happens in the
 * collector between awaits, so no two workers ever interleave inside it.
 */

import { AlgorithmId, IDigestProvider } from "../interfaces/IDigestProvider";
import { IDigestEngine } from "../interfaces/IDigestEngine";
import {
  DigestBatchOptions,
  DigestBatchResult,
  FailedPath,
  IConcurrentScheduler,
  SettledTask,
  TaskPoolOptions,
} from "../interfaces/IConcurrentScheduler";
import { ValidationError } from "../types";
import { ErrorHandler } from "./ErrorHandler";

export const MAX_WORKERS = 16;
export const DEFAULT_WORKER_COUNT = 4;

/**
 * Thrown by a task to report that it stopped on cancellation
 */
export class TaskCancelledError extends Error {
  constructor() {
    super("Task cancelled");
    this.name = "TaskCancelledError";
  }
}

export function assertWorkerCount(workerCount: number): void {
  if (
    !Number.isInteger(workerCount) ||
    workerCount < 1 ||
    workerCount > MAX_WORKERS
  ) {
    throw new ValidationError(
      `workerCount must be an integer between 1 and ${MAX_WORKERS}, got ${workerCount}`
    );
  }
}

export class ConcurrentScheduler implements IConcurrentScheduler {
  private provider: IDigestProvider;
  private engine: IDigestEngine;

  constructor(provider: IDigestProvider, engine: IDigestEngine) {
    this.provider = provider;
    this.engine = engine;
  }

  async runTasks<T, R>(
    items: readonly T[],
    task: (item: T) => Promise<R>,
    options: TaskPoolOptions<T, R>
  ): Promise<SettledTask<T, R>[]> {
    assertWorkerCount(options.workerCount);

    const total = items.length;
    const settled: SettledTask<T, R>[] = [];
    let cursor = 0;

    const collect = (outcome: SettledTask<T, R>): void => {
      settled.push(outcome);
      if (options.onSettled) {
        try {
          options.onSettled(outcome, settled.length, total);
        } catch (error) {
          ErrorHandler.logError(error, { phase: "progress callback" });
        }
      }
    };

    const worker = async (): Promise<void> => {
      while (cursor < total) {
        const item = items[cursor++];
        if (options.token?.isCancelled) {
          collect({ item, status: "skipped" });
          continue;
        }
        try {
          const value = await task(item);
          collect({ item, status: "fulfilled", value });
        } catch (reason) {
          if (reason instanceof TaskCancelledError) {
            collect({ item, status: "skipped" });
          } else {
            collect({ item, status: "rejected", reason });
          }
        }
      }
    };

    const poolSize = Math.min(options.workerCount, total);
    await Promise.all(Array.from({ length: poolSize }, () => worker()));

    return settled;
  }

  async run(
    paths: readonly string[],
    algorithm: AlgorithmId | string,
    options: DigestBatchOptions
  ): Promise<DigestBatchResult> {
    const id = this.provider.assertAvailable(algorithm);
    assertWorkerCount(options.workerCount);

    const digests = new Map<string, string>();
    const failures: FailedPath[] = [];
    const skipped: string[] = [];

    await this.runTasks(
      paths,
      async (filePath) => {
        const outcome = await this.engine.digestFile(filePath, id, {
          chunkSize: options.chunkSize,
          token: options.token,
        });
        if (outcome.status === "cancelled") {
          throw new TaskCancelledError();
        }
        return outcome;
      },
      {
        workerCount: options.workerCount,
        token: options.token,
        onSettled: (settled, completed, total) => {
          if (settled.status === "skipped") {
            skipped.push(settled.item);
          } else if (settled.status === "rejected") {
            failures.push({
              path: settled.item,
              reason: `Error: ${ErrorHandler.describe(settled.reason)}`,
            });
          } else if (settled.value.status === "ok") {
            digests.set(settled.item, settled.value.digest);
          } else {
            failures.push({ path: settled.item, reason: settled.value.error });
          }
          options.progress?.(completed, total, settled.item);
        },
      }
    );

    return {
      digests,
      failures,
      skipped,
      cancelled: options.token?.isCancelled ?? false,
    };
  }
}
