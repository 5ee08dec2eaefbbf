import type { Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PoolJob<T> {
  /** Key used in logs; the target URL for transfers */
  key: string;
  run: () => Promise<T>;
}

export interface WorkerPoolOptions<T> {
  /** Number of worker slots */
  concurrency: number;
  logger: Logger;
  /** Called with each job's result, in completion order */
  onResult?: (key: string, result: T) => void;
}

export interface PoolStats {
  /** Jobs not yet picked up by a worker */
  waiting: number;
  /** Jobs a worker is running now */
  running: number;
  /** Jobs that resolved */
  finished: number;
  /** Jobs that threw */
  crashed: number;
}

export interface WorkerPool<T> {
  submit(job: PoolJob<T>): void;
  stats(): PoolStats;
  /**
   * Resolve once no job is running and none is waiting. After `stop`,
   * waiting jobs are abandoned and only running ones are awaited.
   */
  drain(): Promise<void>;
  /** Start no further jobs; running ones finish. Cannot be undone */
  stop(): void;
  isStopped(): boolean;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a fixed-size worker pool. Each slot runs one job to completion
 * before taking the next, in submission order. A job that throws is
 * counted and logged and never affects the others.
 */
export function createWorkerPool<T>(options: WorkerPoolOptions<T>): WorkerPool<T> {
  const { concurrency, logger, onResult } = options;

  const waiting: PoolJob<T>[] = [];
  let running = 0;
  let finished = 0;
  let crashed = 0;
  let stopped = false;
  let idleWaiters: Array<() => void> = [];

  function isIdle(): boolean {
    return running === 0 && (waiting.length === 0 || stopped);
  }

  function settleIdleWaiters(): void {
    if (idleWaiters.length === 0 || !isIdle()) return;
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  function fillSlots(): void {
    while (!stopped && running < concurrency) {
      const job = waiting.shift();
      if (!job) break;
      void work(job);
    }
    settleIdleWaiters();
  }

  async function work(job: PoolJob<T>): Promise<void> {
    running++;
    const started = Date.now();
    logger.debug("Worker picked up job", { key: job.key, running });

    try {
      const result = await job.run();
      finished++;
      logger.debug("Job finished", { key: job.key, elapsedMs: Date.now() - started });
      onResult?.(job.key, result);
    } catch (error) {
      crashed++;
      logger.error("Job crashed", {
        key: job.key,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      running--;
      fillSlots();
    }
  }

  return {
    submit(job) {
      waiting.push(job);
      fillSlots();
    },

    stats() {
      return { waiting: waiting.length, running, finished, crashed };
    },

    drain() {
      if (isIdle()) return Promise.resolve();
      return new Promise((resolve) => {
        idleWaiters.push(resolve);
      });
    },

    stop() {
      if (stopped) return;
      stopped = true;
      logger.info("Worker pool stopping", { waiting: waiting.length, running });
      settleIdleWaiters();
    },

    isStopped() {
      return stopped;
    },
  };
}
