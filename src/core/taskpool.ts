// src/core/taskpool.ts
//
// Sable Task Pool
// ---------------
// Fixed number of worker loops pulling tasks from one FIFO queue.
//
//   const pool = new TaskPool({ workers: 4 });
//   const f = pool.submit(async (a, b) => a + b, [1, 2]);
//   await f.result();        // 3
//   await pool.shutdown();
//
// Workers are async loops on the host event loop: a task makes progress while
// the submitter is awaiting something. `submit` never blocks; each future
// settles exactly once; a failure is stored and re-raised on join.

import type { Logger } from "../utils/logger";
import { silentLogger } from "../utils/logger";

/* =========================================================
   Errors
   ========================================================= */

export class FutureTimeoutError extends Error {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Future did not complete within ${timeoutMs}ms`);
    this.name = "FutureTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class PoolClosedError extends Error {
  constructor() {
    super("Task pool is shut down");
    this.name = "PoolClosedError";
  }
}

/* =========================================================
   Future
   ========================================================= */

export type FutureState<T> =
  | { status: "pending" }
  | { status: "fulfilled"; value: T }
  | { status: "rejected"; error: unknown };

export class Future<T> {
  public readonly id: number;

  private state: FutureState<T> = { status: "pending" };
  private readonly settled: Promise<void>;
  private markSettled: () => void = () => undefined;
  private joined = false;

  constructor(id: number) {
    this.id = id;
    this.settled = new Promise<void>((resolve) => {
      this.markSettled = resolve;
    });
  }

  public done(): boolean {
    return this.state.status !== "pending";
  }

  public snapshot(): FutureState<T> {
    return this.state;
  }

  /** Whether someone has asked for the result (failures get reported otherwise). */
  public wasJoined(): boolean {
    return this.joined;
  }

  /**
   * Wait for completion. Resolves true once settled, false when `timeoutMs`
   * elapses first.
   */
  public async wait(timeoutMs?: number): Promise<boolean> {
    if (this.done()) return true;
    if (timeoutMs === undefined) {
      await this.settled;
      return true;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
    });

    try {
      return await Promise.race([this.settled.then(() => true), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Value of the task, its failure, or FutureTimeoutError. The task keeps running on timeout. */
  public async result(timeoutMs?: number): Promise<T> {
    this.joined = true;
    const finished = await this.wait(timeoutMs);
    if (!finished) throw new FutureTimeoutError(timeoutMs ?? 0);
    return this.unwrap();
  }

  public resolve(value: T): boolean {
    if (this.done()) return false;
    this.state = { status: "fulfilled", value };
    this.markSettled();
    return true;
  }

  public reject(error: unknown): boolean {
    if (this.done()) return false;
    this.state = { status: "rejected", error };
    this.markSettled();
    return true;
  }

  private unwrap(): T {
    const s = this.state;
    switch (s.status) {
      case "fulfilled":
        return s.value;
      case "rejected":
        throw s.error;
      case "pending":
        throw new Error(`Future #${this.id} is still pending`);
    }
  }
}

/* =========================================================
   Pool
   ========================================================= */

export type TaskPoolOptions = {
  /** Number of worker loops. Default: 4 */
  workers?: number;
  logger?: Logger;
};

type Job = {
  id: number;
  execute: () => Promise<void>;
};

const STOP = Symbol("stop");
type QueueItem = Job | typeof STOP;

export class TaskPool {
  public readonly size: number;

  private readonly log: Logger;
  private readonly queue: QueueItem[] = [];
  private readonly waiters: Array<(item: QueueItem) => void> = [];
  private readonly workers: Promise<void>[];
  private readonly failed: Future<unknown>[] = [];

  private nextId = 1;
  private activeCount = 0;
  private closed = false;
  private reported = false;

  constructor(options: TaskPoolOptions = {}) {
    this.size = Math.max(1, Math.floor(options.workers ?? 4));
    this.log = options.logger ?? silentLogger();
    this.workers = Array.from({ length: this.size }, (_, i) => this.workerLoop(i));
  }

  /** Tasks waiting in the queue. */
  public get pending(): number {
    return this.queue.filter((item) => item !== STOP).length;
  }

  /** Tasks currently running. */
  public get active(): number {
    return this.activeCount;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public submit<A extends unknown[], T>(fn: (...args: A) => T | Promise<T>, args: A): Future<T> {
    if (this.closed) throw new PoolClosedError();

    const id = this.nextId++;
    const future = new Future<T>(id);

    const execute = async (): Promise<void> => {
      try {
        future.resolve(await fn(...args));
      } catch (err) {
        future.reject(err);
        this.failed.push(future);
        this.log.debug(`task #${id} failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    };

    this.put({ id, execute });
    this.log.trace(`task #${id} queued`);
    return future;
  }

  /**
   * Stop accepting tasks, let queued ones finish and wait for every worker to
   * exit. Safe to call more than once.
   */
  public async shutdown(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      for (let i = 0; i < this.size; i++) this.put(STOP);
      this.log.debug(`shutting down ${this.size} workers`);
    }

    await Promise.all(this.workers);
    this.reportUnjoinedFailures();
  }

  /* =========================================================
     Internals
     ========================================================= */

  private async workerLoop(index: number): Promise<void> {
    while (true) {
      const item = await this.take();
      if (item === STOP) break;

      this.activeCount++;
      this.log.trace(`worker ${index} runs task #${item.id}`);
      try {
        await item.execute();
      } finally {
        this.activeCount--;
      }
    }
    this.log.trace(`worker ${index} stopped`);
  }

  private put(item: QueueItem): void {
    const waiter = this.waiters.shift();
    if (waiter) waiter(item);
    else this.queue.push(item);
  }

  private take(): Promise<QueueItem> {
    const item = this.queue.shift();
    if (item !== undefined) return Promise.resolve(item);
    return new Promise<QueueItem>((resolve) => this.waiters.push(resolve));
  }

  private reportUnjoinedFailures(): void {
    if (this.reported) return;
    this.reported = true;

    for (const future of this.failed) {
      if (future.wasJoined()) continue;
      const s = future.snapshot();
      const reason = s.status === "rejected" && s.error instanceof Error ? s.error.message : "unknown error";
      this.log.warn(`task #${future.id} failed and was never joined: ${reason}`);
    }
  }
}
