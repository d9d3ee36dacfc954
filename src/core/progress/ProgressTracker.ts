/**
 * Multi-task progress tracker.
 *
 * Tasks only move forward: lower or non-finite `completed` values and
 * negative advances are ignored, and a move past a known `total` stops at
 * it. Shrinking `total` below `completed` leaves `completed` alone. Only
 * reset() moves a task back to zero. Updates are caller-driven; nothing
 * advances on its own.
 */

import type { ProgressTaskSnapshot, ProgressView } from '../models/index.js';

export class UnknownTaskError extends Error {
  constructor(readonly taskId: number) {
    super(`Unknown progress task: ${taskId}`);
    this.name = 'UnknownTaskError';
  }
}

export interface AddTaskOptions {
  total?: number;
  completed?: number;
}

export interface UpdateTaskOptions {
  completed?: number;
  total?: number;
  description?: string;
}

interface TaskState {
  id: number;
  description: string;
  completed: number;
  total?: number;
  startedAt: number;
}

function normalizeTotal(total: number | undefined): number | undefined {
  if (total === undefined || !Number.isFinite(total)) return undefined;
  return Math.max(0, total);
}

export class ProgressTracker {
  private readonly tasks = new Map<number, TaskState>();
  private nextId = 0;
  private started = false;

  /**
   * @param view Drawing surface; null for a silent tracker that only counts
   * @param clock Milliseconds clock used for elapsed/remaining estimates
   */
  constructor(
    private readonly view: ProgressView | null,
    private readonly clock: () => number = Date.now,
  ) {}

  get isStarted(): boolean {
    return this.started;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.redraw();
  }

  stop(): void {
    if (!this.started) return;
    this.started = false;
    this.view?.stop(this.snapshot(), this.clock());
  }

  /** Start, run `fn`, and stop on every exit path */
  async run<T>(fn: (tracker: ProgressTracker) => T | Promise<T>): Promise<T> {
    this.start();
    try {
      return await fn(this);
    } finally {
      this.stop();
    }
  }

  addTask(description: string, options: AddTaskOptions = {}): number {
    const id = this.nextId++;
    const total = normalizeTotal(options.total);
    const task: TaskState = { id, description, total, completed: 0, startedAt: this.clock() };
    if (options.completed !== undefined) {
      this.moveForward(task, options.completed);
    }
    this.tasks.set(id, task);
    this.redraw();
    return id;
  }

  /** Move a task forward by `amount`; non-positive amounts are ignored */
  advance(id: number, amount = 1): void {
    const task = this.getTask(id);
    if (amount > 0) {
      this.moveForward(task, task.completed + amount);
    }
    this.redraw();
  }

  update(id: number, options: UpdateTaskOptions): void {
    const task = this.getTask(id);
    if (options.description !== undefined) {
      task.description = options.description;
    }
    if (options.total !== undefined) {
      task.total = normalizeTotal(options.total);
    }
    if (options.completed !== undefined) {
      this.moveForward(task, options.completed);
    }
    this.redraw();
  }

  /** The only way to move a task backwards */
  reset(id: number, options: { total?: number } = {}): void {
    const task = this.getTask(id);
    if (options.total !== undefined) {
      task.total = normalizeTotal(options.total);
    }
    task.completed = 0;
    task.startedAt = this.clock();
    this.redraw();
  }

  remove(id: number): void {
    this.getTask(id);
    this.tasks.delete(id);
    this.redraw();
  }

  snapshot(): ProgressTaskSnapshot[] {
    return [...this.tasks.values()].map((task) => ({
      id: task.id,
      description: task.description,
      completed: task.completed,
      total: task.total,
      startedAt: task.startedAt,
      finished: task.total !== undefined && task.completed >= task.total,
    }));
  }

  get finished(): boolean {
    return this.snapshot().every((task) => task.finished);
  }

  private getTask(id: number): TaskState {
    const task = this.tasks.get(id);
    if (!task) {
      throw new UnknownTaskError(id);
    }
    return task;
  }

  /** Raise `completed` toward `target`, stopping at `total`; never lowers it */
  private moveForward(task: TaskState, target: number): void {
    if (!Number.isFinite(target)) return;
    const capped = task.total === undefined ? target : Math.min(target, task.total);
    task.completed = Math.max(task.completed, capped);
  }

  private redraw(): void {
    if (this.started) {
      this.view?.render(this.snapshot(), this.clock());
    }
  }
}
