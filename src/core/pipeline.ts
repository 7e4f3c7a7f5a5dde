/**
 * Pipeline
 *
 * An ordered list of tasks applied left-to-right over a whole document set.
 *
 * Validation happens on construction and on every `addTasks`:
 * - Task ids must be unique (DuplicateTaskIdError)
 * - With `validateChain`, each task's output type must match the next
 *   task's input type (TaskChainTypeMismatchError)
 * A failed validation leaves the task list as it was.
 *
 * Unless a run is in-place, every document is cloned once up front and the
 * caller's documents are never touched. Per-task stats are collected into
 * fresh objects each run and kept for inspection afterwards.
 */

import type { Doc } from '@/data/doc';
import {
  ConfigurationError,
  DuplicateTaskIdError,
  TaskChainTypeMismatchError
} from '@/core/errors';
import {
  logPipelineEnd,
  logPipelineStart,
  logTaskResult,
  logTaskStart
} from '@/utils/logger';
import { createRunStats, type Task, type TaskRunStats } from './tasks/task';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface PipelineOptions {
  /** Check input/output type compatibility between neighbouring tasks (default true) */
  validateChain?: boolean;
  /** Log per-task progress (default false) */
  verbose?: boolean;
  /** Default for `RunOptions.inPlace` (default false) */
  inPlace?: boolean;
}

export interface RunOptions {
  /** Mutate the caller's documents instead of cloning them */
  inPlace?: boolean;
}

export type PipelineState = 'validated' | 'running';

// ═══════════════════════════════════════════════════════════════════════════════
// Validation
// ═══════════════════════════════════════════════════════════════════════════════

function findDuplicateIds(tasks: readonly Task[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const task of tasks) {
    if (seen.has(task.id)) duplicates.add(task.id);
    seen.add(task.id);
  }
  return [...duplicates];
}

function validateTasks(tasks: readonly Task[], validateChain: boolean): void {
  const duplicates = findDuplicateIds(tasks);
  if (duplicates.length > 0) {
    throw new DuplicateTaskIdError(duplicates);
  }

  if (!validateChain) return;
  for (let i = 1; i < tasks.length; i++) {
    const producer = tasks[i - 1];
    const consumer = tasks[i];
    if (producer && consumer && producer.outputType !== consumer.inputType) {
      throw new TaskChainTypeMismatchError(
        producer.id,
        consumer.id,
        producer.outputType,
        consumer.inputType
      );
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Pipeline
// ═══════════════════════════════════════════════════════════════════════════════

export class Pipeline {
  private taskList: Task[];
  private currentState: PipelineState = 'validated';
  private runStats = new Map<string, TaskRunStats>();
  private readonly validateChain: boolean;
  private readonly verbose: boolean;
  private readonly inPlace: boolean;

  /**
   * @param options - Accepts the `pipeline` section of the config as is
   */
  constructor(tasks: readonly Task[] = [], options: PipelineOptions = {}) {
    this.validateChain = options.validateChain ?? true;
    this.verbose = options.verbose ?? false;
    this.inPlace = options.inPlace ?? false;
    validateTasks(tasks, this.validateChain);
    this.taskList = [...tasks];
  }

  get tasks(): readonly Task[] {
    return this.taskList;
  }

  get state(): PipelineState {
    return this.currentState;
  }

  /** Stats of the most recent run, keyed by task id */
  get lastRunStats(): ReadonlyMap<string, TaskRunStats> {
    return this.runStats;
  }

  getTask(id: string): Task {
    const task = this.taskList.find((t) => t.id === id);
    if (!task) {
      throw new ConfigurationError(
        `No task with id "${id}" in pipeline (tasks: ${this.taskList.map((t) => t.id).join(', ') || 'none'})`
      );
    }
    return task;
  }

  /**
   * Append tasks. All-or-nothing: on a validation error the pipeline is unchanged.
   */
  addTasks(tasks: readonly Task[]): this {
    if (this.currentState === 'running') {
      throw new ConfigurationError('Cannot add tasks while the pipeline is running');
    }
    const next = [...this.taskList, ...tasks];
    validateTasks(next, this.validateChain);
    this.taskList = next;
    return this;
  }

  async run(docs: readonly Doc[], options: RunOptions = {}): Promise<Doc[]> {
    if (this.currentState === 'running') {
      throw new ConfigurationError('Pipeline is already running');
    }

    this.currentState = 'running';
    const runStats = new Map<string, TaskRunStats>();
    const started = performance.now();

    try {
      const inPlace = options.inPlace ?? this.inPlace;
      let current = inPlace ? [...docs] : docs.map((doc) => doc.clone());

      if (this.verbose) logPipelineStart(this.taskList.map((t) => t.id), current.length);

      for (const [index, task] of this.taskList.entries()) {
        const stats = createRunStats();
        runStats.set(task.id, stats);

        const taskStarted = performance.now();
        if (this.verbose) logTaskStart(task.id, index + 1, this.taskList.length);

        current = await task.run(current, stats);

        if (this.verbose) logTaskResult(task.id, stats, performance.now() - taskStarted);
      }

      if (this.verbose) logPipelineEnd(current.length, performance.now() - started);
      return current;
    } finally {
      this.runStats = runStats;
      this.currentState = 'validated';
    }
  }
}
