// src/core/scheduler.ts
/**
 * Cron Scheduler
 * Runs reminder tasks on cron expressions with croner. Task definitions are
 * mirrored to a JSON file so they survive restarts; the firing handler is
 * supplied again at start-up through `restore`.
 */
import * as fs from 'fs';
import * as path from 'path';
import { Cron } from 'croner';
import { z } from 'zod';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { describeError } from './errors.js';
import type { ScheduledTask, TaskHandler, TaskScheduler, TaskStats } from '../types/index.js';

const taskFileSchema = z.array(z.object({
  id: z.string(),
  name: z.string(),
  cron: z.string(),
  message: z.string(),
  userId: z.string(),
  enabled: z.boolean(),
  oneShot: z.boolean(),
  createdAt: z.string(),
}));

interface ScheduledEntry {
  task: ScheduledTask;
  job: Cron;
  handler: TaskHandler;
  runCount: number;
}

export class CronScheduler implements TaskScheduler {
  private readonly entries = new Map<string, ScheduledEntry>();
  private readonly tasksFile: string | null;

  /**
   * @param tasksFile - JSON file for task definitions; null disables persistence
   */
  constructor(tasksFile: string | null = config.paths.tasksFile) {
    this.tasksFile = tasksFile;
  }

  /**
   * Starts a task.
   * @returns False if a task with the same id is already scheduled
   * @throws Error when the cron expression is invalid
   */
  schedule(task: ScheduledTask, handler: TaskHandler): boolean {
    if (this.entries.has(task.id)) return false;

    let job: Cron;
    try {
      job = new Cron(task.cron, {
        name: task.id,
        paused: !task.enabled,
        maxRuns: task.oneShot ? 1 : undefined,
      }, () => this.fire(task.id));
    } catch (e) {
      throw new Error(`Invalid cron expression "${task.cron}": ${describeError(e)}`);
    }

    this.entries.set(task.id, { task: { ...task }, job, handler, runCount: 0 });
    this.persist();
    logger.info('Task scheduled', { id: task.id, name: task.name, cron: task.cron, oneShot: task.oneShot });
    return true;
  }

  unschedule(taskId: string): boolean {
    const entry = this.entries.get(taskId);
    if (!entry) return false;

    entry.job.stop();
    this.entries.delete(taskId);
    this.persist();
    logger.info('Task unscheduled', { id: taskId });
    return true;
  }

  enable(taskId: string): boolean {
    const entry = this.entries.get(taskId);
    if (!entry) return false;

    entry.job.resume();
    entry.task.enabled = true;
    this.persist();
    return true;
  }

  disable(taskId: string): boolean {
    const entry = this.entries.get(taskId);
    if (!entry) return false;

    entry.job.pause();
    entry.task.enabled = false;
    this.persist();
    return true;
  }

  stats(): TaskStats[] {
    return [...this.entries.values()].map(entry => ({
      id: entry.task.id,
      name: entry.task.name,
      cron: entry.task.cron,
      enabled: entry.task.enabled,
      nextRun: entry.task.enabled ? entry.job.nextRun() : null,
      runCount: entry.runCount,
    }));
  }

  /**
   * Reschedules the tasks found in the task file.
   * @param handlerFor - Builds the firing handler for a stored task
   * @returns Number of tasks restored
   */
  restore(handlerFor: (task: ScheduledTask) => TaskHandler): number {
    if (!this.tasksFile || !fs.existsSync(this.tasksFile)) return 0;

    let stored: ScheduledTask[];
    try {
      const parsed = taskFileSchema.safeParse(JSON.parse(fs.readFileSync(this.tasksFile, 'utf-8')));
      if (!parsed.success) {
        logger.warn('Task file has an unexpected shape; nothing restored', { file: this.tasksFile });
        return 0;
      }
      stored = parsed.data;
    } catch (e) {
      logger.warn('Failed to read task file', { file: this.tasksFile, error: describeError(e) });
      return 0;
    }

    let restored = 0;
    for (const task of stored) {
      try {
        if (this.schedule(task, handlerFor(task))) restored++;
      } catch (e) {
        logger.warn('Dropping stored task', { id: task.id, error: describeError(e) });
      }
    }
    this.persist();
    return restored;
  }

  /** Stops every job without touching the task file. */
  stopAll(): void {
    for (const entry of this.entries.values()) {
      entry.job.stop();
    }
    this.entries.clear();
  }

  private async fire(taskId: string): Promise<void> {
    const entry = this.entries.get(taskId);
    if (!entry) return;

    entry.runCount++;
    logger.info('Scheduled task fired', { id: taskId, name: entry.task.name, runCount: entry.runCount });

    try {
      await entry.handler({ ...entry.task });
    } catch (e) {
      logger.error(`Scheduled task ${taskId} failed`, e);
    }

    if (entry.task.oneShot) {
      this.unschedule(taskId);
    }
  }

  private persist(): void {
    if (!this.tasksFile) return;
    try {
      fs.mkdirSync(path.dirname(this.tasksFile), { recursive: true });
      const tasks = [...this.entries.values()].map(entry => entry.task);
      fs.writeFileSync(this.tasksFile, JSON.stringify(tasks, null, 2));
    } catch (e) {
      logger.error('Failed to save scheduled tasks', e);
    }
  }
}
