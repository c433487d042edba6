/**
 * Cron-based report scheduler.
 * Creates one cron job per `schedules` entry of .gitbrief.yml. Runs for the
 * same project never overlap: each goes through the project lock.
 */

import { CronJob } from 'cron';
import {
  ConfigError,
  describeError,
  getLogger,
  type GitBriefConfig,
  type Logger,
  type ScheduleEntry,
} from '@gitbrief/core';
import type { RunOptions } from './context.js';
import { runProject, type RunResult } from './orchestrator.js';

// ─── Types ────────────────────────────────────────────────────────

/** Callback invoked when a scheduled run finishes, whatever its status */
export type ResultCallback = (result: RunResult, schedule: ScheduleEntry) => void | Promise<void>;

/** Callback invoked when a scheduled run throws */
export type ErrorCallback = (error: Error, schedule: ScheduleEntry) => void | Promise<void>;

export interface SchedulerOptions {
  config: GitBriefConfig;
  /** Options for one run of the scheduled project */
  runOptions: (schedule: ScheduleEntry) => RunOptions;
  /** Runs a report; defaults to runProject */
  run?: (opts: RunOptions) => Promise<RunResult>;
  onResult?: ResultCallback;
  onError?: ErrorCallback;
  logger?: Logger;
}

export interface JobStatus {
  project: string;
  cron: string;
  timezone: string;
  running: boolean;
  nextRun?: string;
  lastRun?: Date;
  lastStatus?: RunResult['status'];
  lastError?: string;
}

/** Information about a managed cron job */
interface ManagedJob {
  schedule: ScheduleEntry;
  cronJob: CronJob;
  lastRun?: Date;
  lastStatus?: RunResult['status'];
  lastError?: Error;
}

function jobKey(project: string, cron: string): string {
  return `${project}:${cron}`;
}

// ─── Scheduler Class ──────────────────────────────────────────────

export class ReportScheduler {
  private readonly jobs: Map<string, ManagedJob> = new Map();
  private readonly opts: SchedulerOptions;
  private readonly logger: Logger;
  private readonly run: (opts: RunOptions) => Promise<RunResult>;
  private running = false;

  constructor(opts: SchedulerOptions) {
    this.opts = opts;
    this.logger = opts.logger ?? getLogger();
    this.run = opts.run ?? ((runOpts) => runProject(runOpts));
  }

  /** Create a job for every configured schedule and start them */
  start(): void {
    if (this.running) {
      return;
    }

    for (const schedule of this.opts.config.schedules) {
      this.addJob(schedule);
    }
    for (const managed of this.jobs.values()) {
      managed.cronJob.start();
    }

    this.running = true;
    this.logger.info('schedule', `Scheduler started with ${this.jobs.size} job(s)`);
  }

  /** Stop all running cron jobs and clean up */
  stop(): void {
    for (const [key, managed] of this.jobs.entries()) {
      managed.cronJob.stop();
      this.jobs.delete(key);
    }

    this.running = false;
  }

  /**
   * Add one schedule as a cron job. Replaces an existing job with the same
   * project and expression. Throws ConfigError for an invalid expression.
   */
  addJob(schedule: ScheduleEntry): void {
    const key = jobKey(schedule.project, schedule.cron);
    this.jobs.get(key)?.cronJob.stop();

    let cronJob: CronJob;
    try {
      cronJob = new CronJob(
        schedule.cron,
        () => {
          this.execute(schedule, key).catch((error: unknown) =>
            this.logger.error('schedule', `Schedule callback failed: ${describeError(error)}`),
          );
        },
        null, // onComplete
        false, // started by start() or below
        schedule.timezone,
      );
    } catch (error) {
      throw new ConfigError(`Invalid schedule "${schedule.cron}" for ${schedule.project}: ${describeError(error)}`);
    }

    this.jobs.set(key, { schedule, cronJob });

    if (this.running) {
      cronJob.start();
    }
  }

  /** Remove the job for a project and expression */
  removeJob(project: string, cron: string): boolean {
    const key = jobKey(project, cron);
    const managed = this.jobs.get(key);

    if (!managed) {
      return false;
    }

    managed.cronJob.stop();
    this.jobs.delete(key);
    return true;
  }

  getStatus(): JobStatus[] {
    return Array.from(this.jobs.values()).map((managed) => ({
      project: managed.schedule.project,
      cron: managed.schedule.cron,
      timezone: managed.schedule.timezone,
      running: managed.cronJob.running,
      nextRun: managed.cronJob.running ? managed.cronJob.nextDate().toISO() ?? undefined : undefined,
      lastRun: managed.lastRun,
      lastStatus: managed.lastStatus,
      lastError: managed.lastError?.message,
    }));
  }

  isRunning(): boolean {
    return this.running;
  }

  getJobCount(): number {
    return this.jobs.size;
  }

  /** Run a project's report immediately, outside its schedule */
  async triggerNow(project: string): Promise<RunResult | null> {
    const configured = Array.from(this.jobs.values()).find((j) => j.schedule.project === project);
    const schedule: ScheduleEntry = configured?.schedule ?? { project, cron: '@manual', timezone: 'UTC' };
    const key = configured ? jobKey(schedule.project, schedule.cron) : `manual:${project}`;
    return this.execute(schedule, key);
  }

  // ─── Private Methods ────────────────────────────────────────────

  private async execute(schedule: ScheduleEntry, key: string): Promise<RunResult | null> {
    const managed = this.jobs.get(key);
    this.logger.info('schedule', `Running scheduled report for ${schedule.project}`, { cron: schedule.cron });

    try {
      const options = this.opts.runOptions(schedule);
      // Scheduled runs date their reports in the schedule's zone
      const result = await this.run(managed ? { timeZone: schedule.timezone, ...options } : options);

      if (managed) {
        managed.lastRun = new Date();
        managed.lastStatus = result.status;
        managed.lastError = result.failure ? new Error(result.failure.message) : undefined;
      }

      await this.opts.onResult?.(result, schedule);
      return result;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error('schedule', `Scheduled report for ${schedule.project} failed: ${error.message}`);

      if (managed) {
        managed.lastRun = new Date();
        managed.lastStatus = 'failed';
        managed.lastError = error;
      }

      await this.opts.onError?.(error, schedule);
      return null;
    }
  }
}
