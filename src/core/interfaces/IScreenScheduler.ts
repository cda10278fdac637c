import { ScreenContentType } from "@core/types";

/**
 * A screen produced by a scheduled update. Canvas size and device come
 * from the job.
 */
export type ScheduledScreen = {
  contentType: ScreenContentType;
  content: string;
  subtitle?: string;
  /** Appended to the job's device id when the job has one */
  filename?: string;
};

export type ScheduledContent = string | ScheduledScreen | undefined | void;

/**
 * Produces content for a scheduled push. A string is pushed as a plain
 * text screen, a ScheduledScreen as its own content type. Undefined means
 * the function published something itself.
 */
export type ScheduledUpdate = () => ScheduledContent | Promise<ScheduledContent>;

/**
 * Screen Scheduler Interface
 *
 * Runs update functions on fixed intervals.
 */
export interface IScreenScheduler {
  /**
   * Register an update. Starts the scheduler when it is not running.
   * @param intervalMinutes Minutes between runs
   * @param deviceId Prefix for the pushed filenames
   * @returns Job id
   */
  schedule(update: ScheduledUpdate, intervalMinutes: number, deviceId?: string): string;

  start(): void;

  /**
   * Stop every job and forget them
   */
  stop(): void;

  isRunning(): boolean;

  getJobCount(): number;
}
