import {
  IScreenScheduler,
  IScreenService,
  ScheduledScreen,
  ScheduledUpdate,
} from "@core/interfaces";
import { getLogger } from "@utils/logger";
import { formatCompactStamp } from "@utils/time";
import { toError } from "@utils/typeGuards";

const logger = getLogger("ScreenScheduler");

function isScheduledScreen(value: unknown): value is ScheduledScreen {
  return (
    typeof value === "object" &&
    value !== null &&
    "contentType" in value &&
    "content" in value &&
    typeof value.content === "string"
  );
}

type ScheduledJob = {
  id: string;
  update: ScheduledUpdate;
  intervalMs: number;
  deviceId?: string;
  timer: NodeJS.Timeout | null;
};

export type ScreenSchedulerOptions = {
  /** Canvas size of the pushed text screens */
  width: number;
  height: number;
  now?: () => Date;
};

/**
 * Screen Scheduler
 *
 * Calls update functions every N minutes and pushes what they return:
 * text as a `data` screen, a ScheduledScreen with its own content type.
 * A failing run is logged and the job keeps its schedule.
 */
export class ScreenScheduler implements IScreenScheduler {
  private readonly jobs = new Map<string, ScheduledJob>();
  private running = false;
  private nextJobNumber = 1;
  private readonly now: () => Date;

  constructor(
    private readonly screens: IScreenService,
    private readonly options: ScreenSchedulerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  schedule(update: ScheduledUpdate, intervalMinutes: number, deviceId?: string): string {
    if (!Number.isFinite(intervalMinutes) || intervalMinutes <= 0) {
      throw new RangeError(`Invalid interval: ${intervalMinutes} minutes (must be > 0)`);
    }

    const job: ScheduledJob = {
      id: `job-${this.nextJobNumber++}`,
      update,
      intervalMs: intervalMinutes * 60 * 1000,
      deviceId,
      timer: null,
    };
    this.jobs.set(job.id, job);
    logger.info(
      `Scheduled ${job.id} every ${intervalMinutes} minute(s)${deviceId ? ` for ${deviceId}` : ""}`,
    );

    if (this.running) {
      this.arm(job);
    } else {
      this.start();
    }
    return job.id;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    for (const job of this.jobs.values()) {
      this.arm(job);
    }
    logger.info(`Scheduler started with ${this.jobs.size} job(s)`);
  }

  stop(): void {
    for (const job of this.jobs.values()) {
      if (job.timer) {
        clearInterval(job.timer);
      }
    }
    this.jobs.clear();
    this.running = false;
    logger.info("Scheduler stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  getJobCount(): number {
    return this.jobs.size;
  }

  /**
   * Run one job now. Never rejects.
   */
  async runJob(job: Pick<ScheduledJob, "id" | "update" | "deviceId">): Promise<void> {
    try {
      const produced = await job.update();
      let screen: ScheduledScreen;
      if (typeof produced === "string") {
        screen = { contentType: "data", content: produced };
      } else if (isScheduledScreen(produced)) {
        screen = produced;
      } else {
        logger.debug(`${job.id} published on its own`);
        return;
      }

      const result = await this.screens.createScreen({
        contentType: screen.contentType,
        content: screen.content,
        subtitle: screen.subtitle,
        filename: this.filenameFor(screen, job.deviceId),
        width: this.options.width,
        height: this.options.height,
        deviceId: job.deviceId,
      });

      if (result.success) {
        logger.info(`${job.id} pushed ${result.data.filename}`);
      } else {
        logger.error(`${job.id} could not push its screen: ${result.error.message}`);
      }
    } catch (error) {
      logger.error(`Error in ${job.id}: ${toError(error).message}`);
    }
  }

  /**
   * `<device>-<filename>` when both are known, `<device>-big-text-<stamp>`
   * or `<device>-<stamp>` for a device alone. Without a device the store
   * names the screen unless the update did.
   */
  private filenameFor(screen: ScheduledScreen, deviceId?: string): string | undefined {
    if (!deviceId) {
      return screen.filename;
    }
    if (screen.filename) {
      return `${deviceId}-${screen.filename}`;
    }
    const stamp = formatCompactStamp(this.now());
    return screen.contentType === "big_text"
      ? `${deviceId}-big-text-${stamp}`
      : `${deviceId}-${stamp}`;
  }

  private arm(job: ScheduledJob): void {
    if (job.timer) {
      return;
    }
    job.timer = setInterval(() => {
      void this.runJob(job);
    }, job.intervalMs);
  }
}
