import { describeError } from '../errors';
import type { ScheduleConfig } from '../types/config';
import type { SpeedReport } from '../types/report';
import { log } from '../utils/logger';
import type { DigestRunner, DigestRunResult, DigestTrigger } from './DigestService';
import type { NodeStateStore } from './NodeStateStore';

export interface SchedulerStatus {
  started: boolean;
  running: boolean;
  intervalMinutes: number;
  sendImmediately: boolean;
  lastRun: DigestRunResult | null;
}

/**
 * Digest Scheduler
 *
 * One interval timer, first firing a full interval after start so nodes have
 * had a chance to report. Runs never overlap: a scheduled tick that lands
 * during a run is skipped, while update-triggered runs are coalesced into a
 * single follow-up run.
 */
export class DigestScheduler {
  private intervalTimer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private immediateHandle: NodeJS.Immediate | null = null;
  private immediatePending = false;
  private stopped = false;
  private lastRun: DigestRunResult | null = null;

  private readonly onReportRecorded = (report: SpeedReport): void => {
    log.debug(`Report from ${report.nodeId} queued an immediate digest`, 'DigestScheduler');
    // Deferred so the ingesting request answers before any dispatch work starts
    if (this.immediateHandle) return;
    this.immediateHandle = setImmediate(() => {
      this.immediateHandle = null;
      void this.trigger('immediate');
    });
  };

  constructor(
    private readonly digestService: DigestRunner,
    private readonly store: NodeStateStore,
    private readonly schedule: ScheduleConfig
  ) {}

  public start(): void {
    if (this.intervalTimer) {
      log.warn('Digest scheduler already started', 'DigestScheduler');
      return;
    }

    this.stopped = false;
    const intervalMs = this.schedule.intervalMinutes * 60_000;
    this.intervalTimer = setInterval(() => void this.trigger('scheduled'), intervalMs);
    if (this.schedule.sendImmediately) {
      this.store.on('reportRecorded', this.onReportRecorded);
    }

    log.info(
      `Digest scheduler started: every ${this.schedule.intervalMinutes} min, send on update ${this.schedule.sendImmediately ? 'on' : 'off'}`,
      'DigestScheduler'
    );
  }

  /**
   * Cancel the timer and any queued immediate run, then wait for a run
   * already in flight so nothing dispatches after this resolves.
   */
  public async stop(): Promise<void> {
    this.stopped = true;
    if (this.intervalTimer) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }
    if (this.immediateHandle) {
      clearImmediate(this.immediateHandle);
      this.immediateHandle = null;
    }
    this.store.off('reportRecorded', this.onReportRecorded);
    this.immediatePending = false;

    if (this.inFlight) {
      await this.inFlight;
    }
    log.info('Digest scheduler stopped', 'DigestScheduler');
  }

  /**
   * Start a run unless one is in flight. Resolves when the run that covers
   * this request (the current one, for skipped or coalesced requests) ends.
   */
  public trigger(trigger: DigestTrigger): Promise<void> {
    if (this.stopped) {
      log.debug(`Scheduler stopped, ignoring ${trigger} trigger`, 'DigestScheduler');
      return Promise.resolve();
    }
    if (this.inFlight) {
      if (trigger === 'scheduled') {
        log.warn('Previous digest still dispatching, skipping this tick', 'DigestScheduler');
      } else {
        this.immediatePending = true;
      }
      return this.inFlight;
    }

    const run = this.execute(trigger).finally(() => {
      this.inFlight = null;
      if (this.immediatePending && !this.stopped) {
        this.immediatePending = false;
        void this.trigger('immediate');
      }
    });
    this.inFlight = run;
    return run;
  }

  public getStatus(): SchedulerStatus {
    return {
      started: this.intervalTimer !== null,
      running: this.inFlight !== null,
      intervalMinutes: this.schedule.intervalMinutes,
      sendImmediately: this.schedule.sendImmediately,
      lastRun: this.lastRun,
    };
  }

  // Never rejects: a failed run must not take the timer down with it
  private async execute(trigger: DigestTrigger): Promise<void> {
    try {
      this.lastRun = await this.digestService.buildAndDispatch(trigger);
    } catch (error) {
      log.error(`Digest run (${trigger}) failed: ${describeError(error)}`, 'DigestScheduler', error);
    }
  }
}
