import { AuthError, BluelinkError, ReauthRequiredError, describeError } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import type { JobName, PollingJob, VehicleDataClient } from './pollingJobs';
import type { SnapshotStore } from './snapshotStore';
import type { TokenManager } from './tokenManager.service';

export type JobError = {
  code: string;
  message: string;
  at: string;
};

export type JobStatus = {
  name: JobName;
  intervalMs: number;
  fastIntervalMs: number | null;
  fastActive: boolean;
  inFlight: boolean;
  lastRunAt: string | null;
  lastSuccessAt: string | null;
  lastError: JobError | null;
  // First failure since the last success.
  failingSince: string | null;
  nextRunAt: string | null;
};

export type PollingCoordinatorOptions = {
  entryId: string;
  vehicleId: string;
  jobs: PollingJob[];
  client: VehicleDataClient;
  tokenManager: Pick<TokenManager, 'getValidToken' | 'invalidateAccessToken'>;
  snapshot: SnapshotStore;
  logger?: Logger;
};

type JobRuntime = {
  job: PollingJob;
  status: JobStatus;
  timer: NodeJS.Timeout | null;
  inflight: Promise<void> | null;
};

const toJobError = (error: unknown, at: Date): JobError => ({
  ...describeError(error),
  at: at.toISOString(),
});

/**
 * Drives the polling jobs of one selected vehicle. Every job has its own timer;
 * a job's result lands in the snapshot in one merge and a failure only touches
 * that job's own status.
 */
export class PollingCoordinator {
  readonly entryId: string;

  readonly vehicleId: string;

  private readonly client: VehicleDataClient;

  private readonly tokenManager: Pick<TokenManager, 'getValidToken' | 'invalidateAccessToken'>;

  private readonly snapshot: SnapshotStore;

  private readonly log: Logger;

  private readonly runtimes = new Map<JobName, JobRuntime>();

  private running = false;

  private halted = false;

  constructor(options: PollingCoordinatorOptions) {
    this.entryId = options.entryId;
    this.vehicleId = options.vehicleId;
    this.client = options.client;
    this.tokenManager = options.tokenManager;
    this.snapshot = options.snapshot;
    this.log = (options.logger ?? rootLogger).child({
      component: 'polling-coordinator',
      vehicleId: options.vehicleId,
    });

    options.jobs.forEach((job) => {
      this.runtimes.set(job.name, {
        job,
        timer: null,
        inflight: null,
        status: {
          name: job.name,
          intervalMs: job.intervalMs,
          fastIntervalMs: job.fastIntervalMs,
          fastActive: false,
          inFlight: false,
          lastRunAt: null,
          lastSuccessAt: null,
          lastError: null,
          failingSince: null,
          nextRunAt: null,
        },
      });
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  // Set after a re-authentication failure; cleared by start().
  get isHalted(): boolean {
    return this.halted;
  }

  get jobNames(): JobName[] {
    return Array.from(this.runtimes.keys());
  }

  /**
   * Starts the timers. Every job runs once straight away and then follows its
   * own cadence.
   */
  async start(): Promise<void> {
    if (this.running && !this.halted) {
      return;
    }

    this.running = true;
    this.halted = false;
    this.log.info({ jobs: this.jobNames }, 'polling started');
    await this.refreshAll();
  }

  stop(): void {
    this.running = false;
    this.runtimes.forEach((runtime) => this.clearTimer(runtime));
    this.log.info('polling stopped');
  }

  /**
   * Runs every job now. A job already in flight is awaited rather than issued
   * a second time.
   */
  async refreshAll(): Promise<JobStatus[]> {
    await Promise.all(
      Array.from(this.runtimes.values()).map((runtime) => this.runJob(runtime)),
    );
    return this.getJobStatuses();
  }

  async refreshJob(name: JobName): Promise<JobStatus | null> {
    const runtime = this.runtimes.get(name);
    if (!runtime) {
      return null;
    }

    await this.runJob(runtime);
    return { ...runtime.status };
  }

  getJobStatuses(): JobStatus[] {
    return Array.from(this.runtimes.values()).map((runtime) => ({ ...runtime.status }));
  }

  getJobStatus(name: JobName): JobStatus | null {
    const runtime = this.runtimes.get(name);
    return runtime ? { ...runtime.status } : null;
  }

  private runJob(runtime: JobRuntime): Promise<void> {
    if (runtime.inflight) {
      return runtime.inflight;
    }

    this.clearTimer(runtime);
    const execution = this.execute(runtime).finally(() => {
      runtime.inflight = null;
      runtime.status.inFlight = false;
    });
    runtime.inflight = execution;
    runtime.status.inFlight = true;
    return execution;
  }

  private async execute(runtime: JobRuntime): Promise<void> {
    const { job, status } = runtime;
    const startedAt = new Date();
    status.lastRunAt = startedAt.toISOString();

    try {
      const accessToken = await this.tokenManager.getValidToken();
      const outcome = await job.poll({
        client: this.client,
        accessToken,
        vehicleId: this.vehicleId,
      });

      const finishedAt = new Date();
      this.snapshot.merge(job.name, outcome.fields, finishedAt);
      status.lastSuccessAt = finishedAt.toISOString();
      status.lastError = null;
      status.failingSince = null;
      status.fastActive = job.fastIntervalMs !== null && outcome.fastCondition;
      this.log.debug(
        { job: job.name, fields: Object.keys(outcome.fields), fastActive: status.fastActive },
        'job succeeded',
      );
      this.scheduleNext(runtime, this.nextDelay(runtime));
    } catch (error) {
      this.handleFailure(runtime, error);
    }
  }

  private handleFailure(runtime: JobRuntime, error: unknown): void {
    const { job, status } = runtime;
    const failedAt = new Date();
    status.lastError = toJobError(error, failedAt);
    status.failingSince = status.failingSince ?? failedAt.toISOString();
    status.fastActive = false;

    if (error instanceof ReauthRequiredError) {
      this.halt(job.name, error);
      return;
    }

    if (error instanceof AuthError) {
      this.tokenManager.invalidateAccessToken();
    }

    if (error instanceof BluelinkError) {
      this.log.warn(
        { job: job.name, code: error.code, status: error.status, errCode: error.errCode },
        'job failed',
      );
    } else {
      this.log.error({ job: job.name, err: error }, 'job failed unexpectedly');
    }

    // No immediate retry and no fast cadence after a failure.
    this.scheduleNext(runtime, job.intervalMs);
  }

  private halt(jobName: JobName, error: ReauthRequiredError): void {
    if (!this.halted) {
      this.log.warn(
        { job: jobName, reason: error.message },
        'polling halted until re-authentication',
      );
    }

    this.halted = true;
    this.runtimes.forEach((runtime) => this.clearTimer(runtime));
  }

  private nextDelay(runtime: JobRuntime): number {
    const { job, status } = runtime;
    return status.fastActive && job.fastIntervalMs !== null ? job.fastIntervalMs : job.intervalMs;
  }

  private scheduleNext(runtime: JobRuntime, delayMs: number): void {
    this.clearTimer(runtime);
    if (!this.running || this.halted) {
      return;
    }

    runtime.status.nextRunAt = new Date(Date.now() + delayMs).toISOString();
    runtime.timer = setTimeout(() => {
      runtime.timer = null;
      this.runJob(runtime).catch((error: unknown) => {
        this.log.error({ job: runtime.job.name, err: error }, 'scheduled job crashed');
      });
    }, delayMs);
  }

  private clearTimer(runtime: JobRuntime): void {
    if (runtime.timer) {
      clearTimeout(runtime.timer);
      runtime.timer = null;
    }
    runtime.status.nextRunAt = null;
  }
}
