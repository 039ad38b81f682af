export interface TimingSettings {
  readonly processDelaySeconds: number;
  readonly healthCheckIntervalSeconds: number;
}

export interface TimingUpdate {
  processDelaySeconds?: number;
  healthCheckIntervalSeconds?: number;
}

function isPositiveInt(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

/**
 * Timing values that the server may change while the station runs.
 * Each update swaps in a new frozen snapshot, so a reader holding a snapshot
 * never sees half of an update.
 */
export class RuntimeSettings {
  private current: TimingSettings;

  constructor(initial: TimingSettings) {
    this.current = Object.freeze({ ...initial });
  }

  snapshot(): TimingSettings {
    return this.current;
  }

  get processDelayMs(): number {
    return this.current.processDelaySeconds * 1000;
  }

  get healthCheckIntervalMs(): number {
    return this.current.healthCheckIntervalSeconds * 1000;
  }

  /**
   * Apply the positive-integer fields of an update; others are ignored.
   * Returns true when anything changed.
   */
  apply(update: TimingUpdate): boolean {
    const { processDelaySeconds, healthCheckIntervalSeconds } = update;
    const next: TimingSettings = {
      processDelaySeconds: isPositiveInt(processDelaySeconds)
        ? processDelaySeconds
        : this.current.processDelaySeconds,
      healthCheckIntervalSeconds: isPositiveInt(healthCheckIntervalSeconds)
        ? healthCheckIntervalSeconds
        : this.current.healthCheckIntervalSeconds,
    };

    if (
      next.processDelaySeconds === this.current.processDelaySeconds &&
      next.healthCheckIntervalSeconds === this.current.healthCheckIntervalSeconds
    ) {
      return false;
    }

    this.current = Object.freeze(next);
    return true;
  }
}

/**
 * Read timing fields from the settings bag returned by the health endpoint
 * (`process_delay`, `health_check_interval`, in seconds).
 */
export function timingFromServerSettings(settings: Record<string, unknown> | undefined): TimingUpdate {
  if (!settings) return {};
  const update: TimingUpdate = {};
  const processDelay = settings.process_delay;
  const healthCheckInterval = settings.health_check_interval;
  if (isPositiveInt(processDelay)) update.processDelaySeconds = processDelay;
  if (isPositiveInt(healthCheckInterval)) update.healthCheckIntervalSeconds = healthCheckInterval;
  return update;
}
