import type { Clock } from '../types';
import { logger } from '../utils/logger';
import { systemClock } from '../utils/time';
import type { JobStore } from './JobStore';

export interface JobReaperOptions {
  retentionMs: number;
  sweepIntervalMs: number;
  /** Called with the ids removed by each sweep. */
  onEvicted?: (jobIds: string[]) => void;
  clock?: Clock;
}

/**
 * 🧹 Periodically evicts terminal jobs older than the retention window.
 */
export class JobReaper {
  private timer: NodeJS.Timeout | null = null;
  private readonly clock: Clock;

  constructor(
    private readonly store: JobStore,
    private readonly options: JobReaperOptions,
  ) {
    this.clock = options.clock ?? systemClock;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sweep().catch((error: unknown) => logger.error('💥 Job sweep failed', { error }));
    }, this.options.sweepIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  async sweep(): Promise<string[]> {
    const cutoff = new Date(this.clock.now().getTime() - this.options.retentionMs);
    const evicted = await this.store.evictTerminalBefore(cutoff);
    if (evicted.length > 0) {
      logger.info(`🧹 Evicted ${evicted.length} finished job(s) older than ${cutoff.toISOString()}`);
      this.options.onEvicted?.(evicted);
    }
    return evicted;
  }
}
