import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import type { ReplayQueue, ReplaySummary } from '../../../core';
import type { TrackingModuleConfig } from '../tracking.config';
import { REPLAY_QUEUE, TRACKING_CONFIG } from '../constants';

/**
 * Replay Processor
 *
 * Periodically retries parked events whose next attempt is due
 */
@Injectable()
export class ReplayProcessor implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ReplayProcessor.name);
  private intervalId?: NodeJS.Timeout;
  private isProcessing = false;

  constructor(
    @Inject(REPLAY_QUEUE)
    private readonly replayQueue: ReplayQueue,
    @Inject(TRACKING_CONFIG)
    private readonly config: TrackingModuleConfig,
  ) {}

  onModuleInit(): void {
    if (this.config.processors?.replay?.enabled) {
      this.startProcessing();
    }
  }

  onModuleDestroy(): void {
    this.stopProcessing();
  }

  startProcessing(): void {
    const intervalMs = this.config.processors?.replay?.intervalMs ?? 30000;

    this.logger.log(`Starting replay processor (interval: ${intervalMs}ms)`);

    this.intervalId = setInterval(() => {
      void this.processDue();
    }, intervalMs);
  }

  stopProcessing(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
      this.logger.log('Stopped replay processor');
    }
  }

  /**
   * Run one replay pass; skipped while a previous pass is still running
   */
  async processDue(now: Date = new Date()): Promise<ReplaySummary | null> {
    if (this.isProcessing) {
      return null;
    }

    this.isProcessing = true;

    try {
      const summary = await this.replayQueue.replayDue(now);
      if (summary.attempted > 0 || summary.expired > 0) {
        this.logger.debug(
          `Replay pass: ${summary.resolved} resolved, ${summary.pending} pending, ${summary.expired} expired`,
        );
      }
      return summary;
    } catch (error) {
      this.logger.error('Error replaying parked events:', error);
      return null;
    } finally {
      this.isProcessing = false;
    }
  }
}
