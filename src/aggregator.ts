/**
 * Aggregator: the single consumer of worker status events
 */

import chalk from 'chalk';
import { EventChannel } from './event-channel';
import { logger } from './logger';
import { Counters, LoadTestSummary, StatusEvent } from './types';

export interface AggregatorOptions {
  /**
   * Number of workers whose `done` events end the run
   */
  workers: number;
  queriesPerWorker: number;

  /**
   * Called with a counter snapshot after every event
   */
  onProgress?: (counters: Counters) => void;

  now?: () => number;
}

export function completionPercent(sent: number, total: number): number {
  if (total === 0) {
    return 100;
  }
  return Math.floor((100 * sent) / total);
}

export function formatCounters(counters: Counters, percent: number, elapsedMs: number): string {
  return `sent: ${counters.sent}, success: ${counters.success}, timeout: ${counters.timeout}, ` +
    `failed: ${counters.failed}, workers finished: ${counters.workersDone}, ` +
    `percent: ${percent}%, time: ${(elapsedMs / 1000).toFixed(3)}s`;
}

export class Aggregator {
  private events: EventChannel<StatusEvent>;
  private options: AggregatorOptions;
  private now: () => number;
  private counters: Counters = { sent: 0, success: 0, timeout: 0, failed: 0, workersDone: 0 };
  private startedAt: number;

  constructor(events: EventChannel<StatusEvent>, options: AggregatorOptions) {
    this.events = events;
    this.options = options;
    this.now = options.now || Date.now;
    this.startedAt = this.now();
  }

  get total(): number {
    return this.options.workers * this.options.queriesPerWorker;
  }

  /**
   * Fold events into the counters until every worker reports `done`
   */
  async run(): Promise<LoadTestSummary> {
    while (this.counters.workersDone < this.options.workers) {
      const event = await this.events.receive();
      this.apply(event);

      if (this.options.onProgress) {
        this.options.onProgress({ ...this.counters });
      }
      logger.debug(chalk.gray(`${event.origin} ${this.describe()}`));
    }

    const summary = this.summary();
    logger.info(chalk.green(`ALLDONE ${formatCounters(summary, summary.percent, summary.elapsedMs)}`));
    return summary;
  }

  summary(): LoadTestSummary {
    return {
      ...this.counters,
      total: this.total,
      percent: completionPercent(this.counters.sent, this.total),
      elapsedMs: this.now() - this.startedAt
    };
  }

  private apply(event: StatusEvent): void {
    switch (event.status) {
      case 'sent':
        this.counters.sent++;
        break;
      case 'success':
        this.counters.success++;
        break;
      case 'timeout':
        this.counters.timeout++;
        break;
      case 'failed':
        this.counters.failed++;
        break;
      case 'done':
        this.counters.workersDone++;
        break;
    }
  }

  private describe(): string {
    const elapsedMs = this.now() - this.startedAt;
    return formatCounters(this.counters, completionPercent(this.counters.sent, this.total), elapsedMs);
  }
}
