/**
 * RunStats
 * Counts what the capture loop and keep-alive task did during one run
 */

import chalk from 'chalk';
import * as logger from '../../utils/logger';

export type RunCounter =
  | 'triggers'
  | 'triggerFailures'
  | 'detections'
  | 'timeouts'
  | 'downloads'
  | 'downloadFailures'
  | 'deletes'
  | 'deleteFailures'
  | 'keepAlives'
  | 'keepAliveFailures'
  | 'cycleErrors';

export type RunCounters = Record<RunCounter, number>;

const emptyCounters = (): RunCounters => ({
  triggers: 0,
  triggerFailures: 0,
  detections: 0,
  timeouts: 0,
  downloads: 0,
  downloadFailures: 0,
  deletes: 0,
  deleteFailures: 0,
  keepAlives: 0,
  keepAliveFailures: 0,
  cycleErrors: 0,
});

export class RunStats {
  private counters: RunCounters = emptyCounters();

  record(counter: RunCounter): void {
    this.counters[counter]++;
  }

  get(counter: RunCounter): number {
    return this.counters[counter];
  }

  snapshot(): RunCounters {
    return { ...this.counters };
  }

  hasFailures(): boolean {
    const c = this.counters;
    return (
      c.triggerFailures +
        c.timeouts +
        c.downloadFailures +
        c.deleteFailures +
        c.cycleErrors >
      0
    );
  }

  /**
   * Print the end-of-run summary, regardless of verbosity
   */
  displaySummary(): void {
    const c = this.counters;
    const line =
      `${c.triggers} captures triggered, ${c.downloads} photos saved, ` +
      `${c.deletes} deleted from the camera`;

    if (!this.hasFailures()) {
      logger.always(chalk.green(`Run finished: ${line}.`));
    } else {
      logger.always(chalk.yellow(`Run finished with issues: ${line}.`));
      logger.always(
        chalk.yellow(
          `  trigger failures: ${c.triggerFailures}, media timeouts: ${c.timeouts}, ` +
            `download failures: ${c.downloadFailures}, delete failures: ${c.deleteFailures}, ` +
            `cycle errors: ${c.cycleErrors}`,
        ),
      );
    }
    logger.always(
      chalk.gray(
        `Keep-alive: ${c.keepAlives} sent, ${c.keepAliveFailures} failed.`,
      ),
    );
  }
}

export function createRunStats(): RunStats {
  return new RunStats();
}
