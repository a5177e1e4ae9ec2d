/**
 * Daily Rollover Service
 * At each local midnight drops yesterday's notification indexes and hands every
 * affected pet to a reschedule hook, then arms itself for the next midnight.
 */

import logger from '../../logger';
import { addDays, startOfDay } from '../../utils/date-utils';
import { errorMessage } from '../../utils/error-utils';
import type { NotificationIndexStore, PetRef } from './notification-index-store.service';

const log = logger.child({ module: 'daily-rollover' });

export type RolloverHook = (userId: string, petId: string) => Promise<void>;

export interface DailyRolloverOptions {
  now?: () => Date;
  onRollover?: RolloverHook;
}

export interface RolloverResult {
  pets: PetRef[];
  failed: number;
}

export function msUntilNextMidnight(now: Date): number {
  return startOfDay(addDays(now, 1)).getTime() - now.getTime();
}

export class DailyRolloverService {
  private readonly now: () => Date;
  private readonly onRollover?: RolloverHook;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly indexStore: NotificationIndexStore,
    options: DailyRolloverOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.onRollover = options.onRollover;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.arm();
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /**
   * Clear yesterday's indexes, then run the hook once per pet
   * A failing pet is logged and does not stop the others.
   */
  async runRollover(): Promise<RolloverResult> {
    const pets = await this.indexStore.clearAllForYesterday();
    let failed = 0;

    if (this.onRollover) {
      for (const { userId, petId } of pets) {
        try {
          await this.onRollover(userId, petId);
        } catch (error) {
          failed++;
          log.error({ userId, petId, error: errorMessage(error) }, 'Rollover reschedule failed');
        }
      }
    }

    log.info({ pets: pets.length, failed }, 'Midnight rollover complete');
    return { pets, failed };
  }

  private arm(): void {
    const delay = msUntilNextMidnight(this.now());
    this.timer = setTimeout(() => {
      this.runRollover()
        .catch((error: unknown) => {
          log.error({ error: errorMessage(error) }, 'Midnight rollover failed');
        })
        .finally(() => {
          // stop() during the run leaves the timer cleared
          if (this.timer) {
            this.arm();
          }
        });
    }, delay);
    this.timer.unref();
    log.debug({ delay }, 'Midnight rollover armed');
  }
}
