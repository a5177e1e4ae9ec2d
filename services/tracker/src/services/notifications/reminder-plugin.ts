/**
 * Reminder plugin
 * Delivery backend for treatment reminders. The service only talks to this interface;
 * TimerReminderPlugin is the in-process backend used when no platform binding is wired.
 */

import logger from '../../logger';
import { groupSummaryBody, groupSummaryTitle } from '../../constants/messages';
import { errorMessage } from '../../utils/error-utils';
import type { NotificationChannel } from '../../../../../shared';

const log = logger.child({ module: 'reminder-plugin' });

// setTimeout stores delays as a signed 32-bit integer
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export interface ShowZonedRequest {
  id: number;
  title: string;
  body: string;
  scheduledDate: Date;
  channelId: NotificationChannel;
  payload?: string;
  groupId?: string;
  threadIdentifier?: string;
}

export interface PendingNotificationRequest {
  id: number;
  title: string;
  body: string;
  payload?: string;
}

export interface GroupSummaryRequest {
  petId: string;
  petName: string;
  medicationCount: number;
  fluidCount: number;
  groupId: string;
  threadIdentifier?: string;
}

export interface GroupSummary {
  petId: string;
  title: string;
  body: string;
  groupId: string;
}

export interface ReminderPlugin {
  showZoned(request: ShowZonedRequest): Promise<void>;
  cancel(id: number): Promise<void>;
  cancelAll(): Promise<void>;
  pendingNotificationRequests(): Promise<PendingNotificationRequest[]>;
  showGroupSummary(request: GroupSummaryRequest): Promise<void>;
  cancelGroupSummary(petId: string): Promise<void>;
}

export type DeliverFn = (request: ShowZonedRequest) => void | Promise<void>;

interface ScheduledReminder {
  request: ShowZonedRequest;
  timer: NodeJS.Timeout | null;
}

function defaultDeliver(request: ShowZonedRequest): void {
  log.info(
    { notificationId: request.id, channelId: request.channelId, title: request.title },
    'Reminder delivered'
  );
}

export class TimerReminderPlugin implements ReminderPlugin {
  private readonly scheduled = new Map<number, ScheduledReminder>();
  private readonly groupSummaries = new Map<string, GroupSummary>();

  constructor(
    private readonly deliver: DeliverFn = defaultDeliver,
    private readonly now: () => Date = () => new Date()
  ) {}

  async showZoned(request: ShowZonedRequest): Promise<void> {
    this.clearTimer(request.id);

    const delay = Math.max(0, request.scheduledDate.getTime() - this.now().getTime());
    const entry: ScheduledReminder = { request, timer: null };

    // Anything beyond the timer range stays pending until the next reschedule
    if (delay <= MAX_TIMER_DELAY_MS) {
      entry.timer = setTimeout(() => {
        this.fire(request.id);
      }, delay);
      entry.timer.unref();
    }

    this.scheduled.set(request.id, entry);
  }

  async cancel(id: number): Promise<void> {
    this.clearTimer(id);
    this.scheduled.delete(id);
  }

  async cancelAll(): Promise<void> {
    for (const id of [...this.scheduled.keys()]) {
      this.clearTimer(id);
    }
    this.scheduled.clear();
    this.groupSummaries.clear();
  }

  async pendingNotificationRequests(): Promise<PendingNotificationRequest[]> {
    return [...this.scheduled.values()].map(({ request }) => ({
      id: request.id,
      title: request.title,
      body: request.body,
      payload: request.payload,
    }));
  }

  async showGroupSummary(request: GroupSummaryRequest): Promise<void> {
    this.groupSummaries.set(request.petId, {
      petId: request.petId,
      title: groupSummaryTitle(request.petName),
      body: groupSummaryBody(request.medicationCount, request.fluidCount),
      groupId: request.groupId,
    });
  }

  async cancelGroupSummary(petId: string): Promise<void> {
    this.groupSummaries.delete(petId);
  }

  getGroupSummary(petId: string): GroupSummary | undefined {
    return this.groupSummaries.get(petId);
  }

  private fire(id: number): void {
    const entry = this.scheduled.get(id);
    if (!entry) {
      return;
    }
    this.scheduled.delete(id);

    void Promise.resolve()
      .then(() => this.deliver(entry.request))
      .catch((error: unknown) => {
        log.error(
          { notificationId: id, error: errorMessage(error) },
          'Reminder delivery failed'
        );
      });
  }

  private clearTimer(id: number): void {
    const existing = this.scheduled.get(id);
    if (existing?.timer) {
      clearTimeout(existing.timer);
    }
  }
}
