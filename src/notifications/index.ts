import fastq from 'fastq';
import { setTimeout as sleep } from 'node:timers/promises';
import { notificationPollInterval } from '../config';
import { logger as defaultLogger, type Logger } from '../logger';
import type {
  Notification,
  NotificationDispatcher,
  NotificationSink,
} from './types';

export * from './types';

export interface NotificationServiceOptions {
  log?: Logger;
  dispatch?: NotificationDispatcher;
  pollInterval?: number;
}

/**
 * FIFO delivery queue with a single consumer. Producers never wait: a
 * notification is recorded in the user's history when it is added and
 * delivered later, one at a time, once the service is started.
 */
export class NotificationService implements NotificationSink {
  private readonly queue: fastq.queueAsPromised<Notification, void>;
  private readonly history = new Map<string, Notification[]>();
  private readonly log: Logger;
  private readonly dispatch: NotificationDispatcher;
  private readonly pollInterval: number;
  private inFlight: Promise<void> | null = null;
  private running = false;
  private delivered = 0;

  constructor({
    log = defaultLogger,
    dispatch,
    pollInterval = notificationPollInterval,
  }: NotificationServiceOptions = {}) {
    this.log = log;
    this.pollInterval = pollInterval;
    this.dispatch =
      dispatch ??
      (({ username, message }) => {
        this.log.info(
          { username },
          `[Notification for ${username}]: ${message}`,
        );
      });

    this.queue = fastq.promise((notification: Notification) => {
      const delivery = this.deliver(notification);
      this.inFlight = delivery;
      return delivery;
    }, 1);
    this.queue.pause();
  }

  private async deliver(notification: Notification): Promise<void> {
    await this.dispatch(notification);
    this.delivered += 1;

    if (this.pollInterval > 0) {
      await sleep(this.pollInterval);
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  get deliveredCount(): number {
    return this.delivered;
  }

  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    this.queue.resume();
    this.log.info('notification service started');
  }

  /**
   * Stops taking new deliveries. The one in progress finishes, queued
   * notifications stay pending until the next start.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    this.queue.pause();
    await Promise.allSettled([this.inFlight]);
    this.log.info(
      { pending: this.queue.length() },
      'notification service stopped',
    );
  }

  /** Resolves once every queued notification has been delivered. */
  async flush(): Promise<void> {
    if (!this.running || this.queue.idle()) {
      return;
    }

    await this.queue.drained();
  }

  addNotification(username: string, message: string): void {
    const notification: Notification = {
      username,
      message,
      createdAt: new Date(),
      read: false,
    };

    const userHistory = this.history.get(username) ?? [];
    userHistory.push(notification);
    this.history.set(username, userHistory);

    this.queue.push(notification).catch((err) => {
      this.log.error({ err, username }, 'failed to deliver notification');
    });
  }

  sendBulkNotification(usernames: string[], message: string): void {
    usernames.forEach((username) => this.addNotification(username, message));
  }

  getNotificationsForUser(username: string): string[] {
    return (this.history.get(username) ?? []).map(({ message }) => message);
  }

  getUnreadCount(username: string): number {
    return (this.history.get(username) ?? []).filter(({ read }) => !read)
      .length;
  }

  markNotificationsAsRead(username: string): void {
    this.history.get(username)?.forEach((notification) => {
      notification.read = true;
    });
  }

  clearNotificationsForUser(username: string): void {
    this.history.delete(username);
  }

  getPendingNotificationCount(): number {
    return this.queue.length();
  }

  getTotalNotificationCount(): number {
    let total = 0;
    this.history.forEach((notifications) => {
      total += notifications.length;
    });

    return total;
  }
}
