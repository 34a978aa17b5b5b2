import type { WriteResult } from '../store/index.js';
import type { LiveFeed } from './feed.js';
import { LifecycleRegistry } from './lifecycle.js';
import { createGameLogEntry } from './log-entry.js';
import { notificationIds } from './notifications.js';
import type { Notification, NotificationIds, NotificationType } from './notifications.js';
import type { EventWriter } from './writer.js';

export interface DispatchOutcome extends NotificationIds {
  type: NotificationType;
  /** The notification's effect is present in the store after the call. */
  accepted: boolean;
  /** Set for creates: true only for the call that inserted the row. */
  created?: boolean;
  error?: string;
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

export interface NotificationDispatcherOptions {
  feed?: LiveFeed;
  lifecycle?: LifecycleRegistry;
  now?: () => Date;
}

type Applied = Pick<DispatchOutcome, 'accepted' | 'created'>;

const fromWrite = <T>(result: WriteResult<T>): Applied => ({
  accepted: result.record !== null,
  created: result.created,
});

/**
 * Routes source notifications to the writer. Each call is independent: a
 * failure is reported in its outcome and never thrown, so one bad
 * notification cannot stop the ones behind it.
 */
export class NotificationDispatcher {
  readonly lifecycle: LifecycleRegistry;
  private readonly feed?: LiveFeed;
  private readonly now: () => Date;

  constructor(
    private readonly writer: EventWriter,
    options: NotificationDispatcherOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.lifecycle = options.lifecycle ?? new LifecycleRegistry(writer, this.now);
    this.feed = options.feed;
  }

  async dispatch(notification: Notification, options: DispatchOptions = {}): Promise<DispatchOutcome> {
    const ids = notificationIds(notification);
    let outcome: DispatchOutcome;
    try {
      outcome = { type: notification.type, ...ids, ...(await this.apply(notification, options)) };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error('notification_dispatch_error', { type: notification.type, ...ids, message });
      outcome = { type: notification.type, ...ids, accepted: false, error: message };
    }

    this.feed?.publish({
      type: outcome.type,
      accepted: outcome.accepted,
      ...(outcome.created !== undefined ? { created: outcome.created } : {}),
      ...ids,
      at: this.now().toISOString(),
    });
    return outcome;
  }

  /** Dispatches concurrently, so a child may arrive in the same batch as its parent. */
  dispatchAll(notifications: Notification[], options: DispatchOptions = {}): Promise<DispatchOutcome[]> {
    return Promise.all(notifications.map((notification) => this.dispatch(notification, options)));
  }

  /** Tears down every tracked event, finalizing those that completed. */
  close(): Promise<void> {
    return this.lifecycle.disposeAll();
  }

  private async apply(notification: Notification, options: DispatchOptions): Promise<Applied> {
    const wait = { signal: options.signal };

    switch (notification.type) {
      case 'event.created': {
        const { event } = notification;
        const result = await this.writer.addEvent({
          id: event.id,
          format: event.format,
          description: event.description,
          startTime: event.startTime ?? this.now(),
          deck: event.deck ?? null,
        });
        if (result.record) {
          await this.lifecycle
            .track({ id: event.id, completed: event.completed ?? false, endTime: event.endTime })
            .settled();
        }
        return fromWrite(result);
      }

      case 'event.completed': {
        const { eventId } = notification;
        if (!(await this.writer.waitForEvent(eventId, wait))) {
          // Kept on the tracker; applied once the event is created.
          console.warn('event_completion_parent_missing', { eventId });
        }
        return { accepted: await this.lifecycle.complete(eventId, notification.endTime) };
      }

      case 'event.released': {
        const tracked = this.lifecycle.get(notification.eventId) !== undefined;
        await this.lifecycle.release(notification.eventId);
        return { accepted: tracked };
      }

      case 'match.created':
        return fromWrite(await this.writer.addMatch(notification.match, notification.eventId, wait));

      case 'match.results':
        return { accepted: await this.writer.updateMatchResults(notification.matchId, notification.results) };

      case 'match.sideboard':
        return {
          accepted: await this.writer.updateSideboardChanges(
            notification.matchId,
            notification.gameId,
            notification.changes
          ),
        };

      case 'game.created':
        return fromWrite(await this.writer.addGame(notification.game, notification.matchId, wait));

      case 'game.results':
        return { accepted: await this.writer.updateGameResults(notification.gameId, notification.results) };

      case 'game.log': {
        const { entry } = notification;
        if (!(await this.writer.waitForGame(entry.gameId, wait))) {
          console.warn('game_log_parent_missing', { gameId: entry.gameId });
          return { accepted: false };
        }
        const inserted = await this.writer.addGameLog(
          createGameLogEntry(entry.gameId, entry.timestamp, entry.type, entry.data)
        );
        return { accepted: true, created: inserted };
      }
    }
  }
}
