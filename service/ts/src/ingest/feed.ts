import type { NotificationIds, NotificationType } from './notifications.js';

export interface FeedMessage extends NotificationIds {
  type: NotificationType;
  accepted: boolean;
  created?: boolean;
  at: string;
}

export type FeedListener = (message: FeedMessage) => void;

/** In-process fan-out of dispatch outcomes to live subscribers. */
export class LiveFeed {
  private readonly listeners = new Set<FeedListener>();

  subscribe(listener: FeedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** One listener throwing does not keep the message from the rest. */
  publish(message: FeedMessage) {
    for (const listener of [...this.listeners]) {
      try {
        listener(message);
      } catch (err) {
        console.warn('live_feed_listener_error', {
          type: message.type,
          message: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }
}
