import type { EventWriter } from './writer.js';

/**
 * What the source reports about an event. Read again on teardown, so a source
 * exposing live getters is re-checked rather than snapshotted.
 */
export interface TrackedEvent {
  readonly id: number;
  readonly completed: boolean;
  readonly endTime?: Date | null;
}

export type LifecycleState = 'active' | 'finalized';

type EndTimeWriter = Pick<EventWriter, 'updateEventEndTime' | 'getEvent'>;

/**
 * Bound to one event for as long as the source reports on it. The end time is
 * written at most once, whether completion or teardown gets there first. A write
 * that finds no row yet leaves the tracker active, so the next report retries it.
 */
export class EventLifecycle {
  readonly id: number;
  private current: LifecycleState = 'active';
  private completedAt: Date | null = null;
  private completionReported = false;
  private disposed = false;
  private pending: Promise<boolean> = Promise.resolve(false);

  constructor(
    private event: TrackedEvent,
    private readonly writer: EndTimeWriter,
    private readonly now: () => Date = () => new Date()
  ) {
    this.id = event.id;
    if (this.isCompleted()) void this.finalize();
  }

  get state(): LifecycleState {
    return this.current;
  }

  /** Called when the source reports the event as complete. */
  complete(endTime?: Date | null): Promise<boolean> {
    this.completionReported = true;
    if (endTime) this.completedAt = endTime;
    return this.finalize();
  }

  /**
   * Rebinds to a fresh report of the event, finalizing when it, or an earlier
   * completion, says the event is over.
   */
  observe(event: TrackedEvent): Promise<boolean> {
    this.event = event;
    if (!this.isCompleted()) return this.pending;
    return this.finalize();
  }

  /** Teardown; finalizes when the event had completed. Safe to call twice. */
  dispose(): Promise<boolean> {
    if (this.disposed) return this.pending;
    this.disposed = true;
    if (this.isCompleted()) return this.finalize();
    return this.pending;
  }

  /** Resolves once any end time write in flight has settled. */
  settled(): Promise<boolean> {
    return this.pending;
  }

  private isCompleted(): boolean {
    return this.completionReported || this.event.completed;
  }

  private finalize(): Promise<boolean> {
    if (this.current === 'finalized') {
      // A write in flight that finds no row reopens the tracker; try again behind it.
      return this.pending.then((done) => done || this.finalize());
    }
    this.current = 'finalized';

    const endTime = this.completedAt ?? this.event.endTime ?? this.now();
    this.pending = this.writer
      .updateEventEndTime(this.id, endTime)
      .then(async (updated) => {
        if (updated) {
          console.debug('event_end_time_updated', { eventId: this.id, endTime: endTime.toISOString() });
          return true;
        }
        const stored = await this.writer.getEvent(this.id);
        if (stored?.endTime) return true;
        console.warn('event_end_time_deferred', { eventId: this.id });
        this.current = 'active';
        return false;
      })
      .catch((err: unknown) => {
        console.error('event_finalize_error', { eventId: this.id, error: err });
        this.current = 'active';
        return false;
      });
    return this.pending;
  }
}

/** One {@link EventLifecycle} per event id, torn down together on shutdown. */
export class LifecycleRegistry {
  private readonly trackers = new Map<number, EventLifecycle>();

  constructor(
    private readonly writer: EndTimeWriter,
    private readonly now: () => Date = () => new Date()
  ) {}

  track(event: TrackedEvent): EventLifecycle {
    const existing = this.trackers.get(event.id);
    if (existing) {
      void existing.observe(event);
      return existing;
    }
    const tracker = new EventLifecycle(event, this.writer, this.now);
    this.trackers.set(event.id, tracker);
    return tracker;
  }

  get(eventId: number): EventLifecycle | undefined {
    return this.trackers.get(eventId);
  }

  get size(): number {
    return this.trackers.size;
  }

  /**
   * Completes a tracked event. An untracked one gets a tracker that keeps the
   * completion until the event is tracked, if its row is not there yet.
   */
  async complete(eventId: number, endTime?: Date | null): Promise<boolean> {
    const tracker = this.trackers.get(eventId) ?? this.track({ id: eventId, completed: false });
    return tracker.complete(endTime);
  }

  async release(eventId: number): Promise<boolean> {
    const tracker = this.trackers.get(eventId);
    if (!tracker) return false;
    this.trackers.delete(eventId);
    return tracker.dispose();
  }

  async disposeAll(): Promise<void> {
    const trackers = [...this.trackers.values()];
    this.trackers.clear();
    await Promise.all(trackers.map((tracker) => tracker.dispose()));
  }
}
