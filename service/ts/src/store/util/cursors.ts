const ISO_SEPARATOR = '|';

const isValidDate = (value: Date): boolean => Number.isFinite(value.getTime());

export interface EventCursor {
  startTime: Date;
  eventId: number;
}

export const buildEventCursor = ({ startTime, eventId }: EventCursor): string =>
  `${startTime.toISOString()}${ISO_SEPARATOR}${eventId}`;

export const parseEventCursor = (cursor: string): EventCursor | null => {
  if (!cursor) return null;
  const [iso, idRaw] = cursor.split(ISO_SEPARATOR);
  if (!iso || !idRaw) return null;
  const startTime = new Date(iso);
  if (!isValidDate(startTime)) return null;
  const eventId = Number(idRaw);
  if (!Number.isInteger(eventId)) return null;
  return { startTime, eventId };
};

/** True when `a` sorts strictly after `b` in (startTime, eventId) order. */
export const isAfterEventCursor = (a: EventCursor, b: EventCursor): boolean => {
  const diff = a.startTime.getTime() - b.startTime.getTime();
  if (diff !== 0) return diff > 0;
  return a.eventId > b.eventId;
};
