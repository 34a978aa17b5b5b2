import type { DispatchOutcome, NotificationDispatcher } from './dispatcher.js';
import { NotificationSchema } from './notifications.js';
import type { Notification } from './notifications.js';

export interface ReplayFailure {
  line: number;
  message: string;
}

export interface ReplayReport {
  lines: number;
  dispatched: number;
  accepted: number;
  invalid: ReplayFailure[];
}

export interface ReplayOptions {
  /** Notifications dispatched together; 1 keeps the recorded order strictly. */
  batchSize?: number;
  signal?: AbortSignal;
}

const parseLine = (line: string): { ok: true; value: Notification } | { ok: false; message: string } => {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }
  const parsed = NotificationSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, message: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ') };
  }
  return { ok: true, value: parsed.data };
};

/** Feeds a recorded NDJSON notification log back through the dispatcher. */
export const replayNotifications = async (
  lines: Iterable<string> | AsyncIterable<string>,
  dispatcher: Pick<NotificationDispatcher, 'dispatchAll'>,
  options: ReplayOptions = {}
): Promise<ReplayReport> => {
  const batchSize = Math.max(1, options.batchSize ?? 1);
  const report: ReplayReport = { lines: 0, dispatched: 0, accepted: 0, invalid: [] };
  let batch: Notification[] = [];

  const flush = async () => {
    if (!batch.length) return;
    const outcomes: DispatchOutcome[] = await dispatcher.dispatchAll(batch, { signal: options.signal });
    report.dispatched += outcomes.length;
    report.accepted += outcomes.filter((outcome) => outcome.accepted).length;
    batch = [];
  };

  let lineNumber = 0;
  for await (const raw of lines) {
    lineNumber += 1;
    const line = raw.trim();
    if (!line) continue;
    report.lines += 1;

    const parsed = parseLine(line);
    if (!parsed.ok) {
      report.invalid.push({ line: lineNumber, message: parsed.message });
      continue;
    }

    batch.push(parsed.value);
    if (batch.length >= batchSize) await flush();
    if (options.signal?.aborted) break;
  }

  if (!options.signal?.aborted) await flush();
  return report;
};
