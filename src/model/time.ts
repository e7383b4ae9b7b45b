import { EntityPayload, TimestampObservation } from '../types/canonical';

type Timed = EntityPayload & { timestamps: TimestampObservation[] };

export interface TimeSpan {
  start: number;
  end: number;
}

// Epoch values below this are taken to be in seconds
const EPOCH_SECONDS_LIMIT = 1e12;

/**
 * Canonicalize a provider timestamp to ISO 8601 UTC. Accepts ISO strings
 * with any offset, epoch milliseconds or epoch seconds.
 */
export function canonicalTimestamp(value: unknown): string | undefined {
  let parsed: Date;
  if (typeof value === 'number' && Number.isFinite(value)) {
    parsed = new Date(value < EPOCH_SECONDS_LIMIT ? value * 1000 : value);
  } else if (typeof value === 'string' && value.trim() !== '') {
    const trimmed = value.trim();
    parsed = /^\d+$/.test(trimmed) ? new Date(Number(trimmed) < EPOCH_SECONDS_LIMIT ? Number(trimmed) * 1000 : Number(trimmed)) : new Date(trimmed);
  } else if (value instanceof Date) {
    parsed = value;
  } else {
    return undefined;
  }
  return Number.isNaN(parsed.getTime()) ? undefined : parsed.toISOString();
}

function latest(observations: TimestampObservation[]): number | null {
  let result: number | null = null;
  for (const observation of observations) {
    const ms = Date.parse(observation.value);
    if (!Number.isNaN(ms) && (result === null || ms > result)) {
      result = ms;
    }
  }
  return result;
}

/**
 * Single point in time used to order entities and to decide temporal
 * co-occurrence: event start, message send time, sample time, or the most
 * recent modification reported for files and folders.
 */
export function anchorTime(entity: Timed): number | null {
  switch (entity.kind) {
    case 'Event':
      return Date.parse(entity.attributes.start);
    case 'Message':
      return Date.parse(entity.attributes.sentAt);
    case 'LocationSample':
      return Date.parse(entity.attributes.observedAt);
    default: {
      const modified = latest(entity.timestamps.filter(t => t.label === 'modified'));
      return modified !== null ? modified : latest(entity.timestamps);
    }
  }
}

export function timeSpan(entity: Timed): TimeSpan | null {
  if (entity.kind === 'Event') {
    return { start: Date.parse(entity.attributes.start), end: Date.parse(entity.attributes.end) };
  }
  const anchor = anchorTime(entity);
  return anchor === null ? null : { start: anchor, end: anchor };
}

export function spansOverlap(a: TimeSpan, b: TimeSpan, slackMs = 0): boolean {
  return a.start <= b.end + slackMs && b.start <= a.end + slackMs;
}

/** Union of observations, keyed by (label, value, source) */
export function unionTimestamps(
  existing: TimestampObservation[],
  incoming: TimestampObservation[]
): TimestampObservation[] {
  const seen = new Set(existing.map(t => `${t.label}|${t.value}|${t.source}`));
  const merged = [...existing];
  for (const observation of incoming) {
    const key = `${observation.label}|${observation.value}|${observation.source}`;
    if (!seen.has(key)) {
      seen.add(key);
      merged.push(observation);
    }
  }
  return merged;
}
