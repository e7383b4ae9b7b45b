import { createHash } from 'crypto';
import { EntityPayload, TimestampObservation } from '../types/canonical';

/** JSON serialization with object keys sorted at every level */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(item => stableStringify(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
  }
  return JSON.stringify(value);
}

export function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Fields that identify an item regardless of which provider reported it.
 * Owners and provider ids are left out. A file without a content hash also
 * keys on its path and modified time, so distinct files that share a name
 * and size (empty files, placeholders) never share a fingerprint; such files
 * are unified across providers by the similarity pass instead.
 */
function identityFields(payload: EntityPayload, timestamps: TimestampObservation[]): Record<string, unknown> {
  switch (payload.kind) {
    case 'File':
      return {
        name: payload.attributes.name.toLowerCase(),
        size: payload.attributes.size,
        path: payload.attributes.path?.toLowerCase(),
        modified: timestamps.find(observation => observation.label === 'modified')?.value,
      };
    case 'Folder':
      return { name: payload.attributes.name.toLowerCase(), path: payload.attributes.path?.toLowerCase() };
    case 'Event':
      return {
        title: payload.attributes.title,
        start: payload.attributes.start,
        end: payload.attributes.end,
        participants: payload.attributes.participants,
      };
    case 'Message':
      return {
        sender: payload.attributes.sender,
        recipients: payload.attributes.recipients,
        sentAt: payload.attributes.sentAt,
        subject: payload.attributes.subject,
        body: sha256(payload.attributes.body),
      };
    case 'LocationSample':
      return {
        latitude: payload.attributes.latitude,
        longitude: payload.attributes.longitude,
        observedAt: payload.attributes.observedAt,
      };
  }
}

/**
 * Deterministic content fingerprint. A provider content hash on a file is
 * authoritative and used as-is so that the same bytes collide across
 * providers.
 */
export function contentFingerprint(payload: EntityPayload, timestamps: TimestampObservation[] = []): string {
  if (payload.kind === 'File' && payload.attributes.contentHash) {
    return payload.attributes.contentHash;
  }
  return sha256(stableStringify({ kind: payload.kind, ...identityFields(payload, timestamps) }));
}
