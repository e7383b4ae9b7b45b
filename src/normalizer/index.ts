/**
 * Normalizer - maps provider-shaped raw records into the canonical model
 *
 * Pure: no storage access, no wall-clock reads. The same raw record always
 * yields the same draft, which is what makes re-syncs idempotent.
 */
import { ValidateFunction } from 'ajv';
import aliases from './field_aliases.json';
import {
  basename,
  body,
  email,
  emailList,
  isRecord,
  lowerHex,
  nativeId,
  nativeIdList,
  numeric,
  pick,
  text,
  timestamp,
} from './extract';
import {
  attributeValidators,
  formatValidationErrors,
  SchemaValidationError,
  validateRawRecordEnvelope,
} from '../utils/schema-validator';
import { NormalizationError } from '../errors';
import { contentFingerprint } from '../model/fingerprint';
import { roundCoordinate } from '../model/geo';
import { canonicalTimestamp } from '../model/time';
import { provenanceKey } from '../model/provenance';
import { describableText } from '../model/text';
import { EntityPayload, GeoPoint, TimestampLabel, TimestampObservation } from '../types/canonical';
import { EntityDraft, ExplicitReference, NormalizedRecord, ProviderSource, RawProviderRecord } from '../types/provider';

interface MappedRecord {
  payload: EntityPayload;
  references: ExplicitReference[];
  timestamps: TimestampObservation[];
  author?: string;
}

interface MapContext {
  record: RawProviderRecord;
  data: Record<string, unknown>;
  lastModified: string;
  /** Provenance key used as the source of timestamp observations */
  source: string;
  provider: string;
}

function validated<T>(validate: ValidateFunction<T>, candidate: unknown, nativeIdValue: string): T {
  if (validate(candidate)) {
    return candidate;
  }
  throw new NormalizationError(
    `Record ${nativeIdValue} does not satisfy the canonical attribute schema`,
    nativeIdValue,
    formatValidationErrors(validate.errors || [])
  );
}

class TimestampCollector {
  readonly observations: TimestampObservation[] = [];

  constructor(private readonly source: string) {}

  add(label: TimestampLabel, value: string | undefined): this {
    if (value !== undefined) {
      this.observations.push({ label, value, source: this.source });
    }
    return this;
  }
}

function geoOf(latitude: number | undefined, longitude: number | undefined): GeoPoint | undefined {
  if (latitude === undefined || longitude === undefined) return undefined;
  return { latitude: roundCoordinate(latitude), longitude: roundCoordinate(longitude) };
}

function parentReference(parent: string | undefined): ExplicitReference[] {
  return parent === undefined ? [] : [{ relationKind: 'ContainedIn', targetNativeId: parent, evidence: 'parent folder' }];
}

// --- Per-kind mappers ---

function mapFile({ record, data, lastModified, source }: MapContext): MappedRecord {
  const fields = aliases.File;
  const path = pick(data, fields.path, text);
  const name = pick(data, fields.name, text) ?? (path !== undefined ? basename(path) : undefined);
  const owner = pick(data, fields.owner, email);
  const attributes = validated(attributeValidators.File, {
    name,
    path,
    size: pick(data, fields.size, numeric),
    contentHash: pick(data, fields.contentHash, lowerHex),
    mimeType: pick(data, fields.mimeType, text),
    owner,
    geo: geoOf(pick(data, fields.latitude, numeric), pick(data, fields.longitude, numeric)),
  }, record.nativeId);

  const timestamps = new TimestampCollector(source)
    .add('created', pick(data, fields.createdAt, timestamp))
    .add('modified', pick(data, fields.modifiedAt, timestamp) ?? lastModified)
    .add('accessed', pick(data, fields.accessedAt, timestamp))
    .add('changed', pick(data, fields.changedAt, timestamp));

  return {
    payload: { kind: 'File', attributes },
    references: parentReference(pick(data, fields.parentNativeId, nativeId)),
    timestamps: timestamps.observations,
    author: owner,
  };
}

function mapFolder({ record, data, lastModified, source }: MapContext): MappedRecord {
  const fields = aliases.Folder;
  const path = pick(data, fields.path, text);
  const attributes = validated(attributeValidators.Folder, {
    name: pick(data, fields.name, text) ?? (path !== undefined ? basename(path) : undefined),
    path,
    owner: pick(data, fields.owner, email),
  }, record.nativeId);

  const timestamps = new TimestampCollector(source)
    .add('created', pick(data, fields.createdAt, timestamp))
    .add('modified', pick(data, fields.modifiedAt, timestamp) ?? lastModified);

  return {
    payload: { kind: 'Folder', attributes },
    references: parentReference(pick(data, fields.parentNativeId, nativeId)),
    timestamps: timestamps.observations,
  };
}

function mapEvent({ record, data, lastModified, source }: MapContext): MappedRecord {
  const fields = aliases.Event;
  const start = pick(data, fields.start, timestamp);
  const end = pick(data, fields.end, timestamp) ?? start;
  const geo = geoOf(pick(data, fields.latitude, numeric), pick(data, fields.longitude, numeric));
  const locationName = pick(data, fields.locationName, text);
  const organizer = pick(data, fields.organizer, email);

  const attributes = validated(attributeValidators.Event, {
    title: pick(data, fields.title, text),
    start,
    end,
    participants: pick(data, fields.participants, emailList) ?? [],
    organizer,
    description: pick(data, fields.description, text),
    location: geo || locationName !== undefined ? { name: locationName, ...geo } : undefined,
  }, record.nativeId);

  if (Date.parse(attributes.end) < Date.parse(attributes.start)) {
    throw new NormalizationError(`Event ${record.nativeId} ends before it starts`, record.nativeId, [
      { path: '/end', message: 'must not precede start' },
    ]);
  }

  const timestamps = new TimestampCollector(source)
    .add('created', pick(data, fields.createdAt, timestamp))
    .add('modified', pick(data, fields.modifiedAt, timestamp) ?? lastModified);

  const attachments = pick(data, fields.attachmentNativeIds, nativeIdList) ?? [];

  return {
    payload: { kind: 'Event', attributes },
    references: attachments.map((target): ExplicitReference => ({ relationKind: 'ReferTo', targetNativeId: target, evidence: 'event attachment' })),
    timestamps: timestamps.observations,
    author: organizer,
  };
}

function mapMessage({ record, data, lastModified, source }: MapContext): MappedRecord {
  const fields = aliases.Message;
  const to = pick(data, fields.recipients, emailList) ?? [];
  const cc = pick(data, fields.cc, emailList) ?? [];
  const sender = pick(data, fields.sender, email);

  const attributes = validated(attributeValidators.Message, {
    sender,
    recipients: Array.from(new Set([...to, ...cc])).sort(),
    subject: pick(data, fields.subject, text),
    body: pick(data, fields.body, body) ?? '',
    sentAt: pick(data, fields.sentAt, timestamp),
    threadId: pick(data, fields.threadId, nativeId),
  }, record.nativeId);

  const timestamps = new TimestampCollector(source)
    .add('created', pick(data, fields.createdAt, timestamp))
    .add('modified', pick(data, fields.modifiedAt, timestamp) ?? lastModified);

  const inReplyTo = pick(data, fields.inReplyToNativeId, nativeId);

  return {
    payload: { kind: 'Message', attributes },
    references: inReplyTo === undefined ? [] : [{ relationKind: 'ReferTo', targetNativeId: inReplyTo, evidence: 'reply' }],
    timestamps: timestamps.observations,
    author: sender,
  };
}

function mapLocationSample({ record, data, source, provider }: MapContext): MappedRecord {
  const fields = aliases.LocationSample;
  const e7 = (value: number | undefined): number | undefined => (value === undefined ? undefined : value / 1e7);
  const latitude = pick(data, fields.latitude, numeric) ?? e7(pick(data, fields.latitudeE7, numeric));
  const longitude = pick(data, fields.longitude, numeric) ?? e7(pick(data, fields.longitudeE7, numeric));

  const attributes = validated(attributeValidators.LocationSample, {
    latitude: latitude === undefined ? undefined : roundCoordinate(latitude),
    longitude: longitude === undefined ? undefined : roundCoordinate(longitude),
    observedAt: pick(data, fields.observedAt, timestamp),
    source: pick(data, fields.source, text) ?? provider,
    accuracy: pick(data, fields.accuracy, numeric),
    altitude: pick(data, fields.altitude, numeric),
  }, record.nativeId);

  return {
    payload: { kind: 'LocationSample', attributes },
    references: [],
    timestamps: new TimestampCollector(source).add('observed', attributes.observedAt).observations,
  };
}

const MAPPERS = {
  File: mapFile,
  Folder: mapFolder,
  Event: mapEvent,
  Message: mapMessage,
  LocationSample: mapLocationSample,
} satisfies Record<RawProviderRecord['kind'], (context: MapContext) => MappedRecord>;

function rawNativeId(record: unknown): string {
  return isRecord(record) && typeof record.nativeId === 'string' ? record.nativeId : '<unknown>';
}

/**
 * Normalize one raw record from a provider account.
 *
 * Throws NormalizationError when the envelope or the extracted attributes
 * are invalid. Fields under `meta`, and any field the alias table does not
 * name, never reach the draft.
 */
export function normalize(record: unknown, source: ProviderSource, watermark: string | null = null): NormalizedRecord {
  let envelope: RawProviderRecord;
  try {
    envelope = validateRawRecordEnvelope(record);
  } catch (error) {
    if (error instanceof SchemaValidationError) {
      throw new NormalizationError('Invalid raw record envelope', rawNativeId(record), error.errors);
    }
    throw error;
  }

  const lastModified = canonicalTimestamp(envelope.lastModified);
  if (lastModified === undefined) {
    throw new NormalizationError(`Record ${envelope.nativeId} has an unparseable lastModified`, envelope.nativeId, [
      { path: '/lastModified', message: 'must be an ISO 8601 timestamp or epoch value' },
    ]);
  }

  if (envelope.deleted) {
    return { kind: envelope.kind, source, nativeId: envelope.nativeId, watermark, deleted: true };
  }

  const mapped = MAPPERS[envelope.kind]({
    record: envelope,
    data: envelope.data ?? {},
    lastModified,
    source: provenanceKey(source, envelope.nativeId),
    provider: source.provider,
  });

  const draft: EntityDraft = {
    ...mapped.payload,
    source,
    nativeId: envelope.nativeId,
    watermark,
    contentFingerprint: contentFingerprint(mapped.payload, mapped.timestamps),
    timestamps: mapped.timestamps,
    references: mapped.references,
    text: describableText(mapped.payload),
    author: mapped.author,
    deleted: false,
  };
  return draft;
}
