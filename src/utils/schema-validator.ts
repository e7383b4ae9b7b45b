import Ajv, { ValidateFunction, ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import rawRecordSchema from '../schemas/raw_record.schema.json';
import fileAttributesSchema from '../schemas/file_attributes.schema.json';
import folderAttributesSchema from '../schemas/folder_attributes.schema.json';
import eventAttributesSchema from '../schemas/event_attributes.schema.json';
import messageAttributesSchema from '../schemas/message_attributes.schema.json';
import locationSampleAttributesSchema from '../schemas/location_sample_attributes.schema.json';
import compositeQuerySchema from '../schemas/composite_query.schema.json';
import syncTriggerSchema from '../schemas/sync_trigger.v1.schema.json';
import batchCommittedSchema from '../schemas/batch_committed.v1.schema.json';
import syncFailedSchema from '../schemas/sync_failed.v1.schema.json';
import connectorsSchema from '../schemas/connectors.schema.json';
import { logger } from './logger';
import {
  EventAttributes,
  FileAttributes,
  FolderAttributes,
  LocationSampleAttributes,
  MessageAttributes,
} from '../types/canonical';
import { RawProviderRecord } from '../types/provider';
import { CompositeQuery } from '../types/query';
import { BatchCommitted, SyncFailed, SyncTrigger } from '../types/events';
import { FieldViolation } from '../errors';

// Type for validation errors
export type ValidationError = FieldViolation;

export class SchemaValidationError extends Error {
  public readonly errors: ValidationError[];

  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'SchemaValidationError';
    this.errors = errors;
  }
}

export interface ConnectorRegistration {
  provider: string;
  account: string;
  type: 'jsonl';
  path: string;
  batchSize: number;
}

// Create and configure Ajv instance
const ajv = new Ajv({
  allErrors: true,
  useDefaults: true,
  allowUnionTypes: true,
});

// Add formats like 'date-time', 'uuid', etc.
addFormats(ajv);

// Compile validators once at startup
const validateRawRecord = ajv.compile<RawProviderRecord>(rawRecordSchema);
const validateCompositeQuery = ajv.compile<CompositeQuery>(compositeQuerySchema);
const validateSyncTrigger = ajv.compile<SyncTrigger>(syncTriggerSchema);
const validateBatchCommitted = ajv.compile<BatchCommitted>(batchCommittedSchema);
const validateSyncFailed = ajv.compile<SyncFailed>(syncFailedSchema);
const validateConnectors = ajv.compile<ConnectorRegistration[]>(connectorsSchema);

// Canonical attribute validators, one per entity kind. The normalizer runs
// them as type guards and reports failures as a NormalizationError.
export const attributeValidators = {
  File: ajv.compile<FileAttributes>(fileAttributesSchema),
  Folder: ajv.compile<FolderAttributes>(folderAttributesSchema),
  Event: ajv.compile<EventAttributes>(eventAttributesSchema),
  Message: ajv.compile<MessageAttributes>(messageAttributesSchema),
  LocationSample: ajv.compile<LocationSampleAttributes>(locationSampleAttributesSchema),
};

/**
 * Format AJV errors into a more readable structure
 */
export function formatValidationErrors(errors: ErrorObject[]): ValidationError[] {
  return errors.map(error => ({
    path: error.instancePath || '/',
    message: error.message || 'Unknown validation error',
  }));
}

/**
 * Run a compiled validator and throw a SchemaValidationError on failure
 */
function check<T>(validate: ValidateFunction<T>, data: unknown, schema: string, message: string): T {
  if (validate(data)) {
    return data;
  }

  const errors = formatValidationErrors(validate.errors || []);

  logger.warn({
    schema,
    errors,
  }, 'Schema validation failed');

  throw new SchemaValidationError(message, errors);
}

/**
 * Validate the connector-facing envelope of a raw record
 */
export function validateRawRecordEnvelope(data: unknown): RawProviderRecord {
  return check(validateRawRecord, data, 'raw_record', 'Invalid raw provider record');
}

export function validateCompositeQueryMessage(data: unknown): CompositeQuery {
  return check(validateCompositeQuery, data, 'composite_query', 'Invalid composite query');
}

export function validateSyncTriggerMessage(data: unknown): SyncTrigger {
  return check(validateSyncTrigger, data, 'sync_trigger.v1', 'Invalid sync_trigger message');
}

export function validateBatchCommittedMessage(data: unknown): BatchCommitted {
  return check(validateBatchCommitted, data, 'batch_committed.v1', 'Invalid batch_committed message');
}

export function validateSyncFailedMessage(data: unknown): SyncFailed {
  return check(validateSyncFailed, data, 'sync_failed.v1', 'Invalid sync_failed message');
}

export function validateConnectorRegistrations(data: unknown): ConnectorRegistration[] {
  return check(validateConnectors, data, 'connectors', 'Invalid connector registrations');
}
