/**
 * Connector registrations loaded from a JSON file
 */
import { promises as fs } from 'fs';
import Config from '../config';
import { errnoCode } from '../errors';
import { logger } from '../utils/logger';
import { ConnectorRegistration, validateConnectorRegistrations } from '../utils/schema-validator';
import { Connector } from '../types/provider';
import { JsonlConnector } from './jsonl-connector';

const factories: Record<ConnectorRegistration['type'], (registration: ConnectorRegistration) => Connector> = {
  jsonl: registration => new JsonlConnector(registration),
};

export function createConnector(registration: ConnectorRegistration): Connector {
  return factories[registration.type](registration);
}

/** Load registrations; a missing file means no connectors */
export async function loadConnectors(path: string = Config.sync.connectorsPath): Promise<Connector[]> {
  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      logger.warn({ path }, 'No connector registrations found');
      return [];
    }
    throw err;
  }

  const registrations = validateConnectorRegistrations(JSON.parse(raw));
  logger.info({ path, count: registrations.length }, 'Loaded connector registrations');
  return registrations.map(createConnector);
}
