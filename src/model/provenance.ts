import { CanonicalEntity, ProvenanceEntry } from '../types/canonical';
import { ProviderSource } from '../types/provider';

/** Stable key for one item at one provider account */
export function provenanceKey(source: ProviderSource, nativeId: string): string {
  return `${source.provider}/${source.account}/${nativeId}`;
}

export function entryKey(entry: ProvenanceEntry): string {
  return provenanceKey(entry, entry.nativeId);
}

export function findEntry(entity: CanonicalEntity, key: string): ProvenanceEntry | undefined {
  return entity.provenance.find(entry => entryKey(entry) === key);
}

export function liveEntries(entity: CanonicalEntity): ProvenanceEntry[] {
  return entity.provenance.filter(entry => !entry.removed);
}
