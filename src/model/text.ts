import { EntityKind, EntityPayload } from '../types/canonical';

/** Kinds with text worth embedding */
export const DESCRIBABLE_KINDS: ReadonlySet<EntityKind> = new Set<EntityKind>(['File', 'Folder', 'Event', 'Message']);

function joinText(parts: Array<string | undefined>): string | undefined {
  const joined = parts.filter((part): part is string => part !== undefined && part !== '').join('\n');
  return joined === '' ? undefined : joined;
}

/** Text handed to the embedding service for an entity */
export function describableText(payload: EntityPayload): string | undefined {
  switch (payload.kind) {
    case 'File':
      return joinText([payload.attributes.name, payload.attributes.path, payload.attributes.mimeType]);
    case 'Folder':
      return joinText([payload.attributes.name, payload.attributes.path]);
    case 'Event':
      return joinText([payload.attributes.title, payload.attributes.description, payload.attributes.location?.name]);
    case 'Message':
      return joinText([payload.attributes.subject, payload.attributes.body]);
    case 'LocationSample':
      return undefined;
  }
}
