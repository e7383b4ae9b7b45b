/**
 * Field extraction helpers. Providers name the same field differently and
 * drift over time, so every canonical field is looked up through a list of
 * candidate paths (dotted, with numeric segments indexing arrays).
 */
import { canonicalTimestamp } from '../model/time';

export type Converter<T> = (value: unknown) => T | undefined;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function getPath(data: unknown, path: string): unknown {
  let current: unknown = data;
  for (const segment of path.split('.')) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
    } else if (isRecord(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

/** First candidate path whose value survives conversion */
export function pick<T>(data: Record<string, unknown>, paths: readonly string[], convert: Converter<T>): T | undefined {
  for (const path of paths) {
    const value = getPath(data, path);
    if (value === undefined || value === null) continue;
    const converted = convert(value);
    if (converted !== undefined) return converted;
  }
  return undefined;
}

// --- Converters ---

export const text: Converter<string> = value => {
  if (typeof value !== 'string') return undefined;
  const normalized = value.normalize('NFC').trim();
  return normalized === '' ? undefined : normalized;
};

/** Like text, but keeps empty strings */
export const body: Converter<string> = value => (typeof value === 'string' ? value.normalize('NFC').trim() : undefined);

export const numeric: Converter<number> = value => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

export const timestamp: Converter<string> = value => canonicalTimestamp(value);

export const lowerHex: Converter<string> = value => {
  const raw = text(value);
  return raw === undefined ? undefined : raw.toLowerCase();
};

const ANGLE_ADDRESS = /<([^>]+)>/;

/** Email from a plain string, a "Name <addr>" string or a provider object */
export const email: Converter<string> = value => {
  if (typeof value === 'string') {
    const match = ANGLE_ADDRESS.exec(value);
    const address = (match ? match[1] : value).trim().toLowerCase();
    return address === '' ? undefined : address;
  }
  if (isRecord(value)) {
    return email(value.email) ?? email(value.address) ?? email(value.emailAddress);
  }
  return undefined;
};

/** Lower-cased, de-duplicated and sorted list of addresses */
export const emailList: Converter<string[]> = value => {
  const items = Array.isArray(value) ? value : typeof value === 'string' ? value.split(',') : [value];
  const addresses = items.map(item => email(item)).filter((a): a is string => a !== undefined);
  return Array.from(new Set(addresses)).sort();
};

export const nativeId: Converter<string> = value => {
  if (typeof value === 'string') return text(value);
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (isRecord(value)) return nativeId(value.id) ?? nativeId(value.fileId) ?? nativeId(value.nativeId);
  return undefined;
};

export const nativeIdList: Converter<string[]> = value => {
  if (!Array.isArray(value)) return undefined;
  return value.map(item => nativeId(item)).filter((id): id is string => id !== undefined);
};

export function basename(path: string): string | undefined {
  const segments = path.split('/').filter(segment => segment !== '');
  return segments.length > 0 ? segments[segments.length - 1] : undefined;
}
