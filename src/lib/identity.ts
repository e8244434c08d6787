import { v5 as uuidv5 } from 'uuid';
import type { RawRecord } from '../types/index.js';

// RFC 4122 URL namespace. Shared by every derivation so identifiers stay
// comparable across datasets and runs.
export const IDENTITY_NAMESPACE = '6ba7b811-9dad-11d1-80b4-00c04fd430c8';

export function deriveId(content: string, namespace: string = IDENTITY_NAMESPACE): string {
  return uuidv5(content, namespace);
}

/** Concatenates the present parts of a content key. */
export function contentKey(...parts: (string | number | null | undefined)[]): string {
  return parts.filter((part) => part !== null && part !== undefined && part !== '').join('');
}

/** Content key for datasets where the whole row is the entity. */
export function recordContentKey(record: RawRecord): string {
  return JSON.stringify(record);
}
