import Fuse, { type IFuseOptions } from 'fuse.js';
import type { Contact } from '../types/index.js';

/**
 * Case-insensitive substring match on name or phone. A blank query returns
 * every contact. The result keeps the input order.
 */
export function filterContacts<T extends Contact>(contacts: readonly T[], query: string): T[] {
  const term = query.trim().toLowerCase();
  if (!term) {
    return [...contacts];
  }
  return contacts.filter(c =>
    c.name.toLowerCase().includes(term) || c.phone.toLowerCase().includes(term));
}

const FUSE_OPTIONS: IFuseOptions<Contact> = {
  keys: [
    { name: 'name', weight: 0.5 },
    { name: 'phone', weight: 0.2 },
    { name: 'email', weight: 0.2 },
    { name: 'address', weight: 0.1 },
  ],
  threshold: 0.4,
  ignoreLocation: true,
  minMatchCharLength: 2,
};

/** Ranked fuzzy search across all fields, best match first. */
export function fuzzySearch<T extends Contact>(
  contacts: readonly T[],
  query: string,
  limit: number = 20,
): T[] {
  if (!query.trim()) {
    return contacts.slice(0, limit);
  }

  const fuse = new Fuse<T>([...contacts], FUSE_OPTIONS);
  return fuse.search(query, { limit }).map(r => r.item);
}
