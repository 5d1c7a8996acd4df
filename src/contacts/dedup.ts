import type { CountryCode } from 'libphonenumber-js';
import type { SimilarField, SimilarPair, StoredContact } from '../types/index.js';
import { normalizeEmail, normalizePhone } from './normalize.js';

interface SimilarityOptions {
  threshold?: number;
  limit?: number;
  defaultCountry?: CountryCode;
}

/**
 * Report pairs of contacts that look like the same person even though their
 * natural keys differ (or collide after an update). Advisory only.
 */
export function findSimilar(
  contacts: readonly StoredContact[],
  options: SimilarityOptions = {},
): SimilarPair[] {
  const threshold = options.threshold ?? 0.6;
  const limit = options.limit ?? 50;
  const country = options.defaultCountry ?? 'US';
  const pairs: SimilarPair[] = [];
  const seen = new Set<string>();

  for (const block of buildBlocks(contacts).values()) {
    for (let i = 0; i < block.length; i++) {
      for (let j = i + 1; j < block.length; j++) {
        const a = block[i];
        const b = block[j];
        const pairKey = [a.id, b.id].sort().join(':');
        if (seen.has(pairKey)) continue;
        seen.add(pairKey);

        const result = compareContacts(a, b, country);
        if (result.confidence >= threshold) {
          pairs.push({ idA: a.id, idB: b.id, ...result });
        }
      }
    }
  }

  pairs.sort((a, b) => b.confidence - a.confidence);
  return pairs.slice(0, limit);
}

function compareContacts(
  a: StoredContact,
  b: StoredContact,
  country: CountryCode,
): { confidence: number; matchedFields: SimilarField[] } {
  let score = 0;
  const matchedFields: SimilarField[] = [];

  const phoneA = normalizePhone(a.phone, country);
  const phoneB = normalizePhone(b.phone, country);
  if (phoneA && phoneA === phoneB) {
    score = Math.max(score, 0.9);
    matchedFields.push({
      field: 'phone',
      valueA: a.phone,
      valueB: b.phone,
      similarity: 1,
      matchType: a.phone.trim() === b.phone.trim() ? 'exact' : 'normalized',
    });
  }

  const emailA = normalizeEmail(a.email);
  if (emailA && emailA === normalizeEmail(b.email)) {
    score = Math.max(score, 0.85);
    matchedFields.push({ field: 'email', valueA: a.email, valueB: b.email, similarity: 1, matchType: 'exact' });
  }

  const nameSim = nameSimilarity(a.name, b.name);
  if (nameSim >= 0.85) {
    // A close name on top of a shared phone or email is stronger evidence.
    score = score > 0 ? Math.min(1, score + 0.1) : 0.7;
    matchedFields.push({
      field: 'name',
      valueA: a.name,
      valueB: b.name,
      similarity: Math.round(nameSim * 100) / 100,
      matchType: nameSim === 1 ? 'exact' : 'fuzzy',
    });
  } else if (nameSim >= 0.65) {
    score = Math.max(score, 0.5);
    matchedFields.push({
      field: 'name',
      valueA: a.name,
      valueB: b.name,
      similarity: Math.round(nameSim * 100) / 100,
      matchType: 'fuzzy',
    });
  }

  return { confidence: Math.round(score * 100) / 100, matchedFields };
}

function nameSimilarity(a: string, b: string): number {
  const nameA = a.trim().toLowerCase();
  const nameB = b.trim().toLowerCase();
  if (nameA === nameB) return 1;

  const maxLen = Math.max(nameA.length, nameB.length);
  if (maxLen === 0) return 1;
  return Math.max(0, 1 - levenshtein(nameA, nameB) / maxLen);
}

function levenshtein(a: string, b: string): number {
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const curr = [i];
    for (let j = 1; j <= b.length; j++) {
      curr[j] = a[i - 1] === b[j - 1]
        ? prev[j - 1]
        : 1 + Math.min(prev[j], curr[j - 1], prev[j - 1]);
    }
    prev = curr;
  }
  return prev[b.length];
}

/** Group contacts that share a name initial, email domain or phone tail. */
function buildBlocks(contacts: readonly StoredContact[]): Map<string, StoredContact[]> {
  const blocks = new Map<string, StoredContact[]>();

  for (const contact of contacts) {
    const keys = new Set<string>();

    const initial = contact.name.trim()[0]?.toLowerCase();
    if (initial) keys.add(`name:${initial}`);

    const domain = contact.email.split('@')[1]?.trim().toLowerCase();
    if (domain) keys.add(`domain:${domain}`);

    const digits = contact.phone.replace(/\D/g, '');
    if (digits.length >= 7) keys.add(`phone:${digits.slice(-7)}`);

    for (const key of keys) {
      let block = blocks.get(key);
      if (!block) {
        block = [];
        blocks.set(key, block);
      }
      block.push(contact);
    }
  }

  return blocks;
}
