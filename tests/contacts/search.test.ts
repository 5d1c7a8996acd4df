import { describe, it, expect } from 'vitest';
import { filterContacts, fuzzySearch } from '../../src/contacts/search.js';
import { makeContact } from '../helpers.js';

const contacts = [
  makeContact({ name: 'Acme Traders', phone: '+1 555-0100', email: 'ops@acme.com', address: '12 Market St' }),
  makeContact({ name: 'Beta Supplies', phone: '555-0199', email: 'hello@beta.org' }),
  makeContact({ name: 'ACME Labs', phone: '(020) 7946 0958' }),
  makeContact({ name: 'Gamma Foods', phone: '555-0142', address: 'Acme Road 4' }),
];

describe('filterContacts', () => {
  it('should return every contact in order for an empty query', () => {
    const result = filterContacts(contacts, '');
    expect(result).toEqual(contacts);
    expect(result).not.toBe(contacts);
  });

  it('should treat a whitespace-only query as empty', () => {
    expect(filterContacts(contacts, '   ')).toEqual(contacts);
  });

  it('should match names case-insensitively, keeping store order', () => {
    const result = filterContacts(contacts, 'acme');
    expect(result.map(c => c.name)).toEqual(['Acme Traders', 'ACME Labs']);
  });

  it('should match phone substrings', () => {
    const result = filterContacts(contacts, '0199');
    expect(result.map(c => c.name)).toEqual(['Beta Supplies']);
  });

  it('should trim the query before matching', () => {
    expect(filterContacts(contacts, '  beta ').map(c => c.name)).toEqual(['Beta Supplies']);
  });

  it('should not match email or address', () => {
    expect(filterContacts(contacts, 'hello@')).toEqual([]);
    expect(filterContacts(contacts, 'market')).toEqual([]);
  });

  it('should return the same records, not copies', () => {
    const [first] = filterContacts(contacts, 'traders');
    expect(first).toBe(contacts[0]);
  });

  it('should return empty for no match', () => {
    expect(filterContacts(contacts, 'zzzz')).toEqual([]);
  });
});

describe('fuzzySearch', () => {
  it('should rank the closest name first despite a typo', () => {
    const results = fuzzySearch(contacts, 'Gamma Fods');
    expect(results[0].name).toBe('Gamma Foods');
  });

  it('should search email as well', () => {
    const results = fuzzySearch(contacts, 'hello@beta');
    expect(results[0].name).toBe('Beta Supplies');
  });

  it('should return the first N contacts for an empty query', () => {
    expect(fuzzySearch(contacts, '', 2)).toEqual(contacts.slice(0, 2));
  });

  it('should return empty for no match', () => {
    expect(fuzzySearch(contacts, 'qqqqxxxx')).toEqual([]);
  });
});
