import { describe, it, expect } from 'vitest';
import { validateDraft, isValidPhone, isValidEmail } from '../../src/contacts/validate.js';

describe('isValidPhone', () => {
  it('should accept digits with +, -, parentheses and spaces', () => {
    expect(isValidPhone('+1 (555) 010-0100')).toBe(true);
    expect(isValidPhone('555-0100')).toBe(true);
  });

  it('should accept exactly 7 and exactly 20 characters', () => {
    expect(isValidPhone('5550100')).toBe(true);
    expect(isValidPhone('1'.repeat(20))).toBe(true);
  });

  it('should reject numbers shorter than 7 or longer than 20 characters', () => {
    expect(isValidPhone('555010')).toBe(false);
    expect(isValidPhone('1'.repeat(21))).toBe(false);
  });

  it('should reject letters and other punctuation', () => {
    expect(isValidPhone('555-0100 ext 2')).toBe(false);
    expect(isValidPhone('555.010.0100')).toBe(false);
  });

  it('should ignore surrounding whitespace', () => {
    expect(isValidPhone('  555-0100  ')).toBe(true);
  });
});

describe('isValidEmail', () => {
  it('should accept local@domain.tld', () => {
    expect(isValidEmail('ops@acme.com')).toBe(true);
    expect(isValidEmail('a@b.c.d')).toBe(true);
  });

  it('should reject a domain without a dot', () => {
    expect(isValidEmail('ops@acme')).toBe(false);
  });

  it('should reject a second @ or whitespace', () => {
    expect(isValidEmail('ops@@acme.com')).toBe(false);
    expect(isValidEmail('o ps@acme.com')).toBe(false);
  });
});

describe('validateDraft', () => {
  it('should return the trimmed contact when valid', () => {
    const result = validateDraft({
      name: '  Acme Traders ',
      phone: ' +1 555-0100 ',
      email: ' ops@acme.com ',
      address: '12 Market St\nSpringfield\n',
    });

    expect(result).toEqual({
      ok: true,
      contact: {
        name: 'Acme Traders',
        phone: '+1 555-0100',
        email: 'ops@acme.com',
        address: '12 Market St\nSpringfield',
      },
    });
  });

  it('should default missing email and address to empty text', () => {
    const result = validateDraft({ name: 'Acme', phone: '555-0100' });
    expect(result).toEqual({
      ok: true,
      contact: { name: 'Acme', phone: '555-0100', email: '', address: '' },
    });
  });

  it('should fail with MissingField for an empty or blank name', () => {
    expect(validateDraft({ name: '', phone: '555-0100' })).toMatchObject({ ok: false, kind: 'MissingField' });
    expect(validateDraft({ name: '   ', phone: '555-0100' })).toMatchObject({ ok: false, kind: 'MissingField' });
  });

  it('should fail with MissingField for a blank phone', () => {
    expect(validateDraft({ name: 'Acme', phone: '  ' })).toMatchObject({ ok: false, kind: 'MissingField' });
  });

  it('should fail with InvalidPhone for a malformed phone', () => {
    expect(validateDraft({ name: 'Acme', phone: 'call me' })).toEqual({
      ok: false,
      kind: 'InvalidPhone',
      message: 'Please enter a valid phone number (digits, +, -, (), spaces).',
    });
  });

  it('should fail with InvalidEmail for a malformed non-empty email', () => {
    expect(validateDraft({ name: 'Acme', phone: '555-0100', email: 'ops@acme' })).toEqual({
      ok: false,
      kind: 'InvalidEmail',
      message: 'Please enter a valid email address.',
    });
  });

  it('should accept a blank email', () => {
    expect(validateDraft({ name: 'Acme', phone: '555-0100', email: '   ' }).ok).toBe(true);
  });

  it('should report a missing field before a bad phone, and a bad phone before a bad email', () => {
    expect(validateDraft({ name: '', phone: 'x' })).toMatchObject({ kind: 'MissingField' });
    expect(validateDraft({ name: 'Acme', phone: 'x', email: 'bad' })).toMatchObject({ kind: 'InvalidPhone' });
  });

  it('should place no constraint on the address', () => {
    expect(validateDraft({ name: 'Acme', phone: '555-0100', address: '@@@ !!!' }).ok).toBe(true);
  });
});
