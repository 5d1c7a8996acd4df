import type { Contact, ContactDraft } from '../types/index.js';
import type { ValidationKind } from '../utils/index.js';

const PHONE_PATTERN = /^[0-9+\-() ]{7,20}$/;
const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;

export type ValidationResult =
  | { ok: true; contact: Contact }
  | { ok: false; kind: ValidationKind; message: string };

/** Digits, spaces, `+`, `-` and parentheses, 7 to 20 characters. */
export function isValidPhone(phone: string): boolean {
  return PHONE_PATTERN.test(phone.trim());
}

/** Light `local@domain.tld` shape check. */
export function isValidEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email.trim());
}

/**
 * Trim every field of a draft and check it. The first failing rule wins:
 * missing name/phone, then phone pattern, then email shape.
 */
export function validateDraft(draft: ContactDraft): ValidationResult {
  const contact: Contact = {
    name: draft.name.trim(),
    phone: draft.phone.trim(),
    email: (draft.email ?? '').trim(),
    address: (draft.address ?? '').trim(),
  };

  if (!contact.name || !contact.phone) {
    return { ok: false, kind: 'MissingField', message: 'Name and phone are required.' };
  }
  if (!isValidPhone(contact.phone)) {
    return {
      ok: false,
      kind: 'InvalidPhone',
      message: 'Please enter a valid phone number (digits, +, -, (), spaces).',
    };
  }
  if (contact.email && !isValidEmail(contact.email)) {
    return { ok: false, kind: 'InvalidEmail', message: 'Please enter a valid email address.' };
  }

  return { ok: true, contact };
}
