/** A contact as persisted: every field is always present, email and address may be empty. */
export interface Contact {
  name: string;
  phone: string;
  email: string;
  address: string;
}

/** Unvalidated form input. Optional fields default to empty text. */
export interface ContactDraft {
  name: string;
  phone: string;
  email?: string;
  address?: string;
}

/** A contact held by the store, carrying an in-memory id that is never written to disk. */
export interface StoredContact extends Contact {
  readonly id: string;
}

export interface ContactSummary {
  id: string;
  name: string;
  phone: string;
}

export function toSummary(contact: StoredContact): ContactSummary {
  return {
    id: contact.id,
    name: contact.name,
    phone: contact.phone,
  };
}

/** Strip the in-memory id, keeping the persisted field order. */
export function toRecord(contact: Contact): Contact {
  return {
    name: contact.name,
    phone: contact.phone,
    email: contact.email,
    address: contact.address,
  };
}
