import type { Contact, ExportFormat } from '../types/index.js';
import { toRecord } from '../types/index.js';

/** The persisted-file format: a 2-space indented JSON array, non-ASCII kept literal. */
export function contactsToJson(contacts: readonly Contact[]): string {
  return JSON.stringify(contacts.map(toRecord), null, 2);
}

export function serializeContacts(contacts: readonly Contact[], format: ExportFormat): string {
  switch (format) {
    case 'json':
      return contactsToJson(contacts);
    case 'csv':
      return contactsToCsv(contacts);
    case 'vcf':
      return contacts.map(contactToVCard).join('\r\n');
  }
}

export function contactsToCsv(contacts: readonly Contact[]): string {
  const rows = contacts.map(c =>
    [c.name, c.phone, c.email, c.address].map(csvEscape).join(','));
  return ['Name,Phone,Email,Address', ...rows].join('\n');
}

function csvEscape(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** vCard 4.0 (RFC 6350). The free-text address goes in the street component. */
export function contactToVCard(contact: Contact): string {
  const lines = [
    'BEGIN:VCARD',
    'VERSION:4.0',
    `FN:${escapeVCardValue(contact.name)}`,
    `TEL:${escapeVCardValue(contact.phone)}`,
  ];
  if (contact.email) {
    lines.push(`EMAIL:${escapeVCardValue(contact.email)}`);
  }
  if (contact.address) {
    lines.push(`ADR:;;${escapeVCardValue(contact.address)};;;;`);
  }
  lines.push('END:VCARD');

  return lines.map(foldLine).join('\r\n');
}

function escapeVCardValue(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n');
}

/** Lines longer than 75 octets continue on the next line after a single space. */
function foldLine(line: string): string {
  const parts: string[] = [];
  let current = '';
  let limit = 75;

  for (const char of line) {
    if (Buffer.byteLength(current + char, 'utf-8') > limit) {
      parts.push(current);
      current = '';
      limit = 74;
    }
    current += char;
  }
  parts.push(current);

  return parts.join('\r\n ');
}
