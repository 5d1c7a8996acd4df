export { validateDraft, isValidPhone, isValidEmail } from './validate.js';
export type { ValidationResult } from './validate.js';
export { createContact, naturalKey } from './model.js';
export { filterContacts, fuzzySearch } from './search.js';
export { normalizePhone, normalizeEmail, toCountryCode } from './normalize.js';
export { findSimilar } from './dedup.js';
export { coerceImportDocument } from './import.js';
export type { CoercedImport } from './import.js';
export { serializeContacts, contactsToJson, contactsToCsv, contactToVCard } from './export.js';
