export type { Contact, ContactDraft, StoredContact, ContactSummary } from './contact.js';
export { toSummary, toRecord } from './contact.js';
export type { Task, TaskStatus, StoredTask } from './task.js';
export type {
  Selection, Confirmer, LoadResult, MutationOutcome, ImportSummary, ExportFormat,
  SimilarField, SimilarPair,
} from './store.js';
