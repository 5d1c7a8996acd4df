export { ContactStore } from './contact-store.js';
export type { DeleteResult } from './contact-store.js';
export { TaskStore } from './task-store.js';
export { RecordStore } from './record-store.js';
export type { Stored, RecordStoreOptions } from './record-store.js';
export { loadRecords, saveRecords, writeTextFile } from './json-file.js';
