import type {
  ContactDraft, StoredContact, Selection, Confirmer, MutationOutcome, ImportSummary,
} from '../types/index.js';
import type { ContactStore, DeleteResult } from '../store/index.js';
import { NoSelectionError } from '../utils/index.js';

interface CachedView {
  query: string;
  revision: number;
  view: StoredContact[];
}

/**
 * What a list-and-form front end holds between events: the search text, the
 * filtered view derived from it, and the selected contact. The selection is
 * an id, so it stays correct whatever the view's order or filter.
 */
export class BrowseSession {
  private readonly store: ContactStore;
  private query = '';
  private selection: Selection = null;
  private cache: CachedView | undefined;

  constructor(store: ContactStore) {
    this.store = store;
  }

  get currentQuery(): string {
    return this.query;
  }

  get selectionId(): Selection {
    return this.selection;
  }

  /** Change the search text. Any selection is dropped, as the list is rebuilt. */
  setQuery(query: string): readonly StoredContact[] {
    this.query = query;
    this.selection = null;
    return this.view();
  }

  /** The filtered view, recomputed only when the query or the store changed. */
  view(): readonly StoredContact[] {
    const revision = this.store.revision;
    if (!this.cache || this.cache.query !== this.query || this.cache.revision !== revision) {
      this.cache = { query: this.query, revision, view: this.store.filter(this.query) };
    }
    return this.cache.view;
  }

  /** Select the contact shown at `index` in the current view. */
  selectAt(index: number): StoredContact {
    const contact = this.view()[index];
    if (!contact) {
      throw new NoSelectionError('select', `row ${index}`);
    }
    this.selection = contact.id;
    return contact;
  }

  select(id: string): StoredContact {
    const contact = this.store.find(id);
    if (!contact) {
      throw new NoSelectionError('select', id);
    }
    this.selection = id;
    return contact;
  }

  clearSelection(): void {
    this.selection = null;
  }

  /** The selected contact as it is now, or `null` when none is selected or it is gone. */
  selected(): StoredContact | null {
    return this.store.find(this.selection) ?? null;
  }

  async add(draft: ContactDraft): Promise<MutationOutcome<StoredContact>> {
    const outcome = await this.store.add(draft);
    this.selection = null;
    return outcome;
  }

  async update(draft: ContactDraft): Promise<MutationOutcome<StoredContact>> {
    const outcome = await this.store.update(this.selection, draft);
    this.selection = null;
    return outcome;
  }

  async requestDelete(confirm: Confirmer<StoredContact>): Promise<MutationOutcome<DeleteResult>> {
    const outcome = await this.store.requestDelete(this.selection, confirm);
    if (outcome.result.deleted) {
      this.selection = null;
    }
    return outcome;
  }

  async importMerge(filePath: string): Promise<MutationOutcome<ImportSummary>> {
    const outcome = await this.store.importMerge(filePath);
    this.selection = null;
    return outcome;
  }
}
