import type { Contact } from './contact.js';

export interface WriteResult {
  resourceName: string;
  etag?: string;
}

/**
 * A remote contact service. The store and the sync engine hold one of these
 * optionally; when absent, pushes and remote deletes are skipped.
 */
export interface ContactProvider {
  readonly name: string;

  /** Every remote contact, translated to the record model. Pages are followed internally. */
  fetchAll(): Promise<Contact[]>;
  /** Create the contact remotely, or update it when its id is provider-assigned. */
  writeContact(contact: Contact): Promise<WriteResult>;
  /** Delete by provider-assigned id. */
  deleteContact(id: string): Promise<void>;
}

export interface SyncResult {
  provider: string;
  pulled: number;
  syncedAt: string;
  duration: number;
}
