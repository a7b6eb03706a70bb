import * as fs from 'node:fs/promises';
import type { Contact, ContactDraft, ContactProvider } from '../types/index.js';
import { contactToVCard, vcardToContact } from '../contacts/vcard.js';
import { createContact, displayName, providerId } from '../contacts/model.js';
import { ContactNotFoundError, StoreError, isErrnoCode, logger, vcardTimestamp } from '../utils/index.js';
import { contactPath, extractIdFromFile, isStorableId } from './file-layout.js';

export type ContactChanges = Partial<Omit<Contact, 'id' | 'metadata'>>;

/**
 * One vCard file per contact in a flat directory. When a provider is
 * configured, local writes and deletes are mirrored to it.
 */
export class ContactStore {
  readonly dir: string;
  private provider?: ContactProvider;

  constructor(dir: string, provider?: ContactProvider) {
    this.dir = dir;
    this.provider = provider;
  }

  async init(): Promise<void> {
    try {
      await fs.mkdir(this.dir, { recursive: true });
    } catch (err) {
      throw new StoreError('create', this.dir, err);
    }
  }

  async get(id: string): Promise<Contact | null> {
    if (!isStorableId(id)) return null;
    const filePath = contactPath(this.dir, id);
    let vcard: string;
    try {
      vcard = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return null;
      throw new StoreError('read', filePath, err);
    }
    return vcardToContact(vcard);
  }

  /** All stored contacts, in directory order. */
  async list(): Promise<Contact[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return [];
      throw new StoreError('list', this.dir, err);
    }

    const contacts: Contact[] = [];
    for (const entry of entries) {
      const id = extractIdFromFile(entry);
      if (!id) continue;
      const contact = await this.get(id);
      if (contact) contacts.push(contact);
    }
    return contacts;
  }

  /** Look up by id, falling back to a case-insensitive exact display-name match. */
  async resolve(query: string): Promise<Contact | null> {
    const byId = await this.get(query);
    if (byId) return byId;

    const wanted = query.toLowerCase();
    const all = await this.list();
    return all.find(c => displayName(c).toLowerCase() === wanted) ?? null;
  }

  /**
   * Persist a contact, assigning a local id when it has none, then push it to
   * the provider. A failed push fails the call; the local file stays written.
   */
  async write(draft: ContactDraft): Promise<Contact> {
    const contact = createContact({
      ...draft,
      metadata: { ...draft.metadata, revision: vcardTimestamp() },
    });
    await this.writeFile(contact);
    logger.info('Saved contact:', contact.id.value, contact.fullName);

    if (!this.provider) return contact;

    const result = await this.provider.writeContact(contact);
    if (contact.id.kind === 'provider' && result.etag && result.etag !== contact.metadata.etag) {
      const refreshed: Contact = { ...contact, metadata: { ...contact.metadata, etag: result.etag } };
      await this.writeFile(refreshed);
      return refreshed;
    }
    if (contact.id.kind === 'local') {
      logger.debug(`Pushed local ${contact.id.value} as ${providerId(result.resourceName).value}`);
    }
    return contact;
  }

  /** Local-only write of a record fetched from the provider. */
  async writeSynced(contact: Contact, syncedAt: string): Promise<Contact> {
    const stamped: Contact = { ...contact, metadata: { ...contact.metadata, lastSynced: syncedAt } };
    await this.writeFile(stamped);
    return stamped;
  }

  /** Remove a contact; provider-assigned records are deleted remotely first. */
  async delete(id: string): Promise<void> {
    const contact = await this.get(id);
    if (!contact) throw new ContactNotFoundError(id);

    if (contact.id.kind === 'provider' && this.provider) {
      await this.provider.deleteContact(contact.id.value);
    }

    const filePath = contactPath(this.dir, id);
    try {
      await fs.unlink(filePath);
    } catch (err) {
      throw new StoreError('delete', filePath, err);
    }
    logger.info('Deleted contact:', id, contact.fullName);
  }

  async update(id: string, changes: ContactChanges): Promise<Contact> {
    const existing = await this.get(id);
    if (!existing) throw new ContactNotFoundError(id);
    return this.write({ ...existing, ...changes, id: existing.id, metadata: existing.metadata });
  }

  private async writeFile(contact: Contact): Promise<void> {
    if (!isStorableId(contact.id.value)) {
      throw new StoreError('write', contact.id.value, new Error('identifier cannot be used as a file name'));
    }
    const filePath = contactPath(this.dir, contact.id.value);
    try {
      await fs.writeFile(filePath, contactToVCard(contact), 'utf-8');
    } catch (err) {
      throw new StoreError('write', filePath, err);
    }
  }
}
