import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ContactStore } from '../src/store/file-store.js';
import { createContact, providerId } from '../src/contacts/model.js';
import type { Contact, ContactProvider, WriteResult } from '../src/types/index.js';

/** A temp directory for one test. */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'addressbook-test-'));
  return {
    dir,
    cleanup: async () => {
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}

/** Create a temp directory with an initialized ContactStore for testing. */
export async function createTestStore(provider?: ContactProvider): Promise<{ store: ContactStore; storePath: string; cleanup: () => Promise<void> }> {
  const { dir, cleanup } = await createTempDir();
  const storePath = path.join(dir, 'people');
  const store = new ContactStore(storePath, provider);
  await store.init();
  return { store, storePath, cleanup };
}

/** In-memory provider that records every call. */
export class FakeProvider implements ContactProvider {
  readonly name = 'fake';
  remote: Contact[] = [];
  writes: Contact[] = [];
  deletes: string[] = [];
  /** Order of calls, e.g. ["write:abc", "delete:c1"]. */
  calls: string[] = [];
  failWith?: Error;
  nextEtag?: string;
  private created = 0;

  async fetchAll(): Promise<Contact[]> {
    this.calls.push('fetchAll');
    if (this.failWith) throw this.failWith;
    return this.remote.map(c => structuredClone(c));
  }

  async writeContact(contact: Contact): Promise<WriteResult> {
    this.calls.push(`write:${contact.id.value}`);
    if (this.failWith) throw this.failWith;
    this.writes.push(contact);
    const resourceName = contact.id.kind === 'provider' ? `people/${contact.id.value}` : `people/created${++this.created}`;
    return { resourceName, etag: this.nextEtag };
  }

  async deleteContact(id: string): Promise<void> {
    this.calls.push(`delete:${id}`);
    if (this.failWith) throw this.failWith;
    this.deletes.push(id);
  }
}

/** A provider-assigned contact with a name and one phone. */
export function remoteContact(resourceId: string, fullName: string, phone = '+1 555 0100'): Contact {
  return createContact({
    id: providerId(`people/${resourceId}`),
    fullName,
    phones: [{ value: phone, type: 'mobile' }],
    metadata: { etag: `etag-${resourceId}` },
  });
}
