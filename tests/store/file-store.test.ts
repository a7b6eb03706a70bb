import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ContactStore } from '../../src/store/file-store.js';
import { createContact, localId } from '../../src/contacts/model.js';
import { ContactNotFoundError, ProviderError, ValidationError } from '../../src/utils/index.js';
import { FakeProvider, createTestStore, remoteContact } from '../helpers.js';

describe('ContactStore', () => {
  let store: ContactStore;
  let storePath: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ store, storePath, cleanup } = await createTestStore());
  });

  afterEach(async () => {
    await cleanup();
  });

  describe('write', () => {
    it('assigns a local id and stamps the revision', async () => {
      const contact = await store.write(createContact({ fullName: 'Alice' }));

      expect(contact.id.kind).toBe('local');
      expect(contact.metadata.revision).toMatch(/^\d{8}T\d{6}Z$/);
      const file = await fs.readFile(path.join(storePath, `${contact.id.value}.vcf`), 'utf-8');
      expect(file).toContain(`UID:urn:uuid:${contact.id.value}\r\n`);
    });

    it('keeps an existing id', async () => {
      const written = await store.write(remoteContact('c10', 'Ten'));
      expect(written.id).toEqual({ kind: 'provider', value: 'c10' });
      expect(await store.get('c10')).toEqual(written);
    });

    it('rejects ids that cannot be file names', async () => {
      await expect(store.write(createContact({ id: localId('../escape'), fullName: 'X' }))).rejects.toThrow('cannot be used as a file name');
    });
  });

  describe('get', () => {
    it('returns null for unknown and unusable ids', async () => {
      expect(await store.get('missing')).toBeNull();
      expect(await store.get('../etc/passwd')).toBeNull();
      expect(await store.get('')).toBeNull();
    });

    it('fails on a file that is not a vCard', async () => {
      await fs.writeFile(path.join(storePath, 'broken.vcf'), 'not a vcard', 'utf-8');
      await expect(store.get('broken')).rejects.toThrow(ValidationError);
    });

    it('returns null after delete', async () => {
      const contact = await store.write(createContact({ fullName: 'Gone' }));
      await store.delete(contact.id.value);
      expect(await store.get(contact.id.value)).toBeNull();
    });
  });

  describe('list', () => {
    it('returns every .vcf file and ignores other files', async () => {
      await store.write(createContact({ fullName: 'A' }));
      await store.write(createContact({ fullName: 'B' }));
      await fs.writeFile(path.join(storePath, 'notes.txt'), 'ignore me', 'utf-8');

      const names = (await store.list()).map(c => c.fullName).sort();
      expect(names).toEqual(['A', 'B']);
    });

    it('is empty when the directory does not exist', async () => {
      expect(await new ContactStore(path.join(storePath, 'nope')).list()).toEqual([]);
    });
  });

  describe('resolve', () => {
    it('finds by id first, then by case-insensitive display name', async () => {
      const alice = await store.write(createContact({ fullName: 'Alice Smith' }));

      expect((await store.resolve(alice.id.value))?.id).toEqual(alice.id);
      expect((await store.resolve('alice smith'))?.id).toEqual(alice.id);
      expect(await store.resolve('Alice')).toBeNull();
    });
  });

  describe('delete', () => {
    it('throws ContactNotFoundError for a missing contact', async () => {
      await expect(store.delete('missing')).rejects.toThrow(ContactNotFoundError);
    });
  });

  describe('update', () => {
    it('changes only the given fields', async () => {
      const contact = await store.write(createContact({
        fullName: 'Carol',
        emails: [{ value: 'carol@example.com' }],
      }));

      const updated = await store.update(contact.id.value, { phones: [{ value: '555-0199', type: 'home' }] });

      expect(updated.id).toEqual(contact.id);
      expect(updated.fullName).toBe('Carol');
      expect(updated.emails).toEqual([{ value: 'carol@example.com' }]);
      expect(updated.phones).toEqual([{ value: '555-0199', type: 'home' }]);
      expect((await store.get(contact.id.value))?.phones).toEqual([{ value: '555-0199', type: 'home' }]);
    });

    it('throws for a missing contact', async () => {
      await expect(store.update('missing', { fullName: 'X' })).rejects.toThrow(ContactNotFoundError);
    });
  });

  describe('writeSynced', () => {
    it('stamps lastSynced without a revision', async () => {
      const synced = await store.writeSynced(remoteContact('c1', 'One'), '20240101T000000Z');

      expect(synced.metadata.lastSynced).toBe('20240101T000000Z');
      expect((await store.get('c1'))?.metadata).toEqual({ etag: 'etag-c1', lastSynced: '20240101T000000Z' });
    });
  });
});

describe('ContactStore with a provider', () => {
  let provider: FakeProvider;
  let store: ContactStore;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    provider = new FakeProvider();
    ({ store, cleanup } = await createTestStore(provider));
  });

  afterEach(async () => {
    await cleanup();
  });

  it('pushes after writing locally', async () => {
    const contact = await store.write(createContact({ fullName: 'Pushed' }));

    expect(provider.calls).toEqual([`write:${contact.id.value}`]);
    expect(provider.writes[0].metadata.revision).toBe(contact.metadata.revision);
  });

  it('keeps the local file when the push fails', async () => {
    const contact = createContact({ fullName: 'Offline' });
    provider.failWith = new ProviderError('fake', 'unavailable', 503);

    await expect(store.write(contact)).rejects.toThrow(ProviderError);
    expect((await store.get(contact.id.value))?.fullName).toBe('Offline');
  });

  it('rewrites the file with the etag returned by an update', async () => {
    provider.nextEtag = 'etag-fresh';
    const written = await store.write(remoteContact('c3', 'Three'));

    expect(written.metadata.etag).toBe('etag-fresh');
    expect((await store.get('c3'))?.metadata.etag).toBe('etag-fresh');
  });

  it('deletes provider contacts remotely before removing the file', async () => {
    await store.writeSynced(remoteContact('c4', 'Four'), '20240101T000000Z');

    await store.delete('c4');

    expect(provider.deletes).toEqual(['c4']);
    expect(await store.get('c4')).toBeNull();
  });

  it('keeps the file when the remote delete fails', async () => {
    await store.writeSynced(remoteContact('c5', 'Five'), '20240101T000000Z');
    provider.failWith = new ProviderError('fake', 'gone wrong', 500);

    await expect(store.delete('c5')).rejects.toThrow(ProviderError);
    expect(await store.get('c5')).not.toBeNull();
  });

  it('deletes local contacts without calling the provider', async () => {
    await store.writeSynced(createContact({ id: localId(), fullName: 'Local' }), '20240101T000000Z');
    const [local] = await store.list();

    await store.delete(local.id.value);

    expect(provider.calls).toEqual([]);
  });

  it('does not touch the provider when the contact is missing', async () => {
    await expect(store.delete('c404')).rejects.toThrow(ContactNotFoundError);
    expect(provider.calls).toEqual([]);
  });
});

