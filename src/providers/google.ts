import { google, type people_v1 } from 'googleapis';
import type { Contact, ContactProvider, WriteResult } from '../types/index.js';
import type { GoogleSession } from '../auth/session.js';
import type { SyncTokenFile } from '../auth/credentials.js';
import { PERSON_FIELDS, UPDATE_PERSON_FIELDS, contactToPerson, personToContact } from '../google/translate.js';
import { logger, toProviderError } from '../utils/index.js';

type Person = people_v1.Schema$Person;

export interface ConnectionsPage {
  connections: Person[];
  nextPageToken?: string;
  nextSyncToken?: string;
}

/** The People API calls the provider makes. */
export interface PeopleApi {
  listConnections(pageToken?: string): Promise<ConnectionsPage>;
  createContact(person: Person): Promise<Person>;
  updateContact(resourceName: string, person: Person, updatePersonFields: string): Promise<Person>;
  deleteContact(resourceName: string): Promise<void>;
}

/**
 * PeopleApi backed by googleapis. Every call first refreshes the session's
 * access token.
 */
export function googlePeopleApi(session: GoogleSession): PeopleApi {
  const people = async () => google.people({ version: 'v1', auth: await session.authorize() }).people;

  return {
    async listConnections(pageToken) {
      const res = await (await people()).connections.list({
        resourceName: 'people/me',
        pageSize: 1000,
        personFields: PERSON_FIELDS.join(','),
        sources: ['READ_SOURCE_TYPE_CONTACT'],
        requestSyncToken: true,
        pageToken,
      });
      return {
        connections: res.data.connections ?? [],
        nextPageToken: res.data.nextPageToken ?? undefined,
        nextSyncToken: res.data.nextSyncToken ?? undefined,
      };
    },
    async createContact(person) {
      const res = await (await people()).createContact({ requestBody: person });
      return res.data;
    },
    async updateContact(resourceName, person, updatePersonFields) {
      const res = await (await people()).updateContact({ resourceName, updatePersonFields, requestBody: person });
      return res.data;
    },
    async deleteContact(resourceName) {
      await (await people()).deleteContact({ resourceName });
    },
  };
}

/**
 * Google Contacts through the People API.
 *
 * Always fetches the full connection list. The sync token returned with the
 * last page is persisted but not yet sent back.
 */
export class GoogleProvider implements ContactProvider {
  readonly name = 'google';
  private api: PeopleApi;
  private syncToken?: SyncTokenFile;

  constructor(api: PeopleApi, syncToken?: SyncTokenFile) {
    this.api = api;
    this.syncToken = syncToken;
  }

  async fetchAll(): Promise<Contact[]> {
    const contacts: Contact[] = [];
    let pageToken: string | undefined;
    let nextSyncToken: string | undefined;

    do {
      let page: ConnectionsPage;
      try {
        page = await this.api.listConnections(pageToken);
      } catch (err) {
        throw toProviderError(this.name, 'list connections failed', err);
      }
      for (const person of page.connections) {
        contacts.push(personToContact(person));
      }
      pageToken = page.nextPageToken;
      nextSyncToken = page.nextSyncToken ?? nextSyncToken;
    } while (pageToken);

    if (nextSyncToken && this.syncToken) {
      await this.syncToken.save(nextSyncToken);
    }

    logger.info(`Google: fetched ${contacts.length} contacts`);
    return contacts;
  }

  async writeContact(contact: Contact): Promise<WriteResult> {
    const person = contactToPerson(contact);

    if (contact.id.kind === 'provider') {
      const resourceName = `people/${contact.id.value}`;
      try {
        const updated = await this.api.updateContact(
          resourceName,
          { ...person, etag: contact.metadata.etag },
          UPDATE_PERSON_FIELDS.join(','),
        );
        logger.debug(`Google: updated ${resourceName}`);
        return { resourceName: updated.resourceName ?? resourceName, etag: updated.etag ?? undefined };
      } catch (err) {
        throw toProviderError(this.name, `update ${resourceName} failed`, err);
      }
    }

    try {
      const created = await this.api.createContact(person);
      logger.debug(`Google: created ${created.resourceName ?? '(unnamed)'} for local ${contact.id.value}`);
      return { resourceName: created.resourceName ?? '', etag: created.etag ?? undefined };
    } catch (err) {
      throw toProviderError(this.name, 'create contact failed', err);
    }
  }

  async deleteContact(id: string): Promise<void> {
    const resourceName = `people/${id}`;
    try {
      await this.api.deleteContact(resourceName);
    } catch (err) {
      throw toProviderError(this.name, `delete ${resourceName} failed`, err);
    }
    logger.debug(`Google: deleted ${resourceName}`);
  }
}
