import { randomUUID } from 'node:crypto';
import type { Contact, ContactDraft, ContactId, ContactSummary } from '../types/index.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function localId(value: string = randomUUID()): ContactId {
  return { kind: 'local', value };
}

/** Build a provider id from a resource name such as "people/c123"; only the last path segment is kept. */
export function providerId(resourceName: string): ContactId {
  const segments = resourceName.split('/');
  return { kind: 'provider', value: segments[segments.length - 1] };
}

/**
 * Provenance for a bare UID read from a file that predates explicit tagging:
 * a canonical UUID was minted locally, anything else came from the provider.
 */
export function inferContactId(uid: string): ContactId {
  return UUID_PATTERN.test(uid) ? localId(uid) : providerId(uid);
}

export function createContact(fields: Partial<ContactDraft>): Contact {
  const id = fields.id ?? localId();
  return {
    id,
    fullName: fields.fullName?.trim() || id.value,
    name: fields.name,
    nicknames: fields.nicknames ?? [],
    phones: fields.phones ?? [],
    emails: fields.emails ?? [],
    addresses: fields.addresses ?? [],
    urls: fields.urls ?? [],
    ims: fields.ims ?? [],
    related: fields.related ?? [],
    calendarUrls: fields.calendarUrls ?? [],
    languages: fields.languages ?? [],
    organization: fields.organization,
    birthday: fields.birthday,
    anniversary: fields.anniversary,
    gender: fields.gender,
    notes: fields.notes,
    photo: fields.photo,
    extensions: fields.extensions ?? [],
    metadata: fields.metadata ?? {},
  };
}

export function displayName(contact: Contact): string {
  return contact.fullName || contact.id.value;
}

/** First mobile/cell number, else the first number. */
export function primaryPhone(contact: Contact): string | undefined {
  const mobile = contact.phones.find(p => {
    const type = p.type?.toLowerCase();
    return type === 'mobile' || type === 'cell';
  });
  return mobile?.value ?? contact.phones[0]?.value;
}

export function primaryEmail(contact: Contact): string | undefined {
  return contact.emails[0]?.value;
}

export function toSummary(contact: Contact): ContactSummary {
  return {
    id: contact.id.value,
    source: contact.id.kind,
    fullName: displayName(contact),
    primaryEmail: primaryEmail(contact),
    primaryPhone: primaryPhone(contact),
    organization: contact.organization?.name,
  };
}
