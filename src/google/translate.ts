import type { people_v1 } from 'googleapis';
import type { Contact, ContactExtension, TypedValue } from '../types/index.js';
import { createContact, providerId } from '../contacts/model.js';

type Person = people_v1.Schema$Person;

/** Every person field the translator reads. */
export const PERSON_FIELDS = [
  'addresses', 'ageRanges', 'biographies', 'birthdays', 'calendarUrls', 'clientData', 'coverPhotos',
  'emailAddresses', 'events', 'externalIds', 'genders', 'imClients', 'interests', 'locales', 'locations',
  'memberships', 'metadata', 'miscKeywords', 'names', 'nicknames', 'occupations', 'organizations',
  'phoneNumbers', 'photos', 'relations', 'sipAddresses', 'skills', 'urls', 'userDefined',
] as const;

/** The person fields `contactToPerson` writes; used as the update mask. */
export const UPDATE_PERSON_FIELDS = [
  'names', 'phoneNumbers', 'emailAddresses', 'addresses', 'organizations', 'birthdays', 'biographies', 'urls',
] as const;

export interface CalendarDate {
  year?: number | null;
  month?: number | null;
  day?: number | null;
}

/**
 * Translate a People API person into a Contact. Never throws for a well-formed
 * person; a person with only a resource name yields a contact whose id and
 * display name are both the resource id.
 */
export function personToContact(person: Person): Contact {
  const id = providerId(person.resourceName ?? '');
  const primaryName = person.names?.[0];
  const firstOrg = person.organizations?.[0];

  const birthdayDate = person.birthdays?.[0]?.date;

  const extensions: ContactExtension[] = [];
  let anniversary: string | undefined;
  for (const event of person.events ?? []) {
    const date = event.date ? formatVCardDate(event.date) : undefined;
    if (!date) continue;
    if (event.type?.toLowerCase() === 'anniversary') {
      anniversary = date;
    } else {
      extensions.push(extension('X-GOOGLE-EVENT', date, event.type));
    }
  }

  let gender: string | undefined;
  for (const g of person.genders ?? []) {
    gender = g.value ?? undefined;
  }

  const ims: TypedValue[] = [
    ...(person.imClients ?? []).map(im => typed(`${(im.protocol ?? '').toLowerCase()}:${im.username ?? ''}`, lower(im.type))),
    ...(person.sipAddresses ?? []).map(sip => typed(`sip:${sip.value ?? ''}`, lower(sip.type))),
  ];

  for (const i of person.interests ?? []) extensions.push(extension('X-GOOGLE-INTEREST', i.value));
  for (const s of person.skills ?? []) extensions.push(extension('X-GOOGLE-SKILL', s.value));
  for (const o of person.occupations ?? []) extensions.push(extension('X-GOOGLE-OCCUPATION', o.value));
  for (const l of person.locations ?? []) extensions.push(extension('X-GOOGLE-LOCATION', l.value, l.type));
  for (const m of person.memberships ?? []) {
    if (m.contactGroupMembership) {
      extensions.push(extension('X-GOOGLE-GROUP-MEMBERSHIP', m.contactGroupMembership.contactGroupResourceName));
    }
  }
  for (const ud of person.userDefined ?? []) {
    extensions.push(extension(extensionKey('X-GOOGLE-CUSTOM', ud.key ?? ''), ud.value));
  }
  for (const cd of person.clientData ?? []) {
    extensions.push(extension(extensionKey('X-GOOGLE-CLIENT', cd.key ?? ''), cd.value));
  }
  for (const e of person.externalIds ?? []) extensions.push(extension('X-GOOGLE-EXTERNAL-ID', e.value, e.type));
  for (const k of person.miscKeywords ?? []) extensions.push(extension('X-GOOGLE-KEYWORD', k.value, k.type));
  for (const c of person.coverPhotos ?? []) extensions.push(extension('X-GOOGLE-COVER-PHOTO', c.url));
  for (const a of person.ageRanges ?? []) extensions.push(extension('X-GOOGLE-AGE-RANGE', a.ageRange));
  for (const src of person.metadata?.sources ?? []) extensions.push(extension('X-GOOGLE-SOURCE', src.id, src.type));

  return createContact({
    id,
    fullName: primaryName?.displayName ?? undefined,
    name: primaryName ? {
      familyName: primaryName.familyName || undefined,
      givenName: primaryName.givenName || undefined,
      middleName: primaryName.middleName || undefined,
      prefix: primaryName.honorificPrefix || undefined,
      suffix: primaryName.honorificSuffix || undefined,
    } : undefined,
    nicknames: (person.nicknames ?? []).map(n => n.value ?? ''),
    phones: (person.phoneNumbers ?? []).map(p => typed(p.value, lower(p.type))),
    emails: (person.emailAddresses ?? []).map(e => typed(e.value, lower(e.type))),
    addresses: (person.addresses ?? []).map(a => ({
      poBox: a.poBox || undefined,
      extended: a.extendedAddress || undefined,
      street: a.streetAddress || undefined,
      city: a.city || undefined,
      region: a.region || undefined,
      postalCode: a.postalCode || undefined,
      country: a.country || undefined,
      ...(a.type ? { type: a.type.toLowerCase() } : {}),
    })),
    organization: firstOrg ? {
      name: firstOrg.name || undefined,
      department: firstOrg.department || undefined,
      title: firstOrg.title || undefined,
    } : undefined,
    birthday: birthdayDate ? formatVCardDate(birthdayDate) : undefined,
    photo: person.photos?.[0]?.url || undefined,
    notes: person.biographies?.[0]?.value || undefined,
    urls: (person.urls ?? []).map(u => typed(u.value, lower(u.type))),
    anniversary,
    gender,
    ims,
    related: (person.relations ?? []).map(r => typed(r.person, lower(r.type))),
    calendarUrls: (person.calendarUrls ?? []).map(c => typed(c.url, lower(c.type))),
    languages: (person.locales ?? []).map(l => l.value ?? ''),
    extensions,
    metadata: { etag: person.etag || undefined },
  });
}

/**
 * Build the People API write payload. Only the groups the write API accepts are
 * produced; nicknames, IMs, extensions and the rest are dropped.
 */
export function contactToPerson(contact: Contact): Person {
  const person: Person = {};

  if (contact.name) {
    const n = contact.name;
    person.names = [{
      familyName: n.familyName ?? '',
      givenName: n.givenName ?? '',
      middleName: n.middleName ?? '',
      honorificPrefix: n.prefix ?? '',
      honorificSuffix: n.suffix ?? '',
    }];
  } else if (contact.fullName) {
    person.names = [{ unstructuredName: contact.fullName }];
  }

  if (contact.phones.length > 0) {
    person.phoneNumbers = contact.phones.map(p => ({ value: p.value, type: p.type }));
  }
  if (contact.emails.length > 0) {
    person.emailAddresses = contact.emails.map(e => ({ value: e.value, type: e.type }));
  }
  if (contact.addresses.length > 0) {
    person.addresses = contact.addresses.map(a => ({
      poBox: a.poBox ?? '',
      extendedAddress: a.extended ?? '',
      streetAddress: a.street ?? '',
      city: a.city ?? '',
      region: a.region ?? '',
      postalCode: a.postalCode ?? '',
      country: a.country ?? '',
      type: a.type,
    }));
  }

  const org = contact.organization;
  if (org && (org.name || org.department || org.title)) {
    person.organizations = [{ name: org.name, department: org.department, title: org.title }];
  }

  const birthday = contact.birthday ? parseVCardDate(contact.birthday) : undefined;
  if (birthday) {
    person.birthdays = [{ date: birthday }];
  }

  if (contact.notes) {
    person.biographies = [{ value: contact.notes }];
  }
  if (contact.urls.length > 0) {
    person.urls = contact.urls.map(u => ({ value: u.value, type: u.type }));
  }

  return person;
}

/** YYYYMMDD for full dates, --MMDD when only month and day are known, otherwise undefined. */
export function formatVCardDate(date: CalendarDate): string | undefined {
  const { year, month, day } = date;
  if (!month || !day) return undefined;
  const mmdd = `${pad(month, 2)}${pad(day, 2)}`;
  return year ? `${pad(year, 4)}${mmdd}` : `--${mmdd}`;
}

/** Inverse of formatVCardDate. After removing dashes the value must be exactly 8 or 4 digits. */
export function parseVCardDate(value: string): { year?: number; month: number; day: number } | undefined {
  const digits = value.replace(/-/g, '');
  if (/^\d{8}$/.test(digits)) {
    const year = Number(digits.slice(0, 4));
    const month = Number(digits.slice(4, 6));
    const day = Number(digits.slice(6, 8));
    return isValidDay(year, month, day) ? { year, month, day } : undefined;
  }
  if (/^\d{4}$/.test(digits)) {
    const month = Number(digits.slice(0, 2));
    const day = Number(digits.slice(2, 4));
    return isValidDay(2000, month, day) ? { month, day } : undefined;
  }
  return undefined;
}

/**
 * Extension property name for a user-chosen key: "shirt size" under
 * X-GOOGLE-CUSTOM becomes X-GOOGLE-CUSTOM-SHIRT-SIZE. Whitespace and characters
 * that delimit vCard properties become "-".
 */
export function extensionKey(prefix: string, key: string): string {
  return `${prefix}-${key.toUpperCase().replace(/[\s:;,=".]/g, '-')}`;
}

function typed(value: string | null | undefined, type: string | undefined): TypedValue {
  return type ? { value: value ?? '', type } : { value: value ?? '' };
}

function extension(key: string, value: string | null | undefined, type?: string | null): ContactExtension {
  return type ? { key, value: value ?? '', type } : { key, value: value ?? '' };
}

function lower(type: string | null | undefined): string | undefined {
  return type ? type.toLowerCase() : undefined;
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0');
}

function isValidDay(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}
