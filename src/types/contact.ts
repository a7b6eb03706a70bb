/**
 * Where an identifier came from. Provider ids are the trailing segment of the
 * provider's resource name; local ids are random UUIDs minted by the store.
 */
export type ContactId =
  | { kind: 'provider'; value: string }
  | { kind: 'local'; value: string };

/** A repeated field entry. `type` is a free-form label such as "mobile" or "work". */
export interface TypedValue {
  value: string;
  type?: string;
}

export interface ContactName {
  familyName?: string;
  givenName?: string;
  middleName?: string;
  prefix?: string;
  suffix?: string;
}

export interface ContactAddress {
  poBox?: string;
  extended?: string;
  street?: string;
  city?: string;
  region?: string;
  postalCode?: string;
  country?: string;
  type?: string;
}

export interface ContactOrganization {
  name?: string;
  department?: string;
  title?: string;
}

/** A vendor field with no standard vCard property, e.g. X-GOOGLE-SKILL. */
export interface ContactExtension {
  key: string;
  value: string;
  type?: string;
}

export interface ContactMetadata {
  /** Provider concurrency tag, sent back on update. */
  etag?: string;
  /** REV stamp set on every local write. */
  revision?: string;
  lastSynced?: string;
}

export interface Contact {
  id: ContactId;
  fullName: string;
  name?: ContactName;
  nicknames: string[];
  phones: TypedValue[];
  emails: TypedValue[];
  addresses: ContactAddress[];
  urls: TypedValue[];
  ims: TypedValue[];
  related: TypedValue[];
  calendarUrls: TypedValue[];
  languages: string[];
  organization?: ContactOrganization;
  /** vCard date: YYYYMMDD, or --MMDD when the year is unknown. */
  birthday?: string;
  anniversary?: string;
  gender?: string;
  notes?: string;
  photo?: string;
  extensions: ContactExtension[];
  metadata: ContactMetadata;
}

/** A contact that may not have been assigned an identifier yet. */
export type ContactDraft = Omit<Contact, 'id'> & { id?: ContactId };

export interface ContactSummary {
  id: string;
  source: ContactId['kind'];
  fullName: string;
  primaryEmail?: string;
  primaryPhone?: string;
  organization?: string;
}
