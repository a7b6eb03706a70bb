import type { Contact, ContactAddress, ContactExtension, ContactId, TypedValue } from '../types/index.js';
import { ValidationError } from '../utils/index.js';
import { createContact, inferContactId, localId } from './model.js';

const URN_UUID = 'urn:uuid:';
const ETAG_PROPERTY = 'X-GOOGLE-ETAG';
const LAST_SYNCED_PROPERTY = 'X-LAST-SYNCED';

/**
 * Serialize a Contact to vCard 4.0 format (RFC 6350).
 */
export function contactToVCard(contact: Contact): string {
  const lines: string[] = [
    'BEGIN:VCARD',
    'VERSION:4.0',
    `UID:${formatUid(contact.id)}`,
    `FN:${escapeVCardValue(contact.fullName)}`,
  ];

  // N is always five components, even when some are empty
  if (contact.name) {
    const n = contact.name;
    lines.push(`N:${joinComponents([n.familyName, n.givenName, n.middleName, n.prefix, n.suffix])}`);
  }

  for (const nickname of contact.nicknames) {
    lines.push(`NICKNAME:${escapeVCardValue(nickname)}`);
  }

  pushTyped(lines, 'TEL', contact.phones);
  pushTyped(lines, 'EMAIL', contact.emails);

  for (const addr of contact.addresses) {
    lines.push(formatProperty('ADR', addr.type, formatAddressValue(addr)));
  }

  const org = contact.organization;
  if (org?.name || org?.department) {
    lines.push(`ORG:${joinComponents(org.department ? [org.name, org.department] : [org.name])}`);
  }
  if (org?.title) {
    lines.push(`TITLE:${escapeVCardValue(org.title)}`);
  }

  if (contact.birthday) lines.push(`BDAY:${contact.birthday}`);
  if (contact.anniversary) lines.push(`ANNIVERSARY:${contact.anniversary}`);
  if (contact.photo) lines.push(`PHOTO:${escapeVCardValue(contact.photo)}`);
  if (contact.notes) lines.push(`NOTE:${escapeVCardValue(contact.notes)}`);

  pushTyped(lines, 'URL', contact.urls);

  if (contact.gender) lines.push(`GENDER:${escapeVCardValue(contact.gender)}`);

  pushTyped(lines, 'IMPP', contact.ims);
  pushTyped(lines, 'RELATED', contact.related);
  pushTyped(lines, 'CALURI', contact.calendarUrls);

  for (const lang of contact.languages) {
    lines.push(`LANG:${escapeVCardValue(lang)}`);
  }

  for (const ext of contact.extensions) {
    lines.push(formatProperty(ext.key, ext.type, escapeVCardValue(ext.value)));
  }

  if (contact.metadata.etag) lines.push(`${ETAG_PROPERTY}:${escapeVCardValue(contact.metadata.etag)}`);
  if (contact.metadata.revision) lines.push(`REV:${contact.metadata.revision}`);
  if (contact.metadata.lastSynced) lines.push(`${LAST_SYNCED_PROPERTY}:${contact.metadata.lastSynced}`);

  lines.push('END:VCARD');

  return foldLines(lines.join('\r\n')) + '\r\n';
}

/**
 * Parse a vCard 4.0 string into a Contact object.
 * Unknown X- properties are kept as extensions; other unknown properties are dropped.
 */
export function vcardToContact(vcard: string): Contact {
  const lines = unfoldLines(vcard);
  if (!lines.some(l => l.trim().toUpperCase() === 'BEGIN:VCARD')) {
    throw new ValidationError('Invalid vCard: missing BEGIN:VCARD');
  }
  const props = parseProperties(lines);

  const uid = props.first('UID');
  if (!uid?.value) {
    throw new ValidationError('Invalid vCard: missing UID');
  }
  const id = parseUid(unescapeVCardValue(uid.value));

  const nValue = props.first('N')?.value;
  let name: Contact['name'];
  if (nValue !== undefined) {
    const n = splitComponents(nValue);
    name = {
      familyName: n[0] || undefined,
      givenName: n[1] || undefined,
      middleName: n[2] || undefined,
      prefix: n[3] || undefined,
      suffix: n[4] || undefined,
    };
  }

  const orgValue = props.first('ORG')?.value;
  const titleValue = props.first('TITLE')?.value;
  let organization: Contact['organization'];
  if (orgValue !== undefined || titleValue !== undefined) {
    const parts = orgValue !== undefined ? splitComponents(orgValue) : [];
    organization = {
      name: parts[0] || undefined,
      department: parts[1] || undefined,
      title: titleValue ? unescapeVCardValue(titleValue) : undefined,
    };
  }

  const extensions: ContactExtension[] = props.all()
    .filter(p => p.name.startsWith('X-') && p.name !== ETAG_PROPERTY && p.name !== LAST_SYNCED_PROPERTY)
    .map(p => withType<ContactExtension>({ key: p.name, value: unescapeVCardValue(p.value) }, p.params));

  return createContact({
    id,
    fullName: textValue(props, 'FN'),
    name,
    nicknames: props.getAll('NICKNAME').map(p => unescapeVCardValue(p.value)),
    phones: typedValues(props, 'TEL'),
    emails: typedValues(props, 'EMAIL'),
    addresses: props.getAll('ADR').map(p => parseAddressValue(p.value, extractType(p.params))),
    urls: typedValues(props, 'URL'),
    ims: typedValues(props, 'IMPP'),
    related: typedValues(props, 'RELATED'),
    calendarUrls: typedValues(props, 'CALURI'),
    languages: props.getAll('LANG').map(p => unescapeVCardValue(p.value)),
    organization,
    birthday: props.first('BDAY')?.value || undefined,
    anniversary: props.first('ANNIVERSARY')?.value || undefined,
    gender: textValue(props, 'GENDER'),
    notes: textValue(props, 'NOTE'),
    photo: textValue(props, 'PHOTO'),
    extensions,
    metadata: {
      etag: textValue(props, ETAG_PROPERTY),
      revision: props.first('REV')?.value || undefined,
      lastSynced: props.first(LAST_SYNCED_PROPERTY)?.value || undefined,
    },
  });
}

/** ADR value: PO box;extended;street;city;region;postal code;country. Empty trailing parts are kept. */
function formatAddressValue(addr: ContactAddress): string {
  return joinComponents([
    addr.poBox, addr.extended, addr.street, addr.city, addr.region, addr.postalCode, addr.country,
  ]);
}

function parseAddressValue(value: string, type?: string): ContactAddress {
  const parts = splitComponents(value);
  const addr: ContactAddress = {
    poBox: parts[0] || undefined,
    extended: parts[1] || undefined,
    street: parts[2] || undefined,
    city: parts[3] || undefined,
    region: parts[4] || undefined,
    postalCode: parts[5] || undefined,
    country: parts[6] || undefined,
  };
  if (type) addr.type = type;
  return addr;
}

// --- Helpers ---

interface VCardProperty {
  name: string;
  params: string[];
  value: string;
}

class PropertyMap {
  private entries: VCardProperty[] = [];

  add(prop: VCardProperty): void {
    this.entries.push(prop);
  }

  first(name: string): VCardProperty | undefined {
    return this.entries.find(e => e.name === name);
  }

  getAll(name: string): VCardProperty[] {
    return this.entries.filter(e => e.name === name);
  }

  all(): VCardProperty[] {
    return this.entries;
  }
}

function formatUid(id: ContactId): string {
  return id.kind === 'local' ? `${URN_UUID}${id.value}` : id.value;
}

function parseUid(uid: string): ContactId {
  if (uid.toLowerCase().startsWith(URN_UUID)) {
    return localId(uid.substring(URN_UUID.length));
  }
  return inferContactId(uid);
}

function pushTyped(lines: string[], name: string, values: TypedValue[]): void {
  for (const v of values) {
    lines.push(formatProperty(name, v.type, escapeVCardValue(v.value)));
  }
}

function formatProperty(name: string, type: string | undefined, encodedValue: string): string {
  const params = type ? `;TYPE=${formatParamValue(type)}` : '';
  return `${name}${params}:${encodedValue}`;
}

function formatParamValue(value: string): string {
  const clean = value.replace(/\r?\n/g, ' ');
  if (!/[:;,"]/.test(clean)) return clean;
  return `"${clean.replace(/"/g, "'")}"`;
}

function typedValues(props: PropertyMap, name: string): TypedValue[] {
  return props.getAll(name).map(p => withType<TypedValue>({ value: unescapeVCardValue(p.value) }, p.params));
}

function withType<T extends { type?: string }>(entry: T, params: string[]): T {
  const type = extractType(params);
  return type ? { ...entry, type } : entry;
}

function textValue(props: PropertyMap, name: string): string | undefined {
  const value = props.first(name)?.value;
  return value ? unescapeVCardValue(value) : undefined;
}

function parseProperties(lines: string[]): PropertyMap {
  const map = new PropertyMap();
  for (const line of lines) {
    const colonIdx = indexOutsideQuotes(line, ':');
    if (colonIdx < 0) continue;
    const left = line.substring(0, colonIdx);
    const value = line.substring(colonIdx + 1);

    const parts = splitOutsideQuotes(left, ';');
    // Drop any "group." prefix (item1.TEL)
    const name = parts[0].substring(parts[0].lastIndexOf('.') + 1).toUpperCase();
    const params = parts.slice(1);

    if (name === 'BEGIN' || name === 'END' || name === 'VERSION') continue;

    map.add({ name, params, value });
  }
  return map;
}

function extractType(params: string[]): string | undefined {
  for (const p of params) {
    if (p.toUpperCase().startsWith('TYPE=')) {
      const raw = p.substring(5);
      return raw.startsWith('"') && raw.endsWith('"') && raw.length >= 2 ? raw.slice(1, -1) : raw;
    }
  }
  return undefined;
}

function indexOutsideQuotes(text: string, char: string): number {
  let quoted = false;
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '"') quoted = !quoted;
    else if (text[i] === char && !quoted) return i;
  }
  return -1;
}

function splitOutsideQuotes(text: string, char: string): string[] {
  const parts: string[] = [];
  let rest = text;
  let idx = indexOutsideQuotes(rest, char);
  while (idx >= 0) {
    parts.push(rest.substring(0, idx));
    rest = rest.substring(idx + 1);
    idx = indexOutsideQuotes(rest, char);
  }
  parts.push(rest);
  return parts;
}

function joinComponents(components: (string | undefined)[]): string {
  return components.map(c => escapeVCardValue(c ?? '')).join(';');
}

/** Split a structured value on unescaped semicolons and unescape each component. */
function splitComponents(value: string): string[] {
  const parts: string[] = [];
  let current = '';
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === '\\' && i + 1 < value.length) {
      current += ch + value[i + 1];
      i++;
    } else if (ch === ';') {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts.map(unescapeVCardValue);
}

function escapeVCardValue(value: string): string {
  return value
    .replace(/[\\;,]/g, '\\$&')
    .replace(/\r?\n/g, '\\n');
}

function unescapeVCardValue(value: string): string {
  return value.replace(/\\([\\;,nN])/g, (_, ch: string) => (ch === 'n' || ch === 'N' ? '\n' : ch));
}

/** RFC 6350 line folding: lines longer than 75 octets are folded with CRLF + space. */
function foldLines(text: string): string {
  return text.split('\r\n').map(line => {
    if (Buffer.byteLength(line, 'utf-8') <= 75) return line;
    const result: string[] = [];
    let remaining = line;
    let first = true;
    while (Buffer.byteLength(remaining, 'utf-8') > (first ? 75 : 74)) {
      const limit = first ? 75 : 74; // continuation lines lose 1 byte to the leading space
      let cutPoint = Math.min(limit, remaining.length);
      // Don't cut in the middle of a multi-byte char or a surrogate pair
      while (cutPoint > 0 && Buffer.byteLength(remaining.substring(0, cutPoint), 'utf-8') > limit) {
        cutPoint--;
      }
      const code = remaining.charCodeAt(cutPoint - 1);
      if (code >= 0xd800 && code <= 0xdbff) cutPoint--;
      result.push(remaining.substring(0, cutPoint));
      remaining = remaining.substring(cutPoint);
      first = false;
    }
    if (remaining) result.push(remaining);
    return result.join('\r\n ');
  }).join('\r\n');
}

/** Unfold continuation lines (lines starting with space or tab). */
function unfoldLines(text: string): string[] {
  const raw = text.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
  const result: string[] = [];
  for (const line of raw) {
    if ((line.startsWith(' ') || line.startsWith('\t')) && result.length > 0) {
      result[result.length - 1] += line.substring(1);
    } else {
      result.push(line);
    }
  }
  return result.filter(l => l.length > 0);
}
