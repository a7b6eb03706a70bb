import type { Contact, ContactAddress } from '../types/index.js';
import { displayName } from './model.js';

const LABEL_WIDTH = 11;

const HIGHLIGHTED_EXTENSIONS: { key: string; label: string }[] = [
  { key: 'X-GOOGLE-INTEREST', label: 'Interest' },
  { key: 'X-GOOGLE-SKILL', label: 'Skill' },
  { key: 'X-GOOGLE-OCCUPATION', label: 'Occupation' },
  { key: 'X-GOOGLE-LOCATION', label: 'Location' },
];

/** Human-readable multi-line summary of a contact. */
export function formatContact(contact: Contact): string {
  const out: string[] = [];
  const line = (label: string, value: string) => out.push(`  ${`${label}:`.padEnd(LABEL_WIDTH)}${value}`);

  const name = displayName(contact);
  out.push(name, '-'.repeat(name.length));

  if (contact.nicknames.length > 0) line('Nickname', contact.nicknames[0]);

  const org = contact.organization;
  const orgDisplay = [org?.name, org?.department].filter(Boolean).join(', ');
  if (orgDisplay && org?.title) line('Work', `${org.title}, ${orgDisplay}`);
  else if (orgDisplay) line('Org', orgDisplay);
  else if (org?.title) line('Title', org.title);

  for (const p of contact.phones) line('Phone', `${p.value} (${p.type ?? 'phone'})`);
  for (const e of contact.emails) line('Email', `${e.value} (${e.type ?? 'email'})`);
  for (const a of contact.addresses) {
    const addr = formatAddress(a);
    if (addr) line('Address', `${addr} (${a.type ?? 'address'})`);
  }

  if (contact.birthday) line('Birthday', formatDate(contact.birthday));
  if (contact.anniversary) line('Anniv', formatDate(contact.anniversary));

  for (const u of contact.urls) line('URL', `${u.value} (${u.type ?? 'url'})`);
  for (const im of contact.ims) line('IM', im.value);
  for (const r of contact.related) line('Related', `${r.value} (${r.type ?? 'related'})`);

  if (contact.gender) line('Gender', contact.gender);
  if (contact.notes) line('Note', contact.notes);

  for (const { key, label } of HIGHLIGHTED_EXTENSIONS) {
    for (const ext of contact.extensions) {
      if (ext.key === key) line(label, ext.value);
    }
  }

  line('UID', contact.id.value);

  return out.join('\n');
}

export function formatAddress(addr: ContactAddress): string {
  return [addr.street, addr.city, addr.region, addr.postalCode, addr.country].filter(Boolean).join(', ');
}

/** "19900615" -> "Jun 15, 1990"; "--0310" -> "Mar 10"; anything else is returned unchanged. */
export function formatDate(value: string): string {
  const digits = value.replace(/-/g, '');
  if (/^\d{8}$/.test(digits)) {
    const date = utcDate(Number(digits.slice(0, 4)), Number(digits.slice(4, 6)), Number(digits.slice(6, 8)));
    return date ? date.toLocaleDateString('en-US', { month: 'short', day: 'numeric', year: 'numeric', timeZone: 'UTC' }) : value;
  }
  if (/^\d{4}$/.test(digits)) {
    // 2000 is a leap year, so Feb 29 survives
    const date = utcDate(2000, Number(digits.slice(0, 2)), Number(digits.slice(2, 4)));
    return date ? date.toLocaleDateString('en-US', { month: 'short', day: 'numeric', timeZone: 'UTC' }) : value;
  }
  return value;
}

function utcDate(year: number, month: number, day: number): Date | undefined {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return undefined;
  return date;
}
