import { describe, it, expect } from 'vitest';
import {
  contactToPerson, extensionKey, formatVCardDate, parseVCardDate, personToContact,
} from '../../src/google/translate.js';
import { createContact, localId, providerId } from '../../src/contacts/model.js';

describe('personToContact', () => {
  it('uses the resource id as display name for a bare person', () => {
    const contact = personToContact({ resourceName: 'people/empty' });

    expect(contact.id).toEqual({ kind: 'provider', value: 'empty' });
    expect(contact.fullName).toBe('empty');
    expect(contact.phones).toEqual([]);
    expect(contact.extensions).toEqual([]);
  });

  it('maps standard fields and lowercases type labels', () => {
    const contact = personToContact({
      resourceName: 'people/c42',
      etag: '%Eg',
      names: [{ displayName: 'Jane Doe', givenName: 'Jane', familyName: 'Doe' }],
      phoneNumbers: [{ value: '+1 555 0100', type: 'Mobile' }],
      emailAddresses: [{ value: 'jane@example.com', type: 'WORK' }],
      addresses: [{ streetAddress: '1 Main St', city: 'Springfield', type: 'Home' }],
      organizations: [{ name: 'Acme', title: 'Engineer' }, { name: 'Ignored' }],
      birthdays: [{ date: { year: 1990, month: 6, day: 15 } }],
      biographies: [{ value: 'first' }, { value: 'second' }],
      photos: [{ url: 'https://example.com/a.jpg' }],
      imClients: [{ protocol: 'XMPP', username: 'jane', type: 'Home' }],
      sipAddresses: [{ value: 'jane@sip.example.com', type: 'Work' }],
      genders: [{ value: 'male' }, { value: 'female' }],
      locales: [{ value: 'en-US' }],
    });

    expect(contact.fullName).toBe('Jane Doe');
    expect(contact.name).toEqual({ givenName: 'Jane', familyName: 'Doe' });
    expect(contact.phones).toEqual([{ value: '+1 555 0100', type: 'mobile' }]);
    expect(contact.emails).toEqual([{ value: 'jane@example.com', type: 'work' }]);
    expect(contact.addresses).toEqual([{ street: '1 Main St', city: 'Springfield', type: 'home' }]);
    expect(contact.organization).toEqual({ name: 'Acme', title: 'Engineer' });
    expect(contact.birthday).toBe('19900615');
    expect(contact.notes).toBe('first');
    expect(contact.photo).toBe('https://example.com/a.jpg');
    expect(contact.ims).toEqual([
      { value: 'xmpp:jane', type: 'home' },
      { value: 'sip:jane@sip.example.com', type: 'work' },
    ]);
    expect(contact.gender).toBe('female');
    expect(contact.languages).toEqual(['en-US']);
    expect(contact.metadata).toEqual({ etag: '%Eg' });
  });

  it('turns anniversaries into ANNIVERSARY and other events into extensions', () => {
    const contact = personToContact({
      resourceName: 'people/c1',
      events: [
        { type: 'anniversary', date: { year: 2010, month: 5, day: 1 } },
        { type: 'Anniversary', date: { month: 3, day: 10 } },
        { type: 'Graduation', date: { year: 2008, month: 6, day: 20 } },
        { type: 'nodate' },
      ],
    });

    expect(contact.anniversary).toBe('--0310');
    expect(contact.extensions).toEqual([{ key: 'X-GOOGLE-EVENT', value: '20080620', type: 'Graduation' }]);
  });

  it('keeps vendor-only groups as extensions', () => {
    const contact = personToContact({
      resourceName: 'people/c1',
      skills: [{ value: 'Go' }],
      memberships: [{ contactGroupMembership: { contactGroupResourceName: 'contactGroups/friends' } }],
      userDefined: [{ key: 'shirt size', value: 'M' }],
      miscKeywords: [{ value: 'vip', type: 'OUTLOOK_KEYWORD' }],
    });

    expect(contact.extensions).toEqual([
      { key: 'X-GOOGLE-SKILL', value: 'Go' },
      { key: 'X-GOOGLE-GROUP-MEMBERSHIP', value: 'contactGroups/friends' },
      { key: 'X-GOOGLE-CUSTOM-SHIRT-SIZE', value: 'M' },
      { key: 'X-GOOGLE-KEYWORD', value: 'vip', type: 'OUTLOOK_KEYWORD' },
    ]);
  });
});

describe('contactToPerson', () => {
  it('writes every supported group and survives the way back', () => {
    const contact = createContact({
      id: providerId('people/c7'),
      fullName: 'Jane Doe',
      name: { givenName: 'Jane', familyName: 'Doe' },
      phones: [{ value: '555-0100', type: 'mobile' }],
      emails: [{ value: 'jane@example.com', type: 'work' }],
      addresses: [{ street: '1 Main St', city: 'Springfield', type: 'home' }],
      organization: { name: 'Acme', department: 'R&D', title: 'Engineer' },
      birthday: '19900615',
      notes: 'Likes tea',
      urls: [{ value: 'https://example.com', type: 'homepage' }],
      nicknames: ['JD'],
    });

    const person = contactToPerson(contact);

    expect(person.names).toEqual([{ familyName: 'Doe', givenName: 'Jane', middleName: '', honorificPrefix: '', honorificSuffix: '' }]);
    expect(person.birthdays).toEqual([{ date: { year: 1990, month: 6, day: 15 } }]);
    expect(person.nicknames).toBeUndefined();

    const back = personToContact({ ...person, resourceName: 'people/c7' });
    expect(back.phones).toEqual(contact.phones);
    expect(back.emails).toEqual(contact.emails);
    expect(back.addresses).toEqual(contact.addresses);
    expect(back.organization).toEqual(contact.organization);
    expect(back.birthday).toBe('19900615');
    expect(back.notes).toBe('Likes tea');
    expect(back.urls).toEqual(contact.urls);
    expect(back.name).toEqual({ givenName: 'Jane', familyName: 'Doe' });
  });

  it('sends an unstructured name when only a display name exists', () => {
    const person = contactToPerson(createContact({ id: localId(), fullName: 'Just A Name' }));
    expect(person.names).toEqual([{ unstructuredName: 'Just A Name' }]);
  });

  it('omits empty groups and invalid birthdays', () => {
    const person = contactToPerson(createContact({ fullName: 'X', birthday: 'someday', organization: {} }));
    expect(Object.keys(person)).toEqual(['names']);
  });
});

describe('vCard dates', () => {
  it('formats full and year-less dates', () => {
    expect(formatVCardDate({ year: 1990, month: 6, day: 15 })).toBe('19900615');
    expect(formatVCardDate({ month: 3, day: 10 })).toBe('--0310');
    expect(formatVCardDate({ year: 0, month: 3, day: 10 })).toBe('--0310');
    expect(formatVCardDate({ year: 1990 })).toBeUndefined();
  });

  it('parses both forms', () => {
    expect(parseVCardDate('19900615')).toEqual({ year: 1990, month: 6, day: 15 });
    expect(parseVCardDate('1990-06-15')).toEqual({ year: 1990, month: 6, day: 15 });
    expect(parseVCardDate('--0310')).toEqual({ month: 3, day: 10 });
  });

  it('rejects impossible or malformed dates', () => {
    expect(parseVCardDate('19900230')).toBeUndefined();
    expect(parseVCardDate('--1301')).toBeUndefined();
    expect(parseVCardDate('June 1')).toBeUndefined();
  });
});

describe('extensionKey', () => {
  it('uppercases and replaces delimiters with dashes', () => {
    expect(extensionKey('X-GOOGLE-CUSTOM', 'shirt size')).toBe('X-GOOGLE-CUSTOM-SHIRT-SIZE');
    expect(extensionKey('X-GOOGLE-CLIENT', 'a:b;c')).toBe('X-GOOGLE-CLIENT-A-B-C');
  });
});
