import { describe, it, expect } from 'vitest';
import {
  createContact, inferContactId, localId, primaryEmail, primaryPhone, providerId, toSummary,
} from '../../src/contacts/model.js';

describe('identifiers', () => {
  it('keeps only the last segment of a resource name', () => {
    expect(providerId('people/c123')).toEqual({ kind: 'provider', value: 'c123' });
    expect(providerId('c456')).toEqual({ kind: 'provider', value: 'c456' });
  });

  it('mints a random UUID for local ids', () => {
    const a = localId();
    const b = localId();
    expect(a.kind).toBe('local');
    expect(a.value).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(a.value).not.toBe(b.value);
  });

  it('infers provenance of bare UIDs', () => {
    expect(inferContactId('123e4567-e89b-12d3-a456-426614174000'))
      .toEqual({ kind: 'local', value: '123e4567-e89b-12d3-a456-426614174000' });
    expect(inferContactId('c987654321')).toEqual({ kind: 'provider', value: 'c987654321' });
  });
});

describe('createContact', () => {
  it('fills empty collections and a local id', () => {
    const contact = createContact({ fullName: 'Test User' });

    expect(contact.fullName).toBe('Test User');
    expect(contact.id.kind).toBe('local');
    expect(contact.phones).toEqual([]);
    expect(contact.emails).toEqual([]);
    expect(contact.extensions).toEqual([]);
    expect(contact.metadata).toEqual({});
  });

  it('falls back to the id when there is no display name', () => {
    const contact = createContact({ id: providerId('people/c42'), fullName: '   ' });
    expect(contact.fullName).toBe('c42');
  });
});

describe('primaryPhone', () => {
  it('prefers a mobile number', () => {
    const contact = createContact({
      fullName: 'A',
      phones: [{ value: '111', type: 'work' }, { value: '222', type: 'Mobile' }],
    });
    expect(primaryPhone(contact)).toBe('222');
  });

  it('accepts cell as mobile', () => {
    const contact = createContact({
      fullName: 'A',
      phones: [{ value: '111', type: 'home' }, { value: '333', type: 'cell' }],
    });
    expect(primaryPhone(contact)).toBe('333');
  });

  it('falls back to the first number', () => {
    const contact = createContact({ fullName: 'A', phones: [{ value: '111', type: 'work' }, { value: '222' }] });
    expect(primaryPhone(contact)).toBe('111');
  });

  it('is undefined without phones', () => {
    expect(primaryPhone(createContact({ fullName: 'A' }))).toBeUndefined();
  });
});

describe('toSummary', () => {
  it('summarizes the main fields', () => {
    const contact = createContact({
      id: providerId('people/c1'),
      fullName: 'Jane Doe',
      emails: [{ value: 'jane@example.com', type: 'work' }],
      phones: [{ value: '555-0100', type: 'mobile' }],
      organization: { name: 'Acme' },
    });
    expect(primaryEmail(contact)).toBe('jane@example.com');
    expect(toSummary(contact)).toEqual({
      id: 'c1',
      source: 'provider',
      fullName: 'Jane Doe',
      primaryEmail: 'jane@example.com',
      primaryPhone: '555-0100',
      organization: 'Acme',
    });
  });
});
