import { z } from 'zod';
import type { ContactChanges } from '../store/index.js';
import { parseVCardDate } from '../google/translate.js';
import { logger } from '../utils/index.js';

const typedValueSchema = z.object({
  value: z.string(),
  type: z.string().optional().describe('Free-form label, e.g. "mobile", "work"'),
});

const vcardDateSchema = z.string()
  .refine(v => parseVCardDate(v) !== undefined, 'expected YYYYMMDD or --MMDD')
  .describe('YYYYMMDD, or --MMDD when the year is unknown');

/** Optional editable contact fields, shared by create and update. */
export const contactFieldShape = {
  fullName: z.string().min(1).optional().describe('Display name'),
  name: z.object({
    familyName: z.string().optional(),
    givenName: z.string().optional(),
    middleName: z.string().optional(),
    prefix: z.string().optional(),
    suffix: z.string().optional(),
  }).optional(),
  nicknames: z.array(z.string()).optional(),
  phones: z.array(typedValueSchema).optional(),
  emails: z.array(typedValueSchema).optional(),
  addresses: z.array(z.object({
    poBox: z.string().optional(),
    extended: z.string().optional(),
    street: z.string().optional(),
    city: z.string().optional(),
    region: z.string().optional(),
    postalCode: z.string().optional(),
    country: z.string().optional(),
    type: z.string().optional(),
  })).optional(),
  urls: z.array(typedValueSchema).optional(),
  organization: z.object({
    name: z.string().optional(),
    department: z.string().optional(),
    title: z.string().optional(),
  }).optional(),
  birthday: vcardDateSchema.optional(),
  anniversary: vcardDateSchema.optional(),
  gender: z.string().optional(),
  notes: z.string().optional(),
};

const contactFieldsSchema = z.object(contactFieldShape);
export type ContactFieldArgs = z.infer<typeof contactFieldsSchema>;

/** Only the fields the caller supplied; omitted ones stay untouched on update. */
export function toChanges(args: ContactFieldArgs): ContactChanges {
  const changes: ContactChanges = {};
  if (args.fullName !== undefined) changes.fullName = args.fullName;
  if (args.name !== undefined) changes.name = args.name;
  if (args.nicknames !== undefined) changes.nicknames = args.nicknames;
  if (args.phones !== undefined) changes.phones = args.phones;
  if (args.emails !== undefined) changes.emails = args.emails;
  if (args.addresses !== undefined) changes.addresses = args.addresses;
  if (args.urls !== undefined) changes.urls = args.urls;
  if (args.organization !== undefined) changes.organization = args.organization;
  if (args.birthday !== undefined) changes.birthday = args.birthday;
  if (args.anniversary !== undefined) changes.anniversary = args.anniversary;
  if (args.gender !== undefined) changes.gender = args.gender;
  if (args.notes !== undefined) changes.notes = args.notes;
  return changes;
}

export function textResult(text: string) {
  return { content: [{ type: 'text' as const, text }] };
}

export function jsonResult(value: unknown) {
  return textResult(JSON.stringify(value, null, 2));
}

export function errorResult(err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  logger.warn('Tool call failed:', message);
  return { content: [{ type: 'text' as const, text: `Error: ${message}` }], isError: true };
}
