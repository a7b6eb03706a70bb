export type {
  Contact,
  ContactDraft,
  ContactId,
  ContactName,
  ContactAddress,
  ContactOrganization,
  ContactExtension,
  ContactMetadata,
  ContactSummary,
  TypedValue,
} from './contact.js';
export type { ContactProvider, SyncResult, WriteResult } from './provider.js';
export type { AuthState, Credentials, TokenSet } from './auth.js';
