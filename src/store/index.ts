export { ContactStore, type ContactChanges } from './file-store.js';
export { contactPath, extractIdFromFile, isStorableId } from './file-layout.js';
