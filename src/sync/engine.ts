import type { ContactProvider, SyncResult } from '../types/index.js';
import type { ContactStore } from '../store/index.js';
import { SyncError, logger, vcardTimestamp } from '../utils/index.js';

/**
 * One-way pull: every remote contact overwrites its local file. Local-only
 * contacts are never touched. Concurrent syncs are not coordinated.
 */
export class SyncEngine {
  private store: ContactStore;
  private provider: ContactProvider;

  constructor(store: ContactStore, provider: ContactProvider) {
    this.store = store;
    this.provider = provider;
  }

  async sync(): Promise<SyncResult> {
    const startTime = Date.now();
    const syncedAt = vcardTimestamp();

    const remoteContacts = await this.provider.fetchAll();
    let pulled = 0;
    for (const remote of remoteContacts) {
      try {
        await this.store.writeSynced(remote, syncedAt);
      } catch (err) {
        throw new SyncError(`Sync aborted after ${pulled} of ${remoteContacts.length} contacts: could not save ${remote.id.value}`, err);
      }
      pulled++;
    }

    const duration = Date.now() - startTime;
    logger.info(`Sync with ${this.provider.name}: pulled ${pulled} contacts in ${duration}ms`);
    return { provider: this.provider.name, pulled, syncedAt, duration };
  }
}
