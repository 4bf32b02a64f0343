/**
 * IMAP Mail Store
 *
 * MailStore over a single ImapFlow connection. Every command runs behind a
 * mutex, so callers on parallel workers never interleave a select with
 * another folder's fetch.
 */

import { ImapFlow } from 'imapflow';
import type { MailStore } from '../../core/ports';
import type { FlagDelta, FolderDescriptor, SearchScope } from '../../core/domain';
import { DELETED_FLAG, ProtocolOrderError } from '../../core/domain';
import { createMutex } from '../concurrency';

export type ImapConfig = {
  host: string;
  port: number;
  username: string;
  password: string;
  /** Local bridges present self-signed certificates */
  rejectUnauthorized: boolean;
};

export function createImapMailStore(config: ImapConfig): MailStore {
  const mutex = createMutex();
  let client: ImapFlow | null = null;
  let selected: string | null = null;
  // UIDs flagged \Deleted by us in the current selection
  let deleted = new Set<string>();

  async function getClient(): Promise<ImapFlow> {
    if (client?.usable) return client;

    const next = new ImapFlow({
      host: config.host,
      port: config.port,
      secure: config.port === 993,
      auth: { user: config.username, pass: config.password },
      tls: { rejectUnauthorized: config.rejectUnauthorized },
      logger: false,
    });
    await next.connect();
    console.log(`[imap] Connected to ${config.host}:${config.port}`);

    client = next;
    selected = null;
    deleted = new Set();
    return next;
  }

  /** Runs `fn` against the selected folder, or fails with ProtocolOrderError */
  function inSelection<T>(command: string, fn: (c: ImapFlow) => Promise<T>): Promise<T> {
    return mutex.runExclusive(async () => {
      const c = await getClient();
      if (selected === null) throw new ProtocolOrderError(command);
      return fn(c);
    });
  }

  return {
    list() {
      return mutex.runExclusive(async () => {
        const c = await getClient();
        const mailboxes = await c.list();
        return mailboxes.map(
          (m): FolderDescriptor => ({
            path: m.path,
            delimiter: m.delimiter || '/',
            flags: [...m.flags],
            ...(m.specialUse ? { specialUse: m.specialUse } : {}),
          })
        );
      });
    },

    select(folder) {
      return mutex.runExclusive(async () => {
        const c = await getClient();
        selected = null;
        deleted = new Set();
        const mailbox = await c.mailboxOpen(folder);
        selected = mailbox.path;
        return { path: mailbox.path, exists: mailbox.exists };
      });
    },

    search(scope: SearchScope) {
      return inSelection('SEARCH', async c => {
        const query = scope === 'UNSEEN' ? { seen: false } : { all: true };
        const result = await c.search(query, { uid: true });
        const uids = Array.isArray(result) ? result : [];
        return uids.map(String);
      });
    },

    fetchSource(uid) {
      return inSelection('FETCH', async c => {
        const message = await c.fetchOne(uid, { source: true }, { uid: true });
        if (!message || !message.source) return null;
        return message.source;
      });
    },

    fetchInternalDates(uids) {
      return inSelection('FETCH', async c => {
        const dates = new Map<string, Date>();
        if (uids.length === 0) return dates;

        for await (const message of c.fetch(uids.join(','), { uid: true, internalDate: true }, { uid: true })) {
          if (!message.internalDate) continue;
          const date = new Date(message.internalDate);
          if (!Number.isNaN(date.getTime())) dates.set(String(message.uid), date);
        }
        return dates;
      });
    },

    copy(uid, destination) {
      return inSelection('COPY', async c => {
        await c.messageCopy(uid, destination, { uid: true });
      });
    },

    store(uid, delta: FlagDelta) {
      return inSelection('STORE', async c => {
        if (delta.add && delta.add.length > 0) {
          await c.messageFlagsAdd(uid, delta.add, { uid: true });
          if (delta.add.includes(DELETED_FLAG)) deleted.add(uid);
        }
        if (delta.remove && delta.remove.length > 0) {
          await c.messageFlagsRemove(uid, delta.remove, { uid: true });
          if (delta.remove.includes(DELETED_FLAG)) deleted.delete(uid);
        }
      });
    },

    expunge() {
      return inSelection('EXPUNGE', async c => {
        if (deleted.size === 0) return;
        const uids = [...deleted];
        // UID EXPUNGE limited to what we flagged; other clients' deletions stay
        await c.messageDelete(uids.join(','), { uid: true });
        deleted = new Set();
        console.log(`[imap] Expunged ${uids.length} message(s) from ${selected}`);
      });
    },

    create(folder) {
      return mutex.runExclusive(async () => {
        const c = await getClient();
        await c.mailboxCreate(folder);
      });
    },

    close() {
      return mutex.runExclusive(async () => {
        if (!client) return;
        const current = client;
        client = null;
        selected = null;
        deleted = new Set();
        if (current.usable) {
          await current.logout();
          console.log('[imap] Logged out');
        }
      });
    },
  };
}
