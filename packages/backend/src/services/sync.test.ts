import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ContactWithMethods } from '@crm/shared';

vi.mock('./emails.js', () => ({
  find_existing_message_ids: vi.fn(),
  store_synced_email: vi.fn(),
}));

vi.mock('../lib/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  error_meta: (err: unknown) => ({ error: err instanceof Error ? err.message : String(err) }),
}));

import { find_existing_message_ids, store_synced_email } from './emails.js';
import { build_gmail_query, sync_contact_emails } from './sync.js';
import type { MailboxClient } from './gmail/client.js';
import type { GmailMessage } from './gmail/parser.js';
import { BadRequestError, UpstreamError } from '../lib/errors.js';

const contact: ContactWithMethods = {
  id: 1,
  name: 'Ada Lovelace',
  company: null,
  position: null,
  last_contacted: null,
  follow_up_date: null,
  warm: false,
  reminder: true,
  notes: null,
  created_at: '2024-01-01T00:00:00.000Z',
  updated_at: '2024-01-01T00:00:00.000Z',
  email: 'ada@example.com',
  contact_methods: [
    { id: 1, contact_id: 1, type: 'email', value: 'ada@example.com', is_primary: true, created_at: '2024-01-01T00:00:00.000Z' },
    { id: 2, contact_id: 1, type: 'phone', value: '+15550102000', is_primary: true, created_at: '2024-01-01T00:00:00.000Z' },
  ],
};

function gmail_message(id: string): GmailMessage {
  return {
    id,
    threadId: `thread-${id}`,
    labelIds: ['INBOX'],
    payload: {
      mimeType: 'text/plain',
      headers: [
        { name: 'From', value: 'Ada <ada@example.com>' },
        { name: 'To', value: 'me@example.com' },
        { name: 'Subject', value: 'Hello' },
        { name: 'Date', value: 'Tue, 02 Jan 2024 10:00:00 +0000' },
      ],
      body: { data: Buffer.from('Hi there').toString('base64url') },
    },
  };
}

function make_mailbox(ids: string[], messages: Record<string, GmailMessage>): MailboxClient {
  return {
    list_message_ids: vi.fn(async () => ids),
    get_message: vi.fn(async (id: string) => {
      const message = messages[id];
      if (!message) {
        throw new Error(`Gmail returned 404 for ${id}`);
      }
      return message;
    }),
  };
}

const stored = {
  email: {
    id: 1,
    gmail_message_id: 'm4',
    thread_id: 'thread-m4',
    subject: 'Hello',
    content: 'Hi there',
    summary: null,
    date: '2024-01-02T10:00:00.000Z',
    sender_email: 'ada@example.com',
    sender_name: 'Ada',
    recipient_email: 'me@example.com',
    recipient_name: null,
    cc: [],
    read: true,
    has_attachments: false,
    created_at: '2024-01-03T00:00:00.000Z',
  },
  contact_ids: [1],
};

beforeEach(() => {
  vi.mocked(find_existing_message_ids).mockReset();
  vi.mocked(store_synced_email).mockReset();
});

describe('build_gmail_query', () => {
  it('covers both directions for every address', () => {
    expect(build_gmail_query(['a@x.com', 'b@x.com'])).toBe('from:a@x.com OR to:a@x.com OR from:b@x.com OR to:b@x.com');
  });
});

describe('sync_contact_emails', () => {
  it('requires at least one email address', async () => {
    const phone_only = { ...contact, contact_methods: contact.contact_methods.filter((m) => m.type === 'phone') };
    await expect(sync_contact_emails([phone_only], make_mailbox([], {}), 50)).rejects.toThrow(BadRequestError);
  });

  it('inserts nothing when every message is already stored', async () => {
    vi.mocked(find_existing_message_ids).mockResolvedValue(new Set(['m1', 'm2']));
    const mailbox = make_mailbox(['m1', 'm2'], {});

    const result = await sync_contact_emails([contact], mailbox, 50);

    expect(result).toEqual({
      query: 'from:ada@example.com OR to:ada@example.com',
      total_emails: 2,
      saved: 0,
      skipped: 2,
      failed: 0,
      errors: [],
    });
    expect(mailbox.get_message).not.toHaveBeenCalled();
    expect(store_synced_email).not.toHaveBeenCalled();
  });

  it('tallies per-message failures and keeps going', async () => {
    vi.mocked(find_existing_message_ids).mockResolvedValue(new Set(['m1']));
    vi.mocked(store_synced_email).mockResolvedValueOnce(null).mockResolvedValueOnce(stored);
    const mailbox = make_mailbox(['m1', 'm2', 'm3', 'm4'], { m2: gmail_message('m2'), m4: gmail_message('m4') });

    const result = await sync_contact_emails([contact], mailbox, 50);

    expect(result).toMatchObject({ total_emails: 4, saved: 1, skipped: 2, failed: 1 });
    expect(result.errors).toEqual([{ message_id: 'm3', error: 'Gmail returned 404 for m3' }]);
    expect(store_synced_email).toHaveBeenCalledTimes(2);
    expect(vi.mocked(store_synced_email).mock.calls[1]?.[0]).toMatchObject({
      gmail_message_id: 'm4',
      date: '2024-01-02T10:00:00.000Z',
      sender: { email: 'ada@example.com', name: 'Ada' },
      content: 'Hi there',
    });
  });

  it('passes the message cap to the mailbox', async () => {
    vi.mocked(find_existing_message_ids).mockResolvedValue(new Set<string>());
    const mailbox = make_mailbox([], {});

    await sync_contact_emails([contact], mailbox, 25);

    expect(mailbox.list_message_ids).toHaveBeenCalledWith('from:ada@example.com OR to:ada@example.com', 25);
  });

  it('reports listing failures as upstream errors', async () => {
    const mailbox = make_mailbox([], {});
    vi.mocked(mailbox.list_message_ids).mockRejectedValue(new Error('invalid_grant'));

    await expect(sync_contact_emails([contact], mailbox, 50)).rejects.toThrow(UpstreamError);
    expect(find_existing_message_ids).not.toHaveBeenCalled();
  });
});
