import type { ContactWithMethods, EmailWithContacts } from '@crm/shared';

export function make_contact(overrides: Partial<ContactWithMethods> = {}): ContactWithMethods {
  return {
    id: 1,
    name: 'Ada Lovelace',
    company: null,
    position: null,
    last_contacted: null,
    follow_up_date: null,
    warm: false,
    reminder: false,
    notes: null,
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: '2024-01-01T00:00:00.000Z',
    email: null,
    contact_methods: [],
    ...overrides,
  };
}

export function make_email(overrides: Partial<EmailWithContacts> = {}): EmailWithContacts {
  return {
    id: 1,
    gmail_message_id: 'msg-1',
    thread_id: 'thread-1',
    subject: 'Hello',
    content: 'Body text',
    summary: null,
    date: '2024-03-05T10:00:00.000Z',
    sender_email: 'grace@example.com',
    sender_name: 'Grace Hopper',
    recipient_email: 'sam@example.com',
    recipient_name: 'Sam',
    cc: [],
    read: false,
    has_attachments: false,
    created_at: '2024-03-05T10:00:00.000Z',
    contacts: [],
    ...overrides,
  };
}
