import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import type { ContactWithMethods, SyncResult } from '@crm/shared';

vi.mock('../db/index.js', () => ({
  get_pool: vi.fn(),
  query: vi.fn(),
  with_transaction: vi.fn(),
}));

vi.mock('../lib/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  error_meta: vi.fn(() => ({ error: 'mocked' })),
}));

vi.mock('../services/contacts.js', () => ({
  list_contacts: vi.fn(),
  get_contact: vi.fn(),
  create_contact: vi.fn(),
  replace_contact: vi.fn(),
  update_contact: vi.fn(),
  delete_contact: vi.fn(),
  require_contact_id: vi.fn(),
}));

vi.mock('../services/contact-methods.js', () => ({
  add_method: vi.fn(),
  remove_method: vi.fn(),
}));

vi.mock('../services/sync.js', async (import_original) => ({
  ...(await import_original<typeof import('../services/sync.js')>()),
  sync_contact_emails: vi.fn(),
}));

vi.mock('../services/gmail/client.js', () => ({
  get_mailbox_client: vi.fn(),
  is_gmail_configured: vi.fn(() => false),
}));

vi.mock('../services/enrichment.js', () => ({
  enrich_contact: vi.fn(),
}));

import { create_app } from '../app.js';
import {
  list_contacts,
  get_contact,
  create_contact,
  replace_contact,
  update_contact,
  delete_contact,
  require_contact_id,
} from '../services/contacts.js';
import { add_method, remove_method } from '../services/contact-methods.js';
import { sync_contact_emails } from '../services/sync.js';
import { get_mailbox_client } from '../services/gmail/client.js';
import { ConflictError, NotFoundError, ServiceUnavailableError } from '../lib/errors.js';

const contact: ContactWithMethods = {
  id: 1,
  name: 'Ada Lovelace',
  company: 'Analytical Engines Ltd',
  position: null,
  last_contacted: '2024-01-02',
  follow_up_date: null,
  warm: true,
  reminder: true,
  notes: null,
  created_at: '2024-01-01T00:00:00.000Z',
  updated_at: '2024-01-01T00:00:00.000Z',
  email: 'ada@example.com',
  contact_methods: [
    { id: 1, contact_id: 1, type: 'email', value: 'ada@example.com', is_primary: true, created_at: '2024-01-01T00:00:00.000Z' },
  ],
};

describe('contacts routes', () => {
  const app = create_app();

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(require_contact_id).mockResolvedValue(1);
  });

  it('GET /api/contacts passes filters and reports the total', async () => {
    vi.mocked(list_contacts).mockResolvedValue([contact]);

    const response = await request(app).get('/api/contacts?warm=true&company=engines');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('success');
    expect(response.body.data).toEqual([contact]);
    expect(response.body.meta).toEqual({ total: 1 });
    expect(list_contacts).toHaveBeenCalledWith({ warm: true, company: 'engines' });
  });

  it('POST /api/contacts creates a contact', async () => {
    vi.mocked(create_contact).mockResolvedValue(contact);

    const response = await request(app)
      .post('/api/contacts')
      .send({ name: 'Ada Lovelace', contact_methods: [{ type: 'email', value: 'ada@example.com' }] });

    expect(response.status).toBe(201);
    expect(response.body.data.id).toBe(1);
    expect(response.body.message).toBe('Contact created');
    expect(create_contact).toHaveBeenCalledWith({
      name: 'Ada Lovelace',
      contact_methods: [{ type: 'email', value: 'ada@example.com', is_primary: false }],
    });
  });

  it('POST /api/contacts rejects a missing name', async () => {
    const response = await request(app).post('/api/contacts').send({ company: 'Acme' });

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe('bad_request');
    expect(response.body.error.message).toBe('name: Name is required');
    expect(create_contact).not.toHaveBeenCalled();
  });

  it('POST /api/contacts rejects a malformed email method', async () => {
    const response = await request(app)
      .post('/api/contacts')
      .send({ name: 'Ada', contact_methods: [{ type: 'email', value: 'not-an-email' }] });

    expect(response.status).toBe(400);
    expect(response.body.error.message).toBe('contact_methods.0.value: Invalid email format');
  });

  it('POST /api/contacts maps method conflicts to 409', async () => {
    vi.mocked(create_contact).mockRejectedValue(
      new ConflictError('Contact method email "ada@example.com" already belongs to another contact')
    );

    const response = await request(app)
      .post('/api/contacts')
      .send({ name: 'Ada', contact_methods: [{ type: 'email', value: 'ada@example.com' }] });

    expect(response.status).toBe(409);
    expect(response.body.error.code).toBe('conflict');
  });

  it('GET /api/contacts/:ref accepts an email address', async () => {
    vi.mocked(get_contact).mockResolvedValue(contact);

    const response = await request(app).get('/api/contacts/Ada%40Example.com');

    expect(response.status).toBe(200);
    expect(require_contact_id).toHaveBeenCalledWith('ada@example.com');
    expect(get_contact).toHaveBeenCalledWith(1);
  });

  it('GET /api/contacts/:ref rejects references that are neither ids nor emails', async () => {
    const response = await request(app).get('/api/contacts/ada');

    expect(response.status).toBe(400);
    expect(require_contact_id).not.toHaveBeenCalled();
  });

  it('GET /api/contacts/:ref returns 404 for unknown contacts', async () => {
    vi.mocked(require_contact_id).mockRejectedValue(new NotFoundError('Contact not found'));

    const response = await request(app).get('/api/contacts/99');

    expect(response.status).toBe(404);
    expect(response.body.error).toEqual({ code: 'not_found', message: 'Contact not found' });
  });

  it('GET /api/contacts/:ref rejects ids beyond the integer range', async () => {
    const response = await request(app).get('/api/contacts/99999999999');

    expect(response.status).toBe(400);
    expect(response.body.error.message).toBe('ref: Id is out of range');
    expect(require_contact_id).not.toHaveBeenCalled();
  });

  it('DELETE /api/contacts/:ref/methods/:methodId rejects ids beyond the integer range', async () => {
    const response = await request(app).delete('/api/contacts/1/methods/99999999999');

    expect(response.status).toBe(400);
    expect(response.body.error.message).toBe('methodId: Id is out of range');
    expect(remove_method).not.toHaveBeenCalled();
  });

  it('PUT /api/contacts/:ref replaces the contact with defaults for omitted fields', async () => {
    vi.mocked(replace_contact).mockResolvedValue({ ...contact, company: null, warm: false });

    const response = await request(app)
      .put('/api/contacts/1')
      .send({ name: 'Ada Lovelace', contact_methods: [{ type: 'email', value: 'ada@example.com', is_primary: true }] });

    expect(response.status).toBe(200);
    expect(response.body.message).toBe('Contact updated');
    expect(response.body.data.company).toBeNull();
    expect(replace_contact).toHaveBeenCalledWith(1, {
      name: 'Ada Lovelace',
      contact_methods: [{ type: 'email', value: 'ada@example.com', is_primary: true }],
    });
  });

  it('PUT /api/contacts/:ref returns 404 for unknown contacts', async () => {
    vi.mocked(require_contact_id).mockRejectedValue(new NotFoundError('Contact not found'));

    const response = await request(app).put('/api/contacts/ghost%40example.com').send({ name: 'Ghost' });

    expect(response.status).toBe(404);
    expect(response.body.error).toEqual({ code: 'not_found', message: 'Contact not found' });
    expect(replace_contact).not.toHaveBeenCalled();
  });

  it('PATCH /api/contacts/:ref needs at least one field', async () => {
    const response = await request(app).patch('/api/contacts/1').send({});

    expect(response.status).toBe(400);
    expect(response.body.error.message).toBe('At least one field is required');
    expect(update_contact).not.toHaveBeenCalled();
  });

  it('PATCH /api/contacts/:ref updates scalar fields', async () => {
    vi.mocked(update_contact).mockResolvedValue({ ...contact, follow_up_date: '2024-03-01' });

    const response = await request(app).patch('/api/contacts/1').send({ follow_up_date: '2024-03-01' });

    expect(response.status).toBe(200);
    expect(response.body.data.follow_up_date).toBe('2024-03-01');
    expect(update_contact).toHaveBeenCalledWith(1, { follow_up_date: '2024-03-01' });
  });

  it('DELETE /api/contacts/:ref removes the contact', async () => {
    vi.mocked(delete_contact).mockResolvedValue(true);

    const response = await request(app).delete('/api/contacts/1');

    expect(response.status).toBe(200);
    expect(response.body.data).toEqual({ id: 1 });
    expect(delete_contact).toHaveBeenCalledWith(1);
  });

  it('POST /api/contacts/:ref/methods adds a method', async () => {
    const method = { id: 2, contact_id: 1, type: 'phone' as const, value: '+15550102000', is_primary: true, created_at: '2024-01-01T00:00:00.000Z' };
    vi.mocked(add_method).mockResolvedValue(method);

    const response = await request(app).post('/api/contacts/1/methods').send({ type: 'phone', value: '+1 555 010 2000' });

    expect(response.status).toBe(201);
    expect(response.body.data).toEqual(method);
    expect(add_method).toHaveBeenCalledWith(1, { type: 'phone', value: '+1 555 010 2000', is_primary: false });
  });

  it('DELETE /api/contacts/:ref/methods/:methodId returns 404 for unknown methods', async () => {
    vi.mocked(remove_method).mockResolvedValue(false);

    const response = await request(app).delete('/api/contacts/1/methods/42');

    expect(response.status).toBe(404);
    expect(remove_method).toHaveBeenCalledWith(1, 42);
  });

  it('POST /api/contacts/:ref/sync-emails mirrors counts in meta', async () => {
    const result: SyncResult = {
      query: 'from:ada@example.com OR to:ada@example.com',
      total_emails: 3,
      saved: 2,
      skipped: 1,
      failed: 0,
      errors: [],
    };
    vi.mocked(get_contact).mockResolvedValue(contact);
    vi.mocked(get_mailbox_client).mockReturnValue({ list_message_ids: vi.fn(), get_message: vi.fn() });
    vi.mocked(sync_contact_emails).mockResolvedValue(result);

    const response = await request(app).post('/api/contacts/1/sync-emails');

    expect(response.status).toBe(200);
    expect(response.body.data).toEqual(result);
    expect(response.body.meta).toEqual({ total_emails: 3, saved: 2, skipped: 1, failed: 0 });
    expect(vi.mocked(sync_contact_emails).mock.calls[0]?.[2]).toBe(200);
  });

  it('POST /api/contacts/:ref/sync-emails answers 503 without Gmail credentials', async () => {
    vi.mocked(get_contact).mockResolvedValue(contact);
    vi.mocked(get_mailbox_client).mockImplementation(() => {
      throw new ServiceUnavailableError('Gmail is not configured');
    });

    const response = await request(app).post('/api/contacts/1/sync-emails');

    expect(response.status).toBe(503);
    expect(response.body.error.code).toBe('service_unavailable');
    expect(sync_contact_emails).not.toHaveBeenCalled();
  });
});
