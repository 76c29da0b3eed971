import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { api, ApiRequestError } from './api';
import { make_contact } from '@/test/fixtures';

const fetch_mock = vi.fn();

function respond(status: number, body: unknown) {
  fetch_mock.mockResolvedValueOnce({
    ok: status >= 200 && status < 300,
    status,
    json: () => Promise.resolve(body),
  });
}

beforeEach(() => {
  fetch_mock.mockReset();
  vi.stubGlobal('fetch', fetch_mock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('ApiClient', () => {
  it('unwraps the data of a success envelope', async () => {
    const contact = make_contact();
    respond(200, { status: 'success', timestamp: '2024-01-01T00:00:00.000Z', data: [contact] });

    const contacts = await api.get_contacts({ warm: true, name: '' });

    expect(contacts).toEqual([contact]);
    expect(fetch_mock).toHaveBeenCalledWith('http://localhost:5001/api/contacts?warm=true', {
      headers: { 'Content-Type': 'application/json' },
    });
  });

  it('encodes email references in the contact path', async () => {
    respond(200, { status: 'success', timestamp: '2024-01-01T00:00:00.000Z', data: make_contact() });

    await api.get_contact('ada@example.com');

    expect(fetch_mock.mock.calls[0]?.[0]).toBe('http://localhost:5001/api/contacts/ada%40example.com');
  });

  it('sends JSON bodies for writes', async () => {
    respond(201, { status: 'success', timestamp: '2024-01-01T00:00:00.000Z', data: make_contact() });

    await api.create_contact({ name: 'Ada Lovelace' });

    expect(fetch_mock).toHaveBeenCalledWith('http://localhost:5001/api/contacts', {
      method: 'POST',
      body: '{"name":"Ada Lovelace"}',
      headers: { 'Content-Type': 'application/json' },
    });
  });

  it('throws the error envelope as an ApiRequestError', async () => {
    respond(409, {
      status: 'error',
      timestamp: '2024-01-01T00:00:00.000Z',
      error: { code: 'conflict', message: 'Contact method email:ada@example.com already belongs to contact 2' },
      request_id: 'req-1',
    });

    const error = await api.delete_contact(1).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiRequestError);
    expect(error).toMatchObject({
      status: 409,
      code: 'conflict',
      message: 'Contact method email:ada@example.com already belongs to contact 2',
    });
  });

  it('falls back to a generic error when the body is not JSON', async () => {
    fetch_mock.mockResolvedValueOnce({
      ok: false,
      status: 502,
      json: () => Promise.reject(new SyntaxError('Unexpected token <')),
    });

    await expect(api.get_email(5)).rejects.toMatchObject({ status: 502, code: 'http_error', message: 'API error: 502' });
  });

  it('returns emails with their pagination meta', async () => {
    const meta = { total: 30, limit: 25, offset: 0, has_more: true };
    respond(200, { status: 'success', timestamp: '2024-01-01T00:00:00.000Z', data: [], meta });

    const page = await api.search_emails({ q: 'invoice', limit: 25, offset: 0 });

    expect(page).toEqual({ emails: [], meta });
    expect(fetch_mock.mock.calls[0]?.[0]).toBe('http://localhost:5001/api/emails/search?q=invoice&limit=25&offset=0');
  });
});
