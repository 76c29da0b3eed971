import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { create_app } from './app.js';

// Mock the database pool
vi.mock('./db/index.js', () => ({
  get_pool: vi.fn(() => ({
    query: vi.fn().mockResolvedValue({ rows: [{ '?column?': 1 }] }),
  })),
  query: vi.fn(),
  with_transaction: vi.fn(),
}));

vi.mock('./lib/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  error_meta: vi.fn(() => ({ error: 'mocked' })),
}));

describe('App', () => {
  const app = create_app();

  it('GET /api/health returns 200', async () => {
    const response = await request(app).get('/api/health');
    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ status: 'ok', database: 'connected' });
    expect(response.body.integrations.openai).toBe(true);
  });

  it('answers unknown api routes with a 404 envelope', async () => {
    const response = await request(app).get('/api/nope');
    expect(response.status).toBe(404);
    expect(response.body.status).toBe('error');
    expect(response.body.error).toEqual({ code: 'not_found', message: 'Route not found: GET /api/nope' });
    expect(response.body.request_id).toBe(response.headers['x-request-id']);
  });

  it('turns malformed JSON into a 400', async () => {
    const response = await request(app)
      .post('/api/contacts')
      .set('Content-Type', 'application/json')
      .send('{"name": ');
    expect(response.status).toBe(400);
    expect(response.body.error).toEqual({ code: 'bad_request', message: 'Malformed JSON body' });
  });
});
