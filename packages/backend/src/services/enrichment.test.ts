import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ContactWithMethods } from '@crm/shared';

vi.mock('./contacts.js', () => ({
  get_contact: vi.fn(),
  update_contact: vi.fn(),
}));

vi.mock('./apify.js', async (import_original) => ({
  ...(await import_original<typeof import('./apify.js')>()),
  scrape_linkedin_profile: vi.fn(),
}));

vi.mock('./ai/profile-extraction.js', () => ({
  extract_profile: vi.fn(),
}));

vi.mock('../lib/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { get_contact, update_contact } from './contacts.js';
import { scrape_linkedin_profile } from './apify.js';
import { extract_profile } from './ai/profile-extraction.js';
import { enrich_contact } from './enrichment.js';
import { BadRequestError, UpstreamError } from '../lib/errors.js';

const contact: ContactWithMethods = {
  id: 3,
  name: 'Ada Lovelace',
  company: 'Analytical Engines Ltd',
  position: null,
  last_contacted: null,
  follow_up_date: null,
  warm: true,
  reminder: true,
  notes: 'Met at the meetup.',
  created_at: '2024-01-01T00:00:00.000Z',
  updated_at: '2024-01-01T00:00:00.000Z',
  email: null,
  contact_methods: [
    { id: 5, contact_id: 3, type: 'linkedin', value: 'linkedin.com/in/ada', is_primary: true, created_at: '2024-01-01T00:00:00.000Z' },
  ],
};

beforeEach(() => {
  vi.mocked(get_contact).mockReset();
  vi.mocked(update_contact).mockReset();
  vi.mocked(scrape_linkedin_profile).mockReset();
  vi.mocked(extract_profile).mockReset();
});

describe('enrich_contact', () => {
  it('fills empty fields and appends the summary to notes', async () => {
    vi.mocked(get_contact).mockResolvedValue(contact);
    vi.mocked(scrape_linkedin_profile).mockResolvedValue({ fullName: 'Ada Lovelace' });
    vi.mocked(extract_profile).mockResolvedValue({
      company: 'Someone Else Inc',
      position: 'Principal Engineer',
      summary: 'Builds calculating machines.',
    });
    const updated = { ...contact, position: 'Principal Engineer' };
    vi.mocked(update_contact).mockResolvedValue(updated);

    const result = await enrich_contact(3);

    expect(scrape_linkedin_profile).toHaveBeenCalledWith('https://linkedin.com/in/ada');
    expect(update_contact).toHaveBeenCalledWith(3, {
      position: 'Principal Engineer',
      notes: 'Met at the meetup.\n\nBuilds calculating machines.',
    });
    expect(result).toEqual({
      contact: updated,
      updated_fields: ['position', 'notes'],
      summary: 'Builds calculating machines.',
    });
  });

  it('skips the update when nothing new was found', async () => {
    vi.mocked(get_contact).mockResolvedValue(contact);
    vi.mocked(scrape_linkedin_profile).mockResolvedValue({ fullName: 'Ada Lovelace' });
    vi.mocked(extract_profile).mockResolvedValue({ company: null, position: null, summary: null });

    const result = await enrich_contact(3);

    expect(update_contact).not.toHaveBeenCalled();
    expect(result.updated_fields).toEqual([]);
  });

  it('requires a LinkedIn method', async () => {
    vi.mocked(get_contact).mockResolvedValue({ ...contact, contact_methods: [] });

    await expect(enrich_contact(3)).rejects.toThrow(BadRequestError);
    expect(scrape_linkedin_profile).not.toHaveBeenCalled();
  });

  it('fails when the scraper returns nothing', async () => {
    vi.mocked(get_contact).mockResolvedValue(contact);
    vi.mocked(scrape_linkedin_profile).mockResolvedValue(null);

    await expect(enrich_contact(3)).rejects.toThrow(UpstreamError);
  });
});
