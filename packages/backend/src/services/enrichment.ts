import type { ContactWithMethods, EnrichmentResult } from '@crm/shared';
import { logger } from '../lib/logger.js';
import { BadRequestError, NotFoundError, UpstreamError } from '../lib/errors.js';
import type { UpdateContactData } from '../schemas/contacts.js';
import { scrape_linkedin_profile, to_profile_url } from './apify.js';
import { extract_profile } from './ai/profile-extraction.js';
import { get_contact, update_contact } from './contacts.js';

function linkedin_of(contact: ContactWithMethods): string | null {
  const profiles = contact.contact_methods.filter((m) => m.type === 'linkedin');
  const chosen = profiles.find((m) => m.is_primary) ?? profiles[0];
  return chosen?.value ?? null;
}

/**
 * Fills empty company/position fields from the contact's LinkedIn profile and
 * appends a short professional summary to the notes.
 */
export async function enrich_contact(contact_id: number): Promise<EnrichmentResult> {
  const contact = await get_contact(contact_id);
  if (!contact) {
    throw new NotFoundError('Contact not found');
  }

  const linkedin = linkedin_of(contact);
  if (!linkedin) {
    throw new BadRequestError('Contact has no LinkedIn profile to enrich from');
  }

  const profile = await scrape_linkedin_profile(to_profile_url(linkedin));
  if (!profile) {
    throw new UpstreamError('LinkedIn scraper returned no profile data');
  }

  const extracted = await extract_profile(profile);
  const patch: UpdateContactData = {};
  const updated_fields: EnrichmentResult['updated_fields'] = [];

  if (!contact.company && extracted.company) {
    patch.company = extracted.company;
    updated_fields.push('company');
  }
  if (!contact.position && extracted.position) {
    patch.position = extracted.position;
    updated_fields.push('position');
  }
  if (extracted.summary) {
    patch.notes = contact.notes ? `${contact.notes}\n\n${extracted.summary}` : extracted.summary;
    updated_fields.push('notes');
  }

  logger.info('contact enriched', { contact_id, updated_fields });

  if (updated_fields.length === 0) {
    return { contact, updated_fields, summary: extracted.summary };
  }

  const updated = await update_contact(contact_id, patch);
  if (!updated) {
    throw new NotFoundError('Contact not found');
  }
  return { contact: updated, updated_fields, summary: extracted.summary };
}
