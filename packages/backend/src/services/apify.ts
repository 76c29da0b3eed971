import { ApifyClient } from 'apify-client';
import { config } from '../config.js';
import { logger } from '../lib/logger.js';
import { ServiceUnavailableError, UpstreamError } from '../lib/errors.js';

export type ScrapedProfile = Record<string, unknown>;

let client: ApifyClient | null = null;

export function is_apify_available(): boolean {
  return Boolean(config.apify_api_token);
}

function get_client(): ApifyClient {
  if (!config.apify_api_token) {
    throw new ServiceUnavailableError('Apify is not configured: set APIFY_API_TOKEN');
  }

  if (!client) {
    client = new ApifyClient({ token: config.apify_api_token });
  }

  return client;
}

export function to_profile_url(value: string): string {
  const trimmed = value.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed.replace(/^\/+/, '')}`;
}

/** Runs the LinkedIn scraper actor for one profile and returns its first dataset item. */
export async function scrape_linkedin_profile(profile_url: string): Promise<ScrapedProfile | null> {
  const apify = get_client();
  const start = Date.now();

  try {
    const run = await apify.actor(config.apify_linkedin_actor).call({ profileUrls: [profile_url] });
    const { items } = await apify.dataset(run.defaultDatasetId).listItems({ limit: 1 });

    logger.info('apify profile scraped', {
      actor: config.apify_linkedin_actor,
      run_id: run.id,
      items: items.length,
      duration_ms: Date.now() - start,
    });

    const [profile] = items;
    return profile ? { ...profile } : null;
  } catch (err) {
    throw new UpstreamError('Apify actor run failed', err);
  }
}
