import type { ContactWithMethods, SyncMeta, SyncResult } from '@crm/shared';
import { logger, error_meta } from '../lib/logger.js';
import { ApiError, BadRequestError, UpstreamError } from '../lib/errors.js';
import type { MailboxClient } from './gmail/client.js';
import { parse_gmail_message } from './gmail/parser.js';
import { find_existing_message_ids, store_synced_email } from './emails.js';

export function collect_email_addresses(contacts: ContactWithMethods[]): string[] {
  const addresses = new Set<string>();
  for (const contact of contacts) {
    for (const method of contact.contact_methods) {
      if (method.type === 'email') {
        addresses.add(method.value);
      }
    }
  }
  return [...addresses];
}

/** `from:a OR to:a OR from:b OR to:b`, covering both directions of each conversation. */
export function build_gmail_query(addresses: string[]): string {
  return addresses.flatMap((address) => [`from:${address}`, `to:${address}`]).join(' OR ');
}

export function sync_meta(result: SyncResult): SyncMeta {
  return {
    total_emails: result.total_emails,
    saved: result.saved,
    skipped: result.skipped,
    failed: result.failed,
  };
}

export async function sync_contact_emails(
  contacts: ContactWithMethods[],
  mailbox: MailboxClient,
  max_messages: number
): Promise<SyncResult> {
  const addresses = collect_email_addresses(contacts);
  if (addresses.length === 0) {
    throw new BadRequestError('No email addresses found for the selected contacts');
  }

  const search_query = build_gmail_query(addresses);
  logger.info('email sync started', { contacts: contacts.length, addresses: addresses.length, max_messages });

  let message_ids: string[];
  try {
    message_ids = [...new Set(await mailbox.list_message_ids(search_query, max_messages))];
  } catch (err) {
    if (err instanceof ApiError) {
      throw err;
    }
    logger.error('email sync listing failed', error_meta(err));
    throw new UpstreamError('Failed to list Gmail messages', err);
  }

  const result: SyncResult = {
    query: search_query,
    total_emails: message_ids.length,
    saved: 0,
    skipped: 0,
    failed: 0,
    errors: [],
  };

  const existing = await find_existing_message_ids(message_ids);

  for (const message_id of message_ids) {
    if (existing.has(message_id)) {
      result.skipped++;
      continue;
    }

    try {
      const message = parse_gmail_message(await mailbox.get_message(message_id));
      const stored = await store_synced_email(message);
      if (stored) {
        result.saved++;
      } else {
        // stored concurrently since the existence check
        result.skipped++;
      }
    } catch (err) {
      const { error } = error_meta(err);
      result.failed++;
      result.errors.push({ message_id, error });
      logger.warn('email sync message failed', { message_id, error });
    }
  }

  logger.info('email sync finished', { ...sync_meta(result) });
  return result;
}
