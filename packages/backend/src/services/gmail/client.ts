import { google, type gmail_v1 } from 'googleapis';
import { config } from '../../config.js';
import { logger } from '../../lib/logger.js';
import { ServiceUnavailableError } from '../../lib/errors.js';
import type { GmailMessage } from './parser.js';

// Gmail caps a single list page at 500 ids.
const MAX_PAGE_SIZE = 500;

export interface MailboxClient {
  list_message_ids(search_query: string, max_results: number): Promise<string[]>;
  get_message(id: string): Promise<GmailMessage>;
}

export interface GmailCredentials {
  client_id: string;
  client_secret: string;
  refresh_token: string;
}

export class GmailMailboxClient implements MailboxClient {
  private gmail: gmail_v1.Gmail;

  constructor(credentials: GmailCredentials) {
    const auth = new google.auth.OAuth2(credentials.client_id, credentials.client_secret);
    auth.setCredentials({ refresh_token: credentials.refresh_token });
    this.gmail = google.gmail({ version: 'v1', auth });
  }

  async list_message_ids(search_query: string, max_results: number): Promise<string[]> {
    const ids: string[] = [];
    let page_token: string | undefined;

    do {
      const response = await this.gmail.users.messages.list({
        userId: 'me',
        q: search_query,
        maxResults: Math.min(MAX_PAGE_SIZE, max_results - ids.length),
        pageToken: page_token,
      });

      for (const message of response.data.messages ?? []) {
        if (message.id) {
          ids.push(message.id);
        }
      }
      page_token = response.data.nextPageToken ?? undefined;
      logger.debug('gmail list page', { fetched: ids.length, has_more: Boolean(page_token) });
    } while (page_token && ids.length < max_results);

    return ids.slice(0, max_results);
  }

  async get_message(id: string): Promise<GmailMessage> {
    const response = await this.gmail.users.messages.get({ userId: 'me', id, format: 'full' });
    return response.data;
  }
}

let mailbox: MailboxClient | null = null;

export function is_gmail_configured(): boolean {
  return Boolean(config.gmail_client_id && config.gmail_client_secret && config.gmail_refresh_token);
}

export function get_mailbox_client(): MailboxClient {
  if (!is_gmail_configured()) {
    throw new ServiceUnavailableError(
      'Gmail is not configured: set GMAIL_CLIENT_ID, GMAIL_CLIENT_SECRET and GMAIL_REFRESH_TOKEN'
    );
  }

  if (!mailbox) {
    mailbox = new GmailMailboxClient({
      client_id: config.gmail_client_id,
      client_secret: config.gmail_client_secret,
      refresh_token: config.gmail_refresh_token,
    });
  }
  return mailbox;
}
