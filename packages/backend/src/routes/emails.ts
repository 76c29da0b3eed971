import { Router } from 'express';
import type { PaginationMeta, SyncMeta } from '@crm/shared';
import { config } from '../config.js';
import { NotFoundError } from '../lib/errors.js';
import { send_success } from '../lib/response.js';
import { parse_input } from '../lib/validation.js';
import { get_email, search_emails, set_email_read, set_email_summary } from '../services/emails.js';
import { list_contacts } from '../services/contacts.js';
import { sync_contact_emails, sync_meta } from '../services/sync.js';
import { get_mailbox_client } from '../services/gmail/client.js';
import { summarize_email } from '../services/ai/summaries.js';
import {
  search_emails_query_schema,
  email_id_param_schema,
  update_email_schema,
  sync_emails_body_schema,
} from '../schemas/emails.js';

const router = Router();

router.get('/emails/search', async (req, res, next) => {
  try {
    const params = parse_input(search_emails_query_schema, req.query, req, 'emails/search');
    const { emails, total } = await search_emails(params);
    send_success<typeof emails, PaginationMeta>(res, emails, {
      meta: {
        total,
        limit: params.limit,
        offset: params.offset,
        has_more: params.offset + emails.length < total,
      },
    });
  } catch (err) {
    next(err);
  }
});

// Sync Gmail for all contacts, or those matching the body filters
router.post('/emails/sync', async (req, res, next) => {
  try {
    const filters = parse_input(sync_emails_body_schema, req.body ?? {}, req, 'emails/sync');
    const contacts = await list_contacts(filters);
    if (contacts.length === 0) {
      throw new NotFoundError('No contacts found matching the criteria');
    }
    const result = await sync_contact_emails(contacts, get_mailbox_client(), config.sync_max_messages);
    send_success<typeof result, SyncMeta>(res, result, { meta: sync_meta(result) });
  } catch (err) {
    next(err);
  }
});

router.get('/emails/:id', async (req, res, next) => {
  try {
    const { id } = parse_input(email_id_param_schema, req.params, req, 'emails/get');
    const email = await get_email(id);
    if (!email) {
      throw new NotFoundError('Email not found');
    }
    send_success(res, email);
  } catch (err) {
    next(err);
  }
});

router.patch('/emails/:id', async (req, res, next) => {
  try {
    const { id } = parse_input(email_id_param_schema, req.params, req, 'emails/update');
    const { read } = parse_input(update_email_schema, req.body, req, 'emails/update');
    const email = await set_email_read(id, read);
    if (!email) {
      throw new NotFoundError('Email not found');
    }
    send_success(res, email);
  } catch (err) {
    next(err);
  }
});

router.post('/emails/:id/summarize', async (req, res, next) => {
  try {
    const { id } = parse_input(email_id_param_schema, req.params, req, 'emails/summarize');
    const email = await get_email(id);
    if (!email) {
      throw new NotFoundError('Email not found');
    }
    const summary = await summarize_email(config.gmail_owner_name, email);
    const updated = await set_email_summary(id, summary);
    if (!updated) {
      throw new NotFoundError('Email not found');
    }
    send_success(res, updated, { message: 'Email summarized' });
  } catch (err) {
    next(err);
  }
});

export default router;
