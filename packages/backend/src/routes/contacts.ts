import { Router } from 'express';
import type { SyncMeta } from '@crm/shared';
import { config } from '../config.js';
import { logger } from '../lib/logger.js';
import { NotFoundError } from '../lib/errors.js';
import { send_success } from '../lib/response.js';
import { parse_input } from '../lib/validation.js';
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
import { list_contact_emails } from '../services/emails.js';
import { sync_contact_emails, sync_meta } from '../services/sync.js';
import { get_mailbox_client } from '../services/gmail/client.js';
import { enrich_contact } from '../services/enrichment.js';
import {
  create_contact_schema,
  replace_contact_schema,
  update_contact_schema,
  list_contacts_query_schema,
  contact_method_input_schema,
  contact_ref_param_schema,
  method_param_schema,
} from '../schemas/contacts.js';

const router = Router();

// List contacts with optional filters
router.get('/contacts', async (req, res, next) => {
  try {
    const filters = parse_input(list_contacts_query_schema, req.query, req, 'contacts/list');
    const contacts = await list_contacts(filters);
    send_success(res, contacts, { meta: { total: contacts.length } });
  } catch (err) {
    next(err);
  }
});

router.post('/contacts', async (req, res, next) => {
  try {
    const input = parse_input(create_contact_schema, req.body, req, 'contacts/create');
    const contact = await create_contact(input);
    logger.info('contact created', { request_id: req.request_id, contact_id: contact.id });
    send_success(res, contact, { status: 201, message: 'Contact created' });
  } catch (err) {
    next(err);
  }
});

router.get('/contacts/:ref', async (req, res, next) => {
  try {
    const { ref } = parse_input(contact_ref_param_schema, req.params, req, 'contacts/get');
    const contact = await get_contact(await require_contact_id(ref));
    if (!contact) {
      throw new NotFoundError('Contact not found');
    }
    send_success(res, contact);
  } catch (err) {
    next(err);
  }
});

router.put('/contacts/:ref', async (req, res, next) => {
  try {
    const { ref } = parse_input(contact_ref_param_schema, req.params, req, 'contacts/replace');
    const input = parse_input(replace_contact_schema, req.body, req, 'contacts/replace');
    const contact = await replace_contact(await require_contact_id(ref), input);
    if (!contact) {
      throw new NotFoundError('Contact not found');
    }
    send_success(res, contact, { message: 'Contact updated' });
  } catch (err) {
    next(err);
  }
});

router.patch('/contacts/:ref', async (req, res, next) => {
  try {
    const { ref } = parse_input(contact_ref_param_schema, req.params, req, 'contacts/update');
    const patch = parse_input(update_contact_schema, req.body, req, 'contacts/update');
    const contact = await update_contact(await require_contact_id(ref), patch);
    if (!contact) {
      throw new NotFoundError('Contact not found');
    }
    send_success(res, contact, { message: 'Contact updated' });
  } catch (err) {
    next(err);
  }
});

router.delete('/contacts/:ref', async (req, res, next) => {
  try {
    const { ref } = parse_input(contact_ref_param_schema, req.params, req, 'contacts/delete');
    const contact_id = await require_contact_id(ref);
    const deleted = await delete_contact(contact_id);
    if (!deleted) {
      throw new NotFoundError('Contact not found');
    }
    logger.info('contact deleted', { request_id: req.request_id, contact_id });
    send_success(res, { id: contact_id }, { message: 'Contact deleted' });
  } catch (err) {
    next(err);
  }
});

// Contact methods
router.post('/contacts/:ref/methods', async (req, res, next) => {
  try {
    const { ref } = parse_input(contact_ref_param_schema, req.params, req, 'contacts/methods/add');
    const input = parse_input(contact_method_input_schema, req.body, req, 'contacts/methods/add');
    const method = await add_method(await require_contact_id(ref), input);
    send_success(res, method, { status: 201, message: 'Contact method added' });
  } catch (err) {
    next(err);
  }
});

router.delete('/contacts/:ref/methods/:methodId', async (req, res, next) => {
  try {
    const { ref } = parse_input(contact_ref_param_schema, { ref: req.params.ref }, req, 'contacts/methods/remove');
    const { methodId } = parse_input(method_param_schema, req.params, req, 'contacts/methods/remove');
    const removed = await remove_method(await require_contact_id(ref), methodId);
    if (!removed) {
      throw new NotFoundError('Contact method not found');
    }
    send_success(res, { id: methodId }, { message: 'Contact method removed' });
  } catch (err) {
    next(err);
  }
});

router.get('/contacts/:ref/emails', async (req, res, next) => {
  try {
    const { ref } = parse_input(contact_ref_param_schema, req.params, req, 'contacts/emails');
    const emails = await list_contact_emails(await require_contact_id(ref));
    send_success(res, emails, { meta: { total: emails.length } });
  } catch (err) {
    next(err);
  }
});

router.post('/contacts/:ref/sync-emails', async (req, res, next) => {
  try {
    const { ref } = parse_input(contact_ref_param_schema, req.params, req, 'contacts/sync-emails');
    const contact = await get_contact(await require_contact_id(ref));
    if (!contact) {
      throw new NotFoundError('Contact not found');
    }
    const result = await sync_contact_emails([contact], get_mailbox_client(), config.sync_max_messages);
    send_success<typeof result, SyncMeta>(res, result, {
      meta: sync_meta(result),
      message: `Synced emails for ${contact.name}`,
    });
  } catch (err) {
    next(err);
  }
});

router.post('/contacts/:ref/enrich', async (req, res, next) => {
  try {
    const { ref } = parse_input(contact_ref_param_schema, req.params, req, 'contacts/enrich');
    const result = await enrich_contact(await require_contact_id(ref));
    send_success(res, result, {
      message: result.updated_fields.length > 0 ? 'Contact enriched' : 'No new information found',
    });
  } catch (err) {
    next(err);
  }
});

export default router;
