import type { Email, EmailContactLink, EmailContactRole, EmailWithContacts } from '@crm/shared';
import { query, with_transaction } from '../db/index.js';
import type { SearchEmailsQuery } from '../schemas/emails.js';
import type { ParsedMessage } from './gmail/parser.js';
import { find_email_owners } from './contact-methods.js';

export interface EmailSearchPage {
  emails: EmailWithContacts[];
  total: number;
}

export interface StoredEmail {
  email: Email;
  contact_ids: number[];
}

interface ContactLinkRow extends EmailContactLink {
  email_id: number;
}

async function attach_contacts(emails: Email[]): Promise<EmailWithContacts[]> {
  if (emails.length === 0) {
    return [];
  }

  const result = await query<ContactLinkRow>(
    `SELECT ce.email_id, ce.role, c.id, c.name,
       (SELECT cm.value FROM contact_methods cm
        WHERE cm.contact_id = c.id AND cm.type = 'email'
        ORDER BY cm.is_primary DESC, cm.id
        LIMIT 1) AS email
     FROM contact_emails ce
     JOIN contacts c ON c.id = ce.contact_id
     WHERE ce.email_id = ANY($1::int[])
     ORDER BY ce.email_id, c.name`,
    [emails.map((e) => e.id)]
  );

  const by_email = new Map<number, EmailContactLink[]>();
  for (const { email_id, ...link } of result.rows) {
    const list = by_email.get(email_id) ?? [];
    list.push(link);
    by_email.set(email_id, list);
  }

  return emails.map((email) => ({ ...email, contacts: by_email.get(email.id) ?? [] }));
}

export async function search_emails(params: SearchEmailsQuery): Promise<EmailSearchPage> {
  const conditions: string[] = [];
  const values: unknown[] = [];
  let param_index = 1;

  if (params.q) {
    conditions.push(`(
      e.subject ILIKE $${param_index}
      OR e.content ILIKE $${param_index}
      OR e.sender_email ILIKE $${param_index}
      OR e.sender_name ILIKE $${param_index}
    )`);
    values.push(`%${params.q}%`);
    param_index++;
  }

  if (params.contact_id !== undefined) {
    conditions.push(
      `EXISTS (SELECT 1 FROM contact_emails ce WHERE ce.email_id = e.id AND ce.contact_id = $${param_index})`
    );
    values.push(params.contact_id);
    param_index++;
  }

  if (params.sender) {
    conditions.push(`e.sender_email = $${param_index}`);
    values.push(params.sender.toLowerCase());
    param_index++;
  }

  if (params.start_date) {
    conditions.push(`e.date >= $${param_index}::date`);
    values.push(params.start_date);
    param_index++;
  }

  if (params.end_date) {
    // inclusive of the whole end day
    conditions.push(`e.date < $${param_index}::date + INTERVAL '1 day'`);
    values.push(params.end_date);
    param_index++;
  }

  if (params.unread !== undefined) {
    conditions.push(`e.read = $${param_index}`);
    values.push(!params.unread);
    param_index++;
  }

  const where_clause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

  const [count_result, page_result] = await Promise.all([
    query<{ total: number }>(`SELECT COUNT(*)::int AS total FROM emails e ${where_clause}`, values),
    query<Email>(
      `SELECT e.* FROM emails e ${where_clause}
       ORDER BY e.date DESC, e.id DESC
       LIMIT $${param_index} OFFSET $${param_index + 1}`,
      [...values, params.limit, params.offset]
    ),
  ]);

  return {
    emails: await attach_contacts(page_result.rows),
    total: count_result.rows[0]?.total ?? 0,
  };
}

export async function list_contact_emails(contact_id: number): Promise<EmailWithContacts[]> {
  const result = await query<Email>(
    `SELECT e.* FROM emails e
     JOIN contact_emails ce ON ce.email_id = e.id
     WHERE ce.contact_id = $1
     ORDER BY e.date DESC, e.id DESC`,
    [contact_id]
  );
  return attach_contacts(result.rows);
}

export async function get_email(id: number): Promise<EmailWithContacts | null> {
  const result = await query<Email>('SELECT * FROM emails WHERE id = $1', [id]);
  const email = result.rows[0];
  if (!email) {
    return null;
  }
  const [with_contacts] = await attach_contacts([email]);
  return with_contacts ?? null;
}

export async function set_email_read(id: number, read: boolean): Promise<EmailWithContacts | null> {
  const result = await query<{ id: number }>('UPDATE emails SET read = $2 WHERE id = $1 RETURNING id', [id, read]);
  return result.rows[0] ? get_email(id) : null;
}

export async function set_email_summary(id: number, summary: string): Promise<EmailWithContacts | null> {
  const result = await query<{ id: number }>('UPDATE emails SET summary = $2 WHERE id = $1 RETURNING id', [
    id,
    summary,
  ]);
  return result.rows[0] ? get_email(id) : null;
}

export async function find_existing_message_ids(message_ids: string[]): Promise<Set<string>> {
  if (message_ids.length === 0) {
    return new Set();
  }
  const result = await query<{ gmail_message_id: string }>(
    'SELECT gmail_message_id FROM emails WHERE gmail_message_id = ANY($1::text[])',
    [message_ids]
  );
  return new Set(result.rows.map((row) => row.gmail_message_id));
}

const ROLE_RANK: Record<EmailContactRole, number> = { sender: 0, recipient: 1, cc: 2 };

/** Sender wins over recipient, recipient over cc, when an address appears more than once. */
export function participant_roles(message: ParsedMessage): Map<string, EmailContactRole> {
  const roles = new Map<string, EmailContactRole>();
  for (const address of message.cc) {
    roles.set(address.email, 'cc');
  }
  for (const address of message.recipients) {
    roles.set(address.email, 'recipient');
  }
  if (message.sender) {
    roles.set(message.sender.email, 'sender');
  }
  return roles;
}

/**
 * Inserts a synced message, links every contact owning one of its addresses and
 * moves their last_contacted forward. Returns null when the message id is
 * already stored.
 */
export async function store_synced_email(message: ParsedMessage): Promise<StoredEmail | null> {
  return with_transaction(async (client) => {
    const [recipient] = message.recipients;
    const inserted = await client.query<Email>(
      `INSERT INTO emails (
         gmail_message_id, thread_id, subject, content, date,
         sender_email, sender_name, recipient_email, recipient_name, cc, read, has_attachments
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
       ON CONFLICT (gmail_message_id) DO NOTHING
       RETURNING *`,
      [
        message.gmail_message_id,
        message.thread_id,
        message.subject,
        message.content,
        message.date,
        message.sender?.email ?? null,
        message.sender?.name ?? null,
        recipient?.email ?? null,
        recipient?.name ?? null,
        message.cc.map((address) => address.email),
        message.read,
        message.has_attachments,
      ]
    );
    const email = inserted.rows[0];
    if (!email) {
      return null;
    }

    const roles = participant_roles(message);
    const owners = await find_email_owners(client, [...roles.keys()]);

    const contact_roles = new Map<number, EmailContactRole>();
    for (const [address, contact_id] of owners) {
      const role = roles.get(address) ?? 'recipient';
      const current = contact_roles.get(contact_id);
      if (!current || ROLE_RANK[role] < ROLE_RANK[current]) {
        contact_roles.set(contact_id, role);
      }
    }

    for (const [contact_id, role] of contact_roles) {
      await client.query(
        `INSERT INTO contact_emails (contact_id, email_id, role)
         VALUES ($1, $2, $3)
         ON CONFLICT (contact_id, email_id) DO NOTHING`,
        [contact_id, email.id, role]
      );
    }

    const contact_ids = [...contact_roles.keys()];
    if (contact_ids.length > 0) {
      await client.query(
        `UPDATE contacts
         SET last_contacted = GREATEST(COALESCE(last_contacted, $2::date), $2::date), updated_at = NOW()
         WHERE id = ANY($1::int[])`,
        [contact_ids, message.date.slice(0, 10)]
      );
    }

    return { email, contact_ids };
  });
}
