import type { Contact, ContactMethod, ContactWithMethods } from '@crm/shared';
import { query, with_transaction } from '../db/index.js';
import { NotFoundError } from '../lib/errors.js';
import type {
  ContactRef,
  CreateContactData,
  ListContactsQuery,
  UpdateContactData,
} from '../schemas/contacts.js';
import {
  assert_no_conflicts,
  find_contact_id_by_email,
  get_methods_for_contacts,
  insert_methods,
  prepare_methods,
} from './contact-methods.js';

const SCALAR_FIELDS = [
  'name',
  'company',
  'position',
  'last_contacted',
  'follow_up_date',
  'warm',
  'reminder',
  'notes',
] as const;

export function with_methods(contact: Contact, methods: ContactMethod[]): ContactWithMethods {
  const emails = methods.filter((m) => m.type === 'email');
  const primary = emails.find((m) => m.is_primary) ?? emails[0];
  return {
    ...contact,
    email: primary?.value ?? null,
    contact_methods: methods,
  };
}

async function attach_methods(contacts: Contact[]): Promise<ContactWithMethods[]> {
  const methods = await get_methods_for_contacts(contacts.map((c) => c.id));
  return contacts.map((contact) => with_methods(contact, methods.get(contact.id) ?? []));
}

export async function list_contacts(filters: ListContactsQuery): Promise<ContactWithMethods[]> {
  const conditions: string[] = [];
  const values: unknown[] = [];
  let param_index = 1;

  if (filters.name) {
    conditions.push(`c.name ILIKE $${param_index}`);
    values.push(`%${filters.name}%`);
    param_index++;
  }

  if (filters.company) {
    conditions.push(`c.company ILIKE $${param_index}`);
    values.push(`%${filters.company}%`);
    param_index++;
  }

  if (filters.email) {
    conditions.push(`EXISTS (
      SELECT 1 FROM contact_methods cm
      WHERE cm.contact_id = c.id AND cm.type = 'email' AND cm.value ILIKE $${param_index}
    )`);
    values.push(`%${filters.email}%`);
    param_index++;
  }

  if (filters.warm !== undefined) {
    conditions.push(`c.warm = $${param_index}`);
    values.push(filters.warm);
    param_index++;
  }

  const where_clause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  const result = await query<Contact>(
    `SELECT c.* FROM contacts c ${where_clause} ORDER BY LOWER(c.name), c.id`,
    values
  );

  return attach_methods(result.rows);
}

/** Resolves a numeric id or an email address to a contact id, or null when nothing matches. */
export async function resolve_contact_ref(ref: ContactRef): Promise<number | null> {
  if (typeof ref === 'number') {
    const result = await query<{ id: number }>('SELECT id FROM contacts WHERE id = $1', [ref]);
    return result.rows[0]?.id ?? null;
  }
  return find_contact_id_by_email(ref);
}

export async function require_contact_id(ref: ContactRef): Promise<number> {
  const contact_id = await resolve_contact_ref(ref);
  if (contact_id === null) {
    throw new NotFoundError('Contact not found');
  }
  return contact_id;
}

export async function get_contact(id: number): Promise<ContactWithMethods | null> {
  const result = await query<Contact>('SELECT * FROM contacts WHERE id = $1', [id]);
  const contact = result.rows[0];
  if (!contact) {
    return null;
  }
  const [with_list] = await attach_methods([contact]);
  return with_list ?? null;
}

export async function create_contact(input: CreateContactData): Promise<ContactWithMethods> {
  const methods = prepare_methods(input.contact_methods);

  return with_transaction(async (client) => {
    await assert_no_conflicts(client, methods, null);

    const result = await client.query<Contact>(
      `INSERT INTO contacts (name, company, position, last_contacted, follow_up_date, warm, reminder, notes)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING *`,
      [
        input.name,
        input.company ?? null,
        input.position ?? null,
        input.last_contacted ?? null,
        input.follow_up_date ?? null,
        input.warm ?? false,
        input.reminder ?? true,
        input.notes ?? null,
      ]
    );
    const contact = result.rows[0];
    if (!contact) {
      throw new Error('contact insert returned no row');
    }

    const inserted = await insert_methods(client, contact.id, methods);
    return with_methods(contact, inserted);
  });
}

/** Full replacement: scalar fields reset to defaults when omitted and the method set is swapped out. */
export async function replace_contact(id: number, input: CreateContactData): Promise<ContactWithMethods | null> {
  const methods = prepare_methods(input.contact_methods);

  return with_transaction(async (client) => {
    await assert_no_conflicts(client, methods, id);

    const result = await client.query<Contact>(
      `UPDATE contacts
       SET name = $2, company = $3, position = $4, last_contacted = $5, follow_up_date = $6,
           warm = $7, reminder = $8, notes = $9, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [
        id,
        input.name,
        input.company ?? null,
        input.position ?? null,
        input.last_contacted ?? null,
        input.follow_up_date ?? null,
        input.warm ?? false,
        input.reminder ?? true,
        input.notes ?? null,
      ]
    );
    const contact = result.rows[0];
    if (!contact) {
      return null;
    }

    await client.query('DELETE FROM contact_methods WHERE contact_id = $1', [id]);
    const inserted = await insert_methods(client, id, methods);
    return with_methods(contact, inserted);
  });
}

export async function update_contact(id: number, patch: UpdateContactData): Promise<ContactWithMethods | null> {
  const assignments: string[] = [];
  const values: unknown[] = [id];
  let param_index = 2;

  for (const field of SCALAR_FIELDS) {
    const value = patch[field];
    if (value !== undefined) {
      assignments.push(`${field} = $${param_index}`);
      values.push(value);
      param_index++;
    }
  }

  if (assignments.length === 0) {
    return get_contact(id);
  }

  const result = await query<Contact>(
    `UPDATE contacts SET ${assignments.join(', ')}, updated_at = NOW() WHERE id = $1 RETURNING *`,
    values
  );
  const contact = result.rows[0];
  if (!contact) {
    return null;
  }
  const [updated] = await attach_methods([contact]);
  return updated ?? null;
}

export async function delete_contact(id: number): Promise<boolean> {
  const result = await query('DELETE FROM contacts WHERE id = $1 RETURNING id', [id]);
  return (result.rowCount ?? 0) > 0;
}
