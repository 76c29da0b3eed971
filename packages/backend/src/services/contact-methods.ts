import type { ContactMethod, ContactMethodType } from '@crm/shared';
import { query, with_transaction, type Queryable } from '../db/index.js';
import { BadRequestError, ConflictError } from '../lib/errors.js';
import type { ContactMethodInputData } from '../schemas/contacts.js';

export function normalize_method_value(type: ContactMethodType, value: string): string {
  switch (type) {
    case 'email':
      return value.trim().toLowerCase();
    case 'phone':
      return value.replace(/[^\d+]/g, '').replace(/(?!^)\+/g, '');
    case 'linkedin':
      return value.trim();
  }
}

/**
 * Normalizes values and settles the primary flags so each type has exactly one
 * primary: the first method flagged as such, otherwise the first of its type.
 */
export function prepare_methods(methods: ContactMethodInputData[]): ContactMethodInputData[] {
  const normalized = methods.map((method) => ({
    ...method,
    value: normalize_method_value(method.type, method.value),
  }));

  const seen = new Set<string>();
  for (const method of normalized) {
    if (!method.value) {
      throw new BadRequestError(`Contact method value is empty after normalization (${method.type})`);
    }
    const key = `${method.type}:${method.value}`;
    if (seen.has(key)) {
      throw new BadRequestError(`Duplicate contact method: ${key}`);
    }
    seen.add(key);
  }

  const primary_index = new Map<ContactMethodType, number>();
  normalized.forEach((method, index) => {
    if (method.is_primary && !primary_index.has(method.type)) {
      primary_index.set(method.type, index);
    }
  });
  normalized.forEach((method, index) => {
    if (!primary_index.has(method.type)) {
      primary_index.set(method.type, index);
    }
  });

  return normalized.map((method, index) => ({
    ...method,
    is_primary: primary_index.get(method.type) === index,
  }));
}

/** Throws ConflictError when any (type, value) pair already belongs to a contact other than `contact_id`. */
export async function assert_no_conflicts(
  client: Queryable,
  methods: Array<Pick<ContactMethodInputData, 'type' | 'value'>>,
  contact_id: number | null
): Promise<void> {
  if (methods.length === 0) {
    return;
  }

  const result = await client.query<{ contact_id: number; type: ContactMethodType; value: string }>(
    `SELECT contact_id, type, value
     FROM contact_methods
     WHERE (type, value) IN (SELECT * FROM UNNEST($1::text[], $2::text[]))
       AND ($3::int IS NULL OR contact_id <> $3)
     LIMIT 1`,
    [methods.map((m) => m.type), methods.map((m) => m.value), contact_id]
  );

  const conflict = result.rows[0];
  if (conflict) {
    throw new ConflictError(`Contact method ${conflict.type} "${conflict.value}" already belongs to another contact`, {
      type: conflict.type,
      value: conflict.value,
      existing_contact_id: conflict.contact_id,
    });
  }
}

export async function insert_methods(
  client: Queryable,
  contact_id: number,
  methods: ContactMethodInputData[]
): Promise<ContactMethod[]> {
  const inserted: ContactMethod[] = [];
  for (const method of methods) {
    const result = await client.query<ContactMethod>(
      `INSERT INTO contact_methods (contact_id, type, value, is_primary)
       VALUES ($1, $2, $3, $4)
       RETURNING *`,
      [contact_id, method.type, method.value, method.is_primary]
    );
    const row = result.rows[0];
    if (row) {
      inserted.push(row);
    }
  }
  return inserted;
}

export async function add_method(contact_id: number, input: ContactMethodInputData): Promise<ContactMethod> {
  const value = normalize_method_value(input.type, input.value);
  if (!value) {
    throw new BadRequestError(`Contact method value is empty after normalization (${input.type})`);
  }

  return with_transaction(async (client) => {
    const existing = await client.query<{ contact_id: number }>(
      'SELECT contact_id FROM contact_methods WHERE type = $1 AND value = $2',
      [input.type, value]
    );
    const owner = existing.rows[0];
    if (owner) {
      const message =
        owner.contact_id === contact_id
          ? `Contact already has ${input.type} "${value}"`
          : `Contact method ${input.type} "${value}" already belongs to another contact`;
      throw new ConflictError(message, { type: input.type, value, existing_contact_id: owner.contact_id });
    }

    const same_type = await client.query<{ id: number }>(
      'SELECT id FROM contact_methods WHERE contact_id = $1 AND type = $2',
      [contact_id, input.type]
    );
    const is_primary = input.is_primary || same_type.rows.length === 0;

    if (is_primary) {
      await client.query(
        'UPDATE contact_methods SET is_primary = FALSE WHERE contact_id = $1 AND type = $2 AND is_primary',
        [contact_id, input.type]
      );
    }

    const [method] = await insert_methods(client, contact_id, [{ type: input.type, value, is_primary }]);
    if (!method) {
      throw new Error('contact method insert returned no row');
    }
    await client.query('UPDATE contacts SET updated_at = NOW() WHERE id = $1', [contact_id]);
    return method;
  });
}

/** Deletes a method; when it was primary, the oldest remaining method of its type takes over. */
export async function remove_method(contact_id: number, method_id: number): Promise<boolean> {
  return with_transaction(async (client) => {
    const deleted = await client.query<{ type: ContactMethodType; is_primary: boolean }>(
      'DELETE FROM contact_methods WHERE id = $1 AND contact_id = $2 RETURNING type, is_primary',
      [method_id, contact_id]
    );
    const row = deleted.rows[0];
    if (!row) {
      return false;
    }

    if (row.is_primary) {
      await client.query(
        `UPDATE contact_methods SET is_primary = TRUE
         WHERE id = (
           SELECT id FROM contact_methods
           WHERE contact_id = $1 AND type = $2
           ORDER BY created_at, id
           LIMIT 1
         )`,
        [contact_id, row.type]
      );
    }
    await client.query('UPDATE contacts SET updated_at = NOW() WHERE id = $1', [contact_id]);
    return true;
  });
}

export async function get_methods_for_contacts(contact_ids: number[]): Promise<Map<number, ContactMethod[]>> {
  const by_contact = new Map<number, ContactMethod[]>();
  if (contact_ids.length === 0) {
    return by_contact;
  }

  const result = await query<ContactMethod>(
    `SELECT * FROM contact_methods
     WHERE contact_id = ANY($1::int[])
     ORDER BY contact_id, type, is_primary DESC, id`,
    [contact_ids]
  );

  for (const method of result.rows) {
    const list = by_contact.get(method.contact_id) ?? [];
    list.push(method);
    by_contact.set(method.contact_id, list);
  }
  return by_contact;
}

export async function find_contact_id_by_email(email: string): Promise<number | null> {
  const result = await query<{ contact_id: number }>(
    "SELECT contact_id FROM contact_methods WHERE type = 'email' AND value = $1",
    [normalize_method_value('email', email)]
  );
  return result.rows[0]?.contact_id ?? null;
}

/** Maps each stored email address among `addresses` to the contact that owns it. */
export async function find_email_owners(client: Queryable, addresses: string[]): Promise<Map<string, number>> {
  const owners = new Map<string, number>();
  if (addresses.length === 0) {
    return owners;
  }

  const result = await client.query<{ contact_id: number; value: string }>(
    "SELECT contact_id, value FROM contact_methods WHERE type = 'email' AND value = ANY($1::text[])",
    [addresses]
  );
  for (const row of result.rows) {
    owners.set(row.value, row.contact_id);
  }
  return owners;
}
