import { z } from 'zod';

export const contact_method_type_schema = z.enum(['email', 'phone', 'linkedin']);

const date_schema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format')
  .refine((value) => !Number.isNaN(Date.parse(`${value}T00:00:00Z`)), 'Invalid date');

const optional_text = z
  .string()
  .trim()
  .max(10_000)
  .nullable()
  .optional()
  .transform((value) => (value === '' ? null : value));

export const contact_method_input_schema = z
  .object({
    type: contact_method_type_schema,
    value: z.string().trim().min(1, 'Contact method value is required').max(500),
    is_primary: z.boolean().optional().default(false),
  })
  .superRefine((method, ctx) => {
    if (method.type === 'email' && !z.string().email().safeParse(method.value).success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['value'], message: 'Invalid email format' });
    }
  });

const contact_fields = {
  name: z
    .string({ required_error: 'Name is required' })
    .trim()
    .min(1, 'Name is required')
    .max(255),
  company: optional_text,
  position: optional_text,
  last_contacted: date_schema.nullable().optional(),
  follow_up_date: date_schema.nullable().optional(),
  warm: z.boolean().optional(),
  reminder: z.boolean().optional(),
  notes: optional_text,
};

export const create_contact_schema = z.object({
  ...contact_fields,
  contact_methods: z.array(contact_method_input_schema).max(50).optional().default([]),
});

// PUT replaces every field; omitted optional fields reset to their defaults.
export const replace_contact_schema = create_contact_schema;

export const update_contact_schema = z
  .object({
    ...contact_fields,
    name: contact_fields.name.optional(),
  })
  .strict()
  .refine((patch) => Object.keys(patch).length > 0, 'At least one field is required');

export const list_contacts_query_schema = z.object({
  name: z.string().trim().min(1).optional(),
  email: z.string().trim().min(1).optional(),
  company: z.string().trim().min(1).optional(),
  warm: z
    .string()
    .optional()
    .transform((val) => (val === 'true' ? true : val === 'false' ? false : undefined)),
});

// Ids are SERIAL columns: anything past int4 cannot exist.
export const MAX_DB_ID = 2_147_483_647;

export function db_id_schema(message: string) {
  return z
    .string()
    .regex(/^\d+$/, message)
    .transform((value) => Number(value))
    .refine((id) => id >= 1 && id <= MAX_DB_ID, 'Id is out of range');
}

const REF_MESSAGE = 'Expected a numeric id or an email address';

export const contact_ref_param_schema = z.object({
  ref: z
    .string()
    .trim()
    .transform((value, ctx) => {
      if (/^\d+$/.test(value)) {
        const id = Number(value);
        if (id < 1 || id > MAX_DB_ID) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Id is out of range' });
          return z.NEVER;
        }
        return id;
      }
      if (z.string().email().safeParse(value).success) {
        return value.toLowerCase();
      }
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: REF_MESSAGE });
      return z.NEVER;
    }),
});

export const method_param_schema = z.object({
  methodId: db_id_schema('Expected a numeric method id'),
});

export type ContactMethodInputData = z.output<typeof contact_method_input_schema>;
export type CreateContactData = z.output<typeof create_contact_schema>;
export type UpdateContactData = z.output<typeof update_contact_schema>;
export type ListContactsQuery = z.output<typeof list_contacts_query_schema>;
export type ContactRef = z.output<typeof contact_ref_param_schema>['ref'];
