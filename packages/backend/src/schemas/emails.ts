import { z } from 'zod';
import { MAX_DB_ID, db_id_schema } from './contacts.js';

const date_param = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format');

export const search_emails_query_schema = z
  .object({
    q: z.string().trim().min(1).optional(),
    contact_id: z.coerce.number().int().positive().max(MAX_DB_ID, 'Id is out of range').optional(),
    sender: z.string().trim().min(1).optional(),
    start_date: date_param.optional(),
    end_date: date_param.optional(),
    unread: z
      .string()
      .optional()
      .transform((val) => (val === 'true' ? true : val === 'false' ? false : undefined)),
    limit: z
      .string()
      .optional()
      .transform((val) => {
        const num = val ? parseInt(val, 10) : 50;
        return Number.isNaN(num) ? 50 : Math.min(Math.max(num, 1), 100);
      }),
    offset: z
      .string()
      .optional()
      .transform((val) => {
        const num = val ? parseInt(val, 10) : 0;
        return Number.isNaN(num) ? 0 : Math.max(num, 0);
      }),
  })
  .refine((params) => !params.start_date || !params.end_date || params.start_date <= params.end_date, {
    message: 'start_date must not be after end_date',
    path: ['start_date'],
  });

export const email_id_param_schema = z.object({
  id: db_id_schema('Expected a numeric email id'),
});

export const update_email_schema = z.object({
  read: z.boolean(),
});

export const sync_emails_body_schema = z
  .object({
    name: z.string().trim().min(1).optional(),
    email: z.string().trim().min(1).optional(),
    company: z.string().trim().min(1).optional(),
  })
  .default({});

export type SearchEmailsQuery = z.output<typeof search_emails_query_schema>;
export type SyncEmailsBody = z.output<typeof sync_emails_body_schema>;
