import type {
  ApiEnvelope,
  ContactInput,
  ContactMethod,
  ContactMethodInput,
  ContactPatch,
  ContactWithMethods,
  EmailSearchParams,
  EmailWithContacts,
  EnrichmentResult,
  PaginationMeta,
  SuccessEnvelope,
  SyncFilters,
  SyncResult,
} from '@crm/shared';

const BASE_URL = process.env.NEXT_PUBLIC_API_URL || 'http://localhost:5001';

export type ContactRef = number | string;

export interface ContactFilters {
  name?: string;
  email?: string;
  company?: string;
  warm?: boolean;
}

export interface EmailPage {
  emails: EmailWithContacts[];
  meta: PaginationMeta;
}

export class ApiRequestError extends Error {
  constructor(
    public status: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ApiRequestError';
  }
}

function to_query(params: Record<string, string | number | boolean | undefined>): string {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== '') {
      query.set(key, String(value));
    }
  }
  const text = query.toString();
  return text ? `?${text}` : '';
}

function contact_path(ref: ContactRef): string {
  return `/api/contacts/${encodeURIComponent(String(ref))}`;
}

class ApiClient {
  private async fetch_json<T, M = Record<string, unknown>>(
    path: string,
    options: RequestInit = {}
  ): Promise<SuccessEnvelope<T, M>> {
    const res = await fetch(`${BASE_URL}${path}`, {
      ...options,
      headers: {
        'Content-Type': 'application/json',
        ...options.headers,
      },
    });

    const body: ApiEnvelope<T, M> | null = await res.json().catch(() => null);

    if (body?.status === 'error') {
      throw new ApiRequestError(res.status, body.error.code, body.error.message, body.error.details);
    }
    if (!res.ok || !body) {
      throw new ApiRequestError(res.status, 'http_error', `API error: ${res.status}`);
    }

    return body;
  }

  private async data<T>(path: string, options?: RequestInit): Promise<T> {
    const envelope = await this.fetch_json<T>(path, options);
    return envelope.data;
  }

  // Contacts
  get_contacts(filters: ContactFilters = {}): Promise<ContactWithMethods[]> {
    return this.data(`/api/contacts${to_query({ ...filters })}`);
  }

  get_contact(ref: ContactRef): Promise<ContactWithMethods> {
    return this.data(contact_path(ref));
  }

  create_contact(input: ContactInput): Promise<ContactWithMethods> {
    return this.data('/api/contacts', {
      method: 'POST',
      body: JSON.stringify(input),
    });
  }

  replace_contact(ref: ContactRef, input: ContactInput): Promise<ContactWithMethods> {
    return this.data(contact_path(ref), {
      method: 'PUT',
      body: JSON.stringify(input),
    });
  }

  update_contact(ref: ContactRef, patch: ContactPatch): Promise<ContactWithMethods> {
    return this.data(contact_path(ref), {
      method: 'PATCH',
      body: JSON.stringify(patch),
    });
  }

  delete_contact(ref: ContactRef): Promise<{ id: number }> {
    return this.data(contact_path(ref), { method: 'DELETE' });
  }

  add_contact_method(ref: ContactRef, input: ContactMethodInput): Promise<ContactMethod> {
    return this.data(`${contact_path(ref)}/methods`, {
      method: 'POST',
      body: JSON.stringify(input),
    });
  }

  remove_contact_method(ref: ContactRef, method_id: number): Promise<{ id: number }> {
    return this.data(`${contact_path(ref)}/methods/${method_id}`, { method: 'DELETE' });
  }

  get_contact_emails(ref: ContactRef): Promise<EmailWithContacts[]> {
    return this.data(`${contact_path(ref)}/emails`);
  }

  sync_contact_emails(ref: ContactRef): Promise<SyncResult> {
    return this.data(`${contact_path(ref)}/sync-emails`, { method: 'POST' });
  }

  enrich_contact(ref: ContactRef): Promise<EnrichmentResult> {
    return this.data(`${contact_path(ref)}/enrich`, { method: 'POST' });
  }

  // Emails
  async search_emails(params: EmailSearchParams = {}): Promise<EmailPage> {
    const envelope = await this.fetch_json<EmailWithContacts[], PaginationMeta>(
      `/api/emails/search${to_query({ ...params })}`
    );
    const emails = envelope.data;
    const meta = envelope.meta ?? {
      total: emails.length,
      limit: emails.length,
      offset: params.offset ?? 0,
      has_more: false,
    };
    return { emails, meta };
  }

  get_email(id: number): Promise<EmailWithContacts> {
    return this.data(`/api/emails/${id}`);
  }

  mark_email_read(id: number, read: boolean): Promise<EmailWithContacts> {
    return this.data(`/api/emails/${id}`, {
      method: 'PATCH',
      body: JSON.stringify({ read }),
    });
  }

  summarize_email(id: number): Promise<EmailWithContacts> {
    return this.data(`/api/emails/${id}/summarize`, { method: 'POST' });
  }

  sync_emails(filters: SyncFilters = {}): Promise<SyncResult> {
    return this.data('/api/emails/sync', {
      method: 'POST',
      body: JSON.stringify(filters),
    });
  }
}

export const api = new ApiClient();
