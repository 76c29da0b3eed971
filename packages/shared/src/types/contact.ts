export type ContactMethodType = 'email' | 'phone' | 'linkedin';

export interface ContactMethod {
  id: number;
  contact_id: number;
  type: ContactMethodType;
  value: string;
  is_primary: boolean;
  created_at: string;
}

// Dates are YYYY-MM-DD strings, timestamps ISO 8601.
export interface Contact {
  id: number;
  name: string;
  company: string | null;
  position: string | null;
  last_contacted: string | null;
  follow_up_date: string | null;
  warm: boolean;
  reminder: boolean;
  notes: string | null;
  created_at: string;
  updated_at: string;
}

export interface ContactWithMethods extends Contact {
  /** Primary email address, or the first email method when none is primary. */
  email: string | null;
  contact_methods: ContactMethod[];
}

export interface ContactMethodInput {
  type: ContactMethodType;
  value: string;
  is_primary?: boolean;
}

export interface ContactInput {
  name: string;
  company?: string | null;
  position?: string | null;
  last_contacted?: string | null;
  follow_up_date?: string | null;
  warm?: boolean;
  reminder?: boolean;
  notes?: string | null;
  contact_methods?: ContactMethodInput[];
}

export type ContactPatch = Partial<Omit<ContactInput, 'contact_methods'>>;

export interface EnrichmentResult {
  contact: ContactWithMethods;
  updated_fields: Array<'company' | 'position' | 'notes'>;
  summary: string | null;
}
