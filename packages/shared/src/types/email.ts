export type EmailContactRole = 'sender' | 'recipient' | 'cc';

export interface Email {
  id: number;
  gmail_message_id: string;
  thread_id: string | null;
  subject: string;
  content: string;
  summary: string | null;
  date: string;
  sender_email: string | null;
  sender_name: string | null;
  recipient_email: string | null;
  recipient_name: string | null;
  cc: string[];
  read: boolean;
  has_attachments: boolean;
  created_at: string;
}

export interface EmailContactLink {
  id: number;
  name: string;
  email: string | null;
  role: EmailContactRole;
}

export interface EmailWithContacts extends Email {
  contacts: EmailContactLink[];
}

export interface EmailSearchParams {
  q?: string;
  contact_id?: number;
  sender?: string;
  start_date?: string;
  end_date?: string;
  unread?: boolean;
  limit?: number;
  offset?: number;
}
