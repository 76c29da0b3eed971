export interface GmailHeader {
  name?: string | null;
  value?: string | null;
}

export interface GmailMessagePart {
  mimeType?: string | null;
  filename?: string | null;
  headers?: GmailHeader[] | null;
  body?: {
    data?: string | null;
    attachmentId?: string | null;
  } | null;
  parts?: GmailMessagePart[] | null;
}

/** The subset of the Gmail API message resource the parser reads. */
export interface GmailMessage {
  id?: string | null;
  threadId?: string | null;
  labelIds?: string[] | null;
  internalDate?: string | null;
  payload?: GmailMessagePart | null;
}

export interface ParsedAddress {
  email: string;
  name: string | null;
}

export interface ParsedMessage {
  gmail_message_id: string;
  thread_id: string | null;
  subject: string;
  content: string;
  date: string;
  sender: ParsedAddress | null;
  recipients: ParsedAddress[];
  cc: ParsedAddress[];
  read: boolean;
  has_attachments: boolean;
}

export const NO_SUBJECT = '(no subject)';

const ATTRIBUTION_LINE = /^On .+ wrote:\s*$/;

export function get_header(headers: GmailHeader[] | null | undefined, name: string): string | null {
  const wanted = name.toLowerCase();
  const header = headers?.find((h) => h.name?.toLowerCase() === wanted);
  return header?.value ?? null;
}

function split_address_list(value: string): string[] {
  const parts: string[] = [];
  let current = '';
  let in_quotes = false;
  let in_angle = false;

  for (const char of value) {
    if (char === '"') {
      in_quotes = !in_quotes;
    } else if (char === '<' && !in_quotes) {
      in_angle = true;
    } else if (char === '>' && !in_quotes) {
      in_angle = false;
    } else if (char === ',' && !in_quotes && !in_angle) {
      parts.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  parts.push(current);

  return parts.map((part) => part.trim()).filter(Boolean);
}

/** Parses `"Jane Doe" <jane@example.com>, bob@example.com` style header values. */
export function parse_address_list(value: string | null): ParsedAddress[] {
  if (!value) {
    return [];
  }

  const addresses: ParsedAddress[] = [];
  for (const part of split_address_list(value)) {
    const angle = part.match(/^(.*)<([^<>]+)>\s*$/);
    if (angle) {
      const name = (angle[1] ?? '').trim().replace(/^"(.*)"$/, '$1').trim();
      const email = (angle[2] ?? '').trim().toLowerCase();
      if (email.includes('@')) {
        addresses.push({ email, name: name || null });
      }
    } else if (part.includes('@')) {
      addresses.push({ email: part.toLowerCase(), name: null });
    }
  }
  return addresses;
}

export function decode_base64url(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

function collect_bodies(part: GmailMessagePart, mime_type: string, out: string[]): void {
  if (part.parts && part.parts.length > 0) {
    for (const child of part.parts) {
      collect_bodies(child, mime_type, out);
    }
    return;
  }
  if (part.mimeType === mime_type && !part.filename && part.body?.data) {
    out.push(decode_base64url(part.body.data));
  }
}

function strip_html(html: string): string {
  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|li|tr)>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'");
}

/** Drops quoted reply lines and the "On ... wrote:" line that introduces them. */
export function strip_quoted_reply(text: string): string {
  const lines = text.split(/\r?\n/);
  if (!lines.some((line) => line.startsWith('>'))) {
    return text.trim();
  }
  return lines
    .filter((line) => !line.startsWith('>') && !ATTRIBUTION_LINE.test(line))
    .join('\n')
    .trim();
}

/** Plain text of the message: text/plain parts first, then stripped text/html, then a bodyless payload. */
export function extract_body(payload: GmailMessagePart | null | undefined): string {
  if (!payload) {
    return '';
  }

  const plain: string[] = [];
  collect_bodies(payload, 'text/plain', plain);
  if (plain.length > 0) {
    return strip_quoted_reply(plain.join('\n'));
  }

  const html: string[] = [];
  collect_bodies(payload, 'text/html', html);
  if (html.length > 0) {
    return strip_quoted_reply(strip_html(html.join('\n')));
  }

  if (payload.body?.data) {
    return strip_quoted_reply(decode_base64url(payload.body.data));
  }
  return '';
}

export function has_attachment_parts(part: GmailMessagePart | null | undefined): boolean {
  if (!part) {
    return false;
  }
  if (part.filename || part.body?.attachmentId) {
    return true;
  }
  return (part.parts ?? []).some(has_attachment_parts);
}

function resolve_date(header_value: string | null, internal_date: string | null | undefined): string {
  if (header_value) {
    const parsed = new Date(header_value);
    if (!Number.isNaN(parsed.getTime())) {
      return parsed.toISOString();
    }
  }
  if (internal_date && /^\d+$/.test(internal_date)) {
    return new Date(Number(internal_date)).toISOString();
  }
  throw new Error('Message has no usable date');
}

export function parse_gmail_message(message: GmailMessage): ParsedMessage {
  if (!message.id) {
    throw new Error('Message has no id');
  }

  const headers = message.payload?.headers;
  const [sender] = parse_address_list(get_header(headers, 'From'));
  const subject = get_header(headers, 'Subject')?.trim();

  return {
    gmail_message_id: message.id,
    thread_id: message.threadId ?? null,
    subject: subject || NO_SUBJECT,
    content: extract_body(message.payload),
    date: resolve_date(get_header(headers, 'Date'), message.internalDate),
    sender: sender ?? null,
    recipients: parse_address_list(get_header(headers, 'To')),
    cc: parse_address_list(get_header(headers, 'Cc')),
    read: !(message.labelIds ?? []).includes('UNREAD'),
    has_attachments: has_attachment_parts(message.payload),
  };
}
