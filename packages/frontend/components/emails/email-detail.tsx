'use client';

import Link from 'next/link';
import type { EmailWithContacts } from '@crm/shared';
import { useMarkEmailRead, useSummarizeEmail } from '@/lib/hooks/use-emails';
import { Badge } from '@/components/ui/badge';
import { Button } from '@/components/ui/button';
import { ErrorMessage } from '@/components/shared/loading';
import { format_date_time } from '@/lib/utils';
import { Paperclip, Sparkles } from 'lucide-react';

export function format_party(name: string | null, email: string | null): string {
  if (name && email) {
    return `${name} <${email}>`;
  }
  return name || email || 'Unknown';
}

export function EmailDetail({ email }: { email: EmailWithContacts }) {
  const summarize = useSummarizeEmail();
  const mark_read = useMarkEmailRead();
  const error = summarize.error ?? mark_read.error;

  return (
    <article className="space-y-4 rounded-xl border bg-card p-5">
      <header className="space-y-1">
        <h2 className="text-lg font-semibold">{email.subject}</h2>
        <p className="text-sm text-muted-foreground">
          {format_date_time(email.date)}
          {email.has_attachments && <Paperclip aria-label="Has attachments" className="inline w-3.5 h-3.5 ml-2" />}
        </p>
        <dl className="grid grid-cols-[auto_1fr] gap-x-3 text-sm">
          <dt className="text-muted-foreground">From</dt>
          <dd>{format_party(email.sender_name, email.sender_email)}</dd>
          <dt className="text-muted-foreground">To</dt>
          <dd>{format_party(email.recipient_name, email.recipient_email)}</dd>
          {email.cc.length > 0 && (
            <>
              <dt className="text-muted-foreground">Cc</dt>
              <dd>{email.cc.join(', ')}</dd>
            </>
          )}
        </dl>
        {email.contacts.length > 0 && (
          <div className="flex flex-wrap gap-1 pt-1">
            {email.contacts.map((contact) => (
              <Badge key={contact.id} variant="outline">
                <Link href={`/contacts/${contact.id}`}>{contact.name}</Link>
                <span className="ml-1 text-muted-foreground">{contact.role}</span>
              </Badge>
            ))}
          </div>
        )}
      </header>

      <div className="flex gap-2">
        <Button
          variant="outline"
          size="sm"
          onClick={() => mark_read.mutate({ id: email.id, read: !email.read })}
          disabled={mark_read.isPending}
        >
          {email.read ? 'Mark as unread' : 'Mark as read'}
        </Button>
        <Button variant="secondary" size="sm" onClick={() => summarize.mutate(email.id)} disabled={summarize.isPending}>
          <Sparkles />
          {summarize.isPending ? 'Summarizing...' : email.summary ? 'Regenerate summary' : 'Summarize'}
        </Button>
      </div>

      {error && <ErrorMessage error={error} />}

      {email.summary && (
        <section className="rounded-md bg-muted p-3 text-sm">
          <h3 className="font-medium mb-1">Summary</h3>
          <p className="whitespace-pre-wrap">{email.summary}</p>
        </section>
      )}

      <div className="whitespace-pre-wrap text-sm leading-relaxed">{email.content}</div>
    </article>
  );
}
