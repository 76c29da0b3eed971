'use client';

import { useState } from 'react';
import type { EmailWithContacts, SyncResult } from '@crm/shared';
import { useEmailSearch, useSyncEmails } from '@/lib/hooks/use-emails';
import { EmailDetail, format_party } from './email-detail';
import { Button } from '@/components/ui/button';
import { Input } from '@/components/ui/input';
import { ErrorMessage, Loading } from '@/components/shared/loading';
import { cn, format_date_time } from '@/lib/utils';
import { RefreshCw, Search } from 'lucide-react';

export function format_sync_message(result: SyncResult): string {
  return `Sync completed: ${result.saved} new emails saved, ${result.skipped} duplicates skipped, ${result.failed} failed.`;
}

interface EmailItemsProps {
  emails: EmailWithContacts[];
  selected_id: number | null;
  on_select: (id: number) => void;
}

export function EmailItems({ emails, selected_id, on_select }: EmailItemsProps) {
  if (emails.length === 0) {
    return <div className="text-center py-12 text-muted-foreground">No emails found</div>;
  }

  return (
    <ul className="divide-y rounded-xl border bg-card">
      {emails.map((email) => (
        <li key={email.id}>
          <button
            type="button"
            onClick={() => on_select(email.id)}
            aria-current={email.id === selected_id}
            className={cn(
              'w-full text-left px-4 py-3 space-y-0.5 hover:bg-accent transition-colors',
              email.id === selected_id && 'bg-accent'
            )}
          >
            <div className="flex justify-between gap-2 text-sm">
              <span className={cn('truncate', !email.read && 'font-semibold')}>
                {format_party(email.sender_name, email.sender_email)}
              </span>
              <span className="shrink-0 text-xs text-muted-foreground">{format_date_time(email.date)}</span>
            </div>
            <p className={cn('truncate text-sm', !email.read && 'font-semibold')}>{email.subject}</p>
          </button>
        </li>
      ))}
    </ul>
  );
}

export function EmailList() {
  const [draft, set_draft] = useState('');
  const [query, set_query] = useState('');
  const [selected_id, set_selected_id] = useState<number | null>(null);
  const [sync_message, set_sync_message] = useState<string | null>(null);

  const { data, isLoading, error, fetchNextPage, hasNextPage, isFetchingNextPage } = useEmailSearch({
    q: query || undefined,
  });
  const sync = useSyncEmails();

  const emails = data?.pages.flatMap((page) => page.emails) ?? [];
  const total = data?.pages[0]?.meta.total ?? 0;
  const selected = emails.find((email) => email.id === selected_id) ?? null;

  function handle_search(e: React.FormEvent) {
    e.preventDefault();
    set_query(draft.trim());
    set_selected_id(null);
  }

  function handle_sync() {
    set_sync_message(null);
    sync.mutate({}, { onSuccess: (result) => set_sync_message(format_sync_message(result)) });
  }

  return (
    <div className="space-y-4">
      <div className="flex flex-wrap gap-2">
        <form onSubmit={handle_search} className="relative flex-1 min-w-60">
          <Search className="absolute left-3 top-1/2 -translate-y-1/2 w-4 h-4 text-muted-foreground" />
          <Input
            placeholder="Search emails..."
            aria-label="Search emails"
            value={draft}
            onChange={(e) => set_draft(e.target.value)}
            className="pl-10"
          />
        </form>
        <Button onClick={handle_sync} disabled={sync.isPending}>
          <RefreshCw className={cn(sync.isPending && 'animate-spin')} />
          {sync.isPending ? 'Syncing...' : 'Sync Emails'}
        </Button>
      </div>

      {sync_message && (
        <p role="status" className="text-sm text-emerald-700">
          {sync_message}
        </p>
      )}
      {sync.error && <ErrorMessage error={sync.error} />}
      {error && <ErrorMessage error={error} />}

      {isLoading ? (
        <Loading text="Loading emails..." />
      ) : (
        <div className="grid grid-cols-1 lg:grid-cols-5 gap-4">
          <div className="lg:col-span-2 space-y-2">
            <p className="text-xs text-muted-foreground">{total} emails</p>
            <EmailItems emails={emails} selected_id={selected_id} on_select={set_selected_id} />
            {hasNextPage && (
              <Button variant="outline" className="w-full" onClick={() => fetchNextPage()} disabled={isFetchingNextPage}>
                {isFetchingNextPage ? 'Loading...' : 'Load More'}
              </Button>
            )}
          </div>
          <div className="lg:col-span-3">
            {selected ? (
              <EmailDetail email={selected} />
            ) : (
              <div className="text-center py-12 text-muted-foreground">Select an email to read it</div>
            )}
          </div>
        </div>
      )}
    </div>
  );
}
