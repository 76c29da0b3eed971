import { useInfiniteQuery, useMutation, useQuery, useQueryClient } from '@tanstack/react-query';
import type { EmailSearchParams, EmailWithContacts, SyncFilters } from '@crm/shared';
import { api, type ContactRef, type EmailPage } from '@/lib/api';

const PAGE_SIZE = 25;

export function useEmailSearch(params: Omit<EmailSearchParams, 'limit' | 'offset'> = {}) {
  return useInfiniteQuery<EmailPage>({
    queryKey: ['emails', params],
    queryFn: ({ pageParam }) =>
      api.search_emails({
        ...params,
        limit: PAGE_SIZE,
        offset: typeof pageParam === 'number' ? pageParam : 0,
      }),
    initialPageParam: 0,
    getNextPageParam: (last_page) =>
      last_page.meta.has_more ? last_page.meta.offset + last_page.meta.limit : undefined,
  });
}

export function useContactEmails(ref: ContactRef | null) {
  return useQuery<EmailWithContacts[]>({
    queryKey: ['contact-emails', ref === null ? null : String(ref)],
    queryFn: () => api.get_contact_emails(ref ?? ''),
    enabled: ref !== null && ref !== '',
  });
}

function invalidate_email_queries(query_client: ReturnType<typeof useQueryClient>) {
  query_client.invalidateQueries({ queryKey: ['emails'] });
  query_client.invalidateQueries({ queryKey: ['contact-emails'] });
}

export function useMarkEmailRead() {
  const query_client = useQueryClient();

  return useMutation({
    mutationFn: ({ id, read }: { id: number; read: boolean }) => api.mark_email_read(id, read),
    onSuccess: () => invalidate_email_queries(query_client),
  });
}

export function useSummarizeEmail() {
  const query_client = useQueryClient();

  return useMutation({
    mutationFn: (id: number) => api.summarize_email(id),
    onSuccess: () => invalidate_email_queries(query_client),
  });
}

// Sync touches last_contacted, so contact queries go stale too.
export function useSyncEmails() {
  const query_client = useQueryClient();

  return useMutation({
    mutationFn: (filters: SyncFilters) => api.sync_emails(filters),
    onSuccess: () => {
      invalidate_email_queries(query_client);
      query_client.invalidateQueries({ queryKey: ['contacts'] });
      query_client.invalidateQueries({ queryKey: ['contact'] });
    },
  });
}

export function useSyncContactEmails() {
  const query_client = useQueryClient();

  return useMutation({
    mutationFn: (ref: ContactRef) => api.sync_contact_emails(ref),
    onSuccess: () => {
      invalidate_email_queries(query_client);
      query_client.invalidateQueries({ queryKey: ['contact'] });
      query_client.invalidateQueries({ queryKey: ['contacts'] });
    },
  });
}
