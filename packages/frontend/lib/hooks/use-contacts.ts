import { useMutation, useQuery, useQueryClient } from '@tanstack/react-query';
import type { ContactInput, ContactMethodInput, ContactPatch, ContactWithMethods } from '@crm/shared';
import { api, type ContactFilters, type ContactRef } from '@/lib/api';

export function useContacts(filters: ContactFilters = {}) {
  return useQuery<ContactWithMethods[]>({
    queryKey: ['contacts', filters],
    queryFn: () => api.get_contacts(filters),
  });
}

export function useContact(ref: ContactRef | null) {
  return useQuery<ContactWithMethods>({
    queryKey: ['contact', ref === null ? null : String(ref)],
    queryFn: () => api.get_contact(ref ?? ''),
    enabled: ref !== null && ref !== '',
  });
}

export function useCreateContact() {
  const query_client = useQueryClient();

  return useMutation({
    mutationFn: (input: ContactInput) => api.create_contact(input),
    onSuccess: () => {
      query_client.invalidateQueries({ queryKey: ['contacts'] });
    },
  });
}

// Detail queries are keyed by the URL ref (id or email), so writes invalidate them all.
export function useUpdateContact() {
  const query_client = useQueryClient();

  return useMutation({
    mutationFn: ({ ref, patch }: { ref: ContactRef; patch: ContactPatch }) => api.update_contact(ref, patch),
    onSuccess: () => {
      query_client.invalidateQueries({ queryKey: ['contact'] });
      query_client.invalidateQueries({ queryKey: ['contacts'] });
    },
  });
}

export function useDeleteContact() {
  const query_client = useQueryClient();

  return useMutation({
    mutationFn: (ref: ContactRef) => api.delete_contact(ref),
    onSuccess: () => {
      query_client.invalidateQueries({ queryKey: ['contacts'] });
    },
  });
}

export function useAddContactMethod() {
  const query_client = useQueryClient();

  return useMutation({
    mutationFn: ({ ref, input }: { ref: ContactRef; input: ContactMethodInput }) =>
      api.add_contact_method(ref, input),
    onSuccess: () => {
      query_client.invalidateQueries({ queryKey: ['contact'] });
      query_client.invalidateQueries({ queryKey: ['contacts'] });
    },
  });
}

export function useRemoveContactMethod() {
  const query_client = useQueryClient();

  return useMutation({
    mutationFn: ({ ref, method_id }: { ref: ContactRef; method_id: number }) =>
      api.remove_contact_method(ref, method_id),
    onSuccess: () => {
      query_client.invalidateQueries({ queryKey: ['contact'] });
      query_client.invalidateQueries({ queryKey: ['contacts'] });
    },
  });
}

export function useEnrichContact() {
  const query_client = useQueryClient();

  return useMutation({
    mutationFn: (ref: ContactRef) => api.enrich_contact(ref),
    onSuccess: () => {
      query_client.invalidateQueries({ queryKey: ['contact'] });
      query_client.invalidateQueries({ queryKey: ['contacts'] });
    },
  });
}
