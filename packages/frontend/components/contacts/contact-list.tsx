'use client';

import { useMemo, useState } from 'react';
import type { ContactWithMethods } from '@crm/shared';
import { ContactCard } from './contact-card';
import { Input } from '@/components/ui/input';
import { ErrorMessage } from '@/components/shared/loading';
import { useDeleteContact } from '@/lib/hooks/use-contacts';
import { Search } from 'lucide-react';

export function filter_contacts(contacts: ContactWithMethods[], term: string): ContactWithMethods[] {
  const needle = term.trim().toLowerCase();
  if (!needle) {
    return contacts;
  }

  return contacts.filter((contact) =>
    [contact.name, contact.company, contact.position, ...contact.contact_methods.map((m) => m.value)].some(
      (value) => value?.toLowerCase().includes(needle)
    )
  );
}

interface ContactListProps {
  contacts: ContactWithMethods[];
  is_loading: boolean;
}

export function ContactList({ contacts, is_loading }: ContactListProps) {
  const [search, set_search] = useState('');
  const { mutate: delete_contact, isPending, variables: deleting_ref, error } = useDeleteContact();

  const visible = useMemo(() => filter_contacts(contacts, search), [contacts, search]);

  function handle_delete(contact: ContactWithMethods) {
    if (!window.confirm(`Delete ${contact.name}? This cannot be undone.`)) {
      return;
    }
    delete_contact(contact.id);
  }

  return (
    <div className="space-y-4">
      <div className="relative">
        <Search className="absolute left-3 top-1/2 -translate-y-1/2 w-4 h-4 text-muted-foreground" />
        <Input
          placeholder="Search contacts..."
          aria-label="Search contacts"
          value={search}
          onChange={(e) => set_search(e.target.value)}
          className="pl-10"
        />
      </div>

      {error && <ErrorMessage error={error} />}

      {is_loading ? (
        <div className="grid grid-cols-1 md:grid-cols-2 xl:grid-cols-3 gap-4">
          {Array.from({ length: 6 }, (_, i) => (
            <div key={i} className="h-48 rounded-xl border bg-card animate-pulse" />
          ))}
        </div>
      ) : visible.length === 0 ? (
        <div className="text-center py-12 text-muted-foreground">No contacts found</div>
      ) : (
        <div className="grid grid-cols-1 md:grid-cols-2 xl:grid-cols-3 gap-4">
          {visible.map((contact) => (
            <ContactCard
              key={contact.id}
              contact={contact}
              on_delete={handle_delete}
              is_deleting={isPending && deleting_ref === contact.id}
            />
          ))}
        </div>
      )}
    </div>
  );
}
