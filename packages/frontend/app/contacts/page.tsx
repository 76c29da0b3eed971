'use client';

import { useState } from 'react';
import Link from 'next/link';
import { useContacts } from '@/lib/hooks/use-contacts';
import { ContactList } from '@/components/contacts/contact-list';
import { ErrorMessage } from '@/components/shared/loading';
import { button_variants } from '@/components/ui/button';
import { Plus } from 'lucide-react';

export default function ContactsPage() {
  const [warm_only, set_warm_only] = useState(false);
  const { data = [], isLoading, error } = useContacts(warm_only ? { warm: true } : {});

  return (
    <div className="space-y-6">
      <div className="flex justify-between items-center">
        <h1 className="text-3xl font-bold">Contacts</h1>
        <div className="flex items-center gap-4">
          <label className="flex items-center gap-2 text-sm">
            <input type="checkbox" checked={warm_only} onChange={(e) => set_warm_only(e.target.checked)} />
            Warm only
          </label>
          <Link href="/contacts/new" className={button_variants()}>
            <Plus />
            Add Contact
          </Link>
        </div>
      </div>

      {error && <ErrorMessage error={error} />}
      <ContactList contacts={data} is_loading={isLoading} />
    </div>
  );
}
