'use client';

import { useRouter } from 'next/navigation';
import { AddContactForm } from '@/components/contacts/add-contact-form';

export default function NewContactPage() {
  const router = useRouter();

  return (
    <div className="space-y-6">
      <h1 className="text-3xl font-bold">Add Contact</h1>
      <AddContactForm on_created={(contact) => router.push(`/contacts/${contact.id}`)} />
    </div>
  );
}
