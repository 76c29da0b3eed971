'use client';

import Link from 'next/link';
import { useContacts } from '@/lib/hooks/use-contacts';
import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card';
import { Badge } from '@/components/ui/badge';
import { Loading } from '@/components/shared/loading';
import { format_date, is_due } from '@/lib/utils';
import { Mail, UserPlus, Users } from 'lucide-react';

const shortcuts = [
  { href: '/contacts', icon: Users, title: 'Contacts', text: 'Browse, search and edit the people you know.' },
  { href: '/contacts/new', icon: UserPlus, title: 'Add contact', text: 'Record someone new with their emails and phones.' },
  { href: '/emails', icon: Mail, title: 'Emails', text: 'Sync Gmail and read conversations with your contacts.' },
];

function FollowUps() {
  const { data: contacts = [], isLoading } = useContacts();
  const due = contacts
    .filter((contact) => is_due(contact.follow_up_date))
    .sort((a, b) => (a.follow_up_date ?? '').localeCompare(b.follow_up_date ?? ''));

  return (
    <Card>
      <CardHeader>
        <CardTitle>Follow-ups due</CardTitle>
      </CardHeader>
      <CardContent>
        {isLoading ? (
          <Loading size="sm" />
        ) : due.length === 0 ? (
          <p className="text-muted-foreground">Nothing due. Nice.</p>
        ) : (
          <ul className="space-y-2">
            {due.map((contact) => (
              <li key={contact.id} className="flex items-center justify-between gap-2">
                <Link href={`/contacts/${contact.id}`} className="hover:underline">
                  {contact.name}
                </Link>
                <Badge variant="warning">{contact.follow_up_date && format_date(contact.follow_up_date)}</Badge>
              </li>
            ))}
          </ul>
        )}
      </CardContent>
    </Card>
  );
}

export default function HomePage() {
  return (
    <div className="space-y-8">
      <div className="space-y-2">
        <h1 className="text-4xl font-semibold">Smart CRM</h1>
        <p className="text-muted-foreground max-w-2xl">
          Keep track of your contacts and the emails you exchange with them.
        </p>
      </div>

      <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
        {shortcuts.map((item) => (
          <Link key={item.href} href={item.href} className="rounded-xl border bg-card p-5 hover:bg-accent transition-colors">
            <item.icon className="w-5 h-5 mb-3 text-primary" />
            <h2 className="font-semibold">{item.title}</h2>
            <p className="text-sm text-muted-foreground">{item.text}</p>
          </Link>
        ))}
      </div>

      <FollowUps />
    </div>
  );
}
