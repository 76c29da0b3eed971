import Link from 'next/link';
import type { ContactMethodType, ContactWithMethods } from '@crm/shared';
import { Avatar } from '@/components/shared/avatar';
import { Badge } from '@/components/ui/badge';
import { Button, button_variants } from '@/components/ui/button';
import { Card, CardContent, CardFooter, CardHeader, CardTitle } from '@/components/ui/card';
import { format_date, is_due } from '@/lib/utils';
import { Bell, Briefcase, Mail, Pencil, Phone, Star, Trash2 } from 'lucide-react';

const method_icons: Record<ContactMethodType, typeof Mail> = {
  email: Mail,
  phone: Phone,
  linkedin: Briefcase,
};

export function describe_role(contact: Pick<ContactWithMethods, 'position' | 'company'>): string | null {
  if (contact.position && contact.company) {
    return `${contact.position} at ${contact.company}`;
  }
  return contact.position || contact.company || null;
}

interface ContactCardProps {
  contact: ContactWithMethods;
  on_delete?: (contact: ContactWithMethods) => void;
  is_deleting?: boolean;
  show_edit?: boolean;
}

export function ContactCard({ contact, on_delete, is_deleting = false, show_edit = true }: ContactCardProps) {
  const role = describe_role(contact);
  const due = is_due(contact.follow_up_date);

  return (
    <Card>
      <CardHeader>
        <div className="flex items-center gap-3 min-w-0">
          <Avatar name={contact.name} warm={contact.warm} />
          <div className="min-w-0">
            <CardTitle className="flex items-center gap-1.5">
              <Link href={`/contacts/${contact.id}`} className="truncate hover:underline">
                {contact.name}
              </Link>
              {contact.warm && (
                <Star aria-label="Warm contact" className="w-4 h-4 shrink-0 text-amber-500 fill-amber-500" />
              )}
              {contact.reminder && (
                <Bell aria-label="Reminder on" className="w-3.5 h-3.5 shrink-0 text-muted-foreground" />
              )}
            </CardTitle>
            {role && <p className="text-sm text-muted-foreground truncate">{role}</p>}
          </div>
        </div>
      </CardHeader>

      <CardContent>
        {contact.contact_methods.length > 0 && (
          <ul className="space-y-1">
            {contact.contact_methods.map((method) => {
              const Icon = method_icons[method.type];
              return (
                <li key={method.id} className="flex items-center gap-2">
                  <Icon aria-hidden="true" className="w-3.5 h-3.5 text-muted-foreground" />
                  <span className="truncate">{method.value}</span>
                  {method.is_primary && <Badge variant="secondary">Primary</Badge>}
                </li>
              );
            })}
          </ul>
        )}

        <dl className="grid grid-cols-[auto_1fr] gap-x-3 gap-y-1 text-muted-foreground">
          <dt>Last Contacted</dt>
          <dd>{contact.last_contacted ? format_date(contact.last_contacted) : 'Never'}</dd>
          {contact.follow_up_date && (
            <>
              <dt>Follow-up</dt>
              <dd className="flex items-center gap-2">
                {format_date(contact.follow_up_date)}
                {due && <Badge variant="warning">Due</Badge>}
              </dd>
            </>
          )}
        </dl>

        {contact.notes && <p className="whitespace-pre-wrap">{contact.notes}</p>}
      </CardContent>

      {(show_edit || on_delete) && (
        <CardFooter>
          {show_edit && (
            <Link href={`/contacts/${contact.id}`} className={button_variants({ variant: 'outline', size: 'sm' })}>
              <Pencil />
              Edit
            </Link>
          )}
          {on_delete && (
            <Button
              variant="ghost"
              size="sm"
              className="text-destructive"
              onClick={() => on_delete(contact)}
              disabled={is_deleting}
            >
              <Trash2 />
              Delete
            </Button>
          )}
        </CardFooter>
      )}
    </Card>
  );
}
