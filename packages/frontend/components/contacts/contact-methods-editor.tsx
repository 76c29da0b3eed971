'use client';

import { useState } from 'react';
import type { ContactMethodType, ContactWithMethods } from '@crm/shared';
import { useAddContactMethod, useRemoveContactMethod } from '@/lib/hooks/use-contacts';
import { EMAIL_PATTERN } from '@/lib/validation';
import { Badge } from '@/components/ui/badge';
import { Button } from '@/components/ui/button';
import { Input } from '@/components/ui/input';
import { ErrorMessage } from '@/components/shared/loading';
import { Plus, X } from 'lucide-react';

export function ContactMethodsEditor({ contact }: { contact: ContactWithMethods }) {
  const [type, set_type] = useState<ContactMethodType>('email');
  const [value, set_value] = useState('');
  const [is_primary, set_is_primary] = useState(false);
  const [validation_error, set_validation_error] = useState<string | null>(null);
  const add_method = useAddContactMethod();
  const remove_method = useRemoveContactMethod();

  function handle_add(e: React.FormEvent) {
    e.preventDefault();
    const trimmed = value.trim();
    if (!trimmed) {
      set_validation_error('All contact method values must be filled');
      return;
    }
    if (type === 'email' && !EMAIL_PATTERN.test(trimmed)) {
      set_validation_error('Invalid email format');
      return;
    }
    set_validation_error(null);
    add_method.mutate(
      { ref: contact.id, input: { type, value: trimmed, is_primary } },
      {
        onSuccess: () => {
          set_value('');
          set_is_primary(false);
        },
      }
    );
  }

  const error = add_method.error ?? remove_method.error;

  return (
    <section className="space-y-3">
      <h2 className="font-semibold">Contact methods</h2>
      {validation_error && (
        <p role="alert" className="text-sm text-destructive">
          {validation_error}
        </p>
      )}
      {error && <ErrorMessage error={error} />}
      <ul className="space-y-1 text-sm">
        {contact.contact_methods.map((method) => (
          <li key={method.id} className="flex items-center gap-2">
            <span className="w-16 text-muted-foreground capitalize">{method.type}</span>
            <span className="truncate">{method.value}</span>
            {method.is_primary && <Badge variant="secondary">Primary</Badge>}
            <Button
              variant="ghost"
              size="icon-sm"
              aria-label={`Remove ${method.value}`}
              disabled={remove_method.isPending}
              onClick={() => remove_method.mutate({ ref: contact.id, method_id: method.id })}
            >
              <X />
            </Button>
          </li>
        ))}
      </ul>
      <form onSubmit={handle_add} noValidate className="flex flex-wrap items-center gap-2">
        <select
          aria-label="New method type"
          value={type}
          onChange={(e) => set_type(e.target.value === 'phone' ? 'phone' : e.target.value === 'linkedin' ? 'linkedin' : 'email')}
          className="h-9 rounded-md border bg-background px-2 text-sm"
        >
          <option value="email">Email</option>
          <option value="phone">Phone</option>
          <option value="linkedin">LinkedIn</option>
        </select>
        <Input
          aria-label="New method value"
          value={value}
          onChange={(e) => set_value(e.target.value)}
          className="max-w-xs"
        />
        <label className="flex items-center gap-1 text-sm">
          <input type="checkbox" checked={is_primary} onChange={(e) => set_is_primary(e.target.checked)} />
          Primary
        </label>
        <Button type="submit" variant="outline" size="sm" disabled={add_method.isPending}>
          <Plus />
          Add
        </Button>
      </form>
    </section>
  );
}
