'use client';

import { useState } from 'react';
import type { ContactMethodType, ContactWithMethods } from '@crm/shared';
import { useCreateContact } from '@/lib/hooks/use-contacts';
import { Button } from '@/components/ui/button';
import { Input } from '@/components/ui/input';
import { Label } from '@/components/ui/label';
import { Textarea } from '@/components/ui/textarea';
import {
  empty_draft,
  empty_method,
  to_contact_input,
  validate_contact_draft,
  type ContactDraft,
  type MethodDraft,
} from '@/lib/validation';
import { Plus, X } from 'lucide-react';

const method_types: { value: ContactMethodType; label: string }[] = [
  { value: 'email', label: 'Email' },
  { value: 'phone', label: 'Phone' },
  { value: 'linkedin', label: 'LinkedIn' },
];

interface AddContactFormProps {
  on_created?: (contact: ContactWithMethods) => void;
}

export function AddContactForm({ on_created }: AddContactFormProps) {
  const [draft, set_draft] = useState<ContactDraft>(empty_draft);
  const [next_key, set_next_key] = useState(1);
  const [validation_error, set_validation_error] = useState<string | null>(null);
  const { mutate: create_contact, isPending, error } = useCreateContact();

  function update<K extends keyof ContactDraft>(key: K, value: ContactDraft[K]) {
    set_draft((prev) => ({ ...prev, [key]: value }));
  }

  function update_method(key: number, patch: Partial<MethodDraft>) {
    set_draft((prev) => ({
      ...prev,
      methods: prev.methods.map((method) => (method.key === key ? { ...method, ...patch } : method)),
    }));
  }

  // Primary is exclusive within a type.
  function set_primary(target: MethodDraft) {
    set_draft((prev) => ({
      ...prev,
      methods: prev.methods.map((method) =>
        method.type === target.type ? { ...method, is_primary: method.key === target.key } : method
      ),
    }));
  }

  function add_method() {
    set_draft((prev) => ({ ...prev, methods: [...prev.methods, empty_method(next_key)] }));
    set_next_key((key) => key + 1);
  }

  function remove_method(key: number) {
    set_draft((prev) => ({ ...prev, methods: prev.methods.filter((method) => method.key !== key) }));
  }

  function handle_submit(e: React.FormEvent) {
    e.preventDefault();
    const problem = validate_contact_draft(draft);
    set_validation_error(problem);
    if (problem) {
      return;
    }

    create_contact(to_contact_input(draft), {
      onSuccess: (contact) => {
        set_draft(empty_draft());
        on_created?.(contact);
      },
    });
  }

  const message = validation_error ?? (error ? error.message : null);

  return (
    <form onSubmit={handle_submit} noValidate className="space-y-5 max-w-2xl">
      {message && (
        <p role="alert" className="text-sm text-destructive">
          {message}
        </p>
      )}

      <div className="space-y-1.5">
        <Label htmlFor="name">Name</Label>
        <Input id="name" value={draft.name} onChange={(e) => update('name', e.target.value)} placeholder="Jane Doe" />
      </div>

      <div className="grid grid-cols-1 sm:grid-cols-2 gap-4">
        <div className="space-y-1.5">
          <Label htmlFor="company">Company</Label>
          <Input id="company" value={draft.company} onChange={(e) => update('company', e.target.value)} />
        </div>
        <div className="space-y-1.5">
          <Label htmlFor="position">Position</Label>
          <Input id="position" value={draft.position} onChange={(e) => update('position', e.target.value)} />
        </div>
      </div>

      <fieldset className="space-y-2">
        <legend className="text-sm font-medium mb-1">Contact methods</legend>
        {draft.methods.map((method, index) => (
          <div key={method.key} className="flex items-center gap-2">
            <select
              aria-label={`Method ${index + 1} type`}
              value={method.type}
              onChange={(e) => {
                const type = method_types.find((t) => t.value === e.target.value)?.value ?? 'email';
                update_method(method.key, { type, is_primary: false });
              }}
              className="h-9 rounded-md border bg-background px-2 text-sm"
            >
              {method_types.map((t) => (
                <option key={t.value} value={t.value}>
                  {t.label}
                </option>
              ))}
            </select>
            <Input
              aria-label={`Method ${index + 1} value`}
              value={method.value}
              onChange={(e) => update_method(method.key, { value: e.target.value })}
            />
            <label className="flex items-center gap-1 text-sm whitespace-nowrap">
              <input type="radio" checked={method.is_primary} onChange={() => set_primary(method)} />
              Primary
            </label>
            <Button
              type="button"
              variant="ghost"
              size="icon-sm"
              aria-label={`Remove method ${index + 1}`}
              onClick={() => remove_method(method.key)}
            >
              <X />
            </Button>
          </div>
        ))}
        <Button type="button" variant="outline" size="sm" onClick={add_method}>
          <Plus />
          Add method
        </Button>
      </fieldset>

      <div className="space-y-1.5">
        <Label htmlFor="follow_up_date">Follow-up date</Label>
        <Input
          id="follow_up_date"
          type="date"
          value={draft.follow_up_date}
          onChange={(e) => update('follow_up_date', e.target.value)}
        />
      </div>

      <div className="flex gap-6">
        <label className="flex items-center gap-2 text-sm">
          <input type="checkbox" checked={draft.warm} onChange={(e) => update('warm', e.target.checked)} />
          Warm contact
        </label>
        <label className="flex items-center gap-2 text-sm">
          <input type="checkbox" checked={draft.reminder} onChange={(e) => update('reminder', e.target.checked)} />
          Reminder
        </label>
      </div>

      <div className="space-y-1.5">
        <Label htmlFor="notes">Notes</Label>
        <Textarea id="notes" value={draft.notes} onChange={(e) => update('notes', e.target.value)} />
      </div>

      <Button type="submit" disabled={isPending}>
        {isPending ? 'Saving...' : 'Add Contact'}
      </Button>
    </form>
  );
}
