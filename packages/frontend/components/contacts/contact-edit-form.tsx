'use client';

import { useState } from 'react';
import type { ContactPatch, ContactWithMethods } from '@crm/shared';
import { useUpdateContact } from '@/lib/hooks/use-contacts';
import { Button } from '@/components/ui/button';
import { Input } from '@/components/ui/input';
import { Label } from '@/components/ui/label';
import { Textarea } from '@/components/ui/textarea';

export interface EditState {
  name: string;
  company: string;
  position: string;
  last_contacted: string;
  follow_up_date: string;
  notes: string;
  warm: boolean;
  reminder: boolean;
}

export function to_state(contact: ContactWithMethods): EditState {
  return {
    name: contact.name,
    company: contact.company ?? '',
    position: contact.position ?? '',
    last_contacted: contact.last_contacted ?? '',
    follow_up_date: contact.follow_up_date ?? '',
    notes: contact.notes ?? '',
    warm: contact.warm,
    reminder: contact.reminder,
  };
}

const nullable = (value: string): string | null => value.trim() || null;

/** Only fields that differ from the stored contact end up in the PATCH body. */
export function diff_contact(contact: ContactWithMethods, state: EditState): ContactPatch {
  const patch: ContactPatch = {};
  if (state.name.trim() !== contact.name) patch.name = state.name.trim();
  if (nullable(state.company) !== contact.company) patch.company = nullable(state.company);
  if (nullable(state.position) !== contact.position) patch.position = nullable(state.position);
  if (nullable(state.last_contacted) !== contact.last_contacted) patch.last_contacted = nullable(state.last_contacted);
  if (nullable(state.follow_up_date) !== contact.follow_up_date) patch.follow_up_date = nullable(state.follow_up_date);
  if (nullable(state.notes) !== contact.notes) patch.notes = nullable(state.notes);
  if (state.warm !== contact.warm) patch.warm = state.warm;
  if (state.reminder !== contact.reminder) patch.reminder = state.reminder;
  return patch;
}

interface ContactEditFormProps {
  contact: ContactWithMethods;
  on_done: () => void;
}

export function ContactEditForm({ contact, on_done }: ContactEditFormProps) {
  const [state, set_state] = useState<EditState>(() => to_state(contact));
  const [validation_error, set_validation_error] = useState<string | null>(null);
  const { mutate: update_contact, isPending, error } = useUpdateContact();

  function update<K extends keyof EditState>(key: K, value: EditState[K]) {
    set_state((prev) => ({ ...prev, [key]: value }));
  }

  function handle_submit(e: React.FormEvent) {
    e.preventDefault();
    if (!state.name.trim()) {
      set_validation_error('Name is required');
      return;
    }
    set_validation_error(null);

    const patch = diff_contact(contact, state);
    if (Object.keys(patch).length === 0) {
      on_done();
      return;
    }
    update_contact({ ref: contact.id, patch }, { onSuccess: on_done });
  }

  const message = validation_error ?? (error ? error.message : null);

  return (
    <form onSubmit={handle_submit} noValidate className="space-y-4 rounded-xl border bg-card p-5">
      {message && (
        <p role="alert" className="text-sm text-destructive">
          {message}
        </p>
      )}
      <div className="grid grid-cols-1 sm:grid-cols-2 gap-4">
        <div className="space-y-1.5">
          <Label htmlFor="edit-name">Name</Label>
          <Input id="edit-name" value={state.name} onChange={(e) => update('name', e.target.value)} />
        </div>
        <div className="space-y-1.5">
          <Label htmlFor="edit-company">Company</Label>
          <Input id="edit-company" value={state.company} onChange={(e) => update('company', e.target.value)} />
        </div>
        <div className="space-y-1.5">
          <Label htmlFor="edit-position">Position</Label>
          <Input id="edit-position" value={state.position} onChange={(e) => update('position', e.target.value)} />
        </div>
        <div className="space-y-1.5">
          <Label htmlFor="edit-last-contacted">Last contacted</Label>
          <Input
            id="edit-last-contacted"
            type="date"
            value={state.last_contacted}
            onChange={(e) => update('last_contacted', e.target.value)}
          />
        </div>
        <div className="space-y-1.5">
          <Label htmlFor="edit-follow-up">Follow-up date</Label>
          <Input
            id="edit-follow-up"
            type="date"
            value={state.follow_up_date}
            onChange={(e) => update('follow_up_date', e.target.value)}
          />
        </div>
      </div>
      <div className="flex gap-6">
        <label className="flex items-center gap-2 text-sm">
          <input type="checkbox" checked={state.warm} onChange={(e) => update('warm', e.target.checked)} />
          Warm contact
        </label>
        <label className="flex items-center gap-2 text-sm">
          <input type="checkbox" checked={state.reminder} onChange={(e) => update('reminder', e.target.checked)} />
          Reminder
        </label>
      </div>
      <div className="space-y-1.5">
        <Label htmlFor="edit-notes">Notes</Label>
        <Textarea id="edit-notes" value={state.notes} onChange={(e) => update('notes', e.target.value)} />
      </div>
      <div className="flex gap-2">
        <Button type="submit" disabled={isPending}>
          {isPending ? 'Saving...' : 'Save'}
        </Button>
        <Button type="button" variant="outline" onClick={on_done}>
          Cancel
        </Button>
      </div>
    </form>
  );
}
