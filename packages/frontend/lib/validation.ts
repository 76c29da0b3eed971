import type { ContactInput, ContactMethodType } from '@crm/shared';

export const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export interface MethodDraft {
  key: number;
  type: ContactMethodType;
  value: string;
  is_primary: boolean;
}

export interface ContactDraft {
  name: string;
  company: string;
  position: string;
  follow_up_date: string;
  notes: string;
  warm: boolean;
  reminder: boolean;
  methods: MethodDraft[];
}

export function empty_method(key: number, type: ContactMethodType = 'email'): MethodDraft {
  return { key, type, value: '', is_primary: false };
}

export function empty_draft(): ContactDraft {
  return {
    name: '',
    company: '',
    position: '',
    follow_up_date: '',
    notes: '',
    warm: false,
    reminder: true,
    methods: [{ ...empty_method(0), is_primary: true }],
  };
}

/** Returns the first problem with the draft, or null when it can be submitted. */
export function validate_contact_draft(draft: ContactDraft): string | null {
  if (!draft.name.trim()) {
    return 'Name is required';
  }
  if (draft.methods.length === 0) {
    return 'At least one contact method is required';
  }
  if (draft.methods.some((method) => !method.value.trim())) {
    return 'All contact method values must be filled';
  }
  if (draft.methods.some((method) => method.type === 'email' && !EMAIL_PATTERN.test(method.value.trim()))) {
    return 'Invalid email format';
  }
  return null;
}

function blank_to_null(value: string): string | null {
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

export function to_contact_input(draft: ContactDraft): ContactInput {
  return {
    name: draft.name.trim(),
    company: blank_to_null(draft.company),
    position: blank_to_null(draft.position),
    follow_up_date: blank_to_null(draft.follow_up_date),
    notes: blank_to_null(draft.notes),
    warm: draft.warm,
    reminder: draft.reminder,
    contact_methods: draft.methods.map((method) => ({
      type: method.type,
      value: method.value.trim(),
      is_primary: method.is_primary,
    })),
  };
}
