import { describe, expect, it, vi } from 'vitest';
import { render, screen } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { ContactCard, describe_role } from './contact-card';
import { make_contact } from '@/test/fixtures';

vi.mock('next/link', async () => {
  const { MockLink } = await import('@/test/next-mocks');
  return { default: MockLink };
});

const contact = make_contact({
  id: 7,
  name: 'Ada Lovelace',
  company: 'Analytical Engines',
  position: 'Engineer',
  warm: true,
  last_contacted: '2024-03-05',
  notes: 'Met at the conference',
  email: 'ada@example.com',
  contact_methods: [
    { id: 1, contact_id: 7, type: 'email', value: 'ada@example.com', is_primary: true, created_at: '2024-01-01T00:00:00.000Z' },
    { id: 2, contact_id: 7, type: 'phone', value: '+1 555 0100', is_primary: false, created_at: '2024-01-01T00:00:00.000Z' },
  ],
});

describe('describe_role', () => {
  it('joins position and company', () => {
    expect(describe_role({ position: 'Engineer', company: 'Acme' })).toBe('Engineer at Acme');
    expect(describe_role({ position: null, company: 'Acme' })).toBe('Acme');
    expect(describe_role({ position: null, company: null })).toBeNull();
  });
});

describe('ContactCard', () => {
  it('shows the contact details', () => {
    render(<ContactCard contact={contact} />);

    expect(screen.getByRole('link', { name: 'Ada Lovelace' })).toHaveAttribute('href', '/contacts/7');
    expect(screen.getByLabelText('Warm contact')).toBeInTheDocument();
    expect(screen.getByText('Engineer at Analytical Engines')).toBeInTheDocument();
    expect(screen.getByText('ada@example.com')).toBeInTheDocument();
    expect(screen.getByText('+1 555 0100')).toBeInTheDocument();
    expect(screen.getAllByText('Primary')).toHaveLength(1);
    expect(screen.getByText('Mar 5, 2024')).toBeInTheDocument();
    expect(screen.getByText('Met at the conference')).toBeInTheDocument();
  });

  it('marks a follow-up that has come due', () => {
    render(<ContactCard contact={make_contact({ follow_up_date: '2020-01-01' })} />);

    expect(screen.getByText('Jan 1, 2020')).toBeInTheDocument();
    expect(screen.getByText('Due')).toBeInTheDocument();
    expect(screen.getByText('Never')).toBeInTheDocument();
  });

  it('omits the warm marker for cold contacts', () => {
    render(<ContactCard contact={make_contact()} />);

    expect(screen.queryByLabelText('Warm contact')).not.toBeInTheDocument();
  });

  it('links edit to the detail page and reports deletes', async () => {
    const user = userEvent.setup();
    const on_delete = vi.fn();
    render(<ContactCard contact={contact} on_delete={on_delete} />);

    expect(screen.getByRole('link', { name: 'Edit' })).toHaveAttribute('href', '/contacts/7');
    await user.click(screen.getByRole('button', { name: 'Delete' }));

    expect(on_delete).toHaveBeenCalledWith(contact);
  });
});
