import { describe, expect, it, vi } from 'vitest';
import { render, screen, within } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { MobileNav } from './mobile-nav';

vi.mock('next/link', async () => {
  const { MockLink } = await import('@/test/next-mocks');
  return { default: MockLink };
});
vi.mock('next/navigation', () => ({
  usePathname: () => '/contacts/7',
}));

describe('MobileNav', () => {
  it('opens a drawer with the app sections', async () => {
    const user = userEvent.setup();
    render(<MobileNav />);

    expect(screen.queryByRole('dialog')).not.toBeInTheDocument();
    await user.click(screen.getByRole('button', { name: 'Open navigation menu' }));

    const drawer = await screen.findByRole('dialog');
    expect(within(drawer).getByText('Emails').closest('a')).toHaveAttribute('href', '/emails');
    expect(within(drawer).getByText('Contacts').closest('a')).toHaveClass('bg-primary');
    expect(within(drawer).getByText('Home').closest('a')).not.toHaveClass('bg-primary');
  });
});
