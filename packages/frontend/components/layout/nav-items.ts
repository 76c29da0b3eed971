import { Home, Mail, Users } from 'lucide-react';

export const nav_items = [
  { href: '/', icon: Home, label: 'Home' },
  { href: '/contacts', icon: Users, label: 'Contacts' },
  { href: '/emails', icon: Mail, label: 'Emails' },
];

export function is_nav_active(pathname: string, href: string): boolean {
  return pathname === href || (href !== '/' && pathname.startsWith(href));
}
