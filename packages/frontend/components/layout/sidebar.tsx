'use client';

import Link from 'next/link';
import { usePathname } from 'next/navigation';
import { cn } from '@/lib/utils';
import { is_nav_active, nav_items } from './nav-items';

export function Sidebar() {
  const pathname = usePathname();

  return (
    <aside className="hidden md:flex w-52 border-r border-border/70 bg-sidebar/50 flex-col">
      <nav className="flex-1 p-3 space-y-1">
        {nav_items.map((item) => {
          const is_active = is_nav_active(pathname, item.href);

          return (
            <Link
              key={item.href}
              href={item.href}
              className={cn(
                'flex items-center gap-3 px-3 py-2 rounded-md text-sm font-medium transition-colors',
                is_active
                  ? 'bg-primary/10 text-primary font-bold ring-1 ring-primary/20'
                  : 'text-muted-foreground hover:bg-muted hover:text-foreground'
              )}
            >
              <item.icon className="w-4 h-4" />
              {item.label}
            </Link>
          );
        })}
      </nav>
    </aside>
  );
}
