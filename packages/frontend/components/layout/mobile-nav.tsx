'use client';

import { useState } from 'react';
import Link from 'next/link';
import { usePathname } from 'next/navigation';
import { cn } from '@/lib/utils';
import { Button } from '@/components/ui/button';
import { Sheet, SheetClose, SheetContent, SheetHeader, SheetTitle } from '@/components/ui/sheet';
import { Menu } from 'lucide-react';
import { is_nav_active, nav_items } from './nav-items';

export function MobileNav() {
  const [is_open, set_is_open] = useState(false);
  const pathname = usePathname();

  return (
    <Sheet open={is_open} onOpenChange={set_is_open}>
      <Button
        variant="ghost"
        size="icon"
        className="md:hidden"
        onClick={() => set_is_open(true)}
        aria-label="Open navigation menu"
      >
        <Menu className="h-5 w-5" />
      </Button>

      <SheetContent className="w-64">
        <SheetHeader>
          <SheetTitle>
            <Link href="/" onClick={() => set_is_open(false)} className="font-semibold text-lg">
              Smart CRM
            </Link>
          </SheetTitle>
        </SheetHeader>

        <nav className="flex-1 px-4 space-y-1">
          {nav_items.map((item) => (
            <SheetClose
              key={item.href}
              render={
                <Link
                  href={item.href}
                  className={cn(
                    'flex items-center gap-3 px-3 py-2 rounded-lg text-sm font-medium transition-colors',
                    is_nav_active(pathname, item.href)
                      ? 'bg-primary text-primary-foreground'
                      : 'text-muted-foreground hover:bg-muted hover:text-foreground'
                  )}
                />
              }
            >
              <item.icon className="w-4 h-4" />
              {item.label}
            </SheetClose>
          ))}
        </nav>
      </SheetContent>
    </Sheet>
  );
}
