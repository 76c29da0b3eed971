'use client';

import Link from 'next/link';
import { MobileNav } from './mobile-nav';

export function Header() {
  return (
    <header className="border-b border-border/70 bg-background/80 backdrop-blur supports-[backdrop-filter]:bg-background/65">
      <div className="flex h-16 w-full items-center gap-4 px-5 md:px-7">
        <MobileNav />
        <Link href="/" className="font-semibold text-lg tracking-tight">
          Smart CRM
        </Link>
      </div>
    </header>
  );
}
