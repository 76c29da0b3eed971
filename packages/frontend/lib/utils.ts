import { clsx, type ClassValue } from "clsx"
import { twMerge } from "tailwind-merge"

export function cn(...inputs: ClassValue[]) {
  return twMerge(clsx(inputs))
}

// Calendar dates arrive as YYYY-MM-DD; render them in UTC so they never shift a day.
export function format_date(date: string): string {
  const d = new Date(date.length === 10 ? `${date}T00:00:00Z` : date);
  return d.toLocaleDateString('en-US', {
    month: 'short',
    day: 'numeric',
    year: 'numeric',
    timeZone: 'UTC',
  });
}

export function format_date_time(date: string | Date): string {
  const d = new Date(date);
  return d.toLocaleDateString('en-US', {
    month: 'short',
    day: 'numeric',
    year: 'numeric',
    hour: 'numeric',
    minute: '2-digit',
  });
}

export function today_iso(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

export function is_due(follow_up_date: string | null, today: string = today_iso()): boolean {
  return follow_up_date !== null && follow_up_date <= today;
}

// Contacts are addressed by numeric id or by email address.
export function parse_contact_ref(param: string | string[] | undefined): number | string | null {
  const raw = Array.isArray(param) ? param[0] : param;
  if (!raw) {
    return null;
  }
  const value = decodeURIComponent(raw);
  return /^\d+$/.test(value) ? Number(value) : value;
}
