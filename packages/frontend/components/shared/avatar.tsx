import { cn } from '@/lib/utils';

interface AvatarProps {
  name: string;
  size?: 'sm' | 'md' | 'lg';
  warm?: boolean;
  className?: string;
}

const size_classes = {
  sm: 'w-8 h-8 text-xs',
  md: 'w-10 h-10 text-sm',
  lg: 'w-14 h-14 text-lg',
};

const colors = ['bg-sky-600', 'bg-emerald-600', 'bg-violet-600', 'bg-rose-600', 'bg-amber-600', 'bg-teal-600'];

export function get_initials(name: string): string {
  const parts = name.trim().split(/\s+/).filter(Boolean);
  const first = parts[0] ?? '';
  const last = parts.length > 1 ? parts[parts.length - 1] ?? '' : '';
  if (!last) {
    return first.slice(0, 2).toUpperCase() || '?';
  }
  return (first.charAt(0) + last.charAt(0)).toUpperCase();
}

function get_color(name: string): string {
  let hash = 0;
  for (let i = 0; i < name.length; i++) {
    hash = name.charCodeAt(i) + ((hash << 5) - hash);
  }
  return colors[Math.abs(hash) % colors.length] ?? 'bg-slate-600';
}

export function Avatar({ name, size = 'md', warm = false, className }: AvatarProps) {
  return (
    <div
      aria-hidden="true"
      className={cn(
        'rounded-full flex shrink-0 items-center justify-center text-white font-medium',
        size_classes[size],
        get_color(name),
        warm && 'ring-2 ring-amber-400 ring-offset-2',
        className
      )}
    >
      {get_initials(name)}
    </div>
  );
}
