import { describe, expect, it } from 'vitest';
import { format_date, is_due, parse_contact_ref, today_iso } from './utils';

describe('format_date', () => {
  it('renders calendar dates without shifting the day', () => {
    expect(format_date('2024-03-05')).toBe('Mar 5, 2024');
  });
});

describe('is_due', () => {
  it('is due on or after the follow-up date', () => {
    expect(is_due('2024-03-05', '2024-03-05')).toBe(true);
    expect(is_due('2024-03-04', '2024-03-05')).toBe(true);
    expect(is_due('2024-03-06', '2024-03-05')).toBe(false);
    expect(is_due(null, '2024-03-05')).toBe(false);
  });

  it('uses the UTC calendar day for today', () => {
    expect(today_iso(new Date('2024-03-05T23:30:00Z'))).toBe('2024-03-05');
  });
});

describe('parse_contact_ref', () => {
  it('reads numeric ids as numbers', () => {
    expect(parse_contact_ref('42')).toBe(42);
  });

  it('keeps email references as decoded strings', () => {
    expect(parse_contact_ref('ada%40example.com')).toBe('ada@example.com');
    expect(parse_contact_ref(['ada@example.com'])).toBe('ada@example.com');
  });

  it('returns null when the segment is missing', () => {
    expect(parse_contact_ref(undefined)).toBeNull();
  });
});
