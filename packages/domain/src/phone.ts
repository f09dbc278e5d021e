const NON_DIGITS = /\D/g;

export function normalizeNumber(raw?: string | null): string {
  if (!raw) {
    return '';
  }

  return raw.replace(NON_DIGITS, '');
}

export function formatNumber(raw?: string | null): string {
  const digits = normalizeNumber(raw);
  return digits ? `+${digits}` : '';
}
