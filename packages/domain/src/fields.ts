export const NUMBER_FIELDS = ['to', 'number', 'full_number', 'msisdn'] as const;
export const MESSAGE_FIELDS = ['message', 'text', 'body', 'sms'] as const;
export const OTP_FIELDS = ['otp', 'code'] as const;
export const ALLOCATED_NUMBER_FIELDS = ['number', 'full_number', 'copy'] as const;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the first candidate field holding a usable value. Non-empty strings
 * and finite numbers count; numbers are returned in their decimal form.
 */
export function pickField(
  record: Record<string, unknown> | undefined,
  candidates: readonly string[]
): string | undefined {
  if (!record) {
    return;
  }

  for (const field of candidates) {
    const value = record[field];
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
  }

  return;
}
