// First match wins. Spaces may follow the separator, as in "code: 12345".
const OTP_PATTERNS: RegExp[] = [/\b(\d{4,8})\b/, /[#:-]\s*(\d{3,8})(?!\d)/, /(\d+)/];

export function extractOtp(text?: string | null): string | undefined {
  if (!text) {
    return;
  }

  for (const pattern of OTP_PATTERNS) {
    const match = pattern.exec(text);
    if (match?.[1]) {
      return match[1];
    }
  }

  return;
}
