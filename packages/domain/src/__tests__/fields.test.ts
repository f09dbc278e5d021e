import { describe, expect, it } from 'vitest';
import { MESSAGE_FIELDS, NUMBER_FIELDS, OTP_FIELDS, isRecord, pickField } from '../fields.js';

describe('candidate field lookup', () => {
  it('takes the first present field in list order', () => {
    const payload = { msisdn: '111', number: '222', to: '' };
    expect(pickField(payload, NUMBER_FIELDS)).toBe('222');
  });

  it('accepts numeric values', () => {
    expect(pickField({ full_number: 8801799999 }, NUMBER_FIELDS)).toBe('8801799999');
  });

  it('ignores blank strings and other types', () => {
    expect(pickField({ otp: '   ', code: { value: 1 } }, OTP_FIELDS)).toBeUndefined();
  });

  it('trims what it returns', () => {
    expect(pickField({ text: '  code 1234 ' }, MESSAGE_FIELDS)).toBe('code 1234');
  });

  it('handles a missing record', () => {
    expect(pickField(undefined, NUMBER_FIELDS)).toBeUndefined();
  });

  it('recognizes plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });
});
