import { describe, expect, it, vi } from 'vitest';
import { ParseFailure, UpstreamFailure, ValidationFailure } from '@otp-relay/domain';
import { AllocationService, toRange } from '../services/allocation-service.js';
import { memoryStore, silentLogger } from './helpers.js';

describe('range construction', () => {
  it('appends the wildcard suffix when missing', () => {
    expect(toRange('88017')).toBe('88017XXX');
    expect(toRange(' +88017 ')).toBe('+88017XXX');
  });

  it('keeps an existing wildcard suffix', () => {
    expect(toRange('88017XXX')).toBe('88017XXX');
    expect(toRange('88017xx')).toBe('88017xx');
  });

  it('rejects anything that is not a number prefix', () => {
    expect(() => toRange('abc')).toThrow(ValidationFailure);
    expect(() => toRange('880X17')).toThrow(ValidationFailure);
  });
});

describe('allocation flow', () => {
  it('maps the allocated number to the requester', async () => {
    const store = memoryStore();
    const requestNumber = vi.fn(async () => ({
      message: 'Number allocated',
      data: { number: '+880 1799 999', country: 'Bangladesh', operator: 'Grameenphone', status: 'active' }
    }));
    const service = new AllocationService({ requestNumber }, store, silentLogger);

    const result = await service.allocate(42, '88017');

    expect(requestNumber).toHaveBeenCalledWith({ range: '88017XXX', is_national: null, remove_plus: null });
    expect(result).toEqual({
      number: '8801799999',
      range: '88017XXX',
      country: 'Bangladesh',
      operator: 'Grameenphone',
      status: 'active',
      message: 'Number allocated',
      persisted: true
    });
    expect(store.mappings.get('8801799999')).toBe(42);
  });

  it('falls back to the other number fields in order', async () => {
    const store = memoryStore();
    const service = new AllocationService(
      { requestNumber: async () => ({ data: { full_number: '', copy: '8801711111' } }) },
      store,
      silentLogger
    );

    const result = await service.allocate(7, '88017XXX');

    expect(result.number).toBe('8801711111');
    expect(store.mappings.get('8801711111')).toBe(7);
  });

  it('does not touch the store when the api fails', async () => {
    const store = memoryStore();
    const put = vi.spyOn(store, 'put');
    const service = new AllocationService(
      {
        requestNumber: async () => {
          throw new UpstreamFailure('number_api_failed', 'HTTP 500: boom', 500);
        }
      },
      store,
      silentLogger
    );

    await expect(service.allocate(1, '88017')).rejects.toBeInstanceOf(UpstreamFailure);
    expect(put).not.toHaveBeenCalled();
  });

  it('reports a parse failure when no number comes back', async () => {
    const store = memoryStore();
    const put = vi.spyOn(store, 'put');
    const service = new AllocationService(
      { requestNumber: async () => ({ data: {}, message: 'range empty' }) },
      store,
      silentLogger
    );

    const error = await service.allocate(1, '88017').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ParseFailure);
    expect(error).toMatchObject({ code: 'number_not_found', responseBody: '{"data":{},"message":"range empty"}' });
    expect(put).not.toHaveBeenCalled();
  });
});
