import {
  ALLOCATED_NUMBER_FIELDS,
  ParseFailure,
  ValidationFailure,
  isRecord,
  normalizeNumber,
  pickField,
  type AllocationRequest,
  type AllocationResult,
  type MappingStore,
  type SubscriberId
} from '@otp-relay/domain';
import type { Logger } from '../logger.js';

export const RANGE_WILDCARD = 'XXX';

const RANGE_PATTERN = /^\+?\d+X*$/i;
const WILDCARD_SUFFIX = /X$/i;

export function toRange(prefix: string): string {
  const trimmed = prefix.trim();
  if (!RANGE_PATTERN.test(trimmed)) {
    throw new ValidationFailure('invalid_range', `"${prefix}" is not a number prefix`);
  }
  return WILDCARD_SUFFIX.test(trimmed) ? trimmed : `${trimmed}${RANGE_WILDCARD}`;
}

export interface NumberAllocator {
  requestNumber(input: AllocationRequest): Promise<unknown>;
}

export class AllocationService {
  constructor(
    private readonly api: NumberAllocator,
    private readonly store: Pick<MappingStore, 'put'>,
    private readonly logger: Logger
  ) {}

  /**
   * Requests a number in the given range and maps it to the subscriber.
   * Upstream and parse failures propagate before anything is stored.
   */
  async allocate(subscriberId: SubscriberId, prefix: string): Promise<AllocationResult> {
    const range = toRange(prefix);
    this.logger.info({ subscriberId, range }, 'allocation_requested');

    const response = await this.api.requestNumber({ range, is_national: null, remove_plus: null });
    const data = isRecord(response) && isRecord(response.data) ? response.data : undefined;
    const number = normalizeNumber(pickField(data, ALLOCATED_NUMBER_FIELDS));

    if (!number) {
      const body = JSON.stringify(response).slice(0, 1000);
      this.logger.error({ subscriberId, range, response: body }, 'allocation_number_missing');
      throw new ParseFailure('number_not_found', 'number not found in response', body);
    }

    const { persisted } = await this.store.put(number, subscriberId);
    this.logger.info({ subscriberId, number, persisted }, 'allocation_mapped');

    return {
      number,
      range,
      country: pickField(data, ['country']),
      operator: pickField(data, ['operator']),
      status: pickField(data, ['status']),
      message: isRecord(response) ? pickField(response, ['message']) : undefined,
      persisted
    };
  }
}
