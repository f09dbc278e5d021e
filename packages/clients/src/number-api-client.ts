import { ParseFailure, UpstreamFailure, errorMessage } from '@otp-relay/domain';
import type { AllocationInfoQuery, AllocationRequest } from '@otp-relay/domain';

const NUMBER_PATH = '/mapi/v1/mdashboard/getnum/number';
const INFO_PATH = '/mapi/v1/mdashboard/getnum/info';

export interface NumberApiClientOptions {
  timeoutMs?: number;
}

/** Client for the upstream number allocation dashboard API. */
export class NumberApiClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(baseUrl: string, private readonly apiKey: string, options: NumberApiClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 20_000;
  }

  async requestNumber(input: AllocationRequest): Promise<unknown> {
    const res = await this.send(`${this.baseUrl}${NUMBER_PATH}`, {
      method: 'POST',
      body: JSON.stringify(input)
    });
    const text = await res.text();

    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch {
      throw new ParseFailure('number_api_invalid_json', 'response is not JSON', text.slice(0, 1000));
    }
  }

  async fetchInfo(query: AllocationInfoQuery): Promise<string> {
    const params = new URLSearchParams({ ...query });
    const res = await this.send(`${this.baseUrl}${INFO_PATH}?${params.toString()}`, { method: 'GET' });
    return await res.text();
  }

  private async send(url: string, init: { method: string; body?: string }): Promise<Response> {
    let res: Response;
    try {
      res = await fetch(url, {
        ...init,
        headers: {
          'content-type': 'application/json',
          mapikey: this.apiKey
        },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      throw new UpstreamFailure('number_api_unreachable', errorMessage(error), undefined, { cause: error });
    }

    if (!res.ok) {
      const body = await res.text();
      throw new UpstreamFailure('number_api_failed', `HTTP ${res.status}: ${body.slice(0, 500)}`, res.status);
    }

    return res;
  }
}
