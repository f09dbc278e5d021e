import { matchSubscriber, type MappingStore, type SubscriberMatch } from '@otp-relay/domain';
import type { Logger } from '../logger.js';

export class InboundMatcher {
  constructor(private readonly store: Pick<MappingStore, 'load'>, private readonly logger: Logger) {}

  async resolve(rawNumber: string): Promise<SubscriberMatch | undefined> {
    const mappings = await this.store.load();
    const match = matchSubscriber(mappings, rawNumber);

    if (!match) {
      this.logger.info({ number: rawNumber, mappings: mappings.size }, 'inbound_number_unmatched');
      return;
    }

    if (match.collisions.length > 0) {
      this.logger.warn(
        { number: rawNumber, key: match.key, strategy: match.strategy, collisions: match.collisions },
        'inbound_match_collision'
      );
    } else if (match.strategy !== 'exact') {
      this.logger.info(
        { number: rawNumber, key: match.key, strategy: match.strategy, suffixLength: match.suffixLength },
        'inbound_match_fallback'
      );
    }

    return match;
  }
}
