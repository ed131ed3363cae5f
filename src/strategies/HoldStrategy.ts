import { OrderIntent } from '../models/Order';
import { Strategy } from './Strategy';

/**
 * Never trades; useful for observing the market and ledger without risk
 */
export class HoldStrategy implements Strategy {
  readonly name = 'hold';

  decide(): OrderIntent[] {
    return [];
  }
}
