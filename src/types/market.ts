/**
 * Upstream live-data boundary for option Greeks.
 */

import type { Greeks, OptionIdentity } from "./options.js";

/** Per-request callbacks; responses arrive asynchronously and in any order */
export interface GreeksSubscriber {
  onGreeks(greeks: Greeks): void;
  /** Explicit rejection of this request by the upstream */
  onError(reason: string): void;
}

export interface GreeksFeed {
  readonly isConnected: boolean;
  /** May call back synchronously; throws when the request cannot be issued */
  subscribeGreeks(identity: OptionIdentity, subscriber: GreeksSubscriber): void;
  unsubscribeGreeks(identity: OptionIdentity): void;
}
