/**
 * User-triggerable bridge actions.
 *
 * Each action broadcasts one fixed event; the CLI registers a command per
 * entry so a stream deck or hotkey tool can call e.g.
 * `obsb greet-feed-read-all`.
 */

export interface BridgeAction {
  /** CLI command name */
  command: string;
  /** Event action broadcast under the configured namespace */
  eventAction: string;
  /** Help text */
  description: string;
  /** Optional fixed payload */
  payload?: Record<string, unknown>;
}

export const GREET_FEED_READ_ALL: BridgeAction = {
  command: 'greet-feed-read-all',
  eventAction: 'GREET_FEED_READ_ALL',
  description: 'Mark every message of the greet feed as read',
};

export const BRIDGE_ACTIONS: readonly BridgeAction[] = [GREET_FEED_READ_ALL];
