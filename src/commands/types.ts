/**
 * Result payloads of obsb commands (also their `--json` output).
 */

export interface BroadcastCommandResult {
  /** Fully qualified event type, e.g. `twitchat:GREET_FEED_READ_ALL` */
  eventType: string;
  eventData: Record<string, unknown>;
}

export interface RequestCommandResult {
  requestType: string;
  responseData: Record<string, unknown>;
}

export interface ConfigShowResult {
  path: string;
  settings: Record<string, unknown>;
  /** Settings overridden by OBS_* environment variables */
  envOverrides: string[];
}

export interface ConfigSetResult {
  path: string;
  changed: boolean;
  settings: Record<string, unknown>;
}
