/**
 * Namespaced custom-event broadcasting through OBS.
 *
 * OBS relays `BroadcastCustomEvent` requests to every connected WebSocket
 * client as a `CustomEvent`; overlay tools such as Twitchat listen for event
 * types under their own namespace (e.g. `twitchat:GREET_FEED_READ_ALL`).
 */

import {
  BROADCAST_CUSTOM_EVENT_REQUEST,
  DEFAULT_EVENT_NAMESPACE,
  NAMESPACE_SEPARATOR,
} from '@/constants.js';
import { createLogger } from '@/ui/logging/index.js';

import type { RequestSender } from './connection.js';
import { captureObsResult, type ObsResult } from './errors.js';
import { isRecord } from './protocol.js';

const log = createLogger('broadcast');

export type BroadcastPayload = Record<string, unknown>;

export type BroadcastResult = ObsResult<Record<string, unknown>>;

export class EventBroadcaster {
  private currentNamespace: string;

  constructor(
    private readonly connection: RequestSender,
    namespace: string = DEFAULT_EVENT_NAMESPACE
  ) {
    this.currentNamespace = validateNamespace(namespace);
  }

  get namespace(): string {
    return this.currentNamespace;
  }

  /**
   * Replace the namespace used for subsequent broadcasts.
   *
   * @throws Error if `namespace` is empty
   */
  setNamespace(namespace: string): void {
    this.currentNamespace = validateNamespace(namespace);
  }

  ensureConnection(): Promise<void> {
    return this.connection.ensureConnection();
  }

  /**
   * Event type sent for `action`: the action itself when it is already
   * namespaced, otherwise `<namespace>:<action>`.
   */
  formatEventType(action: string): string {
    const trimmed = action.trim();
    if (trimmed.includes(NAMESPACE_SEPARATOR)) {
      return trimmed;
    }
    return `${this.currentNamespace}${NAMESPACE_SEPARATOR}${trimmed}`;
  }

  /**
   * Broadcast a custom event.
   *
   * @param action - Action name, bare or already namespaced
   * @param payload - JSON object delivered as `eventData` (default: {})
   * @param timeoutMs - Response deadline (default: the connection's)
   * @returns OBS response data
   * @throws Error if `action` is empty or `payload` is not a plain object
   * @throws ObsNotConnectedError | ObsRequestError | ObsResponseTimeoutError
   */
  async broadcast(
    action: string,
    payload?: BroadcastPayload,
    timeoutMs?: number
  ): Promise<Record<string, unknown>> {
    if (!action.trim()) {
      throw new Error('Action identifier must be provided');
    }
    if (payload !== undefined && !isRecord(payload)) {
      throw new TypeError('Payload must be a JSON object');
    }

    const eventType = this.formatEventType(action);
    const eventData = payload ?? {};
    log.debug(`Broadcasting ${eventType} with payload ${JSON.stringify(eventData)}`);

    return this.connection.sendRequest(
      BROADCAST_CUSTOM_EVENT_REQUEST,
      { eventType, eventData },
      timeoutMs
    );
  }

  /**
   * {@link broadcast} returning a typed outcome for connectivity and
   * protocol failures. Argument errors still throw.
   */
  tryBroadcast(
    action: string,
    payload?: BroadcastPayload,
    timeoutMs?: number
  ): Promise<BroadcastResult> {
    return captureObsResult(() => this.broadcast(action, payload, timeoutMs));
  }

  /**
   * Broadcast, logging connectivity and protocol failures.
   *
   * @returns True if OBS accepted the event
   */
  async safeBroadcast(
    action: string,
    payload?: BroadcastPayload,
    timeoutMs?: number
  ): Promise<boolean> {
    const result = await this.tryBroadcast(action, payload, timeoutMs);
    if (!result.success) {
      log.error(`Failed to broadcast event ${action}: ${result.error.message}`);
      return false;
    }
    return true;
  }
}

function validateNamespace(namespace: string): string {
  if (!namespace) {
    throw new Error('Namespace cannot be empty');
  }
  return namespace;
}
