/**
 * Centralized configuration constants for obsb
 *
 * Timing, limit and default values used throughout the application.
 */

// ============================================================================
// OBS CONNECTION DEFAULTS
// ============================================================================

/**
 * Default OBS WebSocket host (OBS running on the same machine)
 */
export const DEFAULT_OBS_HOST = '127.0.0.1';

/**
 * Default OBS WebSocket v5 server port
 */
export const DEFAULT_OBS_PORT = 4455;

/**
 * Default request and handshake timeout (5 seconds)
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

/**
 * Default EventSubscription bitmask: no events, this client only sends requests
 */
export const DEFAULT_EVENT_SUBSCRIPTIONS = 0;

/**
 * RPC version announced when Hello does not carry one
 */
export const DEFAULT_RPC_VERSION = 1;

/**
 * Maximum time disconnect() waits for the receiver loop to exit (1 second)
 */
export const RECEIVER_STOP_TIMEOUT_MS = 1000;

/**
 * How long the response registry remembers abandoned request ids and keeps
 * unclaimed responses, as a multiple of the request timeout
 */
export const RESPONSE_RETENTION_FACTOR = 4;

// ============================================================================
// WEBSOCKET
// ============================================================================

/**
 * Normal closure code sent on disconnect
 */
export const WEBSOCKET_NORMAL_CLOSURE = 1000;

/**
 * Close reason sent on disconnect
 */
export const WEBSOCKET_NORMAL_CLOSURE_REASON = 'Normal closure';

/**
 * Text encoding for WebSocket messages
 */
export const UTF8_ENCODING = 'utf8' as const;

// ============================================================================
// BROADCASTING
// ============================================================================

/**
 * Default namespace prefixed to broadcast event types
 */
export const DEFAULT_EVENT_NAMESPACE = 'twitchat';

/**
 * Separator between namespace and action in an event type
 */
export const NAMESPACE_SEPARATOR = ':';

/**
 * OBS request used to emit custom events to WebSocket clients
 */
export const BROADCAST_CUSTOM_EVENT_REQUEST = 'BroadcastCustomEvent';

// ============================================================================
// SETTINGS
// ============================================================================

/**
 * Settings directory (relative to user home)
 */
export const SETTINGS_DIR_NAME = '.obsb';

/**
 * Settings file name inside the settings directory
 */
export const SETTINGS_FILE_NAME = 'settings.json';

/**
 * Environment variable overriding the settings directory
 */
export const SETTINGS_DIR_ENV = 'OBSB_CONFIG_DIR';
