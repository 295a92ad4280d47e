/**
 * OBS module barrel export.
 *
 * Public API of the OBS WebSocket v5 client.
 */

// Core classes
export { ObsConnectionManager } from './connection.js';
export { EventBroadcaster } from './broadcaster.js';
export { ResponseRegistry } from './responseRegistry.js';
export { ReceiverLoop } from './receiver.js';
export { FrameReader, FrameReadTimeoutError } from './frameReader.js';

// Error classes
export {
  ObsError,
  ObsConnectionError,
  ObsAuthenticationError,
  ObsNotConnectedError,
  ObsResponseTimeoutError,
  ObsRequestError,
  RUNTIME_FAILURE_CODES,
  captureObsResult,
  isObsError,
} from './errors.js';

// Functions
export { computeAuthResponse } from './auth.js';
export {
  applyConfigPatch,
  configsEqual,
  connectionUrl,
  createConnectionConfig,
  requiresReconnect,
  DEFAULT_CONNECTION_CONFIG,
} from './config.js';
export { CloseCode, EventSubscription, OpCode, decodeFrame, encodeFrame } from './protocol.js';

// Types
export type {
  ConnectionState,
  ObsConnectionOptions,
  RequestResult,
  RequestSender,
  WebSocketFactory,
} from './connection.js';
export type { BroadcastPayload, BroadcastResult } from './broadcaster.js';
export type { ConnectionConfig, ConnectionConfigPatch } from './config.js';
export type { ObsErrorCode, ObsResult } from './errors.js';
export type { Frame, RequestStatus, ResponseData } from './protocol.js';
