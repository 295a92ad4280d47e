import { randomUUID } from 'crypto';

import WebSocket from 'ws';

import {
  DEFAULT_RPC_VERSION,
  RECEIVER_STOP_TIMEOUT_MS,
  RESPONSE_RETENTION_FACTOR,
  WEBSOCKET_NORMAL_CLOSURE,
  WEBSOCKET_NORMAL_CLOSURE_REASON,
} from '@/constants.js';
import { createLogger } from '@/ui/logging/index.js';
import { Mutex } from '@/utils/concurrency.js';
import { getErrorMessage, toError } from '@/utils/errors.js';

import { computeAuthResponse } from './auth.js';
import {
  applyConfigPatch,
  connectionUrl,
  createConnectionConfig,
  requiresReconnect,
  type ConnectionConfig,
  type ConnectionConfigPatch,
} from './config.js';
import {
  captureObsResult,
  ObsAuthenticationError,
  ObsConnectionError,
  ObsError,
  ObsNotConnectedError,
  ObsRequestError,
  type ObsResult,
} from './errors.js';
import { FrameReader, FrameReadTimeoutError } from './frameReader.js';
import {
  decodeFrame,
  encodeFrame,
  OpCode,
  readEventType,
  readHello,
  readRequestId,
  readResponse,
  RESPONSE_OPCODES,
  type Frame,
  type IdentifyData,
  type OutboundFrame,
} from './protocol.js';
import { ReceiverLoop } from './receiver.js';
import { ResponseRegistry } from './responseRegistry.js';

const log = createLogger('connection');

// Error Messages
const NOT_CONNECTED_ERROR = 'OBS WebSocket is not connected';
const SOCKET_CLOSED_ERROR = 'Cannot send payload, websocket is closed';
const MISSING_HELLO_ERROR = 'Did not receive OBS Hello message during handshake';
const MISSING_IDENTIFIED_ERROR = 'OBS handshake failed: missing Identified acknowledgement';
const PASSWORD_REQUIRED_ERROR = 'OBS WebSocket requires a password but none was provided';
const INVALID_JSON_ERROR = 'Received invalid JSON from OBS';
const DISCONNECTED_ERROR = 'Disconnected from OBS before the response arrived';
const CONNECTION_LOST_ERROR = 'Connection to OBS closed before the response arrived';

// Message Templates
const FAILED_TO_CONNECT_ERROR = (url: string, reason: string): string =>
  `Failed to connect to OBS at ${url}: ${reason}`;
const SEND_FAILED_ERROR = (reason: string): string => `Failed to send message to OBS: ${reason}`;
const OPEN_TIMEOUT_ERROR = (timeoutMs: number): string =>
  `Connection timeout after ${timeoutMs}ms`;
const HANDSHAKE_TIMEOUT_ERROR = (timeoutMs: number): string =>
  `OBS handshake timed out after ${timeoutMs}ms`;

/**
 * Factory for WebSocket instances, replaced by a fake in tests.
 */
export type WebSocketFactory = (url: string) => WebSocket;

/** Outcome of {@link ObsConnectionManager.trySendRequest} */
export type RequestResult = ObsResult<Record<string, unknown>>;

/**
 * Lifecycle state of the single connection a manager owns.
 */
export type ConnectionState = 'Disconnected' | 'Connecting' | 'Identified';

export interface ObsConnectionOptions {
  /** Initial configuration (default: {@link createConnectionConfig}()) */
  config?: ConnectionConfig;
  createWebSocket?: WebSocketFactory;
  /** Bound on how long disconnect() waits for the receiver loop (ms) */
  receiverStopTimeout?: number;
}

/**
 * Anything that can issue OBS requests over an identified session.
 */
export interface RequestSender {
  ensureConnection(): Promise<void>;
  sendRequest(
    requestType: string,
    requestData?: Record<string, unknown>,
    timeoutMs?: number
  ): Promise<Record<string, unknown>>;
}

/**
 * OBS WebSocket v5 connection manager.
 *
 * Owns one socket at a time and drives it through the
 * Hello → Identify → Identified handshake. Requests are correlated with
 * responses by a random requestId, so any number of callers may have
 * requests in flight concurrently.
 *
 * Three independent critical sections, never nested:
 * - lifecycle lock: connect / disconnect / reconfigure
 * - send lock: one frame written at a time
 * - response registry: owns its own bookkeeping
 */
export class ObsConnectionManager implements RequestSender {
  private currentConfig: ConnectionConfig;
  private ws: WebSocket | null = null;
  private reader: FrameReader | null = null;
  private receiver: ReceiverLoop | null = null;
  private identified = false;
  private connecting = false;
  private negotiatedRpcVersion = DEFAULT_RPC_VERSION;

  private readonly lifecycleLock = new Mutex();
  private readonly sendLock = new Mutex();
  private readonly responses: ResponseRegistry;
  private readonly createWebSocket: WebSocketFactory;
  private readonly receiverStopTimeout: number;

  constructor(options: ObsConnectionOptions = {}) {
    this.currentConfig = options.config ?? createConnectionConfig();
    this.createWebSocket = options.createWebSocket ?? ((url: string) => new WebSocket(url));
    this.receiverStopTimeout = options.receiverStopTimeout ?? RECEIVER_STOP_TIMEOUT_MS;
    this.responses = new ResponseRegistry({
      retentionMs: () => this.currentConfig.requestTimeout * RESPONSE_RETENTION_FACTOR,
    });
  }

  // --------------------------------------------------------------------------
  // Configuration
  // --------------------------------------------------------------------------

  get config(): ConnectionConfig {
    return this.currentConfig;
  }

  /**
   * RPC version announced by the server in its last Hello.
   */
  get rpcVersion(): number {
    return this.negotiatedRpcVersion;
  }

  /**
   * Apply a configuration change.
   *
   * An unchanged configuration returns the current value untouched. A change
   * of endpoint or password on an identified session reconnects; a failed
   * reconnect is logged and leaves the manager disconnected so a later
   * {@link ensureConnection} can retry.
   */
  async updateConfig(patch: ConnectionConfigPatch): Promise<ConnectionConfig> {
    return this.lifecycleLock.runExclusive(async () => {
      const previous = this.currentConfig;
      const next = applyConfigPatch(previous, patch);
      if (next === previous) {
        return previous;
      }

      // Sampled under the lock: a connect in flight has finished by now.
      const wasConnected = this.isConnected();
      this.currentConfig = next;

      if (wasConnected && requiresReconnect(previous, next)) {
        log.info('Reconnecting to OBS WebSocket after configuration change');
        try {
          await this.teardown();
          await this.openSession(next.requestTimeout);
        } catch (error) {
          if (!(error instanceof ObsConnectionError)) {
            throw error;
          }
          log.error(`Failed to reconnect to OBS: ${error.message}`);
        }
      }

      return this.currentConfig;
    });
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  isConnected(): boolean {
    return this.ws !== null && this.identified;
  }

  get state(): ConnectionState {
    if (this.isConnected()) {
      return 'Identified';
    }
    return this.connecting ? 'Connecting' : 'Disconnected';
  }

  /**
   * Open the socket and complete the handshake. No-op when already identified.
   *
   * @param timeoutMs - Budget for dial plus handshake (default, also for 0 or less: config.requestTimeout)
   * @throws ObsConnectionError if the dial or the handshake fails
   * @throws ObsAuthenticationError if credentials are missing or rejected
   */
  async connect(timeoutMs?: number): Promise<void> {
    await this.lifecycleLock.runExclusive(async () => {
      if (this.isConnected()) {
        return;
      }
      await this.openSession(this.resolveTimeout(timeoutMs));
    });
  }

  /**
   * Connect unless already identified.
   */
  async ensureConnection(): Promise<void> {
    if (!this.isConnected()) {
      await this.connect();
    }
  }

  /**
   * Stop the receiver, close the socket and fail in-flight requests.
   * Safe to call at any time, any number of times.
   */
  async disconnect(): Promise<void> {
    await this.lifecycleLock.runExclusive(() => this.teardown());
  }

  // --------------------------------------------------------------------------
  // Requests
  // --------------------------------------------------------------------------

  /**
   * Send a request and wait for its response.
   *
   * @param requestType - OBS request name (e.g. 'GetVersion', 'BroadcastCustomEvent')
   * @param requestData - Request fields (default: {})
   * @param timeoutMs - Response deadline (default, also for 0 or less: config.requestTimeout)
   * @returns The response's `responseData` ({} when OBS sends none)
   * @throws ObsNotConnectedError if no session is identified
   * @throws ObsResponseTimeoutError if no response arrives in time
   * @throws ObsRequestError if OBS reports a failed request status
   */
  async sendRequest(
    requestType: string,
    requestData: Record<string, unknown> = {},
    timeoutMs?: number
  ): Promise<Record<string, unknown>> {
    if (!this.isConnected()) {
      throw new ObsNotConnectedError(NOT_CONNECTED_ERROR);
    }

    const requestId = randomUUID();
    log.debug(`Sending ${requestType} (${requestId})`);
    await this.writeFrame({
      op: OpCode.Request,
      d: { requestType, requestId, requestData },
    });

    const response = await this.responses.waitFor(requestId, this.resolveTimeout(timeoutMs));
    if (!response.requestStatus.result) {
      throw new ObsRequestError(requestType, response.requestStatus);
    }
    return response.responseData ?? {};
  }

  /**
   * {@link sendRequest} returning a typed outcome for the expected failure
   * kinds (not connected, rejected, timed out) instead of throwing.
   */
  trySendRequest(
    requestType: string,
    requestData?: Record<string, unknown>,
    timeoutMs?: number
  ): Promise<RequestResult> {
    return captureObsResult(() => this.sendRequest(requestType, requestData, timeoutMs));
  }

  /**
   * A missing, zero or negative timeout means the configured one.
   */
  private resolveTimeout(timeoutMs: number | undefined): number {
    return timeoutMs !== undefined && timeoutMs > 0 ? timeoutMs : this.currentConfig.requestTimeout;
  }

  // --------------------------------------------------------------------------
  // Session internals (callers hold the lifecycle lock)
  // --------------------------------------------------------------------------

  /**
   * Dial and handshake, all within one `timeoutMs` budget.
   */
  private async openSession(timeoutMs: number): Promise<void> {
    if (this.ws || this.receiver) {
      await this.teardown();
    }

    const url = connectionUrl(this.currentConfig);
    log.debug(`Connecting to OBS WebSocket at ${url}`);
    this.connecting = true;

    try {
      let ws: WebSocket;
      try {
        ws = this.createWebSocket(url);
      } catch (error) {
        throw new ObsConnectionError(FAILED_TO_CONNECT_ERROR(url, getErrorMessage(error)), toError(error));
      }

      const reader = new FrameReader(ws);
      this.ws = ws;
      this.reader = reader;

      const deadline = createDeadline(timeoutMs);
      try {
        await waitForOpen(ws, deadline.remaining()).catch((error: unknown) => {
          throw new ObsConnectionError(
            FAILED_TO_CONNECT_ERROR(url, getErrorMessage(error)),
            toError(error)
          );
        });
        await this.performHandshake(reader, deadline);
      } catch (error) {
        this.releaseSocket();
        if (error instanceof ObsError) {
          throw error;
        }
        throw new ObsConnectionError(getErrorMessage(error), toError(error));
      }

      this.startReceiver(reader);
      log.info(`Connected to OBS at ${url} (RPC version ${this.negotiatedRpcVersion})`);
    } finally {
      this.connecting = false;
    }
  }

  private async teardown(): Promise<void> {
    const receiver = this.receiver;
    this.receiver = null;
    const hadSocket = this.ws !== null;

    // Mark the loop stopped before its socket goes away
    const stopped = receiver ? receiver.stop(this.receiverStopTimeout) : Promise.resolve(true);
    this.releaseSocket();

    if (!(await stopped)) {
      log.warn(`Receiver loop did not stop within ${this.receiverStopTimeout}ms`);
    }

    this.responses.clear(new ObsNotConnectedError(DISCONNECTED_ERROR));
    if (hadSocket) {
      log.info('Disconnected from OBS WebSocket');
    }
  }

  /**
   * Close the socket and fail any read still waiting on it.
   */
  private releaseSocket(): void {
    const ws = this.ws;
    const reader = this.reader;
    this.ws = null;
    this.reader = null;
    this.identified = false;

    if (reader) {
      reader.abort(new ObsNotConnectedError(NOT_CONNECTED_ERROR));
      reader.dispose();
    }
    if (ws) {
      try {
        ws.close(WEBSOCKET_NORMAL_CLOSURE, WEBSOCKET_NORMAL_CLOSURE_REASON);
      } catch (error) {
        log.debug(`Ignoring error while closing socket: ${getErrorMessage(error)}`);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Handshake
  // --------------------------------------------------------------------------

  /**
   * Hello → Identify → Identified, reading both server frames directly
   * (the receiver loop is not running yet).
   */
  private async performHandshake(reader: FrameReader, deadline: Deadline): Promise<void> {
    const hello = await this.readHandshakeFrame(reader, deadline);
    if (hello.op !== OpCode.Hello) {
      throw new ObsConnectionError(MISSING_HELLO_ERROR);
    }

    await this.sendIdentify(hello);

    const identified = await this.readHandshakeFrame(reader, deadline);
    if (identified.op !== OpCode.Identified) {
      throw new ObsConnectionError(MISSING_IDENTIFIED_ERROR);
    }

    const negotiated = identified.d['negotiatedRpcVersion'];
    if (typeof negotiated === 'number') {
      this.negotiatedRpcVersion = negotiated;
    }

    this.identified = true;
    log.debug(`OBS WebSocket handshake completed (RPC version ${this.negotiatedRpcVersion})`);
  }

  /**
   * Answer a Hello with Identify, authenticating when it carries a challenge.
   */
  private async sendIdentify(hello: Frame): Promise<void> {
    const config = this.currentConfig;
    const helloData = readHello(hello.d);
    this.negotiatedRpcVersion = helloData.rpcVersion;

    const identify: IdentifyData = {
      rpcVersion: helloData.rpcVersion,
      eventSubscriptions: config.eventSubscriptions,
    };

    if (helloData.authentication) {
      if (!config.password) {
        throw new ObsAuthenticationError(PASSWORD_REQUIRED_ERROR);
      }
      identify.authentication = computeAuthResponse(config.password, helloData.authentication);
    }

    log.debug(`Sending Identify (rpcVersion ${identify.rpcVersion})`);
    await this.writeFrame({ op: OpCode.Identify, d: identify });
  }

  private async readHandshakeFrame(reader: FrameReader, deadline: Deadline): Promise<Frame> {
    let raw: string;
    try {
      raw = await reader.next(deadline.remaining());
    } catch (error) {
      if (error instanceof FrameReadTimeoutError) {
        throw new ObsConnectionError(HANDSHAKE_TIMEOUT_ERROR(deadline.timeoutMs), error);
      }
      throw error;
    }
    try {
      return decodeFrame(raw);
    } catch (error) {
      throw new ObsConnectionError(INVALID_JSON_ERROR, toError(error));
    }
  }

  private writeFrame(frame: OutboundFrame): Promise<void> {
    return this.sendLock.runExclusive(
      () =>
        new Promise<void>((resolve, reject) => {
          const ws = this.ws;
          if (!ws || ws.readyState !== WebSocket.OPEN) {
            reject(new ObsNotConnectedError(SOCKET_CLOSED_ERROR));
            return;
          }
          ws.send(encodeFrame(frame), (error?: Error) => {
            if (error) {
              reject(new ObsConnectionError(SEND_FAILED_ERROR(error.message), error));
            } else {
              resolve();
            }
          });
        })
    );
  }

  // --------------------------------------------------------------------------
  // Receiving
  // --------------------------------------------------------------------------

  private startReceiver(reader: FrameReader): void {
    const receiver: ReceiverLoop = new ReceiverLoop({
      reader,
      dispatch: (frame) => this.dispatchFrame(receiver, frame),
      onExit: () => this.onReceiverExit(receiver),
    });
    this.receiver = receiver;
    receiver.start();
  }

  private async dispatchFrame(receiver: ReceiverLoop, frame: Frame): Promise<void> {
    switch (frame.op) {
      case OpCode.Hello:
        if (!receiver.isRunning()) {
          return;
        }
        // The Identified answer comes back through this loop.
        log.info('OBS WebSocket requested re-identification');
        try {
          await this.sendIdentify(frame);
        } catch (error) {
          log.error(`Re-identification failed: ${getErrorMessage(error)}`);
        }
        return;

      case OpCode.Identified:
        this.identified = true;
        log.debug('OBS WebSocket identified again');
        return;

      case OpCode.Event:
        log.debug(`OBS Event received: ${readEventType(frame.d)}`);
        return;

      default:
        break;
    }

    if (RESPONSE_OPCODES.includes(frame.op)) {
      const requestId = readRequestId(frame.d);
      if (requestId) {
        this.responses.put(requestId, readResponse(frame.d, requestId));
      } else {
        log.debug(`Ignoring OBS response op=${frame.op} without requestId`);
      }
      return;
    }

    log.debug(`Unhandled OBS message op=${frame.op}`);
  }

  /**
   * The loop ended on its own (socket closed or failed). Disconnects
   * initiated through teardown() detach the receiver first and skip this.
   */
  private onReceiverExit(receiver: ReceiverLoop): void {
    if (this.receiver !== receiver) {
      return;
    }
    this.receiver = null;
    this.releaseSocket();
    this.responses.clear(new ObsNotConnectedError(CONNECTION_LOST_ERROR));
  }
}

interface Deadline {
  /** The whole budget */
  readonly timeoutMs: number;
  /** Milliseconds left, never negative */
  remaining(): number;
}

function createDeadline(timeoutMs: number): Deadline {
  const expiresAt = Date.now() + timeoutMs;
  return { timeoutMs, remaining: () => Math.max(0, expiresAt - Date.now()) };
}

/**
 * Resolve once the socket is open.
 */
function waitForOpen(ws: WebSocket, timeoutMs: number): Promise<void> {
  if (ws.readyState === WebSocket.OPEN) {
    return Promise.resolve();
  }

  return new Promise<void>((resolve, reject) => {
    const cleanup = (): void => {
      clearTimeout(timer);
      ws.off('open', onOpen);
      ws.off('error', onError);
      ws.off('close', onClose);
    };
    const onOpen = (): void => {
      cleanup();
      resolve();
    };
    const onError = (error: Error): void => {
      cleanup();
      reject(error);
    };
    const onClose = (code: number): void => {
      cleanup();
      reject(new Error(`WebSocket closed before opening (code ${code})`));
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new Error(OPEN_TIMEOUT_ERROR(timeoutMs)));
    }, timeoutMs);

    ws.on('open', onOpen);
    ws.on('error', onError);
    ws.on('close', onClose);
  });
}
