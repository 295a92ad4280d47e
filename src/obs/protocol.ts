/**
 * OBS WebSocket v5 wire protocol.
 *
 * Every frame is a JSON object `{ op, d }` where `op` identifies the frame's
 * role and `d` carries the opcode-specific payload.
 */

// ============================================================================
// Opcodes
// ============================================================================

export const OpCode = {
  /** server → client: first frame after the socket opens */
  Hello: 0,
  /** client → server: answer to Hello, optionally authenticated */
  Identify: 1,
  /** server → client: session is usable */
  Identified: 2,
  /** client → server: update session parameters */
  Reidentify: 3,
  /** server → client: event notification */
  Event: 5,
  /** client → server: single request */
  Request: 6,
  /** server → client: answer to a single request */
  RequestResponse: 7,
  /** batch request; treated as a response when it carries a requestId */
  RequestBatch: 8,
  /** server → client: answer to a batch request */
  RequestBatchResponse: 9,
} as const;

export type OpCodeValue = (typeof OpCode)[keyof typeof OpCode];

/**
 * Opcodes whose payload is routed to the response registry.
 */
export const RESPONSE_OPCODES: readonly number[] = [
  OpCode.RequestResponse,
  OpCode.RequestBatch,
  OpCode.RequestBatchResponse,
];

/**
 * Event subscription bit flags sent in Identify.
 * 0 (None) subscribes to nothing; events are not consumed by this client.
 */
export const EventSubscription = {
  None: 0,
  General: 1 << 0,
  Config: 1 << 1,
  Scenes: 1 << 2,
  Inputs: 1 << 3,
  Transitions: 1 << 4,
  Filters: 1 << 5,
  Outputs: 1 << 6,
  SceneItems: 1 << 7,
  MediaInputs: 1 << 8,
  Vendors: 1 << 9,
  Ui: 1 << 10,
} as const;

/**
 * WebSocket close codes OBS uses to explain why it dropped a session.
 */
export const CloseCode = {
  NotIdentified: 4007,
  AlreadyIdentified: 4008,
  AuthenticationFailed: 4009,
  UnsupportedRpcVersion: 4010,
  SessionInvalidated: 4011,
} as const;

// ============================================================================
// Frame payloads
// ============================================================================

export interface AuthenticationChallenge {
  challenge: string;
  salt: string;
}

export interface HelloData {
  obsWebSocketVersion?: string;
  rpcVersion: number;
  authentication?: AuthenticationChallenge;
}

export interface IdentifyData {
  rpcVersion: number;
  eventSubscriptions: number;
  authentication?: string;
}

export interface RequestData {
  requestType: string;
  requestId: string;
  requestData: Record<string, unknown>;
}

export interface RequestStatus {
  result: boolean;
  code: number;
  comment?: string;
}

export interface ResponseData {
  requestType?: string;
  requestId: string;
  requestStatus: RequestStatus;
  responseData?: Record<string, unknown>;
}

/**
 * Decoded inbound frame. `d` stays loosely typed until the opcode-specific
 * reader narrows it.
 */
export interface Frame {
  op: number;
  d: Record<string, unknown>;
}

export type OutboundFrame =
  | { op: typeof OpCode.Identify; d: IdentifyData }
  | { op: typeof OpCode.Request; d: RequestData };

// ============================================================================
// Decoding
// ============================================================================

/**
 * Raised when an inbound message is not a `{ op, d }` JSON envelope.
 */
export class FrameDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrameDecodeError';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a raw text frame into its envelope.
 *
 * A missing `d` decodes as an empty object, matching how OBS omits empty
 * payloads.
 *
 * @throws FrameDecodeError if the text is not JSON or not an envelope
 */
export function decodeFrame(raw: string): Frame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FrameDecodeError(`Invalid JSON: ${reason}`);
  }

  if (!isRecord(parsed)) {
    throw new FrameDecodeError('Frame must be a JSON object');
  }

  const { op, d } = parsed;
  if (typeof op !== 'number' || !Number.isInteger(op)) {
    throw new FrameDecodeError('Frame is missing an integer "op" field');
  }
  if (d !== undefined && !isRecord(d)) {
    throw new FrameDecodeError(`Frame op=${op} has a non-object "d" field`);
  }

  return { op, d: d ?? {} };
}

export function encodeFrame(frame: OutboundFrame): string {
  return JSON.stringify(frame);
}

// ============================================================================
// Payload readers
// ============================================================================

/**
 * Read the Hello payload. A missing or non-numeric rpcVersion falls back to 1.
 */
export function readHello(d: Record<string, unknown>): HelloData {
  const rpcVersion = typeof d['rpcVersion'] === 'number' ? d['rpcVersion'] : 1;
  const hello: HelloData = { rpcVersion };

  if (typeof d['obsWebSocketVersion'] === 'string') {
    hello.obsWebSocketVersion = d['obsWebSocketVersion'];
  }

  const auth = d['authentication'];
  if (isRecord(auth)) {
    const { challenge, salt } = auth;
    hello.authentication = {
      challenge: typeof challenge === 'string' ? challenge : '',
      salt: typeof salt === 'string' ? salt : '',
    };
  }

  return hello;
}

/**
 * Extract the correlation id of a response-kind payload, if it has one.
 */
export function readRequestId(d: Record<string, unknown>): string | undefined {
  const requestId = d['requestId'];
  return typeof requestId === 'string' && requestId.length > 0 ? requestId : undefined;
}

/**
 * Read a response payload into its typed shape.
 *
 * A missing or malformed `requestStatus` reads as a failure with code 0,
 * so that it never passes as success.
 */
export function readResponse(d: Record<string, unknown>, requestId: string): ResponseData {
  const status = d['requestStatus'];
  const requestStatus: RequestStatus = { result: false, code: 0 };

  if (isRecord(status)) {
    requestStatus.result = status['result'] === true;
    if (typeof status['code'] === 'number') {
      requestStatus.code = status['code'];
    }
    if (typeof status['comment'] === 'string') {
      requestStatus.comment = status['comment'];
    }
  }

  const response: ResponseData = { requestId, requestStatus };
  if (typeof d['requestType'] === 'string') {
    response.requestType = d['requestType'];
  }
  const responseData = d['responseData'];
  if (isRecord(responseData)) {
    response.responseData = responseData;
  }
  return response;
}

export function readEventType(d: Record<string, unknown>): string {
  return typeof d['eventType'] === 'string' ? d['eventType'] : '<unknown>';
}
