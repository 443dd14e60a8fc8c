import type { ErrorPayload } from '../core/errors';
import type { JsonValue } from '../core/serialization/json';
import type { InputSchema } from './json-schema';

/** Inbound envelope. Arrives from JSON, so every field is re-checked at runtime. */
export type CallRequest = {
  operation: string;
  arguments?: unknown;
  id?: string;
};

export type CallResponse = { result: JsonValue } | { error: ErrorPayload };

export type CallState = 'received' | 'validating' | 'dispatching' | 'completed' | 'failed';

export type CallOptions = {
  signal?: AbortSignal;
};

type CallEventBase = {
  /** Generated per call, unique within the process. */
  callId: string;
  /** The `id` the caller sent, if any. */
  requestId?: string;
  operation: string;
};

export type GatewayEvents = {
  received: CallEventBase & { state: 'received' };
  validating: CallEventBase & { state: 'validating' };
  dispatching: CallEventBase & { state: 'dispatching' };
  completed: CallEventBase & { state: 'completed'; result: JsonValue; durationMs: number };
  failed: CallEventBase & {
    state: 'failed';
    /** The state the call was in when it failed. */
    from: Exclude<CallState, 'completed' | 'failed'>;
    error: ErrorPayload;
    durationMs: number;
  };
};

export type GatewayEventType = Extract<keyof GatewayEvents, string>;

export type OperationDescription = {
  name: string;
  title?: string;
  description: string;
  readOnly: boolean;
  inputSchema: InputSchema;
};

export const isErrorResponse = (
  response: CallResponse,
): response is { error: ErrorPayload } => 'error' in response;
