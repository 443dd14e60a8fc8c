import { randomUUID } from 'node:crypto';

import {
  type AddEventListenerOptionsLike,
  createEventTarget,
  type EmissionEvent,
  type ObservableLike,
} from 'event-emission';
import { z } from 'zod';

import {
  MotorpoolError,
  toErrorPayload,
  UnknownOperation,
  ValidationError,
} from '../core/errors';
import { toValidationIssues } from '../core/filter';
import { errorString, normalizeError } from '../errors';
import { getLogger } from '../logger';
import type { Operation, ParseOutcome, PreparedCall } from './define-operation';
import { toInputSchema } from './json-schema';
import type {
  CallOptions,
  CallRequest,
  CallResponse,
  CallState,
  GatewayEvents,
  GatewayEventType,
  OperationDescription,
} from './types';

const logger = getLogger('gateway');

const envelopeSchema = z.object({
  operation: z.string().trim().min(1, 'operation is required'),
  arguments: z.record(z.string(), z.unknown()).nullish(),
  id: z.string().min(1).optional(),
});

export type Gateway = {
  /** Runs one call to completion. Never rejects: every failure is an `{ error }` envelope. */
  call(request: CallRequest, options?: CallOptions): Promise<CallResponse>;
  describe(): OperationDescription[];
  operations(): Operation[];
  addEventListener: <K extends GatewayEventType>(
    type: K,
    listener: (event: EmissionEvent<GatewayEvents[K]>) => void | Promise<void>,
    options?: AddEventListenerOptionsLike,
  ) => () => void;
  on: <K extends GatewayEventType>(
    type: K,
    options?: AddEventListenerOptionsLike | boolean,
  ) => ObservableLike<EmissionEvent<GatewayEvents[K]>>;
  complete: () => void;
};

export type GatewayOptions = {
  operations: readonly Operation[];
  generateCallId?: () => string;
  clock?: () => number;
};

/**
 * Dispatches structured calls to registered operations, walking each call through
 * `received → validating → dispatching → completed | failed` and emitting one event per state.
 * The gateway keeps no per-call state after the call settles and never retries.
 */
export function createGateway(options: GatewayOptions): Gateway {
  const { generateCallId = randomUUID, clock = () => performance.now() } = options;
  const registry = new Map<string, Operation>();
  for (const operation of options.operations) {
    if (registry.has(operation.name)) {
      throw new Error(`Operation "${operation.name}" is registered twice`);
    }
    registry.set(operation.name, operation);
  }

  const hub = createEventTarget<GatewayEvents>();
  // event-emission fills in the remaining event fields at dispatch time
  const emit = <K extends GatewayEventType>(type: K, detail: GatewayEvents[K]) =>
    hub.dispatchEvent({ type, detail } as EmissionEvent<GatewayEvents[K]>);

  async function call(request: CallRequest, callOptions: CallOptions = {}): Promise<CallResponse> {
    const startedAt = clock();
    const envelope = envelopeSchema.safeParse(request);
    // Caller ids may repeat across concurrent calls, so the generated id keys the call.
    const callId = generateCallId();
    const requestId = envelope.success ? envelope.data.id : undefined;
    const base = requestId === undefined ? { callId } : { callId, requestId };
    const operationName =
      envelope.success ? envelope.data.operation : describeOperationField(request);

    emit('received', { ...base, operation: operationName, state: 'received' });

    const fail = (from: Exclude<CallState, 'completed' | 'failed'>, error: unknown) => {
      const payload = toErrorPayload(error);
      if (!(error instanceof MotorpoolError)) {
        logger.error`Call ${callId} (${operationName}) raised an untyped error: ${errorString(normalizeError(error))}`;
      }
      logger.warn`Call ${callId} (${operationName}) failed while ${from}: ${payload.code} ${payload.message}`;
      emit('failed', {
        ...base,
        operation: operationName,
        state: 'failed',
        from,
        error: payload,
        durationMs: clock() - startedAt,
      });
      return { error: payload };
    };

    if (!envelope.success) {
      return fail(
        'received',
        ValidationError.fromIssues(toValidationIssues(envelope.error)),
      );
    }

    const operation = registry.get(envelope.data.operation);
    if (!operation) {
      return fail('received', new UnknownOperation(envelope.data.operation, [...registry.keys()]));
    }

    emit('validating', { ...base, operation: operation.name, state: 'validating' });
    let prepared: ParseOutcome<PreparedCall>;
    try {
      prepared = operation.prepare(envelope.data.arguments ?? {});
    } catch (error) {
      return fail('validating', error);
    }
    if (!prepared.success) {
      return fail('validating', prepared.error);
    }

    emit('dispatching', { ...base, operation: operation.name, state: 'dispatching' });
    try {
      const result = await prepared.value({
        callId,
        ...(callOptions.signal ? { signal: callOptions.signal } : {}),
      });
      const durationMs = clock() - startedAt;
      logger.debug`Call ${callId} (${operation.name}) completed in ${durationMs.toFixed(1)} ms`;
      emit('completed', {
        ...base,
        operation: operation.name,
        state: 'completed',
        result,
        durationMs,
      });
      return { result };
    } catch (error) {
      return fail('dispatching', error);
    }
  }

  function describe(): OperationDescription[] {
    return [...registry.values()].map((operation) => {
      const description: OperationDescription = {
        name: operation.name,
        description: operation.description,
        readOnly: operation.readOnly,
        inputSchema: toInputSchema(operation.schema),
      };
      if (operation.title !== undefined) description.title = operation.title;
      return description;
    });
  }

  return {
    call,
    describe,
    operations: () => [...registry.values()],
    addEventListener: hub.addEventListener,
    on: hub.on,
    complete: hub.complete,
  };
}

function describeOperationField(request: unknown): string {
  if (!request || typeof request !== 'object') return '';
  const operation: unknown = Reflect.get(request, 'operation');
  return typeof operation === 'string' ? operation : '';
}
