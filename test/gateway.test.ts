import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { ValidationError } from '../src/core/errors';
import { createMotorpool } from '../src/create-motorpool';
import { createGateway } from '../src/gateway/create-gateway';
import { defineOperation, parseWith } from '../src/gateway/define-operation';
import type { CallResponse, GatewayEvents } from '../src/gateway/types';
import { MemoryInventoryStore } from '../src/store/memory-store';
import { CATALOG_ORDER_IDS, seededStore, vehicleId } from './fixtures/vehicles';

const resultOf = (response: CallResponse) => {
  if ('error' in response) throw new Error(`unexpected error ${response.error.code}`);
  return response.result;
};

const errorOf = (response: CallResponse) => {
  if (!('error' in response)) throw new Error('expected an error response');
  return response.error;
};

const pageSchema = z.object({
  records: z.array(z.object({ id: z.string() })),
  nextPageToken: z.string().optional(),
});

const recordIds = (result: unknown): string[] =>
  pageSchema.parse(result).records.map((record) => record.id);

describe('gateway', () => {
  it('answers search_records with records and a page token', async () => {
    const { gateway } = createMotorpool({ store: await seededStore() });
    const response = await gateway.call({
      operation: 'search_records',
      arguments: { identityFilters: { brand: 'volkswagen' }, priceMax: 80000, pageSize: 1 },
    });
    const result = resultOf(response);
    expect(recordIds(result)).toEqual([vehicleId(1)]);
    expect(result).toMatchObject({
      records: [{ brand: 'Volkswagen', model: 'Gol', createdAt: '2024-01-01T00:00:00.000Z' }],
      nextPageToken: expect.any(String),
    });
  });

  it('follows page tokens to the end', async () => {
    const { gateway } = createMotorpool({ store: await seededStore() });
    const seen: string[] = [];
    let pageToken: string | undefined;
    do {
      const result = resultOf(
        await gateway.call({
          operation: 'search_records',
          arguments: { pageSize: 4, ...(pageToken ? { pageToken } : {}) },
        }),
      );
      seen.push(...recordIds(result));
      pageToken = pageSchema.parse(result).nextPageToken;
    } while (pageToken);
    expect(seen).toEqual(CATALOG_ORDER_IDS);
  });

  it('fails unknown operations straight from received', async () => {
    const { gateway } = createMotorpool({ store: new MemoryInventoryStore() });
    const states: string[] = [];
    for (const type of ['received', 'validating', 'dispatching', 'completed', 'failed'] as const) {
      gateway.addEventListener(type, (event) => {
        states.push(event.detail.state);
      });
    }

    const response = await gateway.call({ operation: 'delete_records', arguments: {} });

    expect(errorOf(response)).toEqual({
      code: 'UNKNOWN_OPERATION',
      message:
        'Unknown operation "delete_records". Available: search_records, list_distinct, get_range, list_models',
      retryable: false,
    });
    expect(states).toEqual(['received', 'failed']);
  });

  it('walks a successful call through every state with one call id', async () => {
    const gateway = createGateway({
      operations: createMotorpool({ store: await seededStore() }).gateway.operations(),
      generateCallId: () => 'call-1',
    });
    const events: Array<{ state: string; callId: string; requestId?: string }> = [];
    for (const type of ['received', 'validating', 'dispatching', 'completed'] as const) {
      gateway.addEventListener(type, (event) => {
        const { state, callId, requestId } = event.detail;
        events.push({ state, callId, ...(requestId ? { requestId } : {}) });
      });
    }

    await gateway.call({ operation: 'get_range', arguments: { field: 'year' }, id: 'req-7' });

    expect(events).toEqual([
      { state: 'received', callId: 'call-1', requestId: 'req-7' },
      { state: 'validating', callId: 'call-1', requestId: 'req-7' },
      { state: 'dispatching', callId: 'call-1', requestId: 'req-7' },
      { state: 'completed', callId: 'call-1', requestId: 'req-7' },
    ]);
  });

  it('keeps concurrent calls apart when callers reuse an id', async () => {
    let next = 0;
    const gateway = createGateway({
      operations: createMotorpool({ store: await seededStore() }).gateway.operations(),
      generateCallId: () => `call-${(next += 1)}`,
    });
    const completed: Array<{ callId: string; requestId?: string }> = [];
    gateway.addEventListener('completed', (event) => {
      completed.push({ callId: event.detail.callId, requestId: event.detail.requestId });
    });

    await Promise.all([
      gateway.call({ operation: 'get_range', arguments: { field: 'year' }, id: '1' }),
      gateway.call({ operation: 'get_range', arguments: { field: 'price' }, id: '1' }),
    ]);

    expect(completed.map((event) => event.callId).sort()).toEqual(['call-1', 'call-2']);
    expect(completed.map((event) => event.requestId)).toEqual(['1', '1']);
  });

  it('rejects inconsistent bounds without reaching storage', async () => {
    const store = await seededStore();
    const scan = vi.spyOn(store, 'scan');
    const { gateway } = createMotorpool({ store });
    const failed: GatewayEvents['failed'][] = [];
    gateway.addEventListener('failed', (event) => {
      failed.push(event.detail);
    });

    const response = await gateway.call({
      operation: 'search_records',
      arguments: { priceMin: 100000, priceMax: 50000 },
    });

    expect(errorOf(response)).toEqual({
      code: 'INVALID_ARGUMENT',
      message: 'priceMin: priceMin (100000) must be less than or equal to priceMax (50000)',
      retryable: false,
      details: {
        issues: [
          {
            path: 'priceMin',
            message: 'priceMin (100000) must be less than or equal to priceMax (50000)',
          },
        ],
      },
    });
    expect(failed[0]?.from).toBe('validating');
    expect(scan).not.toHaveBeenCalled();
  });

  it('reports filter and paging issues together', async () => {
    const { gateway } = createMotorpool({ store: new MemoryInventoryStore() });
    const error = errorOf(
      await gateway.call({
        operation: 'search_records',
        arguments: { pageSize: 0, yearMin: 'new' },
      }),
    );
    expect(error.code).toBe('INVALID_ARGUMENT');
    expect(error.details).toMatchObject({
      issues: [{ path: 'pageSize' }, { path: 'yearMin' }],
    });
  });

  it('maps a foreign page token to INVALID_PAGE_TOKEN', async () => {
    const { gateway } = createMotorpool({ store: await seededStore() });
    const first = resultOf(
      await gateway.call({ operation: 'search_records', arguments: { pageSize: 1 } }),
    );
    const { nextPageToken } = z.object({ nextPageToken: z.string() }).parse(first);

    const response = await gateway.call({
      operation: 'search_records',
      arguments: { freeText: 'gol', pageToken: nextPageToken },
    });
    expect(errorOf(response)).toMatchObject({ code: 'INVALID_PAGE_TOKEN', retryable: false });
  });

  it('hides raw storage failures behind a retryable code', async () => {
    const store = await seededStore();
    vi.spyOn(store, 'scan').mockRejectedValue(new Error('password authentication failed'));
    const { gateway } = createMotorpool({ store });

    const response = await gateway.call({ operation: 'search_records', arguments: {} });

    expect(errorOf(response)).toEqual({
      code: 'STORAGE_UNAVAILABLE',
      message: 'The inventory could not be queried; try again',
      retryable: true,
    });
  });

  it('reports a slow store as TIMEOUT', async () => {
    const store = await seededStore();
    vi.spyOn(store, 'range').mockReturnValue(new Promise(() => {}));
    const { gateway } = createMotorpool({ store, storageTimeoutMs: 20 });

    const response = await gateway.call({ operation: 'get_range', arguments: { field: 'price' } });

    expect(errorOf(response)).toMatchObject({ code: 'TIMEOUT', retryable: true });
  });

  it('validates facet arguments', async () => {
    const { gateway } = createMotorpool({ store: await seededStore() });
    const error = errorOf(
      await gateway.call({ operation: 'list_distinct', arguments: { field: 'engine' } }),
    );
    expect(error.code).toBe('INVALID_ARGUMENT');
    expect(error.details).toMatchObject({ issues: [{ path: 'field' }] });
  });

  it('answers the facet operations', async () => {
    const { gateway } = createMotorpool({ store: await seededStore() });
    expect(
      resultOf(await gateway.call({ operation: 'list_distinct', arguments: { field: 'doors' } })),
    ).toEqual({ values: [2, 4] });
    expect(
      resultOf(await gateway.call({ operation: 'list_models', arguments: { brands: 'Fiat' } })),
    ).toEqual({ models: ['Toro', 'Uno'] });
    expect(
      resultOf(await gateway.call({ operation: 'get_range', arguments: { field: 'mileage' } })),
    ).toEqual({ min: 12000, max: 110000 });
  });

  it('returns the empty sentinel for ranges over an empty store', async () => {
    const { gateway } = createMotorpool({ store: new MemoryInventoryStore() });
    expect(
      await gateway.call({ operation: 'get_range', arguments: { field: 'price' } }),
    ).toEqual({ result: { empty: true } });
  });

  it('rejects malformed envelopes', async () => {
    const { gateway } = createMotorpool({ store: new MemoryInventoryStore() });
    expect(errorOf(await gateway.call({ operation: '  ' })).code).toBe('INVALID_ARGUMENT');
    expect(
      errorOf(await gateway.call({ operation: 'search_records', arguments: 'gol' })).details,
    ).toMatchObject({ issues: [{ path: 'arguments' }] });
  });

  it('treats null arguments as none', async () => {
    const { gateway } = createMotorpool({ store: await seededStore() });
    const result = resultOf(await gateway.call({ operation: 'search_records', arguments: null }));
    expect(recordIds(result)).toEqual(CATALOG_ORDER_IDS);
  });

  it('turns a throwing parser into an error envelope', async () => {
    const gateway = createGateway({
      operations: [
        defineOperation({
          name: 'explode',
          description: 'always fails to parse',
          schema: z.object({}),
          parse: () => {
            throw new TypeError('parser bug');
          },
          execute: async () => null,
        }),
      ],
    });
    expect(await gateway.call({ operation: 'explode' })).toEqual({
      error: {
        code: 'STORAGE_UNAVAILABLE',
        message: 'The inventory could not be queried; try again',
        retryable: true,
      },
    });
  });

  it('describes every operation with a JSON Schema', async () => {
    const { gateway } = createMotorpool({ store: new MemoryInventoryStore() });
    const described = gateway.describe();
    expect(described.map((operation) => operation.name)).toEqual([
      'search_records',
      'list_distinct',
      'get_range',
      'list_models',
    ]);
    const search = described[0];
    expect(search?.inputSchema.type).toBe('object');
    expect(search?.inputSchema.additionalProperties).toBe(false);
    expect(Object.keys(search?.inputSchema.properties ?? {})).toEqual(
      expect.arrayContaining(['freeText', 'identityFilters', 'priceMax', 'pageToken', 'pageSize']),
    );
    expect(described[1]?.inputSchema.required).toEqual(['field']);
    expect(described.every((operation) => operation.readOnly)).toBe(true);
  });
});

describe('defineOperation', () => {
  it('requires snake_case names', () => {
    const schema = z.object({});
    expect(() =>
      defineOperation({
        name: 'searchRecords',
        description: 'x',
        schema,
        parse: parseWith(schema),
        execute: async () => null,
      }),
    ).toThrow('Operation names must be snake_case, got "searchRecords"');
  });

  it('reports parse failures as ValidationError', () => {
    const schema = z.strictObject({ field: z.enum(['a', 'b']) });
    const operation = defineOperation<z.output<typeof schema>>({
      name: 'pick',
      description: 'x',
      schema,
      parse: parseWith(schema),
      execute: async ({ field }) => field,
    });
    const outcome = operation.prepare({ field: 'c' });
    expect(outcome.success).toBe(false);
    if (!outcome.success) expect(outcome.error).toBeInstanceOf(ValidationError);
  });

  it('rejects duplicate registrations', () => {
    const schema = z.object({});
    const operation = defineOperation({
      name: 'noop',
      description: 'x',
      schema,
      parse: parseWith(schema),
      execute: async () => null,
    });
    expect(() => createGateway({ operations: [operation, operation] })).toThrow(
      'Operation "noop" is registered twice',
    );
  });
});
