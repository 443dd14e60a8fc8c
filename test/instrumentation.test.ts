import { type Span, trace, type Tracer } from '@opentelemetry/api';
import { describe, expect, it } from 'vitest';

import { createMotorpool } from '../src/create-motorpool';
import { instrument } from '../src/instrumentation';
import { seededStore } from './fixtures/vehicles';

function recordingTracer() {
  const noop = trace.getTracer('test');
  const spans: Array<{ name: string; ended: boolean }> = [];
  const tracer: Tracer = {
    startSpan(name, options, context) {
      const span: Span = noop.startSpan(name, options, context);
      const entry = { name, ended: false };
      spans.push(entry);
      const end = span.end.bind(span);
      span.end = (endTime) => {
        entry.ended = true;
        end(endTime);
      };
      return span;
    },
    startActiveSpan: noop.startActiveSpan.bind(noop),
  };
  return { tracer, spans };
}

describe('instrument', () => {
  it('leaves calls untouched under the default tracer and detaches cleanly', async () => {
    const { gateway } = createMotorpool({ store: await seededStore() });
    const detach = instrument(gateway);

    const ok = await gateway.call({ operation: 'list_distinct', arguments: { field: 'fuel_type' } });
    const failed = await gateway.call({ operation: 'drop_table' });
    detach();
    const after = await gateway.call({ operation: 'get_range', arguments: { field: 'price' } });

    expect(ok).toEqual({ result: { values: ['Diesel', 'Flex', 'Gasolina', 'Híbrido'] } });
    expect(failed).toMatchObject({ error: { code: 'UNKNOWN_OPERATION' } });
    expect(after).toEqual({ result: { min: 28000, max: 150000 } });
  });

  it('ends one span per call even when concurrent callers reuse an id', async () => {
    const { gateway } = createMotorpool({ store: await seededStore() });
    const { tracer, spans } = recordingTracer();
    const detach = instrument(gateway, { tracer });

    await Promise.all([
      gateway.call({ operation: 'get_range', arguments: { field: 'year' }, id: '1' }),
      gateway.call({ operation: 'list_models', arguments: {}, id: '1' }),
    ]);
    detach();

    expect(spans).toEqual([
      { name: 'call get_range', ended: true },
      { name: 'call list_models', ended: true },
    ]);
  });
});
