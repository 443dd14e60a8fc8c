import { describe, expect, it } from 'vitest';

import { toOpenAI } from '../src/adapters/openai';
import { createMotorpool } from '../src/create-motorpool';
import { MemoryInventoryStore } from '../src/store/memory-store';

describe('toOpenAI', () => {
  const { gateway } = createMotorpool({ store: new MemoryInventoryStore() });
  const tools = toOpenAI(gateway);

  it('converts every operation into a function tool', () => {
    expect(tools.map((tool) => tool.function.name)).toEqual([
      'search_records',
      'list_distinct',
      'get_range',
      'list_models',
    ]);
    expect(tools.every((tool) => tool.type === 'function')).toBe(true);
  });

  it('keeps strict mode off', () => {
    expect(tools[0]?.function.strict).toBe(false);
  });

  it('passes the argument schema through', () => {
    const getRange = tools.find((tool) => tool.function.name === 'get_range');
    expect(getRange?.function.parameters.required).toEqual(['field']);
    expect(getRange?.function.parameters.properties['field']).toMatchObject({
      enum: ['year', 'price', 'mileage'],
    });
    expect(getRange?.function.parameters).not.toHaveProperty('$schema');
  });
});
