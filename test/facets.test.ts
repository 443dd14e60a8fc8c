import { describe, expect, it } from 'vitest';

import { createFacetResolver, sortFacetValues } from '../src/engine/facets';
import { MemoryInventoryStore } from '../src/store/memory-store';
import { seededStore } from './fixtures/vehicles';

describe('facet resolver', () => {
  it('lists distinct fuel types without duplicates', async () => {
    const facets = createFacetResolver({ store: await seededStore() });
    expect(await facets.listDistinct('fuel_type')).toEqual([
      'Diesel',
      'Flex',
      'Gasolina',
      'Híbrido',
    ]);
  });

  it('lists numeric facets in numeric order', async () => {
    const facets = createFacetResolver({ store: await seededStore() });
    expect(await facets.listDistinct('doors')).toEqual([2, 4]);
    expect(await facets.listDistinct('engine_size')).toEqual([1, 1.4, 1.6, 2]);
  });

  it('lists brands as stored', async () => {
    const facets = createFacetResolver({ store: await seededStore() });
    expect(await facets.listDistinct('brand')).toEqual([
      'Chevrolet',
      'Citroën',
      'Fiat',
      'Honda',
      'Toyota',
      'Volkswagen',
    ]);
  });

  it('lists models, optionally for some brands', async () => {
    const facets = createFacetResolver({ store: await seededStore() });
    expect(await facets.listModels()).toEqual([
      'C3',
      'Civic',
      'Corolla',
      'Gol',
      'Onix',
      'Polo',
      'Toro',
      'Uno',
    ]);
    expect(await facets.listModels(['fiat'])).toEqual(['Toro', 'Uno']);
    expect(await facets.listModels(['FIAT', 'Citroen'])).toEqual(['C3', 'Toro', 'Uno']);
    expect(await facets.listModels(['  '])).toHaveLength(8);
  });

  it('reports the true extrema', async () => {
    const facets = createFacetResolver({ store: await seededStore() });
    expect(await facets.getRange('price')).toEqual({ min: 28000, max: 150000 });
    expect(await facets.getRange('year')).toEqual({ min: 2015, max: 2023 });
    expect(await facets.getRange('mileage')).toEqual({ min: 12000, max: 110000 });
  });

  it('answers an empty store with empty results', async () => {
    const facets = createFacetResolver({ store: new MemoryInventoryStore() });
    expect(await facets.getRange('price')).toEqual({ empty: true });
    expect(await facets.listDistinct('color')).toEqual([]);
  });

  it('reads the current state on every call', async () => {
    const store = new MemoryInventoryStore();
    const facets = createFacetResolver({ store });
    expect(await facets.getRange('year')).toEqual({ empty: true });
    await store.insert([
      {
        brand: 'Fiat',
        model: 'Mobi',
        manufactureYear: 2020,
        modelYear: 2020,
        engineSize: 1.0,
        fuelType: 'Flex',
        color: 'Branco',
        mileage: 1000,
        doors: 4,
        transmission: 'Manual',
        price: 40000,
      },
    ]);
    expect(await facets.getRange('year')).toEqual({ min: 2020, max: 2020 });
  });
});

describe('sortFacetValues', () => {
  it('puts numbers before strings and removes repeats', () => {
    expect(sortFacetValues(['b', 2, 'a', 10, 2, 'b'])).toEqual([2, 10, 'a', 'b']);
  });
});
