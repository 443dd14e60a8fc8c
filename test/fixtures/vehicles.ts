import type { NewVehicle } from '../../src/core/record';
import { MemoryInventoryStore } from '../../src/store/memory-store';

export const FIXED_NOW = new Date('2024-06-01T00:00:00.000Z');

export const vehicleId = (n: number) => `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`;

const createdOn = (day: number) => new Date(Date.UTC(2024, 0, day));

export const VEHICLES: NewVehicle[] = [
  {
    id: vehicleId(1),
    brand: 'Volkswagen',
    model: 'Gol',
    manufactureYear: 2021,
    modelYear: 2022,
    engineSize: 1.0,
    fuelType: 'Flex',
    color: 'Preto',
    mileage: 35000,
    doors: 4,
    transmission: 'Manual',
    price: 62000,
    createdAt: createdOn(1),
  },
  {
    id: vehicleId(2),
    brand: 'Volkswagen',
    model: 'Polo',
    manufactureYear: 2023,
    modelYear: 2023,
    engineSize: 1.0,
    fuelType: 'Flex',
    color: 'Branco',
    mileage: 12000,
    doors: 4,
    transmission: 'Automático',
    price: 98000,
    createdAt: createdOn(2),
  },
  {
    id: vehicleId(3),
    brand: 'Chevrolet',
    model: 'Onix',
    manufactureYear: 2021,
    modelYear: 2021,
    engineSize: 1.0,
    fuelType: 'Flex',
    color: 'Prata',
    mileage: 40000,
    doors: 4,
    transmission: 'Manual',
    price: 58000,
    createdAt: createdOn(3),
  },
  {
    id: vehicleId(4),
    brand: 'Fiat',
    model: 'Uno',
    manufactureYear: 2015,
    modelYear: 2016,
    engineSize: 1.4,
    fuelType: 'Flex',
    color: 'Vermelho',
    mileage: 110000,
    doors: 2,
    transmission: 'Manual',
    price: 28000,
    createdAt: createdOn(4),
  },
  {
    id: vehicleId(5),
    brand: 'Toyota',
    model: 'Corolla',
    manufactureYear: 2022,
    modelYear: 2023,
    engineSize: 2.0,
    fuelType: 'Híbrido',
    color: 'Prata',
    mileage: 20000,
    doors: 4,
    transmission: 'Automático',
    price: 150000,
    createdAt: createdOn(5),
  },
  {
    id: vehicleId(6),
    brand: 'Citroën',
    model: 'C3',
    manufactureYear: 2019,
    modelYear: 2019,
    engineSize: 1.6,
    fuelType: 'Gasolina',
    color: 'Preto',
    mileage: 60000,
    doors: 4,
    transmission: 'Manual',
    price: 45000,
    createdAt: createdOn(6),
  },
  {
    id: vehicleId(7),
    brand: 'Honda',
    model: 'Civic',
    manufactureYear: 2021,
    modelYear: 2021,
    engineSize: 2.0,
    fuelType: 'Gasolina',
    color: 'Cinza',
    mileage: 30000,
    doors: 4,
    transmission: 'Automático',
    price: 120000,
    createdAt: createdOn(7),
  },
  {
    id: vehicleId(8),
    brand: 'Fiat',
    model: 'Toro',
    manufactureYear: 2022,
    modelYear: 2022,
    engineSize: 2.0,
    fuelType: 'Diesel',
    color: 'Branco',
    mileage: 45000,
    doors: 4,
    transmission: 'Automático',
    price: 135000,
    createdAt: createdOn(8),
  },
  {
    id: vehicleId(9),
    brand: 'Volkswagen',
    model: 'Gol',
    manufactureYear: 2018,
    modelYear: 2018,
    engineSize: 1.6,
    fuelType: 'Flex',
    color: 'Prata',
    mileage: 80000,
    doors: 2,
    transmission: 'Manual',
    price: 38000,
    createdAt: createdOn(9),
  },
];

/** Fixture ids in catalog order: year desc, price asc, id asc. */
export const CATALOG_ORDER_IDS = [2, 8, 5, 3, 1, 7, 6, 9, 4].map(vehicleId);

export async function seededStore(vehicles: readonly NewVehicle[] = VEHICLES) {
  const store = new MemoryInventoryStore({ clock: () => FIXED_NOW });
  await store.insert(vehicles);
  return store;
}
