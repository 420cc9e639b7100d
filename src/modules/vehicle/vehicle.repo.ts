import { Op, type WhereOptions } from 'sequelize';
import models from '../../models/index.js';
import type { VehicleModel } from '../../models/vehicle.js';
import type {
  FuelType,
  Transmission,
  Vehicle,
  VehicleCondition,
} from '../../types/index.js';

export interface InStockFilter {
  fuelType?: FuelType | null;
  transmission?: Transmission | null;
  budgetMin?: number | null;
  budgetMax?: number | null;
}

export interface NewVehicle {
  vin: string;
  registrationNumber: string;
  make: string;
  model: string;
  year: number;
  version?: string | null;
  mileage: number;
  fuelType: FuelType;
  transmission: Transmission;
  powerHp: number;
  engineCc?: number | null;
  originalPurchasePrice?: number | null;
  currentMarketValue: number;
  estimatedTradeInValue?: number | null;
  condition: VehicleCondition;
  inStock?: boolean;
  stockLocation?: string | null;
}

/**
 * Read/write access to vehicles. `findInStock` returns newest first.
 */
export interface VehicleRepository {
  findById(id: number): Promise<Vehicle | null>;
  findByVin(vin: string): Promise<Vehicle | null>;
  findInStock(filter: InStockFilter): Promise<Vehicle[]>;
  create(data: NewVehicle): Promise<Vehicle>;
}

export const toVehicle = (row: VehicleModel): Vehicle => ({
  id: row.id,
  vin: row.vin,
  registrationNumber: row.registrationNumber,
  make: row.make,
  model: row.model,
  year: row.year,
  version: row.version ?? null,
  mileage: row.mileage,
  fuelType: row.fuelType,
  transmission: row.transmission,
  powerHp: row.powerHp,
  condition: row.condition,
  currentMarketValue: Number(row.currentMarketValue),
  estimatedTradeInValue:
    row.estimatedTradeInValue === null ? null : Number(row.estimatedTradeInValue),
  inStock: row.inStock,
  createdAt: row.createdAt,
});

const buildInStockWhere = (filter: InStockFilter): WhereOptions => {
  const where: Record<string | symbol, unknown> = { inStock: true };

  if (filter.fuelType) {
    where.fuelType = filter.fuelType;
  }
  if (filter.transmission) {
    where.transmission = filter.transmission;
  }

  const range: Record<symbol, number> = {};
  if (filter.budgetMin !== null && filter.budgetMin !== undefined) {
    range[Op.gte] = filter.budgetMin;
  }
  if (filter.budgetMax !== null && filter.budgetMax !== undefined) {
    range[Op.lte] = filter.budgetMax;
  }
  if (Object.getOwnPropertySymbols(range).length > 0) {
    where.currentMarketValue = range;
  }

  return where;
};

const repo: VehicleRepository = {
  findById: async (id) => {
    const row = await models.Vehicle.findByPk(id);
    return row ? toVehicle(row) : null;
  },

  findByVin: async (vin) => {
    const row = await models.Vehicle.findOne({ where: { vin } });
    return row ? toVehicle(row) : null;
  },

  findInStock: async (filter) => {
    const rows = await models.Vehicle.findAll({
      where: buildInStockWhere(filter),
      order: [
        ['createdAt', 'DESC'],
        ['id', 'DESC'],
      ],
    });
    return rows.map(toVehicle);
  },

  create: async (data) => {
    const row = await models.Vehicle.create({
      ...data,
      version: data.version ?? null,
      engineCc: data.engineCc ?? null,
      originalPurchasePrice: data.originalPurchasePrice ?? null,
      estimatedTradeInValue: data.estimatedTradeInValue ?? null,
      stockLocation: data.stockLocation ?? null,
    });
    return toVehicle(row);
  },
};

export default repo;
