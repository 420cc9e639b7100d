import models from '../../models/index.js';
import type { FuelType, MarketSnapshot } from '../../types/index.js';

export interface MarketKey {
  make: string;
  model: string;
  year: number;
  fuelType: FuelType;
}

/** Cache of aggregated snapshots, one row per make/model/year/fuel. */
export interface MarketDataRepository {
  findByKey(key: MarketKey): Promise<MarketSnapshot | null>;
  upsert(key: MarketKey, snapshot: MarketSnapshot): Promise<void>;
}

const repo: MarketDataRepository = {
  findByKey: async (key) => {
    const row = await models.MarketData.findOne({
      where: {
        make: key.make,
        model: key.model,
        year: key.year,
        fuelType: key.fuelType,
      },
    });
    if (!row) return null;

    return {
      averagePrice: Number(row.averagePrice),
      minPrice: Number(row.priceMin),
      maxPrice: Number(row.priceMax),
      listingsCount: row.listingsCount,
      averageMileage: row.mileageAverage === null ? null : Number(row.mileageAverage),
      lastUpdated: row.lastUpdated,
    };
  },

  upsert: async (key, snapshot) => {
    await models.MarketData.upsert({
      ...key,
      averagePrice: snapshot.averagePrice,
      priceMin: snapshot.minPrice,
      priceMax: snapshot.maxPrice,
      mileageAverage: snapshot.averageMileage,
      listingsCount: snapshot.listingsCount,
      lastUpdated: snapshot.lastUpdated,
    });
  },
};

export default repo;
