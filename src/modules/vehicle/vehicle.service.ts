import logger from '../../config/logger.js';
import type { Vehicle } from '../../types/index.js';
import { ConflictError, NotFoundError } from '../../utils/custom-error.js';
import type { InStockFilter, NewVehicle, VehicleRepository } from './vehicle.repo.js';

export interface VehicleService {
  createVehicle(data: NewVehicle): Promise<Vehicle>;
  getVehicle(id: number): Promise<Vehicle>;
  listInStock(): Promise<Vehicle[]>;
  searchInStock(filter: InStockFilter): Promise<Vehicle[]>;
}

export function createVehicleService(vehicles: VehicleRepository): VehicleService {
  return {
    createVehicle: async (data) => {
      if (await vehicles.findByVin(data.vin)) {
        throw new ConflictError(`A vehicle with VIN ${data.vin} already exists`);
      }
      const vehicle = await vehicles.create(data);
      logger.info('[Vehicle] Created', { vehicleId: vehicle.id, make: vehicle.make, model: vehicle.model });
      return vehicle;
    },

    getVehicle: async (id) => {
      const vehicle = await vehicles.findById(id);
      if (!vehicle) {
        throw new NotFoundError(`Vehicle ${id} not found`);
      }
      return vehicle;
    },

    listInStock: () => vehicles.findInStock({}),

    searchInStock: (filter) => vehicles.findInStock(filter),
  };
}
