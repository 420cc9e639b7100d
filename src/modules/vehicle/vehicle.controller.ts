import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { validateInput } from '../../middlewares/validate.js';
import type { VehicleService } from './vehicle.service.js';
import { createVehicleSchema, searchVehiclesSchema } from './vehicle.validator.js';

export interface VehicleController {
  createVehicle: RequestHandler;
  getVehicle: RequestHandler;
  listInStock: RequestHandler;
  searchVehicles: RequestHandler;
}

export function createVehicleController(service: VehicleService): VehicleController {
  return {
    createVehicle: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const data = await service.createVehicle(validateInput(createVehicleSchema, req.body));
        res.status(201).json({ message: 'Vehicle created successfully', data });
      } catch (error) {
        next(error);
      }
    },

    getVehicle: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const data = await service.getVehicle(Number(req.params.id));
        res.status(200).json({ message: 'Vehicle', data });
      } catch (error) {
        next(error);
      }
    },

    listInStock: async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const data = await service.listInStock();
        res.status(200).json({ message: 'Vehicles in stock', data });
      } catch (error) {
        next(error);
      }
    },

    /**
     * Search in-stock vehicles by fuel, transmission and budget
     */
    searchVehicles: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const data = await service.searchInStock(validateInput(searchVehiclesSchema, req.body));
        res.status(200).json({ message: 'Matching vehicles', data });
      } catch (error) {
        next(error);
      }
    },
  };
}
