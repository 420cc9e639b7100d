import { Router } from 'express';
import { validateParams } from '../../middlewares/validate.js';
import { createVehicleController } from './vehicle.controller.js';
import type { VehicleService } from './vehicle.service.js';
import { vehicleIdSchema } from './vehicle.validator.js';

export function createVehicleRouter(service: VehicleService): Router {
  const vehicleRouter = Router();
  const controller = createVehicleController(service);

  vehicleRouter.post('/', controller.createVehicle);
  vehicleRouter.get('/in-stock', controller.listInStock);
  vehicleRouter.post('/search', controller.searchVehicles);
  vehicleRouter.get('/:id', validateParams(vehicleIdSchema), controller.getVehicle);

  return vehicleRouter;
}

export default createVehicleRouter;
