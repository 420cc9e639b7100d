/**
 * Database Seeders
 * Sample inventory and clients (uses findOrCreate, safe to run multiple times)
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import Joi from 'joi';
import logger from '../config/logger.js';
import models from '../models/index.js';
import { validateInput } from '../middlewares/validate.js';
import { createVehicleSchema } from '../modules/vehicle/vehicle.validator.js';
import { createClientSchema } from '../modules/client/client.validator.js';
import type { NewVehicle } from '../modules/vehicle/vehicle.repo.js';
import type { NewClient } from '../modules/client/client.repo.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const SAMPLE_DATA_PATH = path.resolve(__dirname, '../../data/sample-data.json');

export interface SampleData {
  vehicles: NewVehicle[];
  clients: NewClient[];
}

const sampleDataSchema = Joi.object<SampleData>({
  vehicles: Joi.array().items(createVehicleSchema).required(),
  clients: Joi.array().items(createClientSchema).required(),
});

export function loadSampleData(filePath: string = SAMPLE_DATA_PATH): SampleData {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return validateInput(sampleDataSchema, raw);
}

async function seedVehicles(vehicles: NewVehicle[]): Promise<void> {
  for (const vehicle of vehicles) {
    const [, created] = await models.Vehicle.findOrCreate({
      where: { vin: vehicle.vin },
      defaults: {
        ...vehicle,
        version: vehicle.version ?? null,
        engineCc: vehicle.engineCc ?? null,
        originalPurchasePrice: vehicle.originalPurchasePrice ?? null,
        estimatedTradeInValue: vehicle.estimatedTradeInValue ?? null,
        stockLocation: vehicle.stockLocation ?? null,
      },
    });
    if (created) {
      logger.info(`[Seed] Created vehicle ${vehicle.year} ${vehicle.make} ${vehicle.model}`);
    }
  }
}

async function seedClients(clients: NewClient[]): Promise<void> {
  for (const client of clients) {
    const [, created] = await models.Client.findOrCreate({
      where: { email: client.email },
      defaults: {
        ...client,
        phone: client.phone ?? null,
        address: client.address ?? null,
        city: client.city ?? null,
        postalCode: client.postalCode ?? null,
        preferredFuel: client.preferredFuel ?? null,
        preferredTransmission: client.preferredTransmission ?? null,
        budgetMin: client.budgetMin ?? null,
        budgetMax: client.budgetMax ?? null,
      },
    });
    if (created) {
      logger.info(`[Seed] Created client ${client.firstName} ${client.lastName}`);
    }
  }
}

export async function seedAll(): Promise<void> {
  const data = loadSampleData();
  await seedVehicles(data.vehicles);
  await seedClients(data.clients);
  logger.info('[Seed] Sample data ready', {
    vehicles: data.vehicles.length,
    clients: data.clients.length,
  });
}

export default seedAll;
