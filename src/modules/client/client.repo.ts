import models from '../../models/index.js';
import type { ClientModel } from '../../models/client.js';
import type {
  FuelType,
  OfferPreference,
  PartyProfile,
  Transmission,
} from '../../types/index.js';

export interface NewClient {
  firstName: string;
  lastName: string;
  email: string;
  phone?: string | null;
  address?: string | null;
  city?: string | null;
  postalCode?: string | null;
  preferredFuel?: FuelType | null;
  preferredTransmission?: Transmission | null;
  budgetMin?: number | null;
  budgetMax?: number | null;
  offerPreference?: OfferPreference;
  loyaltyScore?: number;
  riskScore?: number;
}

export interface ClientRepository {
  findById(id: number): Promise<PartyProfile | null>;
  findByEmail(email: string): Promise<PartyProfile | null>;
  create(data: NewClient): Promise<PartyProfile>;
}

const toNullableNumber = (value: number | null | undefined): number | null =>
  value === null || value === undefined ? null : Number(value);

export const toPartyProfile = (row: ClientModel): PartyProfile => ({
  id: row.id,
  firstName: row.firstName,
  lastName: row.lastName,
  email: row.email,
  phone: row.phone ?? null,
  preferredFuel: row.preferredFuel ?? null,
  preferredTransmission: row.preferredTransmission ?? null,
  budgetMin: toNullableNumber(row.budgetMin),
  budgetMax: toNullableNumber(row.budgetMax),
  offerPreference: row.offerPreference,
  loyaltyScore: Number(row.loyaltyScore),
  riskScore: Number(row.riskScore),
});

const repo: ClientRepository = {
  findById: async (id) => {
    const row = await models.Client.findByPk(id);
    return row ? toPartyProfile(row) : null;
  },

  findByEmail: async (email) => {
    const row = await models.Client.findOne({ where: { email } });
    return row ? toPartyProfile(row) : null;
  },

  create: async (data) => {
    const row = await models.Client.create({
      firstName: data.firstName,
      lastName: data.lastName,
      email: data.email,
      phone: data.phone ?? null,
      address: data.address ?? null,
      city: data.city ?? null,
      postalCode: data.postalCode ?? null,
      preferredFuel: data.preferredFuel ?? null,
      preferredTransmission: data.preferredTransmission ?? null,
      budgetMin: data.budgetMin ?? null,
      budgetMax: data.budgetMax ?? null,
      offerPreference: data.offerPreference,
      loyaltyScore: data.loyaltyScore,
      riskScore: data.riskScore,
    });
    return toPartyProfile(row);
  },
};

export default repo;
