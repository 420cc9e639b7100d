import logger from '../../config/logger.js';
import type { NegotiationSession, PartyProfile } from '../../types/index.js';
import { ConflictError, NotFoundError, ValidationError } from '../../utils/custom-error.js';
import type { NegotiationRepository } from '../negotiation/negotiation.repo.js';
import type { ClientRepository, NewClient } from './client.repo.js';

export interface ClientService {
  createClient(data: NewClient): Promise<PartyProfile>;
  getClient(id: number): Promise<PartyProfile>;
  listNegotiations(clientId: number): Promise<NegotiationSession[]>;
}

export function createClientService(
  clients: ClientRepository,
  negotiations: NegotiationRepository
): ClientService {
  const getClient = async (id: number): Promise<PartyProfile> => {
    const client = await clients.findById(id);
    if (!client) {
      throw new NotFoundError(`Client ${id} not found`);
    }
    return client;
  };

  return {
    createClient: async (data) => {
      if (
        data.budgetMin !== undefined &&
        data.budgetMin !== null &&
        data.budgetMax !== undefined &&
        data.budgetMax !== null &&
        data.budgetMin > data.budgetMax
      ) {
        throw new ValidationError('budgetMin cannot exceed budgetMax');
      }
      if (await clients.findByEmail(data.email)) {
        throw new ConflictError(`A client with email ${data.email} already exists`);
      }
      const client = await clients.create(data);
      logger.info('[Client] Created', { clientId: client.id });
      return client;
    },

    getClient,

    listNegotiations: async (clientId) => {
      await getClient(clientId);
      return negotiations.listByClient(clientId);
    },
  };
}
