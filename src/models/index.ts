import type { Model, ModelStatic } from 'sequelize';
import sequelize from '../config/database.js';

import vehicleModel, { VehicleModel } from './vehicle.js';
import clientModel, { ClientModel } from './client.js';
import marketDataModel, { MarketDataModel } from './marketData.js';
import negotiationModel, { NegotiationModel } from './negotiation.js';
import offerModel, { OfferModel } from './offer.js';
import negotiationRoundModel, { NegotiationRoundModel } from './negotiationRound.js';
import chatSessionModel, { ChatSessionModel } from './chatSession.js';

export interface Models {
  Vehicle: typeof VehicleModel;
  Client: typeof ClientModel;
  MarketData: typeof MarketDataModel;
  Negotiation: typeof NegotiationModel;
  Offer: typeof OfferModel;
  NegotiationRound: typeof NegotiationRoundModel;
  ChatSession: typeof ChatSessionModel;
}

const models: Models = {
  Vehicle: vehicleModel(sequelize),
  Client: clientModel(sequelize),
  MarketData: marketDataModel(sequelize),
  Negotiation: negotiationModel(sequelize),
  Offer: offerModel(sequelize),
  NegotiationRound: negotiationRoundModel(sequelize),
  ChatSession: chatSessionModel(sequelize),
};

const registry: Record<string, ModelStatic<Model>> = { ...models };

models.Vehicle.associate(registry);
models.Client.associate(registry);
models.Negotiation.associate(registry);
models.Offer.associate(registry);
models.NegotiationRound.associate(registry);

export {
  VehicleModel,
  ClientModel,
  MarketDataModel,
  NegotiationModel,
  OfferModel,
  NegotiationRoundModel,
  ChatSessionModel,
  sequelize,
};

export default models;
