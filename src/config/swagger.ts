import swaggerJsdoc from 'swagger-jsdoc';
import env from './env.js';
import {
  fuelTypes,
  negotiationStatuses,
  offerKinds,
  offerPreferences,
  offerStatuses,
  roundStatuses,
  transmissions,
  vehicleConditions,
} from '../types/index.js';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'AutoDeal Negotiator API',
      version: '1.0.0',
      description: `
## AutoDeal Negotiator - Vehicle Trade-in Negotiation Engine

This API provides endpoints for:
- **Negotiation** - Multi-round negotiations with LLM-generated offers and strategy advice
- **Vehicles** - Dealership inventory and trade-in vehicles
- **Clients** - Customer profiles and their negotiation history
      `,
    },
    servers: [
      {
        url: `http://localhost:${env.port}`,
        description: 'Development server',
      },
    ],
    components: {
      schemas: {
        Error: {
          type: 'object',
          properties: {
            message: { type: 'string', example: 'Negotiation not found' },
            details: { type: 'array', items: { type: 'string' } },
            roundNumber: { type: 'integer', example: 3 },
          },
        },
        Vehicle: {
          type: 'object',
          properties: {
            id: { type: 'integer', example: 1 },
            vin: { type: 'string', example: 'WVWZZZ1KZAW000001' },
            registrationNumber: { type: 'string', example: 'AB-123-CD' },
            make: { type: 'string', example: 'Volkswagen' },
            model: { type: 'string', example: 'Golf' },
            year: { type: 'integer', example: 2019 },
            mileage: { type: 'integer', example: 62000 },
            fuelType: { type: 'string', enum: [...fuelTypes] },
            transmission: { type: 'string', enum: [...transmissions] },
            powerHp: { type: 'integer', example: 130 },
            condition: { type: 'string', enum: [...vehicleConditions] },
            currentMarketValue: { type: 'number', example: 17500 },
            estimatedTradeInValue: { type: 'number', nullable: true, example: 15000 },
            inStock: { type: 'boolean' },
          },
        },
        Client: {
          type: 'object',
          properties: {
            id: { type: 'integer', example: 1 },
            firstName: { type: 'string', example: 'Alex' },
            lastName: { type: 'string', example: 'Morgan' },
            email: { type: 'string', format: 'email' },
            offerPreference: { type: 'string', enum: [...offerPreferences] },
            budgetMin: { type: 'number', nullable: true },
            budgetMax: { type: 'number', nullable: true },
            loyaltyScore: { type: 'number', example: 0.6 },
            riskScore: { type: 'number', example: 0.2 },
          },
        },
        Negotiation: {
          type: 'object',
          properties: {
            id: { type: 'string', format: 'uuid' },
            clientId: { type: 'integer' },
            tradeInVehicleId: { type: 'integer', nullable: true },
            targetVehicleId: { type: 'integer', nullable: true },
            status: { type: 'string', enum: [...negotiationStatuses] },
            roundCounter: { type: 'integer', example: 2 },
            maxRounds: { type: 'integer', example: 10 },
            tradeInOfferedValue: { type: 'number', nullable: true },
            finalPrice: { type: 'number', nullable: true },
            marginAchieved: { type: 'number', nullable: true },
            chosenOfferKind: { type: 'string', enum: [...offerKinds], nullable: true },
            marketAnalysis: { type: 'object' },
            agentReasoning: { type: 'object' },
          },
        },
        Offer: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            kind: { type: 'string', enum: [...offerKinds] },
            purchasePrice: { type: 'number', nullable: true },
            monthlyPayment: { type: 'number', nullable: true },
            durationMonths: { type: 'integer', nullable: true, minimum: 1, maximum: 84 },
            totalCost: { type: 'number' },
            confidenceScore: { type: 'number', minimum: 0, maximum: 100 },
            status: { type: 'string', enum: [...offerStatuses] },
          },
        },
        RoundResult: {
          type: 'object',
          properties: {
            sessionId: { type: 'string', format: 'uuid' },
            roundNumber: { type: 'integer' },
            proposedOffer: { type: 'object' },
            offerId: { type: 'integer', nullable: true },
            roundStatus: { type: 'string', enum: [...roundStatuses], nullable: true },
            status: { type: 'string', enum: [...negotiationStatuses] },
            shouldContinue: { type: 'boolean' },
            confidence: { type: 'number' },
            exhausted: { type: 'boolean' },
            defaultedFields: { type: 'array', items: { type: 'string' } },
            reasoning: { type: 'string' },
          },
        },
      },
    },
    tags: [
      { name: 'Health', description: 'Service health' },
      { name: 'Negotiation', description: 'Negotiation sessions, rounds and offers' },
      { name: 'Vehicle', description: 'Inventory and trade-in vehicles' },
      { name: 'Client', description: 'Customer profiles' },
      { name: 'Chat', description: 'Advisory chat and quick price checks' },
    ],
  },
  apis: ['./src/modules/swagger.docs.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);

export default swaggerSpec;
