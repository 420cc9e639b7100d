/**
 * @swagger
 * /api/health:
 *   get:
 *     summary: Liveness check
 *     tags: [Health]
 *     responses:
 *       200:
 *         description: Service is up
 */

// ==================== NEGOTIATION ====================

/**
 * @swagger
 * /api/negotiation/initiate:
 *   post:
 *     summary: Start a negotiation for a client
 *     description: Picks an in-stock target vehicle when none is given and values the trade-in against market data.
 *     tags: [Negotiation]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [clientId]
 *             properties:
 *               clientId: { type: integer }
 *               tradeInVehicleId: { type: integer, nullable: true }
 *               targetVehicleId: { type: integer, nullable: true }
 *               marginTarget: { type: number, minimum: 0, maximum: 1 }
 *     responses:
 *       201:
 *         description: Negotiation in progress
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 message: { type: string }
 *                 data: { $ref: '#/components/schemas/Negotiation' }
 *       404:
 *         description: Client or vehicle not found
 */

/**
 * @swagger
 * /api/negotiation/{id}:
 *   get:
 *     summary: Negotiation with its offers and rounds
 *     tags: [Negotiation]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200:
 *         description: Negotiation details
 *       404:
 *         description: Negotiation not found
 */

/**
 * @swagger
 * /api/negotiation/{id}/rounds:
 *   post:
 *     summary: Run one negotiation round against customer feedback
 *     tags: [Negotiation]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [feedback]
 *             properties:
 *               feedback: { type: string }
 *               counterProposal: { type: object, nullable: true }
 *     responses:
 *       200:
 *         description: Round result
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 message: { type: string }
 *                 data: { $ref: '#/components/schemas/RoundResult' }
 *       422:
 *         description: Session not accepting rounds or no offer can be built
 *       500:
 *         description: Round not committed
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Error' }
 */

/**
 * @swagger
 * /api/negotiation/{id}/history:
 *   get:
 *     summary: Round records in order
 *     tags: [Negotiation]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200:
 *         description: Round history
 */

/**
 * @swagger
 * /api/negotiation/{id}/analysis:
 *   get:
 *     summary: Outcome summary of a negotiation
 *     tags: [Negotiation]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200:
 *         description: Analysis
 */

/**
 * @swagger
 * /api/negotiation/{id}/cancel:
 *   post:
 *     summary: Cancel an open negotiation
 *     tags: [Negotiation]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     requestBody:
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               reason: { type: string }
 *     responses:
 *       200:
 *         description: Negotiation cancelled
 *       422:
 *         description: Negotiation already concluded or failed
 */

/**
 * @swagger
 * /api/negotiation/offers/{offerId}/accept:
 *   post:
 *     summary: Accept an offer and conclude its negotiation
 *     tags: [Negotiation]
 *     parameters:
 *       - in: path
 *         name: offerId
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200:
 *         description: Offer accepted
 */

/**
 * @swagger
 * /api/negotiation/offers/{offerId}/reject:
 *   post:
 *     summary: Reject an offer
 *     tags: [Negotiation]
 *     parameters:
 *       - in: path
 *         name: offerId
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200:
 *         description: Offer rejected
 */

// ==================== VEHICLE ====================

/**
 * @swagger
 * /api/vehicle:
 *   post:
 *     summary: Register a vehicle
 *     tags: [Vehicle]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/Vehicle' }
 *     responses:
 *       201:
 *         description: Vehicle created
 *       409:
 *         description: VIN already registered
 * /api/vehicle/in-stock:
 *   get:
 *     summary: In-stock vehicles, newest first
 *     tags: [Vehicle]
 *     responses:
 *       200:
 *         description: Vehicles
 * /api/vehicle/search:
 *   post:
 *     summary: Search in-stock vehicles
 *     tags: [Vehicle]
 *     requestBody:
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               fuelType: { type: string }
 *               transmission: { type: string }
 *               budgetMin: { type: number }
 *               budgetMax: { type: number }
 *     responses:
 *       200:
 *         description: Matching vehicles
 * /api/vehicle/{id}:
 *   get:
 *     summary: Get a vehicle
 *     tags: [Vehicle]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200:
 *         description: Vehicle
 *       404:
 *         description: Vehicle not found
 */

// ==================== CLIENT ====================

/**
 * @swagger
 * /api/client:
 *   post:
 *     summary: Create a client
 *     tags: [Client]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/Client' }
 *     responses:
 *       201:
 *         description: Client created
 *       409:
 *         description: Email already registered
 * /api/client/{id}:
 *   get:
 *     summary: Get a client
 *     tags: [Client]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200:
 *         description: Client
 * /api/client/{id}/negotiations:
 *   get:
 *     summary: Negotiations of a client, newest first
 *     tags: [Client]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200:
 *         description: Negotiations
 */

// ==================== CHAT ====================

/**
 * @swagger
 * /api/chat/messages:
 *   post:
 *     summary: Ask the sales assistant a question
 *     description: The reply is degraded, not an error, when the model is unavailable.
 *     tags: [Chat]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [message]
 *             properties:
 *               message: { type: string, maxLength: 5000 }
 *               sessionId: { type: string, pattern: '^[A-Za-z0-9_-]+$', maxLength: 64 }
 *     responses:
 *       200:
 *         description: Assistant reply with the session id to continue with
 *       400:
 *         description: Validation error
 * /api/chat/price:
 *   post:
 *     summary: Check a proposed price against the vehicle's fair range
 *     description: Fair range is market value ±10%; the counter-offer is its midpoint.
 *     tags: [Chat]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [vehicleId, proposedPrice]
 *             properties:
 *               vehicleId: { type: integer }
 *               proposedPrice: { type: number, minimum: 0, exclusiveMinimum: true }
 *               sessionId: { type: string }
 *     responses:
 *       200:
 *         description: Fair range, counter-offer and recommendation
 *       404:
 *         description: Vehicle not found
 * /api/chat/sessions/{sessionId}:
 *   delete:
 *     summary: Clear a chat session's history
 *     tags: [Chat]
 *     parameters:
 *       - in: path
 *         name: sessionId
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: Session cleared
 */

export {};
