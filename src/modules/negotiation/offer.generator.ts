import logger from '../../config/logger.js';
import type { OfferSelectionPolicy } from '../../config/env.js';
import {
  MAX_DURATION_MONTHS,
  MIN_DURATION_MONTHS,
  financedOfferKinds,
  offerKinds,
  type OfferKind,
  type OfferPreference,
  type OfferProposal,
  type ProposedTerms,
} from '../../types/index.js';
import type { CompletionFn } from '../../services/llm.service.js';
import { PreconditionError } from '../../utils/custom-error.js';
import {
  clamp,
  optionalBoolean,
  optionalNumber,
  optionalString,
  parseListPayload,
  roundTo,
  type JsonRecord,
} from '../../utils/llmPayload.js';
import { withTimeout } from '../../utils/withTimeout.js';
import type { ProposalRequest } from './negotiation.types.js';

const DEFAULT_WARRANTY_MONTHS = 12;
const DEFAULT_CONFIDENCE = 50;

const KIND_GUIDANCE: Record<OfferKind, string> = {
  purchase: 'an outright purchase: set "purchase_price" and "total_cost"; leave monthly fields null',
  long_term_lease:
    'a long-term lease: set "monthly_payment" and "duration_months" (12-60); "purchase_price" must be null',
  subscription:
    'an all-inclusive subscription: set "monthly_payment" and "duration_months" (1-24); "purchase_price" must be null',
};

const GENERATOR_PROMPT = `You are the pricing desk of a car dealership preparing commercial offers.
Balance the dealership margin target against customer satisfaction.
Reply with JSON only, one object:
{"purchase_price": <number|null>, "monthly_payment": <number|null>, "duration_months": <integer|null>, "total_cost": <number>,
 "warranty_months": <integer>, "maintenance_included": <bool>, "roadside_assistance": <bool>, "insurance_included": <bool>,
 "justification": "<why this offer fits the customer>", "confidence_score": <0-100>}`;

export interface OfferProposalGenerator {
  /** Never rejects; kinds that yield nothing usable are left out. */
  generateOfferProposals(request: ProposalRequest): Promise<OfferProposal[]>;
}

export const isFinancedKind = (kind: OfferKind): boolean => financedOfferKinds.includes(kind);

export const kindsForPreference = (preference: OfferPreference): OfferKind[] =>
  preference === 'flexible' ? [...offerKinds] : [preference];

/**
 * Rejects requests an offer cannot be built from.
 */
export function assertProposalRequest(request: ProposalRequest): void {
  if (request.kinds.length === 0) {
    throw new PreconditionError('At least one offer kind must be requested');
  }
  if (request.budget.min > request.budget.max) {
    throw new PreconditionError(
      `Budget range is empty: minimum ${request.budget.min} exceeds maximum ${request.budget.max}`
    );
  }
  if (request.tradeInValue < 0) {
    throw new PreconditionError('Trade-in value cannot be negative');
  }
}

/**
 * Checks the per-kind term invariants of a proposal.
 */
export function satisfiesOfferInvariants(proposal: OfferProposal): boolean {
  if (proposal.totalCost < 0) return false;
  if (proposal.confidenceScore < 0 || proposal.confidenceScore > 100) return false;

  if (isFinancedKind(proposal.kind)) {
    return (
      proposal.purchasePrice === null &&
      proposal.monthlyPayment !== null &&
      proposal.monthlyPayment >= 0 &&
      proposal.durationMonths !== null &&
      Number.isInteger(proposal.durationMonths) &&
      proposal.durationMonths >= MIN_DURATION_MONTHS &&
      proposal.durationMonths <= MAX_DURATION_MONTHS
    );
  }

  return (
    proposal.purchasePrice !== null &&
    proposal.purchasePrice >= 0 &&
    proposal.monthlyPayment === null &&
    proposal.durationMonths === null
  );
}

const nonNegative = (value: number | undefined): number | undefined =>
  value !== undefined && value >= 0 ? value : undefined;

/**
 * Turns one model-produced object into a proposal of `kind`, or null when
 * the terms that kind needs are missing or out of range.
 */
export function normalizeProposal(
  kind: OfferKind,
  data: JsonRecord,
  request: Pick<ProposalRequest, 'vehicleId' | 'tradeInValue'>
): OfferProposal | null {
  const financed = isFinancedKind(kind);

  let purchasePrice: number | null = null;
  let monthlyPayment: number | null = null;
  let durationMonths: number | null = null;
  let computedTotal: number;

  if (financed) {
    const monthly = nonNegative(optionalNumber(data.monthly_payment));
    const duration = optionalNumber(data.duration_months);
    if (monthly === undefined || duration === undefined) return null;

    const months = Math.round(duration);
    if (months < MIN_DURATION_MONTHS || months > MAX_DURATION_MONTHS) return null;

    monthlyPayment = roundTo(monthly);
    durationMonths = months;
    computedTotal = roundTo(monthly * months);
  } else {
    const price = nonNegative(optionalNumber(data.purchase_price));
    if (price === undefined) return null;

    purchasePrice = roundTo(price);
    computedTotal = purchasePrice;
  }

  const totalCost = nonNegative(optionalNumber(data.total_cost));

  const proposal: OfferProposal = {
    kind,
    vehicleId: request.vehicleId,
    tradeInValue: request.tradeInValue,
    purchasePrice,
    monthlyPayment,
    durationMonths,
    totalCost: totalCost !== undefined ? roundTo(totalCost) : computedTotal,
    warrantyMonths: Math.max(
      0,
      Math.round(optionalNumber(data.warranty_months) ?? DEFAULT_WARRANTY_MONTHS)
    ),
    maintenanceIncluded: optionalBoolean(data.maintenance_included) ?? false,
    roadsideAssistance: optionalBoolean(data.roadside_assistance) ?? false,
    insuranceIncluded: optionalBoolean(data.insurance_included) ?? false,
    justification: optionalString(data.justification) ?? '',
    confidenceScore: clamp(optionalNumber(data.confidence_score) ?? DEFAULT_CONFIDENCE, 0, 100),
    status: 'proposed',
  };

  return satisfiesOfferInvariants(proposal) ? proposal : null;
}

const COMPARED_TERMS: ReadonlyArray<keyof OfferProposal> = [
  'kind',
  'tradeInValue',
  'purchasePrice',
  'monthlyPayment',
  'durationMonths',
  'totalCost',
  'warrantyMonths',
  'maintenanceIncluded',
  'roadsideAssistance',
  'insuranceIncluded',
];

const hasPriceTerms = (terms: ProposedTerms): boolean =>
  terms.purchasePrice !== undefined ||
  terms.monthlyPayment !== undefined ||
  terms.durationMonths !== undefined ||
  terms.kind !== undefined;

/**
 * Applies advisor terms over an existing offer. Returns null when nothing
 * changes or the result breaks the offer invariants.
 */
export function applyProposedTerms(base: OfferProposal, terms: ProposedTerms): OfferProposal | null {
  const kind = terms.kind ?? base.kind;
  const financed = isFinancedKind(kind);

  const purchasePrice = financed ? null : terms.purchasePrice ?? base.purchasePrice;
  const monthlyPayment = financed ? terms.monthlyPayment ?? base.monthlyPayment : null;
  const durationMonths = financed ? terms.durationMonths ?? base.durationMonths : null;

  let totalCost = terms.totalCost ?? base.totalCost;
  if (terms.totalCost === undefined && hasPriceTerms(terms)) {
    if (financed && monthlyPayment !== null && durationMonths !== null) {
      totalCost = roundTo(monthlyPayment * durationMonths);
    } else if (!financed && purchasePrice !== null) {
      totalCost = purchasePrice;
    }
  }

  const merged: OfferProposal = {
    kind,
    vehicleId: base.vehicleId,
    tradeInValue: terms.tradeInValue ?? base.tradeInValue,
    purchasePrice,
    monthlyPayment,
    durationMonths,
    totalCost,
    warrantyMonths: terms.warrantyMonths ?? base.warrantyMonths,
    maintenanceIncluded: terms.maintenanceIncluded ?? base.maintenanceIncluded,
    roadsideAssistance: terms.roadsideAssistance ?? base.roadsideAssistance,
    insuranceIncluded: terms.insuranceIncluded ?? base.insuranceIncluded,
    justification: base.justification,
    confidenceScore: base.confidenceScore,
    status: 'proposed',
  };

  if (!COMPARED_TERMS.some((field) => merged[field] !== base[field])) return null;

  return satisfiesOfferInvariants(merged) ? merged : null;
}

/**
 * `first` keeps generation order; `highest_confidence` takes the maximum
 * score, earlier proposals winning ties.
 */
export function selectBestProposal(
  proposals: readonly OfferProposal[],
  policy: OfferSelectionPolicy
): OfferProposal | undefined {
  if (policy === 'first') return proposals[0];

  let best: OfferProposal | undefined;
  for (const proposal of proposals) {
    if (!best || proposal.confidenceScore > best.confidenceScore) {
      best = proposal;
    }
  }
  return best;
}

const buildUserPrompt = (request: ProposalRequest, kind: OfferKind): string => {
  const { vehicle, budget, objectives } = request;
  return [
    `Prepare ${KIND_GUIDANCE[kind]}.`,
    `Vehicle: ${vehicle.year} ${vehicle.make} ${vehicle.model}, ${vehicle.mileage} km, ${vehicle.fuelType}, ` +
      `${vehicle.powerHp} hp, condition ${vehicle.condition}.`,
    `Market value: ${vehicle.currentMarketValue}; retail price: ${roundTo(vehicle.currentMarketValue * 1.2)}.`,
    `Trade-in value credited to the customer: ${request.tradeInValue}.`,
    `Customer budget: ${budget.min} - ${budget.max}.`,
    `Target margin: ${roundTo(objectives.targetMargin * 100)}%; satisfaction priority: ${objectives.satisfactionPriority}.`,
  ].join('\n');
};

export function createOfferProposalGenerator(complete: CompletionFn, timeoutMs: number): OfferProposalGenerator {
  const generateForKind = async (request: ProposalRequest, kind: OfferKind): Promise<OfferProposal | null> => {
    try {
      const text = await withTimeout(
        complete(
          [
            { role: 'system', content: GENERATOR_PROMPT },
            { role: 'user', content: buildUserPrompt(request, kind) },
          ],
          { temperature: 0.4 }
        ),
        timeoutMs,
        `Offer generation (${kind})`
      );

      const payload = parseListPayload(text);
      switch (payload.kind) {
        case 'structured': {
          for (const item of payload.data) {
            const proposal = normalizeProposal(kind, item, request);
            if (proposal) return proposal;
          }
          logger.warn('[OfferGenerator] No usable terms in model output', { kind });
          return null;
        }
        case 'raw':
          logger.warn('[OfferGenerator] Unstructured model output skipped', {
            kind,
            preview: payload.text.slice(0, 200),
          });
          return null;
      }
    } catch (error) {
      logger.warn('[OfferGenerator] Generation failed', {
        kind,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  };

  return {
    generateOfferProposals: async (request) => {
      if (request.kinds.length === 0 || request.budget.min > request.budget.max) {
        return [];
      }

      const results = await Promise.all(request.kinds.map((kind) => generateForKind(request, kind)));
      const proposals = results.filter((p): p is OfferProposal => p !== null);

      logger.info('[OfferGenerator] Proposals generated', {
        requested: request.kinds,
        produced: proposals.map((p) => p.kind),
      });
      return proposals;
    },
  };
}
