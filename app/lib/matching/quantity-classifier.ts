/**
 * Quantity Classifier
 *
 * Pure function from (available, requested) to an outcome label.
 * Priority:
 *   1. available missing/blank/zero → NoShipment
 *   2. requested missing/unparseable → NoShipment
 *   3. available == requested       → Ok (exact, no tolerance)
 *   4. available <  requested       → OverShipment
 *   5. available >  requested       → LessShipment
 *
 * Over Shipment: the target asks for more than the source made available.
 * Less Shipment: the source made more available than the target asks for.
 */

import { isQuantityAbsent } from '../normalization';
import {
  STRATEGY_DESCRIPTORS,
  type ClassifiedOutcome,
  type Outcome,
  type Quantity,
  type StrategyName,
} from '../types';

export function classifyQuantity(
  available: Quantity,
  requested: Quantity,
  strategy: StrategyName
): ClassifiedOutcome {
  if (available === null || isQuantityAbsent(available)) {
    return { kind: 'NoShipment', strategy };
  }

  if (requested === null || Number.isNaN(requested)) {
    return { kind: 'NoShipment', strategy };
  }

  if (available === requested) {
    return { kind: 'Ok', strategy };
  }

  return {
    kind: available < requested ? 'OverShipment' : 'LessShipment',
    strategy,
    available,
    requested,
  };
}

/** Quantities print at full precision, exactly as compared. */
export function formatQuantity(quantity: number): string {
  return String(quantity);
}

/**
 * Human-readable status written next to each target row.
 *
 * Examples:
 * - "Ok (PO Match)"
 * - "No Shipment (Job+PO Match)"
 * - "Over Shipment (PO Match: 120 vs 150)"
 * - "Less Shipment (Style+Color: 80 vs 50)"
 * - "No Match Found"
 */
export function formatOutcomeStatus(outcome: Outcome): string {
  switch (outcome.kind) {
    case 'NoMatchFound':
      return 'No Match Found';
    case 'NoMatchBuyer':
      return 'No Match Found (Buyer-Specific)';
    case 'Ok':
      return `Ok (${STRATEGY_DESCRIPTORS[outcome.strategy].matchLabel})`;
    case 'NoShipment':
      return `No Shipment (${STRATEGY_DESCRIPTORS[outcome.strategy].matchLabel})`;
    case 'OverShipment':
    case 'LessShipment': {
      const label = outcome.kind === 'OverShipment' ? 'Over Shipment' : 'Less Shipment';
      const strategy = STRATEGY_DESCRIPTORS[outcome.strategy].mismatchLabel;
      return `${label} (${strategy}: ${formatQuantity(outcome.available)} vs ${formatQuantity(outcome.requested)})`;
    }
  }
}
