// src/commands/set-limit-points.ts

import { Decimal } from 'decimal.js';
import { COMMANDS } from '../constants/constants.js';
import { parseAckResponse } from './acknowledge.js';

const LIMIT_DECIMALS = 2;

/**
 * Fixed-point field of the limit command: two decimals, half-even rounding, no plus sign.
 */
export function formatLimitValue(value: Decimal.Value): string {
  const decimal = new Decimal(value);
  if (!decimal.isFinite()) {
    throw new RangeError(`Limit value must be finite, got ${String(value)}`);
  }
  return decimal.toFixed(LIMIT_DECIMALS, Decimal.ROUND_HALF_EVEN);
}

/**
 * Builds the limit points command. The high limit field goes first, then the low one.
 * @throws RangeError If a value is not finite or low is above high
 */
export function buildSetLimitPointsRequest(low: Decimal.Value, high: Decimal.Value): string {
  const lowField = formatLimitValue(low);
  const highField = formatLimitValue(high);
  if (new Decimal(lowField).greaterThan(highField)) {
    throw new RangeError(`Low limit ${lowField} is above high limit ${highField}`);
  }
  return `${COMMANDS.LIMIT_POINTS}${highField}${lowField}`;
}

export function parseSetLimitPointsResponse(command: string, response: string): void {
  parseAckResponse(command, response, 'set high/low limit values');
}
