// src/commands/measure.ts

import { Decimal } from 'decimal.js';
import { COMMANDS } from '../constants/constants.js';
import { decodeMode, decodeState, decodeUnit } from '../constants/wire-codes.js';
import { GaugeParseError, GaugeUnknownCodeError } from '../errors.js';
import { GaugeMeasure } from '../types/gauge-types.js';

/**
 * `<sign><digits>.<digits><unit><mode><state>`, e.g. `+001.23NTO`
 */
const MEASURE_PATTERN = /^([+-])([0-9]+\.[0-9]+)([A-Z])([A-Z])([A-Z])$/;

export function buildMeasureRequest(): string {
  return COMMANDS.MEASURE;
}

/**
 * Parses the reply to a `D` request
 * @param response - Trimmed reply
 * @throws GaugeParseError If the reply does not match the record grammar or holds an unknown code
 */
export function parseMeasureResponse(response: string): GaugeMeasure {
  const match = MEASURE_PATTERN.exec(response);
  if (!match) {
    throw new GaugeParseError(response);
  }

  const [, sign, digits, unitCode, modeCode, stateCode] = match;
  if (
    sign === undefined ||
    digits === undefined ||
    unitCode === undefined ||
    modeCode === undefined ||
    stateCode === undefined
  ) {
    throw new GaugeParseError(response);
  }

  try {
    const magnitude = new Decimal(digits);
    return Object.freeze({
      value: sign === '-' ? magnitude.negated() : magnitude,
      unit: decodeUnit(unitCode),
      mode: decodeMode(modeCode),
      state: decodeState(stateCode),
    });
  } catch (err: unknown) {
    if (err instanceof GaugeUnknownCodeError) {
      throw new GaugeParseError(response, { cause: err });
    }
    throw err;
  }
}
