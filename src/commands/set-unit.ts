// src/commands/set-unit.ts

import { GaugeMeasureUnit, encodeUnit } from '../constants/wire-codes.js';
import { parseAckResponse } from './acknowledge.js';

export function buildSetUnitRequest(unit: GaugeMeasureUnit): string {
  return encodeUnit(unit);
}

export function parseSetUnitResponse(unit: GaugeMeasureUnit, response: string): void {
  parseAckResponse(encodeUnit(unit), response, `set measure unit to ${unit}`);
}
