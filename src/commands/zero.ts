// src/commands/zero.ts

import { COMMANDS } from '../constants/constants.js';
import { parseAckResponse } from './acknowledge.js';

export function buildZeroRequest(): string {
  return COMMANDS.ZERO;
}

export function parseZeroResponse(response: string): void {
  parseAckResponse(COMMANDS.ZERO, response, 'reset the measure');
}
