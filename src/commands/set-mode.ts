// src/commands/set-mode.ts

import { GaugeMeasureMode, encodeMode } from '../constants/wire-codes.js';
import { parseAckResponse } from './acknowledge.js';

export function buildSetModeRequest(mode: GaugeMeasureMode): string {
  return encodeMode(mode);
}

export function parseSetModeResponse(mode: GaugeMeasureMode, response: string): void {
  parseAckResponse(encodeMode(mode), response, `set measure mode to ${mode}`);
}
