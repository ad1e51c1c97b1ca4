// src/commands/memory.ts

import { COMMANDS } from '../constants/constants.js';
import { parseAckResponse } from './acknowledge.js';

export function buildStoreRequest(): string {
  return COMMANDS.STORE;
}

export function parseStoreResponse(response: string): void {
  parseAckResponse(COMMANDS.STORE, response, 'save measure in internal memory');
}

export function buildClearLastRequest(): string {
  return COMMANDS.CLEAR_LAST;
}

export function parseClearLastResponse(response: string): void {
  parseAckResponse(COMMANDS.CLEAR_LAST, response, 'clear last measure in memory');
}

export function buildClearAllRequest(): string {
  return COMMANDS.CLEAR_ALL;
}

export function parseClearAllResponse(response: string): void {
  parseAckResponse(COMMANDS.CLEAR_ALL, response, 'clear stored measures');
}
