// src/commands/acknowledge.ts

import { ACK_TOKEN } from '../constants/constants.js';
import { GaugeAckMismatchError } from '../errors.js';

/**
 * Checks the reply of an action command
 * @param command - Command that was sent
 * @param response - Trimmed reply
 * @param action - Human readable action, used in the error message
 * @throws GaugeAckMismatchError If the reply is not the `R` token
 */
export function parseAckResponse(command: string, response: string, action?: string): void {
  if (response !== ACK_TOKEN) {
    throw new GaugeAckMismatchError(command, response, action);
  }
}
