// src/commands/power-off.ts

import { COMMANDS } from '../constants/constants.js';

/**
 * Builds the power off command. The gauge sends no reply to it.
 */
export function buildPowerOffRequest(): string {
  return COMMANDS.POWER_OFF;
}
