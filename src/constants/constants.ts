// src/constants/constants.ts

import { GaugeProfile } from '../types/gauge-types.js';

/**
 * Byte that terminates every frame, in both directions (CR).
 */
export const COMMAND_TERMINATOR = 0x0d;

/**
 * Command strings understood by the gauge
 */
export const COMMANDS = {
  ZERO: 'Z',
  MEASURE: 'D',
  LIMIT_POINTS: 'E',
  STORE: 'OM',
  CLEAR_LAST: 'OC0',
  CLEAR_ALL: 'OC1',
  POWER_OFF: 'Q',
} as const;

/**
 * Reply tokens
 */
export const ACK_TOKEN = 'R';
export const REJECT_TOKEN = 'E';

/**
 * Greeting sent by the gauge once the link is up
 */
export const BANNER_LINE = 'Gauge Started.';

/**
 * Transport presets. Both connection types share the protocol; only the link settings differ.
 */
export const GAUGE_PROFILES = {
  USB: Object.freeze<GaugeProfile>({
    name: 'usb',
    baudRate: 256000,
    rtscts: true,
    readTimeout: 100,
  }),
  RS232C: Object.freeze<GaugeProfile>({
    name: 'rs232c',
    baudRate: 19200,
    rtscts: false,
    readTimeout: 100,
  }),
} as const;

/**
 * USB identifiers of the DST/DSV series
 */
export const GAUGE_USB_VENDOR_ID = 0x1412;
export const GAUGE_USB_PRODUCT_IDS: ReadonlySet<number> = new Set([0x0200]);
export const GAUGE_DEFAULT_DESCRIPTION = 'IMADA DST/DSV';
