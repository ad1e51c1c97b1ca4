// src/index.ts

import Logger from './logger.js';

export { GaugeProtocol } from './protocol.js';
export { GaugeSession, withGaugeSession } from './session.js';
export { findDevices } from './discovery.js';
export type { ListPorts } from './discovery.js';
export { GaugeEmulator } from './gauge-emulator/gauge-emulator.js';
export { EmulatorTransport } from './transport/emulator-transport.js';
export {
  NodeSerialTransport,
  defaultSerialPortFactory,
} from './transport/node-transports/node-serialport.js';
export { createTransport } from './transport/factory.js';
export type {
  NodeTransportFactoryOptions,
  EmulatorTransportFactoryOptions,
} from './transport/factory.js';
export { Diagnostics } from './utils/diagnostics.js';
export { formatLimitValue } from './commands/set-limit-points.js';
export { parseMeasureResponse } from './commands/measure.js';
export {
  GaugeMeasureUnit,
  GaugeMeasureMode,
  GaugeMeasureState,
  decodeUnit,
  decodeMode,
  decodeState,
  encodeUnit,
  encodeMode,
  encodeState,
} from './constants/wire-codes.js';
export type { WireCodeTable } from './constants/wire-codes.js';
export {
  GAUGE_PROFILES,
  BANNER_LINE,
  COMMANDS,
  GAUGE_USB_VENDOR_ID,
  GAUGE_USB_PRODUCT_IDS,
} from './constants/constants.js';
export * from './errors.js';
export type * from './types/gauge-types.js';

export { Logger };
