// src/transport/factory.ts

import Logger from '../logger.js';
import { GAUGE_PROFILES } from '../constants/constants.js';
import { GaugeConfigError } from '../errors.js';
import { GaugeEmulator } from '../gauge-emulator/gauge-emulator.js';
import { NodeSerialTransport } from './node-transports/node-serialport.js';
import { EmulatorTransport } from './emulator-transport.js';
import type { GaugeProfile, SerialPortFactory, Transport } from '../types/gauge-types.js';

const loggerInstance = new Logger();
const logger = loggerInstance.createLogger('TransportFactory');
logger.setLevel('warn');

export interface NodeTransportFactoryOptions {
  path: string;
  profile?: GaugeProfile;
  maxBufferSize?: number;
  portFactory?: SerialPortFactory;
}

export interface EmulatorTransportFactoryOptions {
  emulator: GaugeEmulator;
  profile?: GaugeProfile;
}

/**
 * Creates a transport configured from a profile.
 *
 * @param type - `'node'` for a serial port (serialport under the hood),
 *   `'emulator'` for an in-process {@link GaugeEmulator}.
 * @param options - Port path or emulator, and the profile (USB by default).
 * @throws {GaugeConfigError} If the options are invalid.
 */
export function createTransport(type: 'node', options: NodeTransportFactoryOptions): Transport;
export function createTransport(
  type: 'emulator',
  options: EmulatorTransportFactoryOptions
): Transport;
export function createTransport(
  type: 'node' | 'emulator',
  options: NodeTransportFactoryOptions | EmulatorTransportFactoryOptions
): Transport {
  const profile = options.profile ?? GAUGE_PROFILES.USB;

  if (type === 'node' && 'path' in options) {
    if (!options.path) {
      throw new GaugeConfigError('Missing "path" option for node transport');
    }
    logger.debug(`Creating NodeSerialTransport with ${profile.name} profile`, {
      path: options.path,
    });
    return new NodeSerialTransport(
      options.path,
      {
        baudRate: profile.baudRate,
        rtscts: profile.rtscts,
        readTimeout: profile.readTimeout,
        ...(options.maxBufferSize !== undefined ? { maxBufferSize: options.maxBufferSize } : {}),
      },
      options.portFactory
    );
  }

  if (type === 'emulator' && 'emulator' in options) {
    logger.debug(`Creating EmulatorTransport with ${profile.name} profile`);
    return new EmulatorTransport(options.emulator, { readTimeout: profile.readTimeout });
  }

  throw new GaugeConfigError(`Invalid options for transport of type "${type}"`);
}
