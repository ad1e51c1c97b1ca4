// src/session.ts

import Logger from './logger.js';
import { GAUGE_PROFILES } from './constants/constants.js';
import { GaugeProtocol } from './protocol.js';
import { createTransport } from './transport/factory.js';
import { GaugeProfile, GaugeSessionOptions, Transport } from './types/gauge-types.js';

const loggerInstance = new Logger();
loggerInstance.setLogFormat(['timestamp', 'level', 'logger', 'path']);
const logger = loggerInstance.createLogger('GaugeSession');
logger.setLevel('info');

/**
 * An open link to one gauge. Owns the transport; the protocol handler only borrows it.
 */
class GaugeSession {
  readonly path: string;
  readonly profile: GaugeProfile;
  readonly protocol: GaugeProtocol;
  readonly banner: string;
  private readonly transport: Transport;
  private _closed: boolean = false;

  private constructor(
    path: string,
    profile: GaugeProfile,
    transport: Transport,
    protocol: GaugeProtocol,
    banner: string
  ) {
    this.path = path;
    this.profile = profile;
    this.transport = transport;
    this.protocol = protocol;
    this.banner = banner;
  }

  /**
   * Opens the port and reads the start line, so the returned protocol is ready for commands.
   * @param path - Serial device, e.g. `/dev/ttyUSB0` or `COM3`
   * @param profile - Link settings, USB by default
   */
  static async open(
    path: string,
    profile: GaugeProfile = GAUGE_PROFILES.USB,
    options: GaugeSessionOptions = {}
  ): Promise<GaugeSession> {
    const transport = options.transportFactory
      ? options.transportFactory(path, profile)
      : createTransport('node', { path, profile });

    await transport.connect();

    try {
      const protocol = new GaugeProtocol(transport, {
        readTimeout: options.readTimeout ?? profile.readTimeout,
        ...(options.diagnostics !== undefined ? { diagnostics: options.diagnostics } : {}),
      });
      const banner = await protocol.readStartLine();
      logger.info(`Session opened (${profile.name}), start line ${JSON.stringify(banner)}`, {
        path,
      });
      return new GaugeSession(path, profile, transport, protocol, banner);
    } catch (err: unknown) {
      if (err instanceof Error) {
        logger.error(`Failed to open session: ${err.message}`, { path });
      }
      try {
        await transport.disconnect();
      } catch (closeErr: unknown) {
        // the open failure is the one the caller sees
        if (closeErr instanceof Error) {
          logger.warn(`Failed to close transport: ${closeErr.message}`, { path });
        }
      }
      throw err;
    }
  }

  get isOpen(): boolean {
    return !this._closed && this.transport.isOpen;
  }

  /**
   * Detaches the protocol handler and closes the port. Once the port is closed, calling it
   * again does nothing; after a failed close it retries.
   */
  async close(): Promise<void> {
    if (this._closed) return;
    this.protocol.detach();
    await this.transport.disconnect();
    this._closed = true;
    logger.info('Session closed', { path: this.path });
  }
}

/**
 * Runs `fn` against an open gauge and closes the session on every exit path.
 * @returns What `fn` returns
 */
async function withGaugeSession<T>(
  path: string,
  profile: GaugeProfile,
  fn: (protocol: GaugeProtocol) => Promise<T>,
  options: GaugeSessionOptions = {}
): Promise<T> {
  const session = await GaugeSession.open(path, profile, options);
  let result: T;
  try {
    result = await fn(session.protocol);
  } catch (err: unknown) {
    try {
      await session.close();
    } catch (closeErr: unknown) {
      // the callback's error is the one the caller sees
      if (closeErr instanceof Error) {
        logger.warn(`Failed to close session: ${closeErr.message}`, { path });
      }
    }
    throw err;
  }
  await session.close();
  return result;
}

export { GaugeSession, withGaugeSession };
