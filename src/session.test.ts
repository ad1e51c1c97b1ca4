import { GaugeSession, withGaugeSession } from './session';
import { GaugeEmulator } from './gauge-emulator/gauge-emulator';
import { EmulatorTransport } from './transport/emulator-transport';
import { GAUGE_PROFILES } from './constants/constants';
import { GaugeStateError, TransportError } from './errors';
import { GaugeProfile, GaugeSessionOptions } from './types/gauge-types';

describe('GaugeSession', () => {
  let emulator: GaugeEmulator;
  let transports: EmulatorTransport[];
  let profiles: GaugeProfile[];
  let options: GaugeSessionOptions;

  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    emulator = new GaugeEmulator();
    transports = [];
    profiles = [];
    options = {
      transportFactory: (_path, profile) => {
        const transport = new EmulatorTransport(emulator, { readTimeout: profile.readTimeout });
        transports.push(transport);
        profiles.push(profile);
        return transport;
      },
    };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('opens ready for commands', async () => {
    const session = await GaugeSession.open('/dev/ttyUSB0', GAUGE_PROFILES.USB, options);
    expect(session.banner).toBe('Gauge Started.');
    expect(session.isOpen).toBe(true);
    expect(session.protocol.state).toBe('ready');
    expect(session.path).toBe('/dev/ttyUSB0');
    await expect(session.protocol.measure()).resolves.toBeDefined();
    await session.close();
  });

  test('uses the USB profile by default', async () => {
    const session = await GaugeSession.open('/dev/ttyUSB0', undefined, options);
    expect(session.profile).toBe(GAUGE_PROFILES.USB);
    expect(profiles).toEqual([GAUGE_PROFILES.USB]);
    await session.close();
  });

  test('hands the RS232C profile to the transport', async () => {
    const session = await GaugeSession.open('COM3', GAUGE_PROFILES.RS232C, options);
    expect(profiles).toEqual([GAUGE_PROFILES.RS232C]);
    expect(session.profile.baudRate).toBe(19200);
    await session.close();
  });

  test('reads the start line before writing anything', async () => {
    const session = await GaugeSession.open('/dev/ttyUSB0', GAUGE_PROFILES.USB, options);
    expect(emulator.receivedCommands).toEqual([]);
    await session.protocol.zero();
    expect(emulator.receivedCommands).toEqual(['Z']);
    await session.close();
  });

  test('close detaches the protocol and is idempotent', async () => {
    const session = await GaugeSession.open('/dev/ttyUSB0', GAUGE_PROFILES.USB, options);
    await session.close();
    expect(session.isOpen).toBe(false);
    expect(transports[0]?.isOpen).toBe(false);
    await expect(session.protocol.measure()).rejects.toThrow(GaugeStateError);
    await expect(session.close()).resolves.toBeUndefined();
  });

  test('closes the transport when the start line cannot be read', async () => {
    const failing: GaugeSessionOptions = {
      transportFactory: (_path, profile) => {
        const transport = new EmulatorTransport(emulator, { readTimeout: profile.readTimeout });
        jest.spyOn(transport, 'readUntil').mockRejectedValue(new TransportError('link lost'));
        transports.push(transport);
        return transport;
      },
    };
    await expect(GaugeSession.open('/dev/ttyUSB0', GAUGE_PROFILES.USB, failing)).rejects.toThrow(
      'link lost'
    );
    expect(transports[0]?.isOpen).toBe(false);
  });

  test('the open failure wins over a failing cleanup', async () => {
    const failing: GaugeSessionOptions = {
      transportFactory: (_path, profile) => {
        const transport = new EmulatorTransport(emulator, { readTimeout: profile.readTimeout });
        jest.spyOn(transport, 'readUntil').mockRejectedValue(new TransportError('link lost'));
        jest.spyOn(transport, 'disconnect').mockRejectedValue(new TransportError('stuck'));
        return transport;
      },
    };
    await expect(GaugeSession.open('/dev/ttyUSB0', GAUGE_PROFILES.USB, failing)).rejects.toThrow(
      'link lost'
    );
  });

  test('a failed close can be retried', async () => {
    const session = await GaugeSession.open('/dev/ttyUSB0', GAUGE_PROFILES.USB, options);
    const transport = transports[0];
    if (!transport) throw new Error('no transport was created');
    jest.spyOn(transport, 'disconnect').mockRejectedValueOnce(new TransportError('stuck'));

    await expect(session.close()).rejects.toThrow('stuck');
    expect(session.isOpen).toBe(true);

    await session.close();
    expect(session.isOpen).toBe(false);
    expect(transport.isOpen).toBe(false);
  });

  describe('withGaugeSession', () => {
    test('returns the callback result and closes', async () => {
      emulator.setForce('4.5');
      const value = await withGaugeSession(
        '/dev/ttyUSB0',
        GAUGE_PROFILES.USB,
        async protocol => (await protocol.measure()).value.toFixed(2),
        options
      );
      expect(value).toBe('4.50');
      expect(transports[0]?.isOpen).toBe(false);
    });

    test('closes when the callback throws', async () => {
      await expect(
        withGaugeSession(
          '/dev/ttyUSB0',
          GAUGE_PROFILES.USB,
          async () => {
            throw new Error('boom');
          },
          options
        )
      ).rejects.toThrow('boom');
      expect(transports[0]?.isOpen).toBe(false);
    });

    test('the callback error wins over a close error', async () => {
      const closeFails: GaugeSessionOptions = {
        transportFactory: (_path, profile) => {
          const transport = new EmulatorTransport(emulator, { readTimeout: profile.readTimeout });
          jest.spyOn(transport, 'disconnect').mockRejectedValue(new TransportError('stuck'));
          return transport;
        },
      };
      await expect(
        withGaugeSession(
          '/dev/ttyUSB0',
          GAUGE_PROFILES.USB,
          async () => {
            throw new Error('boom');
          },
          closeFails
        )
      ).rejects.toThrow('boom');
    });

    test('a close error surfaces when the callback succeeds', async () => {
      const closeFails: GaugeSessionOptions = {
        transportFactory: (_path, profile) => {
          const transport = new EmulatorTransport(emulator, { readTimeout: profile.readTimeout });
          jest.spyOn(transport, 'disconnect').mockRejectedValue(new TransportError('stuck'));
          return transport;
        },
      };
      await expect(
        withGaugeSession('/dev/ttyUSB0', GAUGE_PROFILES.USB, async () => 1, closeFails)
      ).rejects.toThrow('stuck');
    });
  });
});
