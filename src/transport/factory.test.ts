import { SerialPortMock } from 'serialport';
import { createTransport } from './factory';
import { EmulatorTransport } from './emulator-transport';
import { NodeSerialTransport } from './node-transports/node-serialport';
import { GaugeEmulator } from '../gauge-emulator/gauge-emulator';
import { GAUGE_PROFILES } from '../constants/constants';
import { GaugeConfigError } from '../errors';
import { SerialPortFactoryOptions } from '../types/gauge-types';

describe('createTransport', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    SerialPortMock.binding.reset();
    jest.restoreAllMocks();
  });

  test('builds a serial transport from the profile', async () => {
    SerialPortMock.binding.createPort('COM3', { echo: false, record: false });
    const opened: SerialPortFactoryOptions[] = [];
    const transport = createTransport('node', {
      path: 'COM3',
      profile: GAUGE_PROFILES.RS232C,
      portFactory: options => {
        opened.push(options);
        return new SerialPortMock({ ...options, autoOpen: false });
      },
    });
    expect(transport).toBeInstanceOf(NodeSerialTransport);
    await transport.connect();
    expect(opened[0]?.baudRate).toBe(19200);
    expect(opened[0]?.rtscts).toBe(false);
    await transport.disconnect();
  });

  test('uses the USB profile by default', async () => {
    SerialPortMock.binding.createPort('/dev/ttyUSB0', { echo: false, record: false });
    const opened: SerialPortFactoryOptions[] = [];
    const transport = createTransport('node', {
      path: '/dev/ttyUSB0',
      portFactory: options => {
        opened.push(options);
        return new SerialPortMock({ ...options, autoOpen: false });
      },
    });
    await transport.connect();
    expect(opened[0]?.baudRate).toBe(256000);
    expect(opened[0]?.rtscts).toBe(true);
    await transport.disconnect();
  });

  test('requires a path', () => {
    expect(() => createTransport('node', { path: '' })).toThrow(GaugeConfigError);
  });

  test('builds an emulator transport', () => {
    const transport = createTransport('emulator', { emulator: new GaugeEmulator() });
    expect(transport).toBeInstanceOf(EmulatorTransport);
    expect(transport.isOpen).toBe(false);
  });
});
