import { findDevices } from './discovery';
import { SerialPortInfo } from './types/gauge-types';

describe('findDevices', () => {
  const ports: SerialPortInfo[] = [
    { path: '/dev/ttyUSB0', vendorId: '1412', productId: '0200', manufacturer: 'IMADA' },
    { path: '/dev/ttyUSB1', vendorId: '0403', productId: '6001', manufacturer: 'FTDI' },
    { path: 'COM3', vendorId: '1412', productId: '0201' },
    { path: '/dev/ttyS0' },
    { path: 'COM4', vendorId: '0x1412', productId: '0X0200', pnpId: 'USB\\VID_1412' },
    { path: '/dev/ttyUSB2', vendorId: '1412', productId: '200' },
    { path: '/dev/ttyUSB3', vendorId: 'zz', productId: '0200' },
  ];

  test('keeps ports with the gauge vendor and product ids', async () => {
    await expect(findDevices(async () => ports)).resolves.toEqual([
      { path: '/dev/ttyUSB0', description: 'IMADA' },
      { path: 'COM4', description: 'USB\\VID_1412' },
      { path: '/dev/ttyUSB2', description: 'IMADA DST/DSV' },
    ]);
  });

  test('returns nothing when no gauge is plugged in', async () => {
    await expect(findDevices(async () => [{ path: '/dev/ttyS0' }])).resolves.toEqual([]);
  });

  test('propagates enumeration failures', async () => {
    await expect(
      findDevices(async () => {
        throw new Error('udev unavailable');
      })
    ).rejects.toThrow('udev unavailable');
  });
});
