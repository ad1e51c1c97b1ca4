// src/discovery.ts

import { SerialPort } from 'serialport';
import {
  GAUGE_DEFAULT_DESCRIPTION,
  GAUGE_USB_PRODUCT_IDS,
  GAUGE_USB_VENDOR_ID,
} from './constants/constants.js';
import { GaugeDeviceInfo, SerialPortInfo } from './types/gauge-types.js';

export type ListPorts = () => Promise<SerialPortInfo[]>;

function parseUsbId(id: string | undefined): number | null {
  if (!id || !/^(0x)?[0-9a-f]{1,4}$/i.test(id)) return null;
  return parseInt(id.replace(/^0x/i, ''), 16);
}

function isGauge(port: SerialPortInfo): boolean {
  const vendorId = parseUsbId(port.vendorId);
  const productId = parseUsbId(port.productId);
  return (
    vendorId === GAUGE_USB_VENDOR_ID && productId !== null && GAUGE_USB_PRODUCT_IDS.has(productId)
  );
}

/**
 * Lists the serial ports a DST/DSV gauge is plugged into.
 * @param listPorts - Port enumeration, `SerialPort.list` by default
 */
export async function findDevices(
  listPorts: ListPorts = () => SerialPort.list()
): Promise<GaugeDeviceInfo[]> {
  const ports = await listPorts();
  return ports.filter(isGauge).map(port => ({
    path: port.path,
    description: port.manufacturer || port.pnpId || GAUGE_DEFAULT_DESCRIPTION,
  }));
}
