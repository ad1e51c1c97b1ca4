// src/constants/wire-codes.ts

import { GaugeUnknownCodeError } from '../errors.js';

/**
 * Measurement unit
 */
export enum GaugeMeasureUnit {
  Newton = 'N',
  Kilograms = 'K',
}

/**
 * Measurement mode
 */
export enum GaugeMeasureMode {
  Realtime = 'T',
  Peak = 'P',
}

/**
 * Measurement status against the configured limit points
 */
export enum GaugeMeasureState {
  BelowLimit = 'L',
  Good = 'O',
  AboveLimit = 'H',
  Overload = 'E',
}

export type WireCodeTable = 'unit' | 'mode' | 'state';

function buildLookup<T extends string>(values: readonly T[]): ReadonlyMap<string, T> {
  return new Map(values.map((value): [string, T] => [value, value]));
}

const UNIT_BY_CODE = buildLookup(Object.values(GaugeMeasureUnit));
const MODE_BY_CODE = buildLookup(Object.values(GaugeMeasureMode));
const STATE_BY_CODE = buildLookup(Object.values(GaugeMeasureState));

function decode<T>(table: WireCodeTable, lookup: ReadonlyMap<string, T>, code: string): T {
  const value = lookup.get(code);
  if (value === undefined) {
    throw new GaugeUnknownCodeError(table, code);
  }
  return value;
}

export function decodeUnit(code: string): GaugeMeasureUnit {
  return decode('unit', UNIT_BY_CODE, code);
}

export function decodeMode(code: string): GaugeMeasureMode {
  return decode('mode', MODE_BY_CODE, code);
}

export function decodeState(code: string): GaugeMeasureState {
  return decode('state', STATE_BY_CODE, code);
}

export function encodeUnit(unit: GaugeMeasureUnit): string {
  return unit;
}

export function encodeMode(mode: GaugeMeasureMode): string {
  return mode;
}

export function encodeState(state: GaugeMeasureState): string {
  return state;
}
