import {
  buildSetLimitPointsRequest,
  formatLimitValue,
  parseSetLimitPointsResponse,
} from './set-limit-points';
import { parseZeroResponse } from './zero';
import { parseSetModeResponse } from './set-mode';
import { parseClearAllResponse } from './memory';
import { GaugeMeasureMode } from '../constants/wire-codes';
import { GaugeAckMismatchError } from '../errors';

describe('limit points command', () => {
  test('formats values with two decimals', () => {
    expect(formatLimitValue(10)).toBe('10.00');
    expect(formatLimitValue('3.5')).toBe('3.50');
    expect(formatLimitValue(-3)).toBe('-3.00');
  });

  test('rounds half to even', () => {
    expect(formatLimitValue('2.675')).toBe('2.68');
    expect(formatLimitValue('2.665')).toBe('2.66');
    expect(formatLimitValue('1.005')).toBe('1.00');
  });

  test('rejects values that are not finite', () => {
    expect(() => formatLimitValue(Number.NaN)).toThrow(RangeError);
    expect(() => formatLimitValue(Number.POSITIVE_INFINITY)).toThrow(RangeError);
  });

  test('puts the high field first', () => {
    expect(buildSetLimitPointsRequest(10, 20)).toBe('E20.0010.00');
    expect(buildSetLimitPointsRequest('-1.5', '2.25')).toBe('E2.25-1.50');
  });

  test('accepts equal limits', () => {
    expect(buildSetLimitPointsRequest(5, 5)).toBe('E5.005.00');
  });

  test('rejects a low limit above the high one', () => {
    expect(() => buildSetLimitPointsRequest(5, 3)).toThrow(
      'Low limit 5.00 is above high limit 3.00'
    );
  });

  test('acknowledgement other than R is a mismatch', () => {
    expect(() => parseSetLimitPointsResponse('E20.0010.00', 'R')).not.toThrow();
    expect(() => parseSetLimitPointsResponse('E20.0010.00', 'X')).toThrow(
      'Cannot set high/low limit values, got response: "X"'
    );
  });
});

describe('acknowledged commands', () => {
  test('mismatch error names the command and the reply', () => {
    try {
      parseZeroResponse('+001.00NTO');
      throw new Error('parseZeroResponse should have thrown');
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(GaugeAckMismatchError);
      if (err instanceof GaugeAckMismatchError) {
        expect(err.command).toBe('Z');
        expect(err.response).toBe('+001.00NTO');
        expect(err.message).toBe('Cannot reset the measure, got response: "+001.00NTO"');
      }
    }
  });

  test('messages describe the action', () => {
    expect(() => parseSetModeResponse(GaugeMeasureMode.Peak, '')).toThrow(
      'Cannot set measure mode to P, got response: ""'
    );
    expect(() => parseClearAllResponse('?')).toThrow(
      'Cannot clear stored measures, got response: "?"'
    );
  });
});
