import { LineFramer } from './line-framer';

describe('LineFramer', () => {
  const framer = new LineFramer();

  test('appends a single CR', () => {
    expect(Array.from(framer.buildFrame('OC1'))).toEqual([0x4f, 0x43, 0x31, 0x0d]);
  });

  test('refuses non ASCII commands', () => {
    expect(() => framer.buildFrame('Zé')).toThrow(RangeError);
  });

  test('trims the received line', () => {
    const line = framer.parseFrame(Buffer.from(' R\r', 'latin1'));
    expect(line).toEqual({ text: 'R', raw: ' R\r', terminated: true });
  });

  test('flags a line without terminator', () => {
    expect(framer.parseFrame(Buffer.from('+001', 'latin1'))).toEqual({
      text: '+001',
      raw: '+001',
      terminated: false,
    });
    expect(framer.parseFrame(new Uint8Array(0)).terminated).toBe(false);
  });
});
