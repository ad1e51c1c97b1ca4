// src/framers/line-framer.ts

import { COMMAND_TERMINATOR } from '../constants/constants.js';
import { concatUint8Arrays, decodeAscii, encodeAscii } from '../utils/utils.js';

export interface DecodedLine {
  /** Line text, surrounding whitespace removed */
  text: string;
  /** Raw text as received, terminator included */
  raw: string;
  /** Whether the terminator was received */
  terminated: boolean;
}

/**
 * Frames commands as ASCII text followed by a single CR.
 */
export class LineFramer {
  constructor(private readonly terminator: number = COMMAND_TERMINATOR) {}

  public get terminatorByte(): number {
    return this.terminator;
  }

  public buildFrame(command: string): Uint8Array {
    return concatUint8Arrays([encodeAscii(command), new Uint8Array([this.terminator])]);
  }

  public parseFrame(bytes: Uint8Array): DecodedLine {
    const raw = decodeAscii(bytes);
    return {
      text: raw.trim(),
      raw,
      terminated: bytes.length > 0 && bytes[bytes.length - 1] === this.terminator,
    };
  }
}
