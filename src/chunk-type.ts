import { ChunkError } from './errors.js';
import { bytesToString, isAsciiLetter, stringToBytes } from './utils.js';
import type { ChunkTypeProperties } from './types.js';

/**
 * Bit 5 of each type byte (the ASCII case bit) carries one chunk property
 */
const PROPERTY_BIT = 0x20;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * A 4-byte chunk type code such as `IHDR` or `ruSt`
 *
 * The case of each letter encodes a property:
 * - byte 0: uppercase = critical, lowercase = ancillary
 * - byte 1: uppercase = public, lowercase = private
 * - byte 2: must be uppercase (reserved)
 * - byte 3: lowercase = safe to copy
 */
export class ChunkType {
  private readonly code: Uint8Array;

  private constructor(code: Uint8Array) {
    this.code = code;
  }

  /**
   * Wrap four raw bytes. Content is not checked, so any byte values are accepted.
   */
  static fromBytes(bytes: ArrayLike<number>): ChunkType {
    if (bytes.length !== 4) {
      throw new ChunkError({ kind: 'InvalidTypeCode', input: Array.from(bytes).join(',') });
    }
    const code = new Uint8Array(4);
    for (let i = 0; i < 4; i++) {
      const byte = bytes[i];
      if (!Number.isInteger(byte) || byte < 0 || byte > 255) {
        throw new ChunkError({ kind: 'InvalidTypeCode', input: Array.from(bytes).join(',') });
      }
      code[i] = byte;
    }
    return new ChunkType(code);
  }

  /**
   * Parse a 4-letter type code. Only the alphabet is checked, not the reserved bit.
   */
  static fromString(text: string): ChunkType {
    const bytes = stringToBytes(text);
    if (bytes.length !== 4 || !bytes.every(ChunkType.isValidByte)) {
      throw new ChunkError({ kind: 'InvalidTypeCode', input: text });
    }
    return new ChunkType(bytes);
  }

  /** Check whether a byte is an ASCII letter */
  static isValidByte(byte: number): boolean {
    return isAsciiLetter(byte);
  }

  /** Copy of the raw 4-byte code */
  bytes(): Uint8Array {
    return this.code.slice();
  }

  /** True if every byte is an ASCII letter */
  isAlphanumericCode(): boolean {
    return this.code.every(ChunkType.isValidByte);
  }

  /** True if the code is all letters and the reserved bit is clear */
  isValid(): boolean {
    return this.isAlphanumericCode() && this.isReservedBitValid();
  }

  /** Ancillary bit (byte 0) clear */
  isCritical(): boolean {
    return (this.code[0] & PROPERTY_BIT) === 0;
  }

  /** Private bit (byte 1) clear */
  isPublic(): boolean {
    return (this.code[1] & PROPERTY_BIT) === 0;
  }

  /** Reserved bit (byte 2) clear */
  isReservedBitValid(): boolean {
    return (this.code[2] & PROPERTY_BIT) === 0;
  }

  /** Safe-to-copy bit (byte 3) set */
  isSafeToCopy(): boolean {
    return (this.code[3] & PROPERTY_BIT) !== 0;
  }

  /** All four property flags */
  properties(): ChunkTypeProperties {
    return {
      critical: this.isCritical(),
      public: this.isPublic(),
      reservedBitValid: this.isReservedBitValid(),
      safeToCopy: this.isSafeToCopy()
    };
  }

  /** Byte-wise equality */
  equals(other: ChunkType): boolean {
    return this.code.every((byte, i) => byte === other.code[i]);
  }

  /**
   * Render the code as text. Fails for codes built from bytes that are not UTF-8.
   */
  toString(): string {
    try {
      return utf8Decoder.decode(this.code);
    } catch {
      throw new ChunkError({ kind: 'TextRenderError', bytes: Array.from(this.code) });
    }
  }

  /**
   * Lossless rendering for diagnostics, never throws
   */
  toDebugString(): string {
    return bytesToString(this.code);
  }
}
