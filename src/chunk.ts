import { ChunkType } from './chunk-type.js';
import { ChunkError } from './errors.js';
import { CHUNK_OVERHEAD } from './types.js';
import type { ByteOrderMode, ChunkParseOptions, ChunkParseResult } from './types.js';
import { crc32, readUInt32BE, readUInt32LE, writeUInt32BE } from './utils.js';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Which reading of a declared 32-bit field matched the actual value
 */
type FieldMatch = 'big-endian' | 'little-endian' | null;

function matchField(actual: number, buffer: Uint8Array, offset: number, byteOrder: ByteOrderMode): FieldMatch {
  if (actual === readUInt32BE(buffer, offset)) {
    return 'big-endian';
  }
  if (byteOrder === 'lenient' && actual === readUInt32LE(buffer, offset)) {
    return 'little-endian';
  }
  return null;
}

/**
 * A PNG chunk: a type code and its data
 *
 * Length and CRC are derived from the type and data on demand.
 */
export class Chunk {
  private readonly type: ChunkType;
  private readonly payload: Uint8Array;

  /**
   * Build a chunk without validating the type code
   */
  constructor(type: ChunkType, data: Uint8Array) {
    this.type = type;
    this.payload = new Uint8Array(data);
  }

  /**
   * Compute the CRC of a chunk (covers type + data, not the length field)
   */
  static computeCrc(type: ChunkType, data: Uint8Array): number {
    const crcData = new Uint8Array(4 + data.length);
    crcData.set(type.bytes(), 0);
    crcData.set(data, 4);
    return crc32(crcData);
  }

  /**
   * Parse a single serialized chunk, verifying its length and CRC.
   *
   * The buffer must hold exactly one chunk: everything between the type code
   * and the trailing 4 CRC bytes is taken as data.
   */
  static fromBytes(buffer: Uint8Array, options: ChunkParseOptions = {}): Chunk {
    const byteOrder = options.byteOrder ?? 'lenient';
    const logger = options.logger ?? console.warn;

    if (buffer.length < CHUNK_OVERHEAD) {
      throw new ChunkError({ kind: 'BufferTooShort', minimum: CHUNK_OVERHEAD, actual: buffer.length });
    }

    const crcOffset = buffer.length - 4;
    const type = ChunkType.fromBytes(buffer.subarray(4, 8));
    const data = buffer.subarray(8, crcOffset);

    const lengthMatch = matchField(data.length, buffer, 0, byteOrder);
    if (lengthMatch === null) {
      throw new ChunkError({
        kind: 'LengthMismatch',
        expected: readUInt32BE(buffer, 0),
        actual: data.length
      });
    }

    const crc = Chunk.computeCrc(type, data);
    const crcMatch = matchField(crc, buffer, crcOffset, byteOrder);
    if (crcMatch === null) {
      throw new ChunkError({
        kind: 'ChecksumMismatch',
        expected: readUInt32BE(buffer, crcOffset),
        actual: crc
      });
    }

    if (lengthMatch === 'little-endian') {
      logger(`Chunk ${type.toDebugString()}: length field accepted as little-endian`);
    }
    if (crcMatch === 'little-endian') {
      logger(`Chunk ${type.toDebugString()}: CRC field accepted as little-endian`);
    }

    return new Chunk(type, data);
  }

  /**
   * Same as `fromBytes`, but reports failure as a value instead of throwing
   */
  static tryFromBytes(buffer: Uint8Array, options: ChunkParseOptions = {}): ChunkParseResult {
    try {
      return { ok: true, chunk: Chunk.fromBytes(buffer, options) };
    } catch (err) {
      if (err instanceof ChunkError) {
        return { ok: false, error: err };
      }
      throw err;
    }
  }

  /** Number of data bytes */
  length(): number {
    return this.payload.length >>> 0;
  }

  /** The chunk's type code */
  chunkType(): ChunkType {
    return this.type;
  }

  /** Copy of the chunk data */
  data(): Uint8Array {
    return this.payload.slice();
  }

  /** CRC-32 over type + data */
  crc(): number {
    return Chunk.computeCrc(this.type, this.payload);
  }

  /**
   * Decode the chunk data as UTF-8 text
   */
  dataAsString(): string {
    try {
      return utf8Decoder.decode(this.payload);
    } catch {
      throw new ChunkError({ kind: 'TextDecodeError', byteLength: this.payload.length });
    }
  }

  /**
   * Serialize to length(4, BE) + type(4) + data + crc(4, BE)
   */
  toBytes(): Uint8Array {
    const length = this.length();
    const buffer = new Uint8Array(CHUNK_OVERHEAD + length);
    let offset = 0;

    writeUInt32BE(buffer, length, offset);
    offset += 4;

    buffer.set(this.type.bytes(), offset);
    offset += 4;

    buffer.set(this.payload, offset);
    offset += length;

    writeUInt32BE(buffer, this.crc(), offset);

    return buffer;
  }

  /**
   * Multi-line summary for diagnostics
   */
  toString(): string {
    const typeBytes = Array.from(this.type.bytes()).join(', ');
    return [
      'Chunk {',
      `    Length: ${this.length()}`,
      `    Type code: "${this.type.toDebugString()}" ([${typeBytes}])`,
      `    Data: ${this.payload.length} bytes`,
      `    CRC: ${this.crc()}`,
      '}'
    ].join('\n');
  }
}
