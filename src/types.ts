import type { ChunkError } from './errors.js';
import type { Chunk } from './chunk.js';

/**
 * Property flags carried by the case bits of a chunk type code
 */
export interface ChunkTypeProperties {
  critical: boolean;
  public: boolean;
  reservedBitValid: boolean;
  safeToCopy: boolean;
}

/**
 * How the length and CRC fields of a chunk are read
 * - 'strict': big-endian only, as written by `Chunk.toBytes()`
 * - 'lenient': a big-endian or little-endian match is accepted
 */
export type ByteOrderMode = 'strict' | 'lenient';

/**
 * Configuration for chunk parsing
 */
export interface ChunkParseOptions {
  /**
   * Byte order accepted for the length and CRC fields.
   *
   * Default: 'lenient'
   */
  byteOrder?: ByteOrderMode;

  /**
   * Receives a warning whenever lenient parsing accepts a field only through
   * its little-endian reading.
   *
   * Default: console.warn
   */
  logger?: (message: string) => void;
}

/**
 * Outcome of `Chunk.tryFromBytes`
 */
export type ChunkParseResult =
  | { ok: true; chunk: Chunk }
  | { ok: false; error: ChunkError };

/**
 * Minimum size of a serialized chunk: length(4) + type(4) + crc(4)
 */
export const CHUNK_OVERHEAD = 12;
