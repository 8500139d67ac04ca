/**
 * PNG Chunk Codec
 *
 * Encode, decode and validate the chunk records that make up PNG-style
 * containers: a 4-byte length, a 4-byte type code, the chunk data and a
 * CRC-32 over type + data.
 *
 * @example
 * import { Chunk, ChunkType } from 'png-chunk-codec';
 *
 * const chunk = new Chunk(ChunkType.fromString('ruSt'), new TextEncoder().encode('hello'));
 * const bytes = chunk.toBytes();
 * const parsed = Chunk.fromBytes(bytes);
 */

export { Chunk } from './chunk.js';
export { ChunkType } from './chunk-type.js';
export { ChunkError, isChunkError } from './errors.js';
export type { ChunkErrorDetail, ChunkErrorKind } from './errors.js';
export * from './types.js';
export {
  crc32,
  readUInt32BE,
  readUInt32LE,
  writeUInt32BE
} from './utils.js';
