/**
 * Structured failure details, one variant per way a chunk operation can fail
 */
export type ChunkErrorDetail =
  | { kind: 'InvalidTypeCode'; input: string }
  | { kind: 'BufferTooShort'; minimum: number; actual: number }
  | { kind: 'LengthMismatch'; expected: number; actual: number }
  | { kind: 'ChecksumMismatch'; expected: number; actual: number }
  | { kind: 'TextDecodeError'; byteLength: number }
  | { kind: 'TextRenderError'; bytes: number[] };

export type ChunkErrorKind = ChunkErrorDetail['kind'];

function describe(detail: ChunkErrorDetail): string {
  switch (detail.kind) {
    case 'InvalidTypeCode':
      return `Invalid chunk type code ${JSON.stringify(detail.input)}: expected exactly 4 ASCII letters`;
    case 'BufferTooShort':
      return `Chunk buffer too short: need at least ${detail.minimum} bytes, got ${detail.actual}`;
    case 'LengthMismatch':
      return `Chunk length mismatch: declared ${detail.expected}, data has ${detail.actual} bytes`;
    case 'ChecksumMismatch':
      return `Chunk CRC mismatch: declared ${detail.expected}, computed ${detail.actual}`;
    case 'TextDecodeError':
      return `Chunk data (${detail.byteLength} bytes) is not valid UTF-8`;
    case 'TextRenderError':
      return `Chunk type bytes [${detail.bytes.join(', ')}] are not valid UTF-8`;
  }
}

/**
 * Thrown by every fallible chunk operation
 */
export class ChunkError extends Error {
  readonly detail: ChunkErrorDetail;

  constructor(detail: ChunkErrorDetail) {
    super(describe(detail));
    this.name = 'ChunkError';
    this.detail = detail;
  }

  get kind(): ChunkErrorKind {
    return this.detail.kind;
  }
}

export function isChunkError(err: unknown, kind?: ChunkErrorKind): err is ChunkError {
  return err instanceof ChunkError && (kind === undefined || err.kind === kind);
}
