import { describe, test } from 'node:test';
import assert from 'node:assert';
import { ChunkType } from './chunk-type.js';
import { ChunkError, isChunkError } from './errors.js';

describe('ChunkType construction', () => {
  test('fromBytes keeps the raw bytes', () => {
    const type = ChunkType.fromBytes([82, 117, 83, 116]);
    assert.deepStrictEqual(Array.from(type.bytes()), [82, 117, 83, 116]);
  });

  test('fromBytes accepts a Uint8Array', () => {
    const type = ChunkType.fromBytes(new Uint8Array([73, 72, 68, 82]));
    assert.strictEqual(type.toString(), 'IHDR');
  });

  test('fromBytes accepts non-letter bytes', () => {
    const type = ChunkType.fromBytes([1, 2, 3, 4]);
    assert.strictEqual(type.isAlphanumericCode(), false);
    assert.strictEqual(type.isValid(), false);
  });

  test('fromBytes rejects input that is not four bytes', () => {
    assert.throws(
      () => ChunkType.fromBytes([82, 117, 83]),
      (err: unknown) => isChunkError(err, 'InvalidTypeCode')
    );
    assert.throws(
      () => ChunkType.fromBytes([82, 117, 83, 256]),
      (err: unknown) => isChunkError(err, 'InvalidTypeCode')
    );
  });

  test('fromString matches fromBytes', () => {
    const fromBytes = ChunkType.fromBytes([82, 117, 83, 116]);
    const fromString = ChunkType.fromString('RuSt');
    assert.ok(fromString.equals(fromBytes));
  });

  test('fromString rejects digits', () => {
    assert.throws(
      () => ChunkType.fromString('Ru1t'),
      (err: unknown) => {
        assert.ok(err instanceof ChunkError);
        assert.deepStrictEqual(err.detail, { kind: 'InvalidTypeCode', input: 'Ru1t' });
        return true;
      }
    );
  });

  test('fromString rejects wrong lengths', () => {
    assert.throws(() => ChunkType.fromString('Rus'), /Invalid chunk type code "Rus"/);
    assert.throws(() => ChunkType.fromString('RuStX'), /Invalid chunk type code "RuStX"/);
  });

  test('fromString rejects multi-byte characters that fill four bytes', () => {
    // 'ß' is two bytes in UTF-8
    assert.throws(
      () => ChunkType.fromString('Ruß'),
      (err: unknown) => isChunkError(err, 'InvalidTypeCode')
    );
  });

  test('fromString does not check the reserved bit', () => {
    const type = ChunkType.fromString('Rust');
    assert.strictEqual(type.isAlphanumericCode(), true);
    assert.strictEqual(type.isValid(), false);
  });

  test('bytes returns a copy', () => {
    const type = ChunkType.fromString('RuSt');
    const bytes = type.bytes();
    bytes[0] = 0;
    assert.strictEqual(type.toString(), 'RuSt');
  });
});

describe('ChunkType property bits', () => {
  test('RuSt has all documented flags', () => {
    const type = ChunkType.fromString('RuSt');
    assert.strictEqual(type.isCritical(), true);
    assert.strictEqual(type.isPublic(), false);
    assert.strictEqual(type.isReservedBitValid(), true);
    assert.strictEqual(type.isSafeToCopy(), true);
    assert.strictEqual(type.isValid(), true);
  });

  test('lowercase first letter is ancillary', () => {
    assert.strictEqual(ChunkType.fromString('ruSt').isCritical(), false);
  });

  test('uppercase second letter is public', () => {
    assert.strictEqual(ChunkType.fromString('RUSt').isPublic(), true);
  });

  test('lowercase third letter breaks the reserved bit', () => {
    assert.strictEqual(ChunkType.fromString('Rust').isReservedBitValid(), false);
  });

  test('uppercase fourth letter is unsafe to copy', () => {
    assert.strictEqual(ChunkType.fromString('RuST').isSafeToCopy(), false);
  });

  test('properties reports standard PNG types', () => {
    assert.deepStrictEqual(ChunkType.fromString('IHDR').properties(), {
      critical: true,
      public: true,
      reservedBitValid: true,
      safeToCopy: false
    });
    assert.deepStrictEqual(ChunkType.fromString('tEXt').properties(), {
      critical: false,
      public: true,
      reservedBitValid: true,
      safeToCopy: true
    });
  });

  test('isValidByte accepts only ASCII letters', () => {
    assert.strictEqual(ChunkType.isValidByte(65), true);
    assert.strictEqual(ChunkType.isValidByte(90), true);
    assert.strictEqual(ChunkType.isValidByte(97), true);
    assert.strictEqual(ChunkType.isValidByte(122), true);
    assert.strictEqual(ChunkType.isValidByte(64), false);
    assert.strictEqual(ChunkType.isValidByte(91), false);
    assert.strictEqual(ChunkType.isValidByte(96), false);
    assert.strictEqual(ChunkType.isValidByte(123), false);
    assert.strictEqual(ChunkType.isValidByte(49), false);
  });
});

describe('ChunkType rendering', () => {
  test('toString renders the letters', () => {
    assert.strictEqual(ChunkType.fromString('RuSt').toString(), 'RuSt');
    assert.strictEqual(`${ChunkType.fromString('IEND')}`, 'IEND');
  });

  test('toString fails for bytes that are not UTF-8', () => {
    const type = ChunkType.fromBytes([255, 0, 0, 0]);
    assert.throws(
      () => type.toString(),
      (err: unknown) => {
        assert.ok(err instanceof ChunkError);
        assert.deepStrictEqual(err.detail, { kind: 'TextRenderError', bytes: [255, 0, 0, 0] });
        return true;
      }
    );
  });

  test('toDebugString renders any bytes', () => {
    assert.strictEqual(ChunkType.fromBytes([255, 65, 66, 67]).toDebugString(), 'ÿABC');
  });

  test('equals compares bytes', () => {
    assert.strictEqual(ChunkType.fromString('RuSt').equals(ChunkType.fromString('RuSt')), true);
    assert.strictEqual(ChunkType.fromString('RuSt').equals(ChunkType.fromString('RuST')), false);
  });
});
