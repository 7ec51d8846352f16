/**
 * Unit-scaled block size used by file uploads.
 *
 * Units are decimal SI (factor 1000). Conversions truncate toward zero, so
 * `BlockSize.bytes(1500).toKilobytes()` is `1K`, and converting back gives
 * `1000B`.
 */

import { FairOSError } from '../errors';

/** Unit suffix as used on the wire. */
export type BlockSizeUnit = 'B' | 'K' | 'M' | 'G' | 'T';

const UNIT_FACTORS: Record<BlockSizeUnit, bigint> = {
  B: 1n,
  K: 1_000n,
  M: 1_000_000n,
  G: 1_000_000_000n,
  T: 1_000_000_000_000n,
};

/** Largest units first, for picking the unit of a raw byte count. */
const UNITS_DESCENDING: BlockSizeUnit[] = ['T', 'G', 'M', 'K', 'B'];

const U32_MAX = 0xffff_ffff;

function assertU32(value: number, param: string): void {
  if (!Number.isInteger(value) || value < 0 || value > U32_MAX) {
    throw FairOSError.validation(`${param} must be an unsigned 32-bit integer, got ${value}`, param);
  }
}

export class BlockSize {
  private constructor(
    readonly unit: BlockSizeUnit,
    readonly magnitude: number
  ) {}

  static of(unit: BlockSizeUnit, magnitude: number): BlockSize {
    assertU32(magnitude, 'magnitude');
    return new BlockSize(unit, magnitude);
  }

  static bytes(n: number): BlockSize {
    return BlockSize.of('B', n);
  }

  static kilobytes(n: number): BlockSize {
    return BlockSize.of('K', n);
  }

  static megabytes(n: number): BlockSize {
    return BlockSize.of('M', n);
  }

  static gigabytes(n: number): BlockSize {
    return BlockSize.of('G', n);
  }

  static terabytes(n: number): BlockSize {
    return BlockSize.of('T', n);
  }

  /**
   * Parses the wire form, e.g. `"512K"`.
   */
  static parse(value: string): BlockSize {
    const match = /^(\d+)([BKMGT])$/.exec(value);
    if (!match || match[1] === undefined || match[2] === undefined) {
      throw FairOSError.validation(`Invalid block size: "${value}"`, 'blockSize');
    }
    return BlockSize.of(toUnit(match[2]), Number(match[1]));
  }

  /**
   * Expresses a raw byte count in the largest unit not exceeding it.
   */
  static fromBytes(n: number | bigint): BlockSize {
    if (typeof n === 'number' && !Number.isSafeInteger(n)) {
      throw FairOSError.validation(`Byte count must be a safe integer, got ${n}`, 'bytes');
    }
    const bytes = typeof n === 'bigint' ? n : BigInt(n);
    if (bytes < 0n) {
      throw FairOSError.validation(`Byte count cannot be negative, got ${bytes}`, 'bytes');
    }
    for (const unit of UNITS_DESCENDING) {
      if (bytes >= UNIT_FACTORS[unit]) {
        return BlockSize.fromTotal(bytes, unit);
      }
    }
    return new BlockSize('B', 0);
  }

  /** Size in bytes, without truncation. */
  totalBytes(): bigint {
    return BigInt(this.magnitude) * UNIT_FACTORS[this.unit];
  }

  toBytes(): BlockSize {
    return this.convert('B');
  }

  toKilobytes(): BlockSize {
    return this.convert('K');
  }

  toMegabytes(): BlockSize {
    return this.convert('M');
  }

  toGigabytes(): BlockSize {
    return this.convert('G');
  }

  toTerabytes(): BlockSize {
    return this.convert('T');
  }

  equals(other: BlockSize): boolean {
    return this.unit === other.unit && this.magnitude === other.magnitude;
  }

  toString(): string {
    return `${this.magnitude}${this.unit}`;
  }

  toJSON(): string {
    return this.toString();
  }

  private convert(unit: BlockSizeUnit): BlockSize {
    return BlockSize.fromTotal(this.totalBytes(), unit);
  }

  private static fromTotal(bytes: bigint, unit: BlockSizeUnit): BlockSize {
    const magnitude = bytes / UNIT_FACTORS[unit];
    if (magnitude > BigInt(U32_MAX)) {
      throw FairOSError.validation(
        `${bytes} bytes does not fit a 32-bit magnitude in unit ${unit}`,
        'blockSize'
      );
    }
    return new BlockSize(unit, Number(magnitude));
  }
}

function toUnit(suffix: string): BlockSizeUnit {
  switch (suffix) {
    case 'B':
    case 'K':
    case 'M':
    case 'G':
    case 'T':
      return suffix;
    default:
      throw FairOSError.validation(`Unknown block size unit: "${suffix}"`, 'blockSize');
  }
}
