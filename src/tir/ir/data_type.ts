/**
 * Scalar and vector data types carried by every IR node
 */

/**
 * Type codes
 */
export enum TypeCode {
  Int = "int",
  UInt = "uint",
  Float = "float",
  Bool = "bool",
  Handle = "handle",
}

const DTYPE_PATTERN = /^(int|uint|float|bool|handle)(\d+)?(?:x(\d+))?$/;

const DEFAULT_BITS: Record<TypeCode, number | null> = {
  [TypeCode.Int]: null,
  [TypeCode.UInt]: null,
  [TypeCode.Float]: null,
  [TypeCode.Bool]: 1,
  [TypeCode.Handle]: 64,
};

const parseTypeCode = (text: string): TypeCode | null => {
  switch (text) {
    case "int":
      return TypeCode.Int;
    case "uint":
      return TypeCode.UInt;
    case "float":
      return TypeCode.Float;
    case "bool":
      return TypeCode.Bool;
    case "handle":
      return TypeCode.Handle;
    default:
      return null;
  }
};

export class DataType {
  constructor(
    readonly code: TypeCode,
    readonly bits: number,
    readonly lanes = 1,
  ) {}

  /**
   * Parse the textual form produced by toString ("int64", "float32x4", "bool").
   */
  static parse(text: string): DataType | null {
    const match = DTYPE_PATTERN.exec(text);
    if (!match) return null;
    const code = parseTypeCode(match[1]);
    if (code === null) return null;
    const bits = match[2] !== undefined ? Number(match[2]) : DEFAULT_BITS[code];
    if (bits === null || bits <= 0) return null;
    if (code === TypeCode.Bool && bits !== 1) return null;
    const lanes = match[3] !== undefined ? Number(match[3]) : 1;
    if (lanes <= 0) return null;
    return new DataType(code, bits, lanes);
  }

  isInt(): boolean {
    return this.code === TypeCode.Int;
  }

  isUInt(): boolean {
    return this.code === TypeCode.UInt;
  }

  isInteger(): boolean {
    return this.code === TypeCode.Int || this.code === TypeCode.UInt;
  }

  isFloat(): boolean {
    return this.code === TypeCode.Float;
  }

  isBool(): boolean {
    return this.code === TypeCode.Bool;
  }

  isScalar(): boolean {
    return this.lanes === 1;
  }

  withBits(bits: number): DataType {
    if (bits === this.bits) return this;
    return new DataType(this.code, bits, this.lanes);
  }

  withLanes(lanes: number): DataType {
    if (lanes === this.lanes) return this;
    return new DataType(this.code, this.bits, lanes);
  }

  element(): DataType {
    return this.withLanes(1);
  }

  equals(other: DataType): boolean {
    return (
      this.code === other.code &&
      this.bits === other.bits &&
      this.lanes === other.lanes
    );
  }

  toString(): string {
    const base = this.code === TypeCode.Bool ? "bool" : `${this.code}${this.bits}`;
    return this.lanes === 1 ? base : `${base}x${this.lanes}`;
  }
}

export const DataTypes = {
  int8: new DataType(TypeCode.Int, 8),
  int16: new DataType(TypeCode.Int, 16),
  int32: new DataType(TypeCode.Int, 32),
  int64: new DataType(TypeCode.Int, 64),
  uint8: new DataType(TypeCode.UInt, 8),
  uint16: new DataType(TypeCode.UInt, 16),
  uint32: new DataType(TypeCode.UInt, 32),
  uint64: new DataType(TypeCode.UInt, 64),
  float16: new DataType(TypeCode.Float, 16),
  float32: new DataType(TypeCode.Float, 32),
  float64: new DataType(TypeCode.Float, 64),
  bool: new DataType(TypeCode.Bool, 1),
  handle: new DataType(TypeCode.Handle, 64),
} as const;

export interface IntegerRange {
  min: bigint;
  max: bigint;
}

/**
 * Representable range of an integer dtype, or null for other codes.
 */
export const getIntegerRange = (dtype: DataType): IntegerRange | null => {
  const bits = BigInt(dtype.bits);
  switch (dtype.code) {
    case TypeCode.UInt:
      return { min: 0n, max: (1n << bits) - 1n };
    case TypeCode.Int: {
      const half = bits - 1n;
      return { min: -(1n << half), max: (1n << half) - 1n };
    }
    default:
      return null;
  }
};

export const fitsInRange = (value: bigint, range: IntegerRange): boolean => {
  return value >= range.min && value <= range.max;
};

/**
 * Two's-complement wrap of value into the range of dtype.
 */
export const wrapToType = (value: bigint, dtype: DataType): bigint => {
  if (dtype.isBool()) return value === 0n ? 0n : 1n;
  if (dtype.isInt()) return BigInt.asIntN(dtype.bits, value);
  if (dtype.isUInt()) return BigInt.asUintN(dtype.bits, value);
  return value;
};
