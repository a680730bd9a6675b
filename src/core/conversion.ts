/**
 * Type Conversion Registry
 *
 * Turns raw string tokens into typed values: primitives, enums, well-known
 * structured types, user-registered converters, and collections of those.
 * Every built-in converter also formats its values back to a token.
 */

import * as path from "path";
import { z } from "zod";
import type {
  EnumType,
  PrimitiveTypeName,
  ScalarType,
  TypeDescriptor,
  WellKnownTypeName,
} from "./types.js";
import { ArborError, errorMessage, normalizeName, splitList } from "./utils.js";

// ============================================================================
// Converter Contract
// ============================================================================

export interface TypeConverter<T = unknown> {
  /** Shown to the user as the expected type */
  readonly typeName: string;
  convert(raw: string): T;
  format?(value: T): string;
}

/**
 * Raised by converters for a token they cannot read.
 */
export class ConversionError extends ArborError {
  constructor(
    public readonly raw: string,
    public readonly expected: string,
    public readonly reason?: string
  ) {
    super(
      reason ? `Cannot convert '${raw}' to ${expected}: ${reason}` : `Cannot convert '${raw}' to ${expected}`,
      "CONVERSION_FAILED",
      { raw, expected }
    );
    this.name = "ConversionError";
  }
}

// ============================================================================
// Primitive Converters
// ============================================================================

const TRUE_WORDS = new Set(["true", "1", "yes", "on"]);
const FALSE_WORDS = new Set(["false", "0", "no", "off"]);

const INTEGER_PATTERN = /^[+-]?\d+$/;

const stringConverter: TypeConverter<string> = {
  typeName: "string",
  convert: (raw) => raw,
  format: (value) => value,
};

const booleanConverter: TypeConverter<boolean> = {
  typeName: "boolean",
  convert(raw) {
    const word = normalizeName(raw.trim());
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
    throw new ConversionError(raw, "boolean", "expected true or false");
  },
  format: (value) => String(value),
};

const integerConverter: TypeConverter<number> = {
  typeName: "integer",
  convert(raw) {
    const text = raw.trim();
    if (!INTEGER_PATTERN.test(text)) throw new ConversionError(raw, "integer");
    const value = Number(text);
    if (!Number.isSafeInteger(value)) {
      throw new ConversionError(raw, "integer", "value is out of range");
    }
    return value;
  },
  format: (value) => String(value),
};

const numberConverter: TypeConverter<number> = {
  typeName: "number",
  convert(raw) {
    const text = raw.trim();
    const value = text.length > 0 ? Number(text) : Number.NaN;
    if (!Number.isFinite(value)) throw new ConversionError(raw, "number");
    return value;
  },
  format: (value) => String(value),
};

const bigintConverter: TypeConverter<bigint> = {
  typeName: "bigint",
  convert(raw) {
    const text = raw.trim();
    if (!INTEGER_PATTERN.test(text)) throw new ConversionError(raw, "bigint");
    return BigInt(text);
  },
  format: (value) => value.toString(),
};

const charConverter: TypeConverter<string> = {
  typeName: "char",
  convert(raw) {
    if ([...raw].length !== 1) {
      throw new ConversionError(raw, "char", "expected a single character");
    }
    return raw;
  },
  format: (value) => value,
};

const PRIMITIVES: Record<PrimitiveTypeName, TypeConverter> = {
  string: stringConverter,
  boolean: booleanConverter,
  integer: integerConverter,
  number: numberConverter,
  bigint: bigintConverter,
  char: charConverter,
};

// ============================================================================
// Well-Known Converters
// ============================================================================

const UrlToken = z.string().url();
const UuidToken = z.string().uuid();
const IpToken = z.string().ip();

const urlConverter: TypeConverter<URL> = {
  typeName: "url",
  convert(raw) {
    if (!UrlToken.safeParse(raw).success) throw new ConversionError(raw, "url");
    return new URL(raw);
  },
  format: (value) => value.href,
};

const dateConverter: TypeConverter<Date> = {
  typeName: "date",
  convert(raw) {
    const time = Date.parse(raw);
    if (Number.isNaN(time)) throw new ConversionError(raw, "date");
    return new Date(time);
  },
  format: (value) => value.toISOString(),
};

const uuidConverter: TypeConverter<string> = {
  typeName: "uuid",
  convert(raw) {
    if (!UuidToken.safeParse(raw).success) throw new ConversionError(raw, "uuid");
    return raw.toLowerCase();
  },
  format: (value) => value,
};

const ipConverter: TypeConverter<string> = {
  typeName: "ip",
  convert(raw) {
    if (!IpToken.safeParse(raw).success) throw new ConversionError(raw, "ip");
    return raw;
  },
  format: (value) => value,
};

function pathConverter(typeName: "file" | "directory"): TypeConverter<string> {
  return {
    typeName,
    convert(raw) {
      if (raw.trim().length === 0) throw new ConversionError(raw, typeName, "path is empty");
      return path.resolve(raw);
    },
    format: (value) => value,
  };
}

// Durations -------------------------------------------------------------------

const MS_PER = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
} as const;

// [d.]hh:mm[:ss[.fff]]
const CLOCK_PATTERN = /^(?:(\d+)\.)?(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?$/;
// 1d2h30m15s500ms
const UNIT_PATTERN = /^(?:(\d+)d)?(?:(\d+)h)?(?:(\d+)m(?!s))?(?:(\d+)s)?(?:(\d+)ms)?$/;

function num(group: string | undefined): number {
  return group === undefined ? 0 : Number(group);
}

/**
 * Parses "2.14:30:00", "01:30", "00:00:05.250" or "1h30m" to milliseconds.
 */
export function parseDuration(raw: string): number | undefined {
  const text = raw.trim();
  if (text.length === 0) return undefined;

  const clock = CLOCK_PATTERN.exec(text);
  if (clock) {
    const [, days, hours, minutes, seconds, fraction] = clock;
    if (num(hours) > 23 || num(minutes) > 59 || num(seconds) > 59) return undefined;
    const millis = fraction === undefined ? 0 : Number(fraction.padEnd(3, "0"));
    return (
      num(days) * MS_PER.d +
      num(hours) * MS_PER.h +
      num(minutes) * MS_PER.m +
      num(seconds) * MS_PER.s +
      millis
    );
  }

  const units = UNIT_PATTERN.exec(text);
  if (units && units.slice(1).some((g) => g !== undefined)) {
    const [, days, hours, minutes, seconds, millis] = units;
    return (
      num(days) * MS_PER.d +
      num(hours) * MS_PER.h +
      num(minutes) * MS_PER.m +
      num(seconds) * MS_PER.s +
      num(millis)
    );
  }

  return undefined;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Formats milliseconds as [d.]hh:mm:ss[.fff].
 */
export function formatDuration(totalMs: number): string {
  const days = Math.floor(totalMs / MS_PER.d);
  const hours = Math.floor((totalMs % MS_PER.d) / MS_PER.h);
  const minutes = Math.floor((totalMs % MS_PER.h) / MS_PER.m);
  const seconds = Math.floor((totalMs % MS_PER.m) / MS_PER.s);
  const millis = totalMs % MS_PER.s;

  let text = `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
  if (days > 0) text = `${days}.${text}`;
  if (millis > 0) text = `${text}.${pad(millis, 3)}`;
  return text;
}

const durationConverter: TypeConverter<number> = {
  typeName: "duration",
  convert(raw) {
    const value = parseDuration(raw);
    if (value === undefined) throw new ConversionError(raw, "duration");
    return value;
  },
  format: formatDuration,
};

const WELL_KNOWN: Record<WellKnownTypeName, TypeConverter> = {
  url: urlConverter,
  date: dateConverter,
  duration: durationConverter,
  uuid: uuidConverter,
  file: pathConverter("file"),
  directory: pathConverter("directory"),
  ip: ipConverter,
};

// ============================================================================
// Enums
// ============================================================================

function enumValueFromToken(type: EnumType, token: string): number | undefined {
  const wanted = normalizeName(token);
  for (const [name, value] of Object.entries(type.members)) {
    if (normalizeName(name) === wanted) return value;
  }

  if (!INTEGER_PATTERN.test(token)) return undefined;
  const numeric = Number(token);
  const values = Object.values(type.members);

  if (type.flags) {
    const allBits = values.reduce((acc, v) => acc | v, 0);
    return (numeric & ~allBits) === 0 ? numeric : undefined;
  }
  return values.includes(numeric) ? numeric : undefined;
}

function enumFailure(type: EnumType, raw: string): ConversionError {
  return new ConversionError(
    raw,
    type.name,
    `valid values are: ${Object.keys(type.members).join(", ")}`
  );
}

export function convertEnum(type: EnumType, raw: string): number {
  if (!type.flags) {
    const value = enumValueFromToken(type, raw.trim());
    if (value === undefined) throw enumFailure(type, raw);
    return value;
  }

  const segments = splitList(raw);
  if (segments.length === 0) throw enumFailure(type, raw);

  let combined = 0;
  for (const segment of segments) {
    const value = enumValueFromToken(type, segment);
    if (value === undefined) throw enumFailure(type, segment);
    combined |= value;
  }
  return combined;
}

export function formatEnum(type: EnumType, value: number): string {
  const entries = Object.entries(type.members);
  const exact = entries.find(([, v]) => v === value);
  if (exact) return exact[0];
  if (!type.flags) return String(value);

  // Largest members first so composite members win over their parts.
  const names: string[] = [];
  let remaining = value;
  const candidates = entries.filter(([, v]) => v !== 0).sort((a, b) => b[1] - a[1]);
  for (const [name, bits] of candidates) {
    if ((remaining & bits) === bits) {
      names.push(name);
      remaining &= ~bits;
    }
  }
  if (remaining !== 0) return String(value);
  return names.reverse().join(", ");
}

// ============================================================================
// Registry
// ============================================================================

export class TypeConverterRegistry {
  private custom = new Map<string, TypeConverter>();

  register(id: string, converter: TypeConverter): this {
    if (this.custom.has(id)) {
      throw new ArborError(`Converter '${id}' is already registered`, "DUPLICATE_CONVERTER", { id });
    }
    this.custom.set(id, converter);
    return this;
  }

  has(id: string): boolean {
    return this.custom.has(id);
  }

  /**
   * Human-readable name of a type, e.g. `integer` or `list of Color`.
   */
  describe(type: TypeDescriptor): string {
    switch (type.kind) {
      case "primitive":
      case "well-known":
        return type.name;
      case "enum":
        return type.name;
      case "custom":
        return this.custom.get(type.converterId)?.typeName ?? type.converterId;
      case "collection":
        return `list of ${this.describe(type.element)}`;
    }
  }

  convertScalar(type: ScalarType, raw: string): unknown {
    switch (type.kind) {
      case "primitive":
        return PRIMITIVES[type.name].convert(raw);
      case "well-known":
        return WELL_KNOWN[type.name].convert(raw);
      case "enum":
        return convertEnum(type, raw);
      case "custom":
        return this.convertCustom(type.converterId, raw);
    }
  }

  /**
   * Convert the raw values collected for one parameter. Collections convert
   * element-wise; a scalar takes the last value.
   */
  convert(type: TypeDescriptor, raw: readonly string[]): unknown {
    if (type.kind === "collection") {
      return raw.map((item) => this.convertScalar(type.element, item));
    }
    const last = raw[raw.length - 1];
    if (last === undefined) {
      throw new ConversionError("", this.describe(type), "no value given");
    }
    return this.convertScalar(type, last);
  }

  /**
   * Split an environment or prompt value the way a collection option
   * splits commas.
   */
  splitFor(type: TypeDescriptor, raw: string): string[] {
    return type.kind === "collection" ? splitList(raw) : [raw];
  }

  format(type: ScalarType, value: unknown): string {
    switch (type.kind) {
      case "enum":
        return typeof value === "number" ? formatEnum(type, value) : String(value);
      case "primitive":
        return formatWith(PRIMITIVES[type.name], value);
      case "well-known":
        return formatWith(WELL_KNOWN[type.name], value);
      case "custom": {
        const converter = this.custom.get(type.converterId);
        return converter ? formatWith(converter, value) : String(value);
      }
    }
  }

  private convertCustom(id: string, raw: string): unknown {
    const converter = this.custom.get(id);
    if (!converter) {
      throw new ArborError(`No converter registered for '${id}'`, "UNKNOWN_CONVERTER", { id });
    }
    try {
      return converter.convert(raw);
    } catch (error) {
      if (error instanceof ConversionError) throw error;
      throw new ConversionError(raw, converter.typeName, errorMessage(error));
    }
  }
}

function formatWith(converter: TypeConverter, value: unknown): string {
  return converter.format ? converter.format(value) : String(value);
}

export function createConverterRegistry(): TypeConverterRegistry {
  return new TypeConverterRegistry();
}
