import * as path from "path";
import { describe, it, expect } from "vitest";
import {
  ConversionError,
  TypeConverterRegistry,
  convertEnum,
  formatDuration,
  formatEnum,
  parseDuration,
} from "../conversion.js";
import { customType, enumOf, listOf, toTypeDescriptor } from "../model.js";
import type { ScalarType } from "../types.js";

enum Color {
  Red,
  Green,
  Blue,
}

enum Permission {
  None = 0,
  Read = 1,
  Write = 2,
  Execute = 4,
  ReadWrite = 3,
}

const ColorType = enumOf("Color", Color);
const PermissionType = enumOf("Permission", Permission, { flags: true });

describe("TypeConverterRegistry", () => {
  const registry = new TypeConverterRegistry();
  const scalar = (name: Parameters<typeof toTypeDescriptor>[0]): ScalarType => {
    const type = toTypeDescriptor(name);
    if (type.kind === "collection") throw new Error("expected a scalar type");
    return type;
  };

  // ==========================================================================
  // Primitives
  // ==========================================================================

  describe("primitives", () => {
    it("should keep strings as they are", () => {
      expect(registry.convertScalar(scalar("string"), " spaced ")).toBe(" spaced ");
    });

    it("should read booleans case-insensitively", () => {
      expect(registry.convertScalar(scalar("boolean"), "TRUE")).toBe(true);
      expect(registry.convertScalar(scalar("boolean"), "no")).toBe(false);
      expect(registry.convertScalar(scalar("boolean"), "1")).toBe(true);
    });

    it("should reject words that are not booleans", () => {
      expect(() => registry.convertScalar(scalar("boolean"), "maybe")).toThrow(ConversionError);
    });

    it("should read integers", () => {
      expect(registry.convertScalar(scalar("integer"), "-42")).toBe(-42);
      expect(registry.convertScalar(scalar("integer"), "+7")).toBe(7);
    });

    it("should reject fractional and non-numeric integers", () => {
      expect(() => registry.convertScalar(scalar("integer"), "1.5")).toThrow(ConversionError);
      expect(() => registry.convertScalar(scalar("integer"), "abc")).toThrow(ConversionError);
      expect(() => registry.convertScalar(scalar("integer"), "")).toThrow(ConversionError);
    });

    it("should reject integers beyond the safe range", () => {
      expect(() => registry.convertScalar(scalar("integer"), "9007199254740993")).toThrow(/out of range/);
    });

    it("should read numbers", () => {
      expect(registry.convertScalar(scalar("number"), "3.25")).toBe(3.25);
      expect(registry.convertScalar(scalar("number"), "1e3")).toBe(1000);
    });

    it("should reject blank and non-finite numbers", () => {
      expect(() => registry.convertScalar(scalar("number"), "  ")).toThrow(ConversionError);
      expect(() => registry.convertScalar(scalar("number"), "Infinity")).toThrow(ConversionError);
    });

    it("should read bigints", () => {
      expect(registry.convertScalar(scalar("bigint"), "9007199254740993")).toBe(9007199254740993n);
    });

    it("should read a single character", () => {
      expect(registry.convertScalar(scalar("char"), "x")).toBe("x");
      expect(() => registry.convertScalar(scalar("char"), "xy")).toThrow(/single character/);
    });
  });

  // ==========================================================================
  // Well-known types
  // ==========================================================================

  describe("well-known types", () => {
    it("should read urls", () => {
      const url = registry.convertScalar(scalar("url"), "https://example.com/path?q=1");
      expect(url).toBeInstanceOf(URL);
      expect(registry.format(scalar("url"), url)).toBe("https://example.com/path?q=1");
    });

    it("should reject malformed urls", () => {
      expect(() => registry.convertScalar(scalar("url"), "not a url")).toThrow(ConversionError);
    });

    it("should read dates", () => {
      const date = registry.convertScalar(scalar("date"), "2024-03-01T10:00:00.000Z");
      expect(date).toEqual(new Date("2024-03-01T10:00:00.000Z"));
      expect(registry.format(scalar("date"), date)).toBe("2024-03-01T10:00:00.000Z");
    });

    it("should reject invalid dates", () => {
      expect(() => registry.convertScalar(scalar("date"), "yesterday-ish")).toThrow(ConversionError);
    });

    it("should read uuids in lower case", () => {
      expect(registry.convertScalar(scalar("uuid"), "3F2504E0-4F89-41D3-9A0C-0305E82C3301")).toBe(
        "3f2504e0-4f89-41d3-9a0c-0305e82c3301"
      );
      expect(() => registry.convertScalar(scalar("uuid"), "3f2504e0")).toThrow(ConversionError);
    });

    it("should read ip addresses", () => {
      expect(registry.convertScalar(scalar("ip"), "192.168.1.10")).toBe("192.168.1.10");
      expect(registry.convertScalar(scalar("ip"), "::1")).toBe("::1");
      expect(() => registry.convertScalar(scalar("ip"), "999.1.1.1")).toThrow(ConversionError);
    });

    it("should resolve file and directory paths", () => {
      expect(registry.convertScalar(scalar("file"), "data/input.txt")).toBe(path.resolve("data/input.txt"));
      expect(registry.convertScalar(scalar("directory"), ".")).toBe(path.resolve("."));
    });

    it("should read durations", () => {
      expect(registry.convertScalar(scalar("duration"), "01:30:00")).toBe(5_400_000);
      expect(registry.convertScalar(scalar("duration"), "2.14:30:00")).toBe(2 * 86_400_000 + 14 * 3_600_000 + 30 * 60_000);
      expect(registry.convertScalar(scalar("duration"), "1h30m")).toBe(5_400_000);
    });
  });

  // ==========================================================================
  // Enums
  // ==========================================================================

  describe("enums", () => {
    it("should skip the reverse entries of a numeric enum", () => {
      expect(ColorType.members).toEqual({ Red: 0, Green: 1, Blue: 2 });
    });

    it("should match member names case-insensitively", () => {
      expect(convertEnum(ColorType, "green")).toBe(Color.Green);
      expect(convertEnum(ColorType, "BLUE")).toBe(Color.Blue);
    });

    it("should accept a numeric value that is declared", () => {
      expect(convertEnum(ColorType, "2")).toBe(Color.Blue);
    });

    it("should reject undeclared values and list the valid ones", () => {
      expect(() => convertEnum(ColorType, "7")).toThrow("valid values are: Red, Green, Blue");
      expect(() => convertEnum(ColorType, "purple")).toThrow(ConversionError);
    });

    it("should combine flag members", () => {
      expect(convertEnum(PermissionType, "Read,Execute")).toBe(5);
      expect(convertEnum(PermissionType, "read, write")).toBe(3);
    });

    it("should accept numeric flag combinations of declared bits only", () => {
      expect(convertEnum(PermissionType, "6")).toBe(6);
      expect(() => convertEnum(PermissionType, "8")).toThrow(ConversionError);
    });

    it("should reject an unknown flag segment", () => {
      expect(() => convertEnum(PermissionType, "Read,Delete")).toThrow(/Delete/);
    });

    it("should format flag values by member names", () => {
      expect(formatEnum(PermissionType, 3)).toBe("ReadWrite");
      expect(formatEnum(PermissionType, 5)).toBe("Read, Execute");
      expect(formatEnum(PermissionType, 0)).toBe("None");
    });
  });

  // ==========================================================================
  // Round trips
  // ==========================================================================

  describe("round trips", () => {
    const cases: [ScalarType, string][] = [
      [scalar("string"), "hello"],
      [scalar("boolean"), "true"],
      [scalar("integer"), "-12"],
      [scalar("number"), "0.5"],
      [scalar("bigint"), "123456789012345678901234567890"],
      [scalar("char"), "q"],
      [scalar("url"), "https://example.com/"],
      [scalar("date"), "2023-12-31T23:59:59.000Z"],
      [scalar("duration"), "1.02:03:04.500"],
      [scalar("uuid"), "3f2504e0-4f89-41d3-9a0c-0305e82c3301"],
      [scalar("ip"), "10.0.0.1"],
      [scalar("file"), path.resolve("notes.md")],
      [scalar("directory"), path.resolve("src")],
      [ColorType, "Green"],
      [PermissionType, "Read, Execute"],
    ];

    it.each(cases)("should format %o back to an equal value", (type, token) => {
      const value = registry.convertScalar(type, token);
      const formatted = registry.format(type, value);
      expect(formatted).toBe(token);
      expect(registry.convertScalar(type, formatted)).toEqual(value);
    });
  });

  // ==========================================================================
  // Collections & custom converters
  // ==========================================================================

  describe("collections", () => {
    it("should convert each element", () => {
      expect(registry.convert(listOf("integer"), ["1", "2", "3"])).toEqual([1, 2, 3]);
    });

    it("should take the last value for a scalar", () => {
      expect(registry.convert(toTypeDescriptor("string"), ["first", "second"])).toBe("second");
    });

    it("should split env-style values only for collections", () => {
      expect(registry.splitFor(listOf("string"), "a, b,,c")).toEqual(["a", "b", "c"]);
      expect(registry.splitFor(toTypeDescriptor("string"), "a, b")).toEqual(["a, b"]);
    });

    it("should describe collection types", () => {
      expect(registry.describe(listOf(ColorType))).toBe("list of Color");
    });
  });

  describe("custom converters", () => {
    const custom = new TypeConverterRegistry().register("semver", {
      typeName: "semantic version",
      convert(raw) {
        const match = /^(\d+)\.(\d+)\.(\d+)$/.exec(raw);
        if (!match) throw new Error("expected MAJOR.MINOR.PATCH");
        return { major: Number(match[1]), minor: Number(match[2]), patch: Number(match[3]) };
      },
    });

    it("should use the registered converter", () => {
      expect(custom.convertScalar(customType("semver"), "1.4.2")).toEqual({ major: 1, minor: 4, patch: 2 });
    });

    it("should wrap converter failures as ConversionError", () => {
      try {
        custom.convertScalar(customType("semver"), "1.4");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConversionError);
        if (error instanceof ConversionError) {
          expect(error.expected).toBe("semantic version");
          expect(error.reason).toBe("expected MAJOR.MINOR.PATCH");
        }
      }
    });

    it("should refuse to register the same id twice", () => {
      expect(() => custom.register("semver", { typeName: "x", convert: (raw) => raw })).toThrow(/already registered/);
    });

    it("should fail for an unknown converter id", () => {
      expect(() => custom.convertScalar(customType("missing"), "x")).toThrow(/No converter registered/);
    });
  });
});

describe("durations", () => {
  it("should parse clock forms", () => {
    expect(parseDuration("00:00:05.250")).toBe(5250);
    expect(parseDuration("01:30")).toBe(5_400_000);
  });

  it("should parse unit forms", () => {
    expect(parseDuration("500ms")).toBe(500);
    expect(parseDuration("2d")).toBe(172_800_000);
    expect(parseDuration("1m30s")).toBe(90_000);
  });

  it("should reject out-of-range clock fields and garbage", () => {
    expect(parseDuration("25:00:00")).toBeUndefined();
    expect(parseDuration("10:75")).toBeUndefined();
    expect(parseDuration("soon")).toBeUndefined();
    expect(parseDuration("")).toBeUndefined();
  });

  it("should format with days and milliseconds only when present", () => {
    expect(formatDuration(5_400_000)).toBe("01:30:00");
    expect(formatDuration(86_400_000 + 1)).toBe("1.00:00:00.001");
  });
});
