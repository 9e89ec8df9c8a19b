import type { TypeKind } from "../types.js";

export interface BuiltinType {
  kind: TypeKind;
  size?: number; // undefined for void
  canonical?: string; // set for the standard typedefs
}

// LP64 data model
export const BUILTIN_TYPES: Readonly<Record<string, BuiltinType>> = {
  void: { kind: "Void" },
  bool: { kind: "Bool", size: 1 },
  char: { kind: "CharS", size: 1 },
  "signed char": { kind: "SChar", size: 1 },
  "unsigned char": { kind: "UChar", size: 1 },
  char16_t: { kind: "Char16", size: 2 },
  char32_t: { kind: "Char32", size: 4 },
  wchar_t: { kind: "WChar", size: 4 },
  short: { kind: "Short", size: 2 },
  "unsigned short": { kind: "UShort", size: 2 },
  int: { kind: "Int", size: 4 },
  "unsigned int": { kind: "UInt", size: 4 },
  long: { kind: "Long", size: 8 },
  "unsigned long": { kind: "ULong", size: 8 },
  "long long": { kind: "LongLong", size: 8 },
  "unsigned long long": { kind: "ULongLong", size: 8 },
  float: { kind: "Float", size: 4 },
  double: { kind: "Double", size: 8 },
  "long double": { kind: "LongDouble", size: 16 },
  nullptr_t: { kind: "NullPtr", size: 8 },

  int8_t: { kind: "Typedef", canonical: "signed char" },
  uint8_t: { kind: "Typedef", canonical: "unsigned char" },
  int16_t: { kind: "Typedef", canonical: "short" },
  uint16_t: { kind: "Typedef", canonical: "unsigned short" },
  int32_t: { kind: "Typedef", canonical: "int" },
  uint32_t: { kind: "Typedef", canonical: "unsigned int" },
  int64_t: { kind: "Typedef", canonical: "long" },
  uint64_t: { kind: "Typedef", canonical: "unsigned long" },
  size_t: { kind: "Typedef", canonical: "unsigned long" },
  ssize_t: { kind: "Typedef", canonical: "long" },
  ptrdiff_t: { kind: "Typedef", canonical: "long" },
  intptr_t: { kind: "Typedef", canonical: "long" },
  uintptr_t: { kind: "Typedef", canonical: "unsigned long" },
};

export function isBuiltinType(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(BUILTIN_TYPES, name);
}

/**
 * Normalise a sized type specifier (`unsigned`, `long int`,
 * `unsigned long long int`, ...) to its key in BUILTIN_TYPES.
 */
export function normalizeSizedType(text: string): string {
  const words = text.trim().split(/\s+/);
  const isUnsigned = words.includes("unsigned");
  const isSigned = words.includes("signed");
  const longs = words.filter((w) => w === "long").length;
  const prefix = isUnsigned ? "unsigned " : "";

  if (words.includes("char")) {
    if (isUnsigned) return "unsigned char";
    return isSigned ? "signed char" : "char";
  }
  if (words.includes("double")) {
    return longs > 0 ? "long double" : "double";
  }
  if (words.includes("short")) {
    return `${prefix}short`;
  }
  if (longs >= 2) {
    return `${prefix}long long`;
  }
  if (longs === 1) {
    return `${prefix}long`;
  }
  return `${prefix}int`;
}
