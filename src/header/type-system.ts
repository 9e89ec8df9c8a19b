import type { TypeHandle, TypeKind } from "../types.js";
import { BUILTIN_TYPES, isBuiltinType } from "./builtins.js";

const POINTER_SIZE = 8;

export type TagKeyword = "struct" | "class" | "union" | "enum";

/** Structural description of a type written in the header. */
export type TypeSpec =
  | { tag: "builtin"; name: string; isConst: boolean }
  | { tag: "named"; name: string; isConst: boolean }
  | { tag: "elaborated"; keyword: TagKeyword; name: string; isConst: boolean }
  | { tag: "tag"; name: string; isConst: boolean } // a struct/union/enum after name lookup
  | { tag: "pointer"; pointee: TypeSpec; isConst: boolean }
  | { tag: "reference"; pointee: TypeSpec; rvalue: boolean }
  | { tag: "array"; element: TypeSpec; length?: number }
  | { tag: "function"; result: TypeSpec; params: TypeSpec[]; variadic: boolean };

/**
 * A name declared in the header. Records without `fields` are opaque; records
 * with bit-fields have no computed layout.
 */
export type Declaration =
  | { kind: "alias"; target: TypeSpec }
  | { kind: "record"; isUnion: boolean; fields?: TypeSpec[]; hasBitFields?: boolean }
  | { kind: "enum"; base?: TypeSpec };

/** Thrown by size queries on types without a layout. */
export class TypeLayoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TypeLayoutError";
  }
}

function roundUp(value: number, align: number): number {
  return Math.ceil(value / align) * align;
}

function withConst(spec: TypeSpec, isConst: boolean): TypeSpec {
  if (!isConst) return spec;
  switch (spec.tag) {
    case "builtin":
    case "named":
    case "elaborated":
    case "tag":
    case "pointer":
      return { ...spec, isConst: true };
    default:
      return spec;
  }
}

/** Spell a type the way clang prints it (`const char *`, `int *const`, `void (*)(int)`). */
export function spellType(spec: TypeSpec): string {
  switch (spec.tag) {
    case "builtin":
    case "named":
    case "tag":
      return `${spec.isConst ? "const " : ""}${spec.name}`;
    case "elaborated":
      return `${spec.isConst ? "const " : ""}${spec.keyword} ${spec.name}`;
    case "pointer": {
      const suffix = spec.isConst ? "const" : "";
      if (spec.pointee.tag === "function") {
        return `${spellType(spec.pointee.result)} (*${suffix})(${spellParams(spec.pointee)})`;
      }
      const base = spellType(spec.pointee);
      return `${base}${base.endsWith("*") ? "" : " "}*${suffix}`;
    }
    case "reference": {
      const base = spellType(spec.pointee);
      return `${base} ${spec.rvalue ? "&&" : "&"}`;
    }
    case "array":
      return `${spellType(spec.element)}[${spec.length ?? ""}]`;
    case "function":
      return `${spellType(spec.result)} (${spellParams(spec)})`;
  }
}

function spellParams(spec: { params: TypeSpec[]; variadic: boolean }): string {
  const parts = spec.params.map(spellType);
  if (spec.variadic) parts.push("...");
  return parts.join(", ");
}

/**
 * Names declared in one header. Tags (`struct X`, `enum Y`) and ordinary
 * names (aliases, typedefs) live apart, as in C; a bare name falls back to
 * the tag so C++-style `X` finds `struct X`.
 */
export class TypeScope {
  private readonly ordinary = new Map<string, Declaration>();
  private readonly tags = new Map<string, Declaration>();

  declareAlias(name: string, target: TypeSpec): void {
    this.ordinary.set(name, { kind: "alias", target });
  }

  /** Forward declarations never replace a definition. */
  declareRecord(name: string, isUnion: boolean, fields?: TypeSpec[], hasBitFields = false): void {
    const existing = this.tags.get(name);
    if (existing && existing.kind === "record" && existing.fields && !fields) {
      return;
    }
    this.tags.set(name, { kind: "record", isUnion, fields, hasBitFields });
  }

  declareEnum(name: string, base?: TypeSpec): void {
    this.tags.set(name, { kind: "enum", base });
  }

  lookup(name: string): Declaration | undefined {
    return this.ordinary.get(name) ?? this.tags.get(name);
  }

  lookupTag(name: string): Declaration | undefined {
    return this.tags.get(name);
  }

  /** A handle for `spec`, or undefined when some name in it is not declared. */
  resolve(spec: TypeSpec): TypeHandle | undefined {
    return this.isResolvable(spec, new Set()) ? new HeaderType(spec, this) : undefined;
  }

  private isResolvable(spec: TypeSpec, aliases: Set<string>): boolean {
    switch (spec.tag) {
      case "builtin":
        return isBuiltinType(spec.name);
      case "named": {
        const decl = this.lookup(spec.name);
        if (!decl) return false;
        if (decl.kind !== "alias") return true;
        // `aliases` is the chain being expanded; a cycle never resolves
        if (aliases.has(spec.name)) return false;
        aliases.add(spec.name);
        const resolvable = this.isResolvable(decl.target, aliases);
        aliases.delete(spec.name);
        return resolvable;
      }
      // An elaborated specifier declares the tag if nothing else did
      case "elaborated":
      case "tag":
        return true;
      case "pointer":
      case "reference":
        return this.isResolvable(spec.pointee, aliases);
      case "array":
        return this.isResolvable(spec.element, aliases);
      case "function":
        return (
          this.isResolvable(spec.result, aliases) &&
          spec.params.every((p) => this.isResolvable(p, aliases))
        );
    }
  }

  private declared(name: string): Declaration {
    const decl = this.lookup(name);
    if (!decl) {
      throw new Error(`type '${name}' is not declared`);
    }
    return decl;
  }

  kindOf(spec: TypeSpec): TypeKind {
    switch (spec.tag) {
      case "builtin":
        return BUILTIN_TYPES[spec.name].kind;
      case "named": {
        const decl = this.declared(spec.name);
        if (decl.kind === "alias") return "Typedef";
        return decl.kind === "enum" ? "Enum" : "Record";
      }
      case "elaborated":
        return "Elaborated";
      case "tag":
        return this.lookupTag(spec.name)?.kind === "enum" ? "Enum" : "Record";
      case "pointer":
        return "Pointer";
      case "reference":
        return spec.rvalue ? "RValueReference" : "LValueReference";
      case "array":
        return spec.length === undefined ? "IncompleteArray" : "ConstantArray";
      case "function":
        return "FunctionPrototype";
    }
  }

  canonicalize(spec: TypeSpec): TypeSpec {
    switch (spec.tag) {
      case "builtin": {
        const canonical = BUILTIN_TYPES[spec.name].canonical;
        return canonical ? { tag: "builtin", name: canonical, isConst: spec.isConst } : spec;
      }
      case "named": {
        const decl = this.declared(spec.name);
        if (decl.kind !== "alias") return { tag: "tag", name: spec.name, isConst: spec.isConst };
        return withConst(this.canonicalize(decl.target), spec.isConst);
      }
      case "elaborated":
        return { tag: "tag", name: spec.name, isConst: spec.isConst };
      case "tag":
        return spec;
      case "pointer":
        return { ...spec, pointee: this.canonicalize(spec.pointee) };
      case "reference":
        return { ...spec, pointee: this.canonicalize(spec.pointee) };
      case "array":
        return { ...spec, element: this.canonicalize(spec.element) };
      case "function":
        return {
          ...spec,
          result: this.canonicalize(spec.result),
          params: spec.params.map((p) => this.canonicalize(p)),
        };
    }
  }

  /** Declaration behind a named spec; unknown tags are opaque records. */
  private recordOrEnum(spec: TypeSpec & { name: string }): Declaration {
    if (spec.tag === "named") {
      return this.declared(spec.name);
    }
    const isUnion = spec.tag === "elaborated" && spec.keyword === "union";
    return this.lookupTag(spec.name) ?? { kind: "record", isUnion };
  }

  sizeOf(spec: TypeSpec, records: Set<string> = new Set()): number {
    switch (spec.tag) {
      case "builtin": {
        const info = BUILTIN_TYPES[spec.name];
        if (info.canonical) {
          return this.sizeOf({ tag: "builtin", name: info.canonical, isConst: false }, records);
        }
        if (info.size === undefined) {
          throw new TypeLayoutError(`'${spec.name}' is an incomplete type`);
        }
        return info.size;
      }
      case "named":
      case "elaborated":
      case "tag": {
        const decl = this.recordOrEnum(spec);
        if (decl.kind === "alias") return this.sizeOf(decl.target, records);
        if (decl.kind === "enum") return decl.base ? this.sizeOf(decl.base, records) : 4;
        return this.recordLayout(spec.name, decl, records).size;
      }
      case "pointer":
        return POINTER_SIZE;
      // sizeof(T&) is sizeof(T)
      case "reference":
        return this.sizeOf(spec.pointee, records);
      case "array":
        if (spec.length === undefined) {
          throw new TypeLayoutError(`'${spellType(spec)}' is an incomplete array`);
        }
        return spec.length * this.sizeOf(spec.element, records);
      case "function":
        throw new TypeLayoutError(`'${spellType(spec)}' is a function type`);
    }
  }

  alignOf(spec: TypeSpec, records: Set<string> = new Set()): number {
    switch (spec.tag) {
      case "named":
      case "elaborated":
      case "tag": {
        const decl = this.recordOrEnum(spec);
        if (decl.kind === "alias") return this.alignOf(decl.target, records);
        if (decl.kind === "enum") return decl.base ? this.alignOf(decl.base, records) : 4;
        return this.recordLayout(spec.name, decl, records).align;
      }
      case "pointer":
      case "reference":
        return POINTER_SIZE;
      case "array":
        return this.alignOf(spec.element, records);
      default:
        return this.sizeOf(spec, records);
    }
  }

  private recordLayout(
    name: string,
    { isUnion, fields, hasBitFields }: Extract<Declaration, { kind: "record" }>,
    records: Set<string>,
  ): { size: number; align: number } {
    if (!fields) {
      throw new TypeLayoutError(`'${name}' is an opaque type`);
    }
    // TODO: pack bit-fields into their storage units as the SysV ABI does
    if (hasBitFields) {
      throw new TypeLayoutError(`'${name}' has bit-fields`);
    }
    if (records.has(name)) {
      throw new TypeLayoutError(`'${name}' contains itself`);
    }
    if (fields.length === 0) {
      return { size: 1, align: 1 };
    }

    const nested = new Set(records).add(name);
    let offset = 0;
    let align = 1;
    for (const field of fields) {
      if (!this.isResolvable(field, new Set())) {
        throw new TypeLayoutError(`field type '${spellType(field)}' of '${name}' is not declared`);
      }
      const fieldAlign = this.alignOf(field, nested);
      const fieldSize = this.sizeOf(field, nested);
      align = Math.max(align, fieldAlign);
      offset = isUnion
        ? Math.max(offset, fieldSize)
        : roundUp(offset, fieldAlign) + fieldSize;
    }
    return { size: roundUp(offset, align), align };
  }
}

/** Front-end type handle over a spec and the scope it was written in. */
export class HeaderType implements TypeHandle {
  constructor(
    private readonly spec: TypeSpec,
    private readonly scope: TypeScope,
  ) {}

  get displayName(): string {
    return spellType(this.spec);
  }

  get kind(): TypeKind {
    return this.scope.kindOf(this.spec);
  }

  pointee(): TypeHandle | undefined {
    if (this.spec.tag === "pointer" || this.spec.tag === "reference") {
      return new HeaderType(this.spec.pointee, this.scope);
    }
    return undefined;
  }

  canonical(): TypeHandle {
    return new HeaderType(this.scope.canonicalize(this.spec), this.scope);
  }

  sizeOf(): number {
    return this.scope.sizeOf(this.spec);
  }
}
