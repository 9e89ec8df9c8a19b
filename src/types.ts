// Native type-kind tags, as reported by the C/C++ front end
export type TypeKind =
  | "Void"
  | "Bool"
  | "CharS"
  | "SChar"
  | "UChar"
  | "Char16"
  | "Char32"
  | "WChar"
  | "Short"
  | "UShort"
  | "Int"
  | "UInt"
  | "Long"
  | "ULong"
  | "LongLong"
  | "ULongLong"
  | "Float"
  | "Double"
  | "LongDouble"
  | "NullPtr"
  | "Pointer"
  | "LValueReference"
  | "RValueReference"
  | "Record"
  | "Enum"
  | "Typedef"
  | "Elaborated"
  | "FunctionPrototype"
  | "ConstantArray"
  | "IncompleteArray";

// Declaration kinds produced by the header front end
export type EntityKind =
  | "TranslationUnit"
  | "Namespace"
  | "UnexposedDecl"
  | "TypeAliasDecl"
  | "TypedefDecl"
  | "FunctionDecl"
  | "StructDecl"
  | "ClassDecl"
  | "UnionDecl"
  | "EnumDecl"
  | "Other";

// --- Declaration tree (front-end contract) ---

/** A type as seen by the front end. Only `sizeOf` may fail. */
export interface TypeHandle {
  readonly displayName: string;
  readonly kind: TypeKind;
  pointee(): TypeHandle | undefined;
  canonical(): TypeHandle;
  /** Byte size; throws when the layout cannot be computed (e.g. opaque types). */
  sizeOf(): number;
}

export interface Argument {
  name?: string; // undefined for unnamed parameters
  type?: TypeHandle; // undefined when the front end could not resolve it
}

export interface Entity {
  kind: EntityKind;
  name?: string;
  displayName?: string;
  children: Entity[];
  arguments?: Argument[]; // FunctionDecl only
  resultType?: TypeHandle; // FunctionDecl only
  comment?: string;
}

// --- Extracted binding model ---

export interface TypeDescriptor {
  displayName: string;
  kind: TypeKind;
  pointee?: TypeDescriptor;
  canonical?: TypeDescriptor; // only when different from the surface type
  byteSize?: number;
}

export interface ConstructorDescriptor {
  className: string;
  fnName: string;
  cFnName: string;
  argNames: string[];
  argTypes: TypeDescriptor[];
  comments?: string;
}

export interface DestructorDescriptor {
  className: string;
  fnName: string;
  cFnName: string;
}

export interface MethodDescriptor {
  className: string;
  methodName: string;
  fnName: string;
  cFnName: string;
  returnType: TypeDescriptor;
  argNames: string[]; // receiver stripped
  argTypes: TypeDescriptor[];
  comments?: string;
  consume: boolean;
}

export interface StaticDescriptor {
  className: string;
  methodName: string;
  fnName: string;
  cFnName: string;
  returnType: TypeDescriptor;
  argNames: string[];
  argTypes: TypeDescriptor[];
  comments?: string;
}

export interface GetterDescriptor {
  className: string;
  fieldName: string;
  fnName: string;
  cFnName: string;
  type: TypeDescriptor;
  comments?: string;
}

export interface SetterDescriptor {
  className: string;
  fieldName: string;
  fnName: string;
  cFnName: string;
  type: TypeDescriptor;
  comments?: string;
}

export interface ClassDescriptor {
  name: string;
  cName: string; // linkage-qualified C++ name of the opaque handle alias
  comments?: string;
  ctor?: ConstructorDescriptor;
  dtor?: DestructorDescriptor;
  statics: StaticDescriptor[];
  methods: MethodDescriptor[];
  getters: GetterDescriptor[];
  setters: SetterDescriptor[];
}

// --- Diagnostics ---

export type DiagnosticCode =
  | "unknown-namespace"
  | "unknown-identifier"
  | "malformed-identifier"
  | "namespace-mismatch"
  | "unknown-scope"
  | "unknown-member-kind";

export interface Diagnostic {
  severity: "warning";
  code: DiagnosticCode;
  message: string;
  identifier: string;
  expected?: string;
  actual?: string;
}

// --- Run results ---

export interface ExtractionOutput {
  packageNamespace?: string;
  classes: Map<string, ClassDescriptor>;
  warnings: Diagnostic[];
}

export interface DiscoveredHeader {
  path: string; // relative to the scanned root
  absolutePath: string;
  packageName: string;
  mtime: number;
  size: number;
}

// --- Tool results ---

export interface HeaderExtractResult {
  headerPath: string;
  packageNamespace?: string;
  classes: Record<string, ClassDescriptor>;
  warnings: Diagnostic[];
}

export interface ScannedHeader {
  path: string;
  packageName: string;
  classCount: number;
  warningCount: number;
  error?: string;
}

export interface HeaderScanResult {
  rootPath: string;
  headers: ScannedHeader[];
}
