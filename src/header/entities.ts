import type Parser from "tree-sitter";
import type { Argument, Entity, EntityKind } from "../types.js";
import { isBuiltinType, normalizeSizedType } from "./builtins.js";
import { TypeScope, spellType } from "./type-system.js";
import type { TagKeyword, TypeSpec } from "./type-system.js";

/** Node types that may sit in a `declarator` field. */
const DECLARATOR_NODES = new Set([
  "identifier",
  "field_identifier",
  "type_identifier",
  "qualified_identifier",
  "pointer_declarator",
  "reference_declarator",
  "array_declarator",
  "function_declarator",
  "parenthesized_declarator",
  "init_declarator",
]);

const NAME_NODES = new Set([
  "identifier",
  "field_identifier",
  "type_identifier",
  "qualified_identifier",
  "destructor_name",
  "operator_name",
]);

const TAG_SPECIFIERS: Record<string, TagKeyword> = {
  struct_specifier: "struct",
  class_specifier: "class",
  union_specifier: "union",
  enum_specifier: "enum",
};

const TAG_ENTITY_KINDS: Record<TagKeyword, EntityKind> = {
  struct: "StructDecl",
  class: "ClassDecl",
  union: "UnionDecl",
  enum: "EnumDecl",
};

interface ParsedParameter {
  name?: string;
  type: TypeSpec;
}

/** Result of reading a declarator chain inside-out. */
interface Declarator {
  name?: string;
  type: TypeSpec;
  /** Parameters of the function declarator closest to the name. */
  parameters?: ParsedParameter[];
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function hasConst(node: Parser.SyntaxNode): boolean {
  return node.children.some((c) => c.type === "type_qualifier" && c.text === "const");
}

function tagKeyword(node: Parser.SyntaxNode): TagKeyword | undefined {
  return Object.prototype.hasOwnProperty.call(TAG_SPECIFIERS, node.type)
    ? TAG_SPECIFIERS[node.type]
    : undefined;
}

/** Name of a struct/union/enum specifier; anonymous ones are named after their position. */
function tagName(node: Parser.SyntaxNode, keyword: TagKeyword): string {
  const nameNode = node.childForFieldName("name");
  if (nameNode) return nameNode.text;
  return `(unnamed ${keyword} at ${node.startPosition.row + 1}:${node.startPosition.column + 1})`;
}

/** Declarator children of a declaration-like node, excluding its type. */
function declaratorsOf(node: Parser.SyntaxNode): Parser.SyntaxNode[] {
  const typeNode = node.childForFieldName("type");
  return node.namedChildren.filter(
    (c) => DECLARATOR_NODES.has(c.type) && (!typeNode || c.startIndex !== typeNode.startIndex),
  );
}

function namedOrBuiltin(name: string, isConst: boolean): TypeSpec {
  return isBuiltinType(name)
    ? { tag: "builtin", name, isConst }
    : { tag: "named", name, isConst };
}

function typeSpecFromNode(node: Parser.SyntaxNode | null, isConst: boolean): TypeSpec {
  if (!node) {
    return { tag: "named", name: "", isConst };
  }

  const keyword = tagKeyword(node);
  if (keyword) {
    return { tag: "elaborated", keyword, name: tagName(node, keyword), isConst };
  }

  switch (node.type) {
    case "sized_type_specifier":
      return { tag: "builtin", name: normalizeSizedType(node.text), isConst };
    // `std::uint32_t` and friends
    case "qualified_identifier": {
      const segments = node.text.split("::");
      return namedOrBuiltin(segments[segments.length - 1].trim(), isConst);
    }
    default:
      return namedOrBuiltin(node.text, isConst);
  }
}

/** Array and function parameters are adjusted to pointers. */
function decay(spec: TypeSpec): TypeSpec {
  if (spec.tag === "array") {
    return { tag: "pointer", pointee: spec.element, isConst: false };
  }
  if (spec.tag === "function") {
    return { tag: "pointer", pointee: spec, isConst: false };
  }
  return spec;
}

function parseParameterList(list: Parser.SyntaxNode | null): {
  params: ParsedParameter[];
  variadic: boolean;
} {
  if (!list) return { params: [], variadic: false };

  let variadic = list.children.some((c) => c.type === "...");
  const params: ParsedParameter[] = [];

  for (const child of list.namedChildren) {
    if (child.type === "parameter_declaration" || child.type === "optional_parameter_declaration") {
      const base = typeSpecFromNode(child.childForFieldName("type"), hasConst(child));
      const d = applyDeclarator(base, child.childForFieldName("declarator"));
      params.push({ name: d.name, type: decay(d.type) });
    } else if (child.type === "variadic_parameter_declaration") {
      variadic = true;
    }
  }

  // `(void)` declares no parameters
  if (params.length === 1) {
    const only = params[0];
    if (!only.name && only.type.tag === "builtin" && only.type.name === "void" && !only.type.isConst) {
      return { params: [], variadic };
    }
  }

  return { params, variadic };
}

/**
 * Apply a declarator chain to a base type. C declarators read inside-out:
 * `int *f(char)` wraps the name in a function declarator inside a pointer
 * declarator, giving "function returning pointer to int".
 */
function applyDeclarator(base: TypeSpec, node: Parser.SyntaxNode | null): Declarator {
  if (!node) return { type: base };
  if (NAME_NODES.has(node.type)) return { name: node.text, type: base };

  switch (node.type) {
    case "pointer_declarator":
    case "abstract_pointer_declarator":
      return applyDeclarator(
        { tag: "pointer", pointee: base, isConst: hasConst(node) },
        node.childForFieldName("declarator"),
      );

    case "reference_declarator":
    case "abstract_reference_declarator": {
      const rvalue = node.children.some((c) => c.type === "&&");
      const inner = node.namedChildren.find((c) => c.type !== "type_qualifier") ?? null;
      return applyDeclarator({ tag: "reference", pointee: base, rvalue }, inner);
    }

    case "function_declarator":
    case "abstract_function_declarator": {
      const { params, variadic } = parseParameterList(node.childForFieldName("parameters"));
      const fn: TypeSpec = {
        tag: "function",
        result: base,
        params: params.map((p) => p.type),
        variadic,
      };
      const inner = applyDeclarator(fn, node.childForFieldName("declarator"));
      return inner.parameters ? inner : { ...inner, parameters: params };
    }

    case "array_declarator":
    case "abstract_array_declarator": {
      const size = node.childForFieldName("size");
      const length = size && /^\d+$/.test(size.text) ? Number(size.text) : undefined;
      return applyDeclarator(
        { tag: "array", element: base, length },
        node.childForFieldName("declarator"),
      );
    }

    case "parenthesized_declarator":
    case "abstract_parenthesized_declarator":
      return applyDeclarator(base, node.namedChildren[0] ?? null);

    case "init_declarator":
      return applyDeclarator(base, node.childForFieldName("declarator"));

    default:
      return { type: base };
  }
}

// ---------------------------------------------------------------------------
// Pass 1: declared type names
// ---------------------------------------------------------------------------

function recordFields(body: Parser.SyntaxNode): { fields: TypeSpec[]; hasBitFields: boolean } {
  const fields: TypeSpec[] = [];
  let hasBitFields = false;

  for (const child of body.namedChildren) {
    if (child.type !== "field_declaration") continue;
    if (child.children.some((c) => c.type === "storage_class_specifier" && c.text === "static")) {
      continue;
    }

    if (child.namedChildren.some((c) => c.type === "bitfield_clause")) {
      hasBitFields = true;
    }

    const typeNode = child.childForFieldName("type");
    const base = typeSpecFromNode(typeNode, hasConst(child));
    const declarators = declaratorsOf(child);

    // anonymous nested struct/union members
    if (declarators.length === 0 && typeNode && tagKeyword(typeNode)) {
      fields.push(base);
      continue;
    }

    for (const declarator of declarators) {
      const d = applyDeclarator(base, declarator);
      if (d.type.tag !== "function") fields.push(d.type);
    }
  }

  return { fields, hasBitFields };
}

function collectDeclarations(root: Parser.SyntaxNode, scope: TypeScope): void {
  const nodes = root.descendantsOfType([
    "alias_declaration",
    "type_definition",
    ...Object.keys(TAG_SPECIFIERS),
  ]);

  for (const node of nodes) {
    switch (node.type) {
      case "alias_declaration": {
        const name = node.childForFieldName("name");
        const descriptor = node.childForFieldName("type");
        if (!name || !descriptor) break;
        const base = typeSpecFromNode(descriptor.childForFieldName("type"), hasConst(descriptor));
        scope.declareAlias(
          name.text,
          applyDeclarator(base, descriptor.childForFieldName("declarator")).type,
        );
        break;
      }

      case "type_definition": {
        const base = typeSpecFromNode(node.childForFieldName("type"), hasConst(node));
        for (const declarator of declaratorsOf(node)) {
          const d = applyDeclarator(base, declarator);
          if (d.name) scope.declareAlias(d.name, d.type);
        }
        break;
      }

      default: {
        const keyword = tagKeyword(node);
        if (!keyword) break;
        const name = tagName(node, keyword);
        const body = node.childForFieldName("body");

        if (keyword === "enum") {
          // `enum Color c` refers to an enum, it does not redeclare it
          if (!body && scope.lookupTag(name)) break;
          const base = node.childForFieldName("base");
          scope.declareEnum(name, base ? typeSpecFromNode(base, false) : undefined);
        } else {
          if (body) {
            const { fields, hasBitFields } = recordFields(body);
            scope.declareRecord(name, keyword === "union", fields, hasBitFields);
          } else {
            scope.declareRecord(name, keyword === "union");
          }
        }
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Pass 2: entities
// ---------------------------------------------------------------------------

function isDocComment(text: string): boolean {
  if (text.startsWith("///<") || text.startsWith("//!<")) return false;
  if (text.startsWith("///")) return !text.startsWith("////");
  if (text.startsWith("//!") || text.startsWith("/*!")) return true;
  return text.startsWith("/**") && !text.startsWith("/**/");
}

function sameNode(a: Parser.SyntaxNode | null, b: Parser.SyntaxNode): boolean {
  return a !== null && a.startIndex === b.startIndex && a.endIndex === b.endIndex;
}

/** Parses a standalone snippet with the header's grammar. */
export type Reparse = (source: string) => Parser.Tree;

class EntityBuilder {
  constructor(
    private readonly scope: TypeScope,
    private readonly reparse: Reparse,
  ) {}

  /**
   * Adapt a run of sibling nodes. Doc comments directly above a declaration
   * (no blank line between) are attached to it.
   */
  children(nodes: Parser.SyntaxNode[]): Entity[] {
    const entities: Entity[] = [];
    let pending: { lines: string[]; endRow: number } | null = null;

    for (const node of nodes) {
      if (node.type === "comment") {
        if (!isDocComment(node.text)) {
          pending = null;
        } else if (pending && node.startPosition.row <= pending.endRow + 1) {
          pending.lines.push(node.text);
          pending.endRow = node.endPosition.row;
        } else {
          pending = { lines: [node.text], endRow: node.endPosition.row };
        }
        continue;
      }

      const comment =
        pending && node.startPosition.row <= pending.endRow + 1
          ? pending.lines.join("\n")
          : undefined;
      pending = null;
      entities.push(...this.node(node, comment));
    }

    return entities;
  }

  node(node: Parser.SyntaxNode, comment: string | undefined): Entity[] {
    switch (node.type) {
      case "namespace_definition":
        return [this.namespace(node, comment)];

      case "linkage_specification": {
        const body = node.childForFieldName("body");
        let children: Entity[] = [];
        if (body && body.type === "declaration_list") {
          children = this.children(body.namedChildren);
        } else if (body) {
          // `extern "C" void f();` documents the inner declaration
          children = this.node(body, comment);
        }
        return [{ kind: "UnexposedDecl", children }];
      }

      case "alias_declaration": {
        const name = node.childForFieldName("name")?.text;
        return [{ kind: "TypeAliasDecl", name, displayName: name, children: [], comment }];
      }

      case "type_definition": {
        const base = typeSpecFromNode(node.childForFieldName("type"), false);
        const name = declaratorsOf(node)
          .map((d) => applyDeclarator(base, d).name)
          .find((n) => n !== undefined);
        return [{ kind: "TypedefDecl", name, displayName: name, children: [], comment }];
      }

      case "declaration":
        return this.declaration(node, comment);

      // Only the branch taken when the condition holds is read
      case "preproc_if":
      case "preproc_ifdef": {
        const skipped = [
          node.childForFieldName("condition"),
          node.childForFieldName("name"),
          node.childForFieldName("alternative"),
        ];
        return this.children(
          node.namedChildren.filter((c) => !skipped.some((s) => sameNode(s, c))),
        );
      }

      default: {
        const keyword = tagKeyword(node);
        if (keyword) {
          const name = tagName(node, keyword);
          return [
            { kind: TAG_ENTITY_KINDS[keyword], name, displayName: name, children: [], comment },
          ];
        }
        return [{ kind: "Other", displayName: node.type, children: [] }];
      }
    }
  }

  private namespace(node: Parser.SyntaxNode, comment: string | undefined): Entity {
    const nameNode = node.childForFieldName("name");
    const body = node.childForFieldName("body");
    const children = body ? this.children(body.namedChildren) : [];

    // `namespace a::b { ... }` nests like `namespace a { namespace b { ... } }`
    const segments = nameNode
      ? nameNode.text.split("::").map((s) => s.trim()).filter((s) => s !== "")
      : [];
    if (segments.length === 0) {
      return { kind: "Namespace", children, comment };
    }

    let entity: Entity = { kind: "Namespace", children };
    for (let i = segments.length - 1; i >= 0; i--) {
      const name = segments[i];
      entity = {
        kind: "Namespace",
        name,
        displayName: name,
        children: i === segments.length - 1 ? children : [entity],
      };
    }
    entity.comment = comment;
    return entity;
  }

  private declaration(node: Parser.SyntaxNode, comment: string | undefined): Entity[] {
    const typeNode = node.childForFieldName("type");
    const declarators = declaratorsOf(node);

    // `struct Widget;` and friends
    if (declarators.length === 0) {
      return typeNode && tagKeyword(typeNode)
        ? this.node(typeNode, comment)
        : [{ kind: "Other", displayName: node.type, children: [] }];
    }

    const base = typeSpecFromNode(typeNode, hasConst(node));
    const first = declarators[0];
    const d =
      (first.type === "init_declarator" ? this.asFunctionDeclarator(node, typeNode, first) : undefined) ??
      applyDeclarator(base, first);
    if (d.type.tag !== "function" || !d.name || !d.parameters) {
      return [{ kind: "Other", name: d.name, displayName: d.name, children: [] }];
    }

    const params = d.parameters;
    const args: Argument[] = params.map((p) => ({
      name: p.name,
      type: this.scope.resolve(p.type),
    }));

    return [
      {
        kind: "FunctionDecl",
        name: d.name,
        displayName: `${d.name}(${params.map((p) => spellType(p.type)).join(", ")})`,
        children: [],
        arguments: args,
        resultType: this.scope.resolve(d.type.result),
        comment,
      },
    ];
  }

  /**
   * `void f(W *self, void (*cb)(W *a));` also reads as a variable `f`
   * initialised with `(W * self, ...)`, since `W` is not known to be a type.
   * A typedef takes no initialiser, so the same text reparsed as one yields
   * the function declarator.
   */
  private asFunctionDeclarator(
    node: Parser.SyntaxNode,
    typeNode: Parser.SyntaxNode | null,
    declarator: Parser.SyntaxNode,
  ): Declarator | undefined {
    if (declarator.childForFieldName("value")?.type !== "argument_list") return undefined;

    const start = node.children.findIndex((c) => c.type === "type_qualifier" || sameNode(typeNode, c));
    const end = node.children.findIndex((c) => sameNode(declarator, c));
    if (start < 0 || end < start) return undefined;

    const text = node.children.slice(start, end + 1).map((c) => c.text).join(" ");
    const typedef = this.reparse(`typedef ${text};`).rootNode.namedChildren[0];
    if (!typedef || typedef.type !== "type_definition" || typedef.descendantsOfType("ERROR").length > 0) {
      return undefined;
    }

    const [inner] = declaratorsOf(typedef);
    if (!inner) return undefined;
    const d = applyDeclarator(
      typeSpecFromNode(typedef.childForFieldName("type"), hasConst(typedef)),
      inner,
    );
    return d.type.tag === "function" && d.name && d.parameters ? d : undefined;
  }
}

/**
 * Turn a tree-sitter C++ parse tree into the declaration tree the extractor
 * walks. Type names are collected from the whole header first, so a
 * declaration may use a type declared after it.
 */
export function buildTranslationUnit(tree: Parser.Tree, filePath: string, reparse: Reparse): Entity {
  const scope = new TypeScope();
  collectDeclarations(tree.rootNode, scope);

  const builder = new EntityBuilder(scope, reparse);
  return {
    kind: "TranslationUnit",
    name: filePath,
    displayName: filePath,
    children: builder.children(tree.rootNode.namedChildren),
  };
}
