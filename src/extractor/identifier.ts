import type { Diagnostic, DiagnosticCode } from "../types.js";

export const IDENTIFIER_PREFIX = "___finch_bindgen";
export const FIELD_DELIMITER = "___";

// ["", "finch_bindgen", <package>, "class", <class>, <member kind>, <member name>]
const PREFIX_FIELD = "finch_bindgen";
const CLASS_SCOPE = "class";
const ALIAS_FIELD_COUNT = 5;
const DROP_FIELD_COUNT = 6;
const MEMBER_FIELD_COUNT = 7;

/** Decoded member role, from the fields after the class name. */
export type MemberKind =
  | { kind: "destructor" }
  | { kind: "constructor" }
  | { kind: "method"; name: string; consume: boolean }
  | { kind: "static"; name: string }
  | { kind: "getter"; name: string }
  | { kind: "setter"; name: string };

export type DecodeFailure = { valid: false; diagnostic: Diagnostic };

export type ClassScopeResult =
  | { valid: true; className: string; fields: string[] }
  | DecodeFailure;

export type AliasResult = { valid: true; className: string } | DecodeFailure;

export type MemberKindResult = { valid: true; member: MemberKind } | DecodeFailure;

function fail(
  code: DiagnosticCode,
  identifier: string,
  message: string,
  expected?: string,
  actual?: string,
): DecodeFailure {
  const diagnostic: Diagnostic = { severity: "warning", code, message, identifier };
  if (expected !== undefined) diagnostic.expected = expected;
  if (actual !== undefined) diagnostic.actual = actual;
  return { valid: false, diagnostic };
}

function malformed(identifier: string): DecodeFailure {
  return fail("malformed-identifier", identifier, `malformed identifier '${identifier}'`);
}

/**
 * Decode the shared head of every class-scoped identifier:
 * prefix, package namespace, the `class` scope and the class name.
 */
export function decodeClassScope(identifier: string, packageNamespace: string): ClassScopeResult {
  if (!identifier.startsWith(IDENTIFIER_PREFIX)) {
    return fail("unknown-identifier", identifier, `unknown identifier found '${identifier}'`);
  }

  const fields = identifier.split(FIELD_DELIMITER);
  if (fields.length < 3 || fields[0] !== "" || fields[1] !== PREFIX_FIELD) {
    return malformed(identifier);
  }

  if (fields[2] !== packageNamespace) {
    return fail(
      "namespace-mismatch",
      identifier,
      `namespace mismatch, expected '${packageNamespace}', got '${fields[2]}'`,
      packageNamespace,
      fields[2],
    );
  }

  if (fields.length < 4) {
    return malformed(identifier);
  }
  if (fields[3] !== CLASS_SCOPE) {
    return fail(
      "unknown-scope",
      identifier,
      `unknown symbol scope '${fields[3]}' in '${identifier}'`,
      CLASS_SCOPE,
      fields[3],
    );
  }

  if (fields.length < ALIAS_FIELD_COUNT || fields[4] === "") {
    return malformed(identifier);
  }

  return { valid: true, className: fields[4], fields };
}

/** Decode the identifier of an opaque class handle alias. */
export function decodeAliasIdentifier(identifier: string, packageNamespace: string): AliasResult {
  const scope = decodeClassScope(identifier, packageNamespace);
  if (!scope.valid) {
    return scope;
  }
  if (scope.fields.length !== ALIAS_FIELD_COUNT) {
    return malformed(identifier);
  }
  return { valid: true, className: scope.className };
}

/** Decode the member kind and name of a function identifier. */
export function decodeMemberKind(identifier: string, fields: string[]): MemberKindResult {
  if (fields.length <= ALIAS_FIELD_COUNT) {
    return malformed(identifier);
  }

  const keyword = fields[5];
  const name = fields[6] ?? "";
  const named = fields.length === MEMBER_FIELD_COUNT && name !== "";

  switch (keyword) {
    case "drop":
      if (fields.length !== DROP_FIELD_COUNT) return malformed(identifier);
      return { valid: true, member: { kind: "destructor" } };

    case "method":
    case "method_consume":
      if (!named) return malformed(identifier);
      return {
        valid: true,
        member: { kind: "method", name, consume: keyword === "method_consume" },
      };

    case "static":
      if (!named) return malformed(identifier);
      return {
        valid: true,
        member: name === "new" ? { kind: "constructor" } : { kind: "static", name },
      };

    case "getter":
      if (!named) return malformed(identifier);
      return { valid: true, member: { kind: "getter", name } };

    case "setter":
      if (!named) return malformed(identifier);
      return { valid: true, member: { kind: "setter", name } };

    default:
      return fail(
        "unknown-member-kind",
        identifier,
        `unknown member kind '${keyword}' in '${identifier}'`,
        undefined,
        keyword,
      );
  }
}
