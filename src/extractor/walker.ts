import type { ClassDescriptor, Diagnostic, Entity } from "../types.js";
import { attachMember, createClassDescriptor } from "./class-descriptor.js";
import type { ClassMember } from "./class-descriptor.js";
import { ExtractionError } from "./errors.js";
import { decodeAliasIdentifier, decodeClassScope, decodeMemberKind } from "./identifier.js";
import type { MemberKind } from "./identifier.js";
import {
  buildConstructor,
  buildDestructor,
  buildGetter,
  buildMethod,
  buildSetter,
  buildStatic,
} from "./members.js";
import type { MemberNames } from "./members.js";
import { eligiblePackage, enterNamespace, qualifiedName } from "./state.js";
import type { TraversalState } from "./state.js";

/** Mutable accumulator plus the sink for skip warnings, threaded through the walk. */
export interface WalkContext {
  state: TraversalState;
  report: (diagnostic: Diagnostic) => void;
}

function processChildren(ctx: WalkContext, e: Entity): void {
  for (const child of e.children) {
    processEntity(ctx, child);
  }
}

function handleNamespace(ctx: WalkContext, e: Entity): void {
  const name = e.name ?? "";
  if (name === "") {
    if (ctx.state.enteredRoot) {
      ctx.report({
        severity: "warning",
        code: "unknown-namespace",
        message: "unknown namespace found '<anonymous>'",
        identifier: "<anonymous>",
      });
    }
    return;
  }

  switch (enterNamespace(ctx.state, name)) {
    case "enter":
      processChildren(ctx, e);
      break;
    case "unexpected":
      ctx.report({
        severity: "warning",
        code: "unknown-namespace",
        message: `unknown namespace found '${name}'`,
        identifier: name,
      });
      break;
    case "ignored":
      break;
  }
}

function handleTypeAlias(ctx: WalkContext, e: Entity): void {
  const packageNamespace = eligiblePackage(ctx.state);
  if (packageNamespace === undefined) return;

  const identifier = e.name ?? "";
  const decoded = decodeAliasIdentifier(identifier, packageNamespace);
  if (!decoded.valid) {
    ctx.report(decoded.diagnostic);
    return;
  }

  if (ctx.state.classes.has(decoded.className)) return;

  const cName = qualifiedName(packageNamespace, e.displayName ?? identifier);
  ctx.state.classes.set(decoded.className, createClassDescriptor(decoded.className, cName, e));
}

function requireClass(state: TraversalState, className: string): ClassDescriptor {
  const cls = state.classes.get(className);
  if (!cls) {
    throw new ExtractionError(`failed to find class '${className}'`);
  }
  return cls;
}

function buildMember(names: MemberNames, member: MemberKind, e: Entity): ClassMember {
  switch (member.kind) {
    case "constructor":
      return { kind: "constructor", descriptor: buildConstructor(names, e) };
    case "destructor":
      return { kind: "destructor", descriptor: buildDestructor(names) };
    case "method":
      return { kind: "method", descriptor: buildMethod(names, member.name, member.consume, e) };
    case "static":
      return { kind: "static", descriptor: buildStatic(names, member.name, e) };
    case "getter":
      return { kind: "getter", descriptor: buildGetter(names, member.name, e) };
    case "setter":
      return { kind: "setter", descriptor: buildSetter(names, member.name, e) };
  }
}

function handleFunction(ctx: WalkContext, e: Entity): void {
  const packageNamespace = eligiblePackage(ctx.state);
  if (packageNamespace === undefined) return;

  const cFnName = e.name ?? "";
  const scope = decodeClassScope(cFnName, packageNamespace);
  if (!scope.valid) {
    ctx.report(scope.diagnostic);
    return;
  }

  // A missing class means members were emitted before their owner
  const cls = requireClass(ctx.state, scope.className);

  const decoded = decodeMemberKind(cFnName, scope.fields);
  if (!decoded.valid) {
    ctx.report(decoded.diagnostic);
    return;
  }

  const names: MemberNames = {
    className: scope.className,
    fnName: qualifiedName(packageNamespace, cFnName),
    cFnName,
  };
  attachMember(cls, buildMember(names, decoded.member, e));
}

/**
 * Visit a declaration and its subtree, decoding binding symbols into
 * `ctx.state.classes`. Throws `ExtractionError` on contract violations.
 */
export function processEntity(ctx: WalkContext, e: Entity): void {
  switch (e.kind) {
    case "TranslationUnit":
      processChildren(ctx, e);
      break;

    case "Namespace":
      handleNamespace(ctx, e);
      break;

    // extern "C" blocks
    case "UnexposedDecl":
      if (ctx.state.enteredRoot && ctx.state.enteredInternal) {
        processChildren(ctx, e);
      }
      break;

    case "TypeAliasDecl":
      handleTypeAlias(ctx, e);
      break;

    case "FunctionDecl":
      handleFunction(ctx, e);
      break;

    default:
      break;
  }
}
