import type {
  Argument,
  ConstructorDescriptor,
  DestructorDescriptor,
  Entity,
  GetterDescriptor,
  MethodDescriptor,
  SetterDescriptor,
  StaticDescriptor,
  TypeDescriptor,
  TypeHandle,
} from "../types.js";
import { ExtractionError } from "./errors.js";
import { buildTypeDescriptor } from "./type-descriptor.js";

/** Names every member descriptor shares. */
export interface MemberNames {
  className: string;
  fnName: string; // linkage-qualified logical name
  cFnName: string; // the C symbol
}

interface ArgumentList {
  argNames: string[];
  argTypes: TypeDescriptor[];
}

function argumentsOf(e: Entity, cFnName: string): Argument[] {
  if (!e.arguments) {
    throw new ExtractionError(`function '${cFnName}' has no argument list`);
  }
  return e.arguments;
}

function argumentType(arg: Argument, index: number, cFnName: string): TypeHandle {
  if (!arg.type) {
    throw new ExtractionError(
      `could not resolve the type of argument ${index} of '${cFnName}'`,
    );
  }
  return arg.type;
}

function resultTypeOf(e: Entity, cFnName: string): TypeDescriptor {
  if (!e.resultType) {
    throw new ExtractionError(`could not resolve the return type of '${cFnName}'`);
  }
  return buildTypeDescriptor(e.resultType);
}

/**
 * Collect names and types of `args`. `offset` is the position of the first
 * entry in the full parameter list and is only used in error messages.
 */
function collectArguments(args: Argument[], cFnName: string, offset: number = 0): ArgumentList {
  const argNames: string[] = [];
  const argTypes: TypeDescriptor[] = [];

  args.forEach((arg, i) => {
    const index = i + offset;
    if (!arg.name) {
      throw new ExtractionError(`argument ${index} of '${cFnName}' has no name`);
    }
    argNames.push(arg.name);
    argTypes.push(buildTypeDescriptor(argumentType(arg, index, cFnName)));
  });

  return { argNames, argTypes };
}

export function buildConstructor(names: MemberNames, e: Entity): ConstructorDescriptor {
  return {
    ...names,
    ...collectArguments(argumentsOf(e, names.cFnName), names.cFnName),
    comments: e.comment,
  };
}

export function buildDestructor(names: MemberNames): DestructorDescriptor {
  return { ...names };
}

/**
 * Build a method descriptor. The first argument is the receiver and is not
 * recorded; a method without one breaks the generator's contract.
 */
export function buildMethod(
  names: MemberNames,
  methodName: string,
  consume: boolean,
  e: Entity,
): MethodDescriptor {
  const [receiver, ...rest] = argumentsOf(e, names.cFnName);
  if (!receiver) {
    throw new ExtractionError(
      `method '${methodName}' of class '${names.className}' has no receiver argument`,
    );
  }

  return {
    className: names.className,
    methodName,
    fnName: names.fnName,
    cFnName: names.cFnName,
    returnType: resultTypeOf(e, names.cFnName),
    ...collectArguments(rest, names.cFnName, 1),
    comments: e.comment,
    consume,
  };
}

export function buildStatic(names: MemberNames, methodName: string, e: Entity): StaticDescriptor {
  return {
    className: names.className,
    methodName,
    fnName: names.fnName,
    cFnName: names.cFnName,
    returnType: resultTypeOf(e, names.cFnName),
    ...collectArguments(argumentsOf(e, names.cFnName), names.cFnName),
    comments: e.comment,
  };
}

export function buildGetter(names: MemberNames, fieldName: string, e: Entity): GetterDescriptor {
  return {
    className: names.className,
    fieldName,
    fnName: names.fnName,
    cFnName: names.cFnName,
    type: resultTypeOf(e, names.cFnName),
    comments: e.comment,
  };
}

/** The field type of a setter is its second argument; the first is the receiver. */
export function buildSetter(names: MemberNames, fieldName: string, e: Entity): SetterDescriptor {
  const value = argumentsOf(e, names.cFnName)[1];
  if (!value) {
    throw new ExtractionError(
      `setter '${fieldName}' of class '${names.className}' has no value argument`,
    );
  }

  return {
    className: names.className,
    fieldName,
    fnName: names.fnName,
    cFnName: names.cFnName,
    type: buildTypeDescriptor(argumentType(value, 1, names.cFnName)),
    comments: e.comment,
  };
}
