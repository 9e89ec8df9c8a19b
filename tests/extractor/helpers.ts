import type { Argument, Entity, TypeHandle, TypeKind } from '../../src/types.js';

interface FakeTypeOptions {
  pointee?: TypeHandle;
  canonical?: TypeHandle;
  size?: number;
}

/** In-memory type handle; `sizeOf` throws when no size is given. */
export function fakeType(displayName: string, kind: TypeKind, opts: FakeTypeOptions = {}): TypeHandle {
  const handle: TypeHandle = {
    displayName,
    kind,
    pointee: () => opts.pointee,
    canonical: () => opts.canonical ?? handle,
    sizeOf: () => {
      if (opts.size === undefined) {
        throw new Error(`no layout for ${displayName}`);
      }
      return opts.size;
    },
  };
  return handle;
}

export const INT = fakeType('int', 'Int', { size: 4 });
export const VOID = fakeType('void', 'Void');
export const WIDGET_RECORD = fakeType('Widget', 'Record');
export const WIDGET_PTR = fakeType('Widget *', 'Pointer', { pointee: WIDGET_RECORD, size: 8 });

export function pkgId(pkg: string, rest: string): string {
  return `___finch_bindgen___${pkg}___class___${rest}`;
}

export function namespace(name: string, ...children: Entity[]): Entity {
  return { kind: 'Namespace', name, displayName: name, children };
}

export function translationUnit(...children: Entity[]): Entity {
  return { kind: 'TranslationUnit', name: 'test.h', children };
}

/** `namespace finch { namespace bindgen { namespace <pkg> { ... } } }` */
export function packageScope(pkg: string, ...children: Entity[]): Entity {
  return translationUnit(namespace('finch', namespace('bindgen', namespace(pkg, ...children))));
}

export function alias(name: string, comment?: string): Entity {
  return { kind: 'TypeAliasDecl', name, displayName: name, children: [], comment };
}

/** A function declaration; pass `null` for a result type the front end could not resolve. */
export function fn(
  name: string,
  args: Argument[],
  resultType: TypeHandle | null = VOID,
  comment?: string,
): Entity {
  return {
    kind: 'FunctionDecl',
    name,
    displayName: name,
    children: [],
    arguments: args,
    resultType: resultType ?? undefined,
    comment,
  };
}

export function arg(name: string | undefined, type: TypeHandle | undefined): Argument {
  return { name, type };
}
