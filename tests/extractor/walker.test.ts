import { describe, it, expect } from 'vitest';
import { extractBindings, classesToRecord, ExtractionError } from '../../src/extractor/index.js';
import type { Diagnostic, Entity } from '../../src/types.js';
import {
  INT,
  VOID,
  WIDGET_PTR,
  alias,
  arg,
  fn,
  namespace,
  packageScope,
  pkgId,
  translationUnit,
} from './helpers.js';

const WIDGET = pkgId('pkg', 'Widget');

describe('extractBindings', () => {
  it('builds a class with only a constructor', () => {
    const root = packageScope('pkg', alias(WIDGET), fn(`${WIDGET}___static___new`, [], WIDGET_PTR));

    const output = extractBindings(root);

    expect(output.packageNamespace).toBe('pkg');
    expect(output.warnings).toEqual([]);
    expect([...output.classes.keys()]).toEqual(['Widget']);

    const widget = output.classes.get('Widget');
    expect(widget?.cName).toBe(`finch::bindgen::pkg::${WIDGET}`);
    expect(widget?.ctor).toEqual({
      className: 'Widget',
      fnName: `finch::bindgen::pkg::${WIDGET}___static___new`,
      cFnName: `${WIDGET}___static___new`,
      argNames: [],
      argTypes: [],
      comments: undefined,
    });
    expect(widget?.dtor).toBeUndefined();
    expect(widget?.statics).toEqual([]);
    expect(widget?.methods).toEqual([]);
    expect(widget?.getters).toEqual([]);
    expect(widget?.setters).toEqual([]);
  });

  it('aborts when a member appears before its class', () => {
    const root = packageScope(
      'pkg',
      fn(`${pkgId('pkg', 'Gadget')}___getter___level`, [arg('self', WIDGET_PTR)], INT),
      alias(pkgId('pkg', 'Gadget')),
    );

    expect(() => extractBindings(root)).toThrow(ExtractionError);
    expect(() => extractBindings(root)).toThrow("failed to find class 'Gadget'");
  });

  it('warns and skips identifiers for another package', () => {
    const root = packageScope(
      'pkg',
      alias(WIDGET),
      fn(`${pkgId('other_pkg', 'Widget')}___method___poke`, [arg('self', WIDGET_PTR)]),
    );
    const seen: Diagnostic[] = [];

    const output = extractBindings(root, { onWarning: (d) => seen.push(d) });

    expect(output.warnings).toHaveLength(1);
    expect(output.warnings[0].code).toBe('namespace-mismatch');
    expect(seen).toEqual(output.warnings);
    expect(output.classes.get('Widget')?.methods).toEqual([]);
  });

  it('takes the setter type from the value argument, not the receiver', () => {
    const root = packageScope(
      'pkg',
      alias(WIDGET),
      fn(`${WIDGET}___setter___count`, [arg('self', WIDGET_PTR), arg('value', INT)], VOID),
    );

    const setter = extractBindings(root).classes.get('Widget')?.setters[0];

    expect(setter?.fieldName).toBe('count');
    expect(setter?.type).toEqual({ displayName: 'int', kind: 'Int', byteSize: 4 });
  });

  it('strips the receiver from method arguments', () => {
    const root = packageScope(
      'pkg',
      alias(WIDGET),
      fn(
        `${WIDGET}___method___resize`,
        [arg('self', WIDGET_PTR), arg('width', INT), arg('height', INT)],
        VOID,
        '/// Resize in place.',
      ),
    );

    const method = extractBindings(root).classes.get('Widget')?.methods[0];

    expect(method?.methodName).toBe('resize');
    expect(method?.argNames).toEqual(['width', 'height']);
    expect(method?.argTypes.map((t) => t.displayName)).toEqual(['int', 'int']);
    expect(method?.returnType).toEqual({ displayName: 'void', kind: 'Void' });
    expect(method?.consume).toBe(false);
    expect(method?.comments).toBe('/// Resize in place.');
  });

  it('keeps declaration order within each member list', () => {
    const root = packageScope(
      'pkg',
      alias(WIDGET),
      fn(`${WIDGET}___getter___b`, [arg('self', WIDGET_PTR)], INT),
      fn(`${WIDGET}___method_consume___finish`, [arg('self', WIDGET_PTR)]),
      fn(`${WIDGET}___getter___a`, [arg('self', WIDGET_PTR)], INT),
      fn(`${WIDGET}___method___start`, [arg('self', WIDGET_PTR)]),
      fn(`${WIDGET}___static___zero`, [], INT),
    );

    const widget = extractBindings(root).classes.get('Widget');

    expect(widget?.getters.map((g) => g.fieldName)).toEqual(['b', 'a']);
    expect(widget?.methods.map((m) => [m.methodName, m.consume])).toEqual([
      ['finish', true],
      ['start', false],
    ]);
    expect(widget?.statics.map((s) => s.methodName)).toEqual(['zero']);
  });

  it('keeps the last constructor and destructor seen', () => {
    const root = packageScope(
      'pkg',
      alias(WIDGET),
      fn(`${WIDGET}___static___new`, [arg('a', INT)], WIDGET_PTR),
      fn(`${WIDGET}___drop`, [arg('self', WIDGET_PTR)]),
      fn(`${WIDGET}___static___new`, [arg('b', INT)], WIDGET_PTR),
      fn(`${WIDGET}___drop`, [arg('this', WIDGET_PTR)]),
    );

    const widget = extractBindings(root).classes.get('Widget');

    expect(widget?.ctor?.argNames).toEqual(['b']);
    expect(widget?.dtor).toEqual({
      className: 'Widget',
      fnName: `finch::bindgen::pkg::${WIDGET}___drop`,
      cFnName: `${WIDGET}___drop`,
    });
  });

  it('does not replace a class when its alias repeats', () => {
    const root = packageScope(
      'pkg',
      alias(WIDGET, '/// First.'),
      fn(`${WIDGET}___getter___size`, [arg('self', WIDGET_PTR)], INT),
      alias(WIDGET, '/// Second.'),
    );

    const widget = extractBindings(root).classes.get('Widget');

    expect(widget?.comments).toBe('/// First.');
    expect(widget?.getters).toHaveLength(1);
  });

  it('descends into extern "C" blocks only inside the package namespaces', () => {
    const externC = (...children: Entity[]): Entity => ({ kind: 'UnexposedDecl', children });
    const root = translationUnit(
      externC(alias(pkgId('pkg', 'Early'))),
      namespace(
        'finch',
        namespace(
          'bindgen',
          namespace('pkg', externC(alias(WIDGET), fn(`${WIDGET}___drop`, [arg('self', WIDGET_PTR)]))),
        ),
      ),
    );

    const output = extractBindings(root);

    expect([...output.classes.keys()]).toEqual(['Widget']);
    expect(output.classes.get('Widget')?.dtor?.cFnName).toBe(`${WIDGET}___drop`);
  });

  it('reports unknown namespaces inside the root and skips their contents', () => {
    const root = translationUnit(
      namespace('std', alias(WIDGET)),
      namespace('finch', namespace('detail', alias(WIDGET)), namespace('bindgen', namespace('pkg'))),
    );

    const output = extractBindings(root);

    expect(output.warnings).toEqual([
      {
        severity: 'warning',
        code: 'unknown-namespace',
        message: "unknown namespace found 'detail'",
        identifier: 'detail',
      },
    ]);
    expect(output.packageNamespace).toBe('pkg');
    expect(output.classes.size).toBe(0);
  });

  it('reports anonymous namespaces inside the root', () => {
    const anonymous: Entity = { kind: 'Namespace', children: [alias(WIDGET)] };
    const root = translationUnit(
      { kind: 'Namespace', children: [] },
      namespace('finch', anonymous),
    );

    const output = extractBindings(root);

    expect(output.warnings.map((w) => w.message)).toEqual(["unknown namespace found '<anonymous>'"]);
    expect(output.classes.size).toBe(0);
  });

  it('ignores aliases and functions before the package namespace', () => {
    const root = translationUnit(alias(WIDGET), fn(`${WIDGET}___drop`, [arg('self', WIDGET_PTR)]));

    const output = extractBindings(root);

    expect(output.packageNamespace).toBeUndefined();
    expect(output.classes.size).toBe(0);
    expect(output.warnings).toEqual([]);
  });

  it('warns on unprefixed functions and keeps going', () => {
    const root = packageScope(
      'pkg',
      alias(WIDGET),
      fn('finch_bindgen_version', []),
      fn(`${WIDGET}___drop`, [arg('self', WIDGET_PTR)]),
    );

    const output = extractBindings(root);

    expect(output.warnings.map((w) => w.code)).toEqual(['unknown-identifier']);
    expect(output.classes.get('Widget')?.dtor).toBeDefined();
  });

  describe('contract violations', () => {
    it('rejects a method without a receiver', () => {
      const root = packageScope('pkg', alias(WIDGET), fn(`${WIDGET}___method___poke`, []));

      expect(() => extractBindings(root)).toThrow(
        "method 'poke' of class 'Widget' has no receiver argument",
      );
    });

    it('rejects a setter without a value argument', () => {
      const root = packageScope(
        'pkg',
        alias(WIDGET),
        fn(`${WIDGET}___setter___count`, [arg('self', WIDGET_PTR)]),
      );

      expect(() => extractBindings(root)).toThrow(
        "setter 'count' of class 'Widget' has no value argument",
      );
    });

    it('rejects unnamed arguments with their position', () => {
      const root = packageScope(
        'pkg',
        alias(WIDGET),
        fn(`${WIDGET}___method___resize`, [arg('self', WIDGET_PTR), arg(undefined, INT)]),
      );

      expect(() => extractBindings(root)).toThrow(
        `argument 1 of '${WIDGET}___method___resize' has no name`,
      );
    });

    it('rejects unresolved argument types', () => {
      const root = packageScope(
        'pkg',
        alias(WIDGET),
        fn(`${WIDGET}___static___new`, [arg('size', undefined)], WIDGET_PTR),
      );

      expect(() => extractBindings(root)).toThrow(
        `could not resolve the type of argument 0 of '${WIDGET}___static___new'`,
      );
    });

    it('rejects an unresolved return type', () => {
      const root = packageScope(
        'pkg',
        alias(WIDGET),
        fn(`${WIDGET}___getter___size`, [arg('self', WIDGET_PTR)], null),
      );

      expect(() => extractBindings(root)).toThrow(
        `could not resolve the return type of '${WIDGET}___getter___size'`,
      );
    });
  });
});

describe('classesToRecord', () => {
  it('orders classes by name', () => {
    const root = packageScope('pkg', alias(pkgId('pkg', 'Zebra')), alias(pkgId('pkg', 'Apple')));

    const record = classesToRecord(extractBindings(root).classes);

    expect(Object.keys(record)).toEqual(['Apple', 'Zebra']);
  });

  it('keeps a class named __proto__ as an own key', () => {
    const root = packageScope('pkg', alias(pkgId('pkg', '__proto__')), alias(pkgId('pkg', 'Apple')));

    const record = classesToRecord(extractBindings(root).classes);

    expect(Object.keys(record)).toEqual(['Apple', '__proto__']);
    expect(Object.getPrototypeOf(record)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(record, '__proto__')?.value?.cName).toBe(
      `finch::bindgen::pkg::${pkgId('pkg', '__proto__')}`,
    );
    expect(Object.keys(JSON.parse(JSON.stringify(record)))).toEqual(['Apple', '__proto__']);
  });
});
