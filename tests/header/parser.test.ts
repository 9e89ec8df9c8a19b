import { describe, it, expect } from 'vitest';
import { parseHeader } from '../../src/header/parser.js';
import type { Entity } from '../../src/types.js';

function parse(source: string): Entity {
  return parseHeader(source, 'test.h').root;
}

function findFunction(root: Entity, name: string): Entity {
  const stack = [root];
  while (stack.length > 0) {
    const e = stack.pop();
    if (!e) break;
    if (e.kind === 'FunctionDecl' && e.name === name) return e;
    stack.push(...e.children);
  }
  throw new Error(`no function '${name}'`);
}

describe('parseHeader', () => {
  describe('declaration tree', () => {
    it('maps namespaces, aliases and extern "C" blocks', () => {
      const root = parse(`
namespace outer {
using Handle = int;
extern "C" {
void ping(int value);
}
}
`);

      expect(root.kind).toBe('TranslationUnit');
      expect(root.children).toHaveLength(1);

      const ns = root.children[0];
      expect(ns.kind).toBe('Namespace');
      expect(ns.name).toBe('outer');
      expect(ns.children.map((c) => c.kind)).toEqual(['TypeAliasDecl', 'UnexposedDecl']);
      expect(ns.children[0].name).toBe('Handle');
      expect(ns.children[1].children.map((c) => [c.kind, c.name])).toEqual([['FunctionDecl', 'ping']]);
    });

    it('nests qualified namespace names', () => {
      const root = parse('namespace a::b { using T = int; }');

      const a = root.children[0];
      expect(a.name).toBe('a');
      expect(a.children).toHaveLength(1);
      expect(a.children[0].name).toBe('b');
      expect(a.children[0].children[0].name).toBe('T');
    });

    it('keeps anonymous namespaces unnamed', () => {
      const root = parse('namespace { using T = int; }');

      expect(root.children[0].kind).toBe('Namespace');
      expect(root.children[0].name).toBeUndefined();
    });

    it('maps struct, enum and typedef declarations', () => {
      const root = parse(`
struct Point { int x; int y; };
enum Color { Red, Green };
typedef struct Point PointT;
`);

      expect(root.children.map((c) => [c.kind, c.name])).toEqual([
        ['StructDecl', 'Point'],
        ['EnumDecl', 'Color'],
        ['TypedefDecl', 'PointT'],
      ]);
    });

    it('leaves records with bit-fields without a size', () => {
      const root = parse(`
struct Flags { uint8_t visible : 1; uint8_t dirty : 1; };
struct Bytes { uint8_t visible; uint8_t dirty; };
Flags read_flags(Bytes bytes);
`);
      const readFlags = findFunction(root, 'read_flags');

      expect(readFlags.resultType?.kind).toBe('Record');
      expect(() => readFlags.resultType?.sizeOf()).toThrow("'Flags' has bit-fields");
      expect(readFlags.arguments?.[0].type?.sizeOf()).toBe(2);
    });

    it('reports syntax errors', () => {
      expect(parseHeader('void f(int value);', 'ok.h').hasSyntaxErrors).toBe(false);
      expect(parseHeader('void f(int value;', 'bad.h').hasSyntaxErrors).toBe(true);
    });
  });

  describe('function declarations', () => {
    it('records argument names and resolved types', () => {
      const root = parse('void send(const char *name, int32_t count);');
      const send = findFunction(root, 'send');

      expect(send.displayName).toBe('send(const char *, int32_t)');
      expect(send.resultType?.kind).toBe('Void');
      expect(send.arguments?.map((a) => a.name)).toEqual(['name', 'count']);

      const [name, count] = send.arguments ?? [];
      expect(name.type?.displayName).toBe('const char *');
      expect(name.type?.kind).toBe('Pointer');
      expect(name.type?.pointee()?.kind).toBe('CharS');
      expect(count.type?.kind).toBe('Typedef');
      expect(count.type?.canonical().displayName).toBe('int');
    });

    it('treats (void) as an empty parameter list', () => {
      const root = parse('unsigned long long ticks(void);');
      const ticks = findFunction(root, 'ticks');

      expect(ticks.arguments).toEqual([]);
      expect(ticks.resultType?.displayName).toBe('unsigned long long');
      expect(ticks.resultType?.kind).toBe('ULongLong');
    });

    it('leaves unnamed parameters without a name', () => {
      const root = parse('void scale(double, float factor);');
      const scale = findFunction(root, 'scale');

      expect(scale.arguments?.map((a) => a.name)).toEqual([undefined, 'factor']);
      expect(scale.arguments?.map((a) => a.type?.displayName)).toEqual(['double', 'float']);
    });

    it('leaves undeclared types unresolved', () => {
      const root = parse('Missing lookup(const Missing *key);');
      const lookup = findFunction(root, 'lookup');

      expect(lookup.resultType).toBeUndefined();
      expect(lookup.arguments?.[0].name).toBe('key');
      expect(lookup.arguments?.[0].type).toBeUndefined();
    });

    it('resolves types declared later in the header', () => {
      const root = parse(`
Pair swap_pair(const Pair *pair);
struct Pair { char tag; int value; };
`);
      const swap = findFunction(root, 'swap_pair');

      expect(swap.resultType?.kind).toBe('Record');
      expect(swap.resultType?.sizeOf()).toBe(8);
      expect(swap.arguments?.[0].type?.displayName).toBe('const Pair *');
    });

    it('spells function pointer parameters', () => {
      const root = parse('void on_event(void (*callback)(int code));');
      const onEvent = findFunction(root, 'on_event');

      expect(onEvent.arguments?.[0].name).toBe('callback');
      expect(onEvent.arguments?.[0].type?.displayName).toBe('void (*)(int)');
      expect(onEvent.arguments?.[0].type?.pointee()?.kind).toBe('FunctionPrototype');
    });

    it('resolves callback aliases that repeat a header alias', () => {
      const root = parse(`
struct Widget;
using W = Widget;
using Cb = void (*)(W *a, W *b);
void on_cb(W *self, Cb cb);
`);
      const onCb = findFunction(root, 'on_cb');
      const cb = onCb.arguments?.[1];

      expect(onCb.arguments?.map((a) => a.name)).toEqual(['self', 'cb']);
      expect(cb?.type?.displayName).toBe('Cb');
      expect(cb?.type?.kind).toBe('Typedef');
      expect(cb?.type?.canonical().displayName).toBe('void (*)(Widget *, Widget *)');
    });

    it('reads inline callbacks with named pointer parameters as functions', () => {
      const root = parse(`
struct Widget;
using W = Widget;
void on_pair(W *self, void (*cb)(W *a, W *b));
void on_one(W *self, void (*cb)(W *a));
`);
      const onPair = findFunction(root, 'on_pair');
      const onOne = findFunction(root, 'on_one');

      expect(onPair.displayName).toBe('on_pair(W *, void (*)(W *, W *))');
      expect(onPair.resultType?.kind).toBe('Void');
      expect(onPair.arguments?.map((a) => a.name)).toEqual(['self', 'cb']);
      expect(onPair.arguments?.map((a) => a.type?.displayName)).toEqual(['W *', 'void (*)(W *, W *)']);
      expect(onPair.arguments?.[1].type?.pointee()?.kind).toBe('FunctionPrototype');
      expect(onOne.arguments?.map((a) => a.type?.displayName)).toEqual(['W *', 'void (*)(W *)']);
    });

    it('keeps variables initialised with parentheses out of the functions', () => {
      const root = parse('int counter(42);');

      expect(root.children.map((c) => [c.kind, c.name])).toEqual([['Other', 'counter']]);
    });

    it('returns pointers from functions', () => {
      const root = parse('struct Node; struct Node *next(const struct Node *node);');
      const next = findFunction(root, 'next');

      expect(next.resultType?.displayName).toBe('struct Node *');
      expect(next.resultType?.pointee()?.kind).toBe('Elaborated');
      expect(next.resultType?.canonical().displayName).toBe('Node *');
      expect(next.resultType?.pointee()?.canonical().kind).toBe('Record');
    });
  });

  describe('doc comments', () => {
    it('attaches adjacent doc comments and drops detached or plain ones', () => {
      const root = parse(`/// First line.
/// Second line.
void documented(int a);

/// Detached.

void detached(int b);
// Plain comment.
void plain(int c);
/** Block comment. */
void block(int d);
`);

      expect(findFunction(root, 'documented').comment).toBe('/// First line.\n/// Second line.');
      expect(findFunction(root, 'detached').comment).toBeUndefined();
      expect(findFunction(root, 'plain').comment).toBeUndefined();
      expect(findFunction(root, 'block').comment).toBe('/** Block comment. */');
    });

    it('attaches doc comments to aliases', () => {
      const root = parse(`//! Opaque handle.
using Handle = int;
`);

      expect(root.children[0].comment).toBe('//! Opaque handle.');
    });
  });

  describe('preprocessor conditionals', () => {
    it('reads the guarded declarations', () => {
      const root = parse(`#ifndef WIDGETS_H
#define WIDGETS_H
void inside(int a);
#endif
`);

      expect(findFunction(root, 'inside').arguments?.[0].name).toBe('a');
    });
  });
});
