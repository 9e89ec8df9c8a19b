import type { TypeDescriptor, TypeHandle } from "../types.js";

/**
 * Two handles describe the same type when their spelling, kind and pointee
 * chain agree.
 */
export function sameType(a: TypeHandle, b: TypeHandle): boolean {
  if (a.displayName !== b.displayName || a.kind !== b.kind) {
    return false;
  }
  const pa = a.pointee();
  const pb = b.pointee();
  if (!pa || !pb) {
    return pa === pb;
  }
  return sameType(pa, pb);
}

function trySizeOf(type: TypeHandle): number | undefined {
  try {
    return type.sizeOf();
  } catch {
    // Incomplete and opaque types have no layout
    return undefined;
  }
}

/**
 * Build an owned descriptor for a front-end type handle.
 *
 * The canonical form is only recorded when it differs from the surface
 * type, so already-canonical types do not reference themselves.
 */
export function buildTypeDescriptor(type: TypeHandle): TypeDescriptor {
  const descriptor: TypeDescriptor = {
    displayName: type.displayName,
    kind: type.kind,
  };

  const pointee = type.pointee();
  if (pointee) {
    descriptor.pointee = buildTypeDescriptor(pointee);
  }

  const canonical = type.canonical();
  if (!sameType(canonical, type)) {
    descriptor.canonical = buildTypeDescriptor(canonical);
  }

  const size = trySizeOf(type);
  if (size !== undefined) {
    descriptor.byteSize = size;
  }

  return descriptor;
}
