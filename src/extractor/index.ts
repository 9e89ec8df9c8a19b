import type { ClassDescriptor, Diagnostic, Entity, ExtractionOutput } from "../types.js";
import { createTraversalState } from "./state.js";
import { processEntity } from "./walker.js";

export { ExtractionError } from "./errors.js";
export { buildTypeDescriptor, sameType } from "./type-descriptor.js";
export { processEntity } from "./walker.js";
export type { WalkContext } from "./walker.js";
export { createTraversalState } from "./state.js";
export type { TraversalState } from "./state.js";

export interface ExtractOptions {
  /** Called for every skipped declaration, in encounter order. */
  onWarning?: (diagnostic: Diagnostic) => void;
}

/**
 * Walk a declaration tree and collect the class descriptors it encodes.
 * Warnings are collected on the output; contract violations throw.
 */
export function extractBindings(root: Entity, options: ExtractOptions = {}): ExtractionOutput {
  const state = createTraversalState();
  const warnings: Diagnostic[] = [];

  processEntity(
    {
      state,
      report: (diagnostic) => {
        warnings.push(diagnostic);
        options.onWarning?.(diagnostic);
      },
    },
    root,
  );

  return {
    packageNamespace: state.packageNamespace,
    classes: state.classes,
    warnings,
  };
}

/** Plain-object form of the class table, keyed by class name in sorted order. */
export function classesToRecord(
  classes: Map<string, ClassDescriptor>,
): Record<string, ClassDescriptor> {
  // own data properties, so a class named `__proto__` stays a key
  return Object.fromEntries(
    [...classes.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}
