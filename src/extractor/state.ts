import type { ClassDescriptor } from "../types.js";

export const ROOT_NAMESPACE = "finch";
export const INTERNAL_NAMESPACE = "bindgen";

/**
 * Position of the walker within `finch::bindgen::<package>` and the classes
 * found so far. One instance per run; the flags never reset.
 */
export interface TraversalState {
  enteredRoot: boolean;
  enteredInternal: boolean;
  packageNamespace?: string;
  classes: Map<string, ClassDescriptor>;
}

/**
 * What a namespace node does to the state:
 * - `enter`: the walker should recurse into it
 * - `unexpected`: an extra or misplaced namespace inside the root; reported, not recursed
 * - `ignored`: outside the root namespace; skipped silently
 */
export type NamespaceTransition = "enter" | "unexpected" | "ignored";

export function createTraversalState(): TraversalState {
  return {
    enteredRoot: false,
    enteredInternal: false,
    packageNamespace: undefined,
    classes: new Map(),
  };
}

export function enterNamespace(state: TraversalState, name: string): NamespaceTransition {
  if (!state.enteredRoot && name === ROOT_NAMESPACE) {
    state.enteredRoot = true;
    return "enter";
  }
  if (state.enteredRoot && !state.enteredInternal && name === INTERNAL_NAMESPACE) {
    state.enteredInternal = true;
    return "enter";
  }
  if (state.enteredRoot && state.enteredInternal && state.packageNamespace === undefined) {
    state.packageNamespace = name;
    return "enter";
  }
  return state.enteredRoot ? "unexpected" : "ignored";
}

/** The package namespace when declarations may be decoded, otherwise undefined. */
export function eligiblePackage(state: TraversalState): string | undefined {
  if (!state.enteredRoot || !state.enteredInternal) {
    return undefined;
  }
  return state.packageNamespace;
}

/** `finch::bindgen::<package>::<name>` */
export function qualifiedName(packageNamespace: string, name: string): string {
  return `${ROOT_NAMESPACE}::${INTERNAL_NAMESPACE}::${packageNamespace}::${name}`;
}
