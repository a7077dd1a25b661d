// Binding Environment
//
// Tracks which SQL relation holds each named set while a request is lowered.

import { UnboundNameError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export type ElementKind = "node" | "way" | "relation" | "area";

export interface Binding {
  /** Name of the CTE or temp table holding the set */
  relation: string;
  /** Element kinds the set can contain */
  kinds: ReadonlySet<ElementKind>;
  /** True only for the set that exists before any statement has run */
  empty?: boolean;
}

/** `._` in a query: the set written by the last unassigned statement */
export const DEFAULT_SET = "_";

export const EMPTY_RELATION = "_empty";

export const EMPTY_BINDING: Binding = {
  relation: EMPTY_RELATION,
  kinds: new Set<ElementKind>(),
  empty: true,
};

// ============================================================================
// Relation names
// ============================================================================

/**
 * Hands out relation names that are unique across a whole request, including
 * every union branch. Redefining `.a` yields `_a`, then `_a_2`, `_a_3`...
 */
export class RelationNames {
  private used = new Set<string>([EMPTY_RELATION]);

  next(base: string): string {
    let name = `_${base}`;
    let counter = 2;
    while (this.used.has(name)) {
      name = `_${base}_${counter++}`;
    }
    this.used.add(name);
    return name;
  }
}

// ============================================================================
// Environment
// ============================================================================

export class BindingEnvironment {
  private bindings: Map<string, Binding>;
  private current: Binding;

  constructor() {
    this.bindings = new Map();
    this.current = EMPTY_BINDING;
  }

  define(name: string, binding: Binding): void {
    if (name === DEFAULT_SET) {
      this.current = binding;
    } else {
      this.bindings.set(name, binding);
    }
  }

  resolve(name: string): Binding {
    if (name === DEFAULT_SET) {
      return this.current;
    }
    const binding = this.bindings.get(name);
    if (!binding) {
      throw new UnboundNameError(name);
    }
    return binding;
  }

  default(): Binding {
    return this.current;
  }

  setDefault(binding: Binding): void {
    this.current = binding;
  }

  has(name: string): boolean {
    return name === DEFAULT_SET || this.bindings.has(name);
  }

  /**
   * Snapshot for a union branch.
   */
  clone(): BindingEnvironment {
    const copy = new BindingEnvironment();
    copy.bindings = new Map(this.bindings);
    copy.current = this.current;
    return copy;
  }

  /**
   * Take over the named sets a branch assigned. Branches merged later win.
   * The branch's default set is not carried over.
   */
  absorb(branch: BindingEnvironment): void {
    for (const [name, binding] of branch.bindings) {
      if (this.bindings.get(name) !== binding) {
        this.bindings.set(name, binding);
      }
    }
  }
}
