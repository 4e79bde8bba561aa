/**
 * Category Capability
 *
 * Diagrams never compose or evaluate morphisms. All they need from the ambient
 * category C is:
 *   - dom, codom : Hom(C) → Ob(C)
 *   - equality on Ob(C) and on Hom(C)
 *
 * Every shape constructor is generic over this capability rather than over a
 * concrete category.
 */

// ─── Capability ────────────────────────────────────────────────────────────

export interface Category<Ob, Hom> {
  /** Domain (source object) of a morphism. */
  dom(f: Hom): Ob
  /** Codomain (target object) of a morphism. */
  codom(f: Hom): Ob
  obEquals(a: Ob, b: Ob): boolean
  homEquals(f: Hom, g: Hom): boolean
}

export interface CategoryOps<Ob, Hom> {
  dom(f: Hom): Ob
  codom(f: Hom): Ob
  obEquals?: (a: Ob, b: Ob) => boolean
  homEquals?: (f: Hom, g: Hom) => boolean
}

/** Structural equality using JSON serialization. */
export function structuralEquals<T>(a: T, b: T): boolean {
  return JSON.stringify(a) === JSON.stringify(b)
}

/**
 * Build a category capability. Equalities default to structural equality,
 * which suits plain-data objects and morphisms.
 */
export function category<Ob, Hom>(ops: CategoryOps<Ob, Hom>): Category<Ob, Hom> {
  return {
    dom: ops.dom,
    codom: ops.codom,
    obEquals: ops.obEquals ?? structuralEquals,
    homEquals: ops.homEquals ?? structuralEquals,
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/**
 * Positions whose value differs from `values[0]`. Empty when all agree
 * (including for an empty or singleton list).
 */
export function mismatches<T>(values: readonly T[], equals: (a: T, b: T) => boolean): number[] {
  const out: number[] = []
  for (let i = 1; i < values.length; i++) {
    if (!equals(values[0], values[i])) out.push(i)
  }
  return out
}

function isCopyOf<T extends readonly unknown[]>(copy: readonly T[number][], items: T): copy is T {
  return copy.length === items.length && copy.every((x, i) => x === items[i])
}

/**
 * Frozen shallow copy of `items`, keeping its (tuple) type. Shapes store
 * these so a caller's array can't change them after construction.
 */
export function frozenCopy<T extends readonly unknown[]>(items: T): T {
  const copy: readonly T[number][] = Object.freeze([...items])
  if (!isCopyOf(copy, items)) throw new Error(`Copy of ${items.length} items diverged from its source`)
  return copy
}
