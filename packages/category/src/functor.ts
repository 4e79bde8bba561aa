/**
 * Functor Capabilities
 *
 * Decorated cospans carry a functor F that assigns decorations to the base
 * of a cospan, and composition of decorated cospans needs F to be lax
 * monoidal: a functor together with a laxator
 *
 *   φ_{A,B} : F(A) ⊗ F(B) → F(A ⊗ B)
 *
 * Their action belongs to the open-network composition layer. Here they are
 * tagged, opaque references so a decorated cospan can name the capability it
 * was decorated with.
 */

// ─── Opaque Capabilities ────────────────────────────────────────────────────

export interface AbstractFunctor {
  readonly tag: string
}

export interface AbstractLaxator {
  readonly tag: string
}

/** Create an opaque functor or laxator reference. */
export function capability<T extends string>(tag: T): { readonly tag: T } {
  return { tag }
}

// ─── Lax Monoidal Functor ───────────────────────────────────────────────────

export interface LaxMonoidalFunctor<F extends AbstractFunctor, L extends AbstractLaxator> extends AbstractFunctor {
  readonly tag: 'lax-monoidal'
  readonly functor: F
  readonly laxator: L
}

export function laxMonoidalFunctor<F extends AbstractFunctor, L extends AbstractLaxator>(
  functor: F,
  laxator: L,
): LaxMonoidalFunctor<F, L> {
  return { tag: 'lax-monoidal', functor, laxator }
}
