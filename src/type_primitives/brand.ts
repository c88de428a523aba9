/***
 * Brand — Nominal typing over primitives.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime, it only stops
 * structurally identical values from being passed where another is
 * expected.
 *
 * EntityIndex and EntityGeneration are both numbers at runtime, but
 * Brand<number, "entity_index"> and Brand<number, "entity_generation">
 * cannot be swapped by accident when building an Entity.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
