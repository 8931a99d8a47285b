/***
 * Brand — Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime — it only prevents
 * accidental assignment between structurally identical types.
 *
 * Example: an Address and a stored Word are both bigints at runtime, but
 * Brand<bigint, "address"> cannot be passed where a plain value is
 * expected without going through as_address.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
