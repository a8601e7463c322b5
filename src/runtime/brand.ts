/**
 * Nominal marker for values that passed a parser, such as the config loaded from
 * RESERVOIR_* variables. Erased at runtime.
 *
 * A string key rather than a `unique symbol` keeps exported zod-derived types nameable.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
