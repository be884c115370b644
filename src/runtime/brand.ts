/**
 * Brand helper for "parse, don't validate".
 *
 * A branded value proves it went through a boundary parser (config, URLs).
 * String-keyed marker rather than a `unique symbol` so exported zod schemas that
 * transform into branded types stay nameable (TS4023).
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
