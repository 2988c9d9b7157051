/**
 * Brand helper for "parse, don't validate".
 *
 * A branded number or string proves it went through a parser (config, address
 * encoding) before reaching the code that relies on its bounds.
 *
 * NOTE: string-keyed marker, not a `unique symbol`, so exported zod schemas that
 * transform into branded types can still be named (TS4023).
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
