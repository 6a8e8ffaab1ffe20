/**
 * Brand helper for protocol identifiers.
 *
 * Object ids, session ids and callback cookies are all plain integers on the
 * wire; the brand keeps them from being swapped at a call site.
 *
 * Uses a string-keyed marker rather than a `unique symbol` so zod schemas that
 * produce branded values can be exported without TS4023.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
