/**
 * Nominal typing for values that have passed a boundary check.
 *
 * Uses a string-keyed marker so branded types stay nameable when exported
 * from zod transforms. Erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
