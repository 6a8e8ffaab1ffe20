/**
 * Exhaustiveness helper for discriminated unions and closed enumerations.
 * Place in the `default` branch of a `switch` so a new member fails to compile.
 */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
