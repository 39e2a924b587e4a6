/**
 * Compile-time exhaustive check for discriminated unions.
 * Use as the default case in switch statements.
 */
export function assertNever(x: never, message = 'Unexpected value'): never {
  throw new Error(`${message}: ${JSON.stringify(x)}`);
}
