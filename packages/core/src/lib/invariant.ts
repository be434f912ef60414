export function invariant(assertion: unknown, message?: string): asserts assertion {
  if (!assertion) {
    throw new Error(`Invariant failed${message ? `: ${message}` : ''}`)
  }
}
