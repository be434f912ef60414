/**
 * Opaque identity of a logical node, assigned by the diff engine. Unsigned
 * 64-bit, so it is carried as a `bigint`.
 */
export type NodeId = bigint

/**
 * Opaque identity of the component scope that owns a listener.
 */
export type ComponentId = bigint

export const U64_MAX = (1n << 64n) - 1n

const DECIMAL = /^\d+$/

/**
 * Reads an unsigned 64-bit id from its decimal form. Returns `undefined` for
 * anything else, including signs, whitespace, hex and out of range values.
 */
export function parseId(text: string): bigint | undefined {
  if (!DECIMAL.test(text)) return undefined
  let value = BigInt(text)
  return value <= U64_MAX ? value : undefined
}

export function toNodeId(value: bigint | number | string): NodeId {
  if (typeof value === 'bigint') {
    if (value < 0n || value > U64_MAX) {
      throw new RangeError(`Node id out of range: ${value}`)
    }
    return value
  }

  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`Node id must be a non-negative safe integer: ${value}`)
    }
    return BigInt(value)
  }

  let id = parseId(value)
  if (id === undefined) {
    throw new RangeError(`Node id must be an unsigned 64-bit decimal: ${JSON.stringify(value)}`)
  }
  return id
}
