import { StackUnderflowError } from './errors.ts'

export type BuilderStack = ReturnType<typeof createBuilderStack>

/**
 * Scratch stack of nodes for the edit interpreter. Instructions only ever
 * refer to "the node(s) just produced" through it.
 */
export function createBuilderStack() {
  let list: Node[] = []

  return {
    push(node: Node): void {
      list.push(node)
    },

    pop(): Node {
      let node = list.pop()
      if (!node) throw new StackUnderflowError('pop', 1, 0)
      return node
    },

    /**
     * Removes the `many` most recently pushed nodes and returns them in the
     * order they were pushed.
     */
    popMany(many: number): Node[] {
      if (!Number.isInteger(many) || many < 0) {
        throw new RangeError(`Expected a non-negative node count, got ${many}`)
      }
      if (many > list.length) throw new StackUnderflowError('popMany', many, list.length)
      return list.splice(list.length - many, many)
    },

    top(): Node {
      let node = list[list.length - 1]
      if (!node) throw new StackUnderflowError('top', 1, 0)
      return node
    },

    /**
     * The node at `position`, counted from the bottom of the stack.
     */
    at(position: number): Node {
      let node = position >= 0 ? list[position] : undefined
      if (!node) throw new StackUnderflowError('at', list.length - position, list.length)
      return node
    },

    get size(): number {
      return list.length
    },

    clear(): void {
      list = []
    },

    toArray(): Node[] {
      return [...list]
    },
  }
}
