import type { NodeId } from '@patchkit/core'
import { UnknownNodeIdError } from './errors.ts'

/**
 * Position of an id in an arena of slots: the low 32 bits index a slot, the
 * high 32 bits are the generation of the node stored in it. The registry keys
 * by the whole id, so this split is only a view for callers that allocate ids.
 */
export interface SlotKey {
  index: number
  version: number
}

const INDEX_MASK = 0xffff_ffffn

export function slotKey(id: NodeId): SlotKey {
  return { index: Number(id & INDEX_MASK), version: Number(id >> 32n) }
}

export function fromSlotKey({ index, version }: SlotKey): NodeId {
  return (BigInt(version) << 32n) | BigInt(index)
}

export type NodeRegistry = ReturnType<typeof createNodeRegistry>

export function createNodeRegistry() {
  let nodes = new Map<NodeId, Node>()
  let ids = new WeakMap<Node, NodeId>()

  function get(id: NodeId): Node | undefined {
    return nodes.get(id)
  }

  function unregister(id: NodeId): boolean {
    let node = nodes.get(id)
    if (!node) return false
    nodes.delete(id)
    if (ids.get(node) === id) ids.delete(node)
    return true
  }

  function forget(node: Node): boolean {
    let id = ids.get(node)
    if (id === undefined || nodes.get(id) !== node) return false
    return unregister(id)
  }

  return {
    /**
     * Maps `id` to `node`, replacing whatever node the id pointed at before.
     */
    register(id: NodeId, node: Node): void {
      let prev = nodes.get(id)
      if (prev && prev !== node && ids.get(prev) === id) ids.delete(prev)
      nodes.set(id, node)
      ids.set(node, id)
    },

    lookup(id: NodeId): Node {
      let node = nodes.get(id)
      if (!node) throw new UnknownNodeIdError(id)
      return node
    },

    get,

    has(id: NodeId): boolean {
      return nodes.has(id)
    },

    idOf(node: Node): NodeId | undefined {
      let id = ids.get(node)
      return id !== undefined && nodes.get(id) === node ? id : undefined
    },

    unregister,

    forget,

    /**
     * Forgets `node` and every registered descendant. Returns how many entries
     * were removed.
     */
    forgetTree(node: Node): number {
      let removed = 0
      let pending: Node[] = [node]
      let current: Node | undefined
      while ((current = pending.pop())) {
        if (forget(current)) removed++
        pending.push(...Array.from(current.childNodes))
      }
      return removed
    },

    get size(): number {
      return nodes.size
    },
  }
}
