import type { Edit, NodeId, Trigger } from '@patchkit/core'
import { createBuilderStack } from './builder-stack.ts'
import { createChannel } from './channel.ts'
import { createEventDelegation } from './event-delegation.ts'
import { createEditInterpreter } from './interpreter.ts'
import { createNodeRegistry } from './node-registry.ts'

export type DomPatcherOptions = {
  /**
   * Id under which `root` is registered, so streams can `PushRoot` it.
   * Defaults to `0n`.
   */
  rootId?: NodeId
  /**
   * Prefix of the reservation attributes written for event listeners.
   */
  eventPrefix?: string
  placeholderTag?: string
}

export type DomPatcher = ReturnType<typeof createDomPatcher>

/**
 * Binds a node registry, builder stack, edit interpreter and event delegation
 * to one root element. Edits go in through `applyEdits`; triggers come out
 * through `waitForEvent` or by iterating `triggers`.
 *
 * ```ts
 * let patcher = createDomPatcher(document.getElementById('app'))
 * patcher.applyEdits(edits)
 * for await (let trigger of patcher.triggers) {
 *   scheduler.dispatch(trigger)
 * }
 * ```
 */
export function createDomPatcher(root: Element, options: DomPatcherOptions = {}) {
  let rootId = options.rootId ?? 0n
  let registry = createNodeRegistry()
  let stack = createBuilderStack()
  let triggers = createChannel<Trigger>()
  let triggerStream: AsyncIterable<Trigger> = triggers
  let events = createEventDelegation(root, {
    prefix: options.eventPrefix,
    onTrigger: (trigger) => {
      triggers.send(trigger)
    },
  })
  let interpreter = createEditInterpreter({
    document: root.ownerDocument,
    registry,
    stack,
    events,
    placeholderTag: options.placeholderTag,
  })

  registry.register(rootId, root)

  return {
    root,
    rootId,
    registry,
    stack,
    events,
    triggers: triggerStream,

    applyEdits(edits: Iterable<Edit>): number {
      return interpreter.applyEdits(edits)
    },

    /**
     * Resolves with the next trigger. Abort `signal` to stop waiting.
     */
    waitForEvent(signal?: AbortSignal): Promise<Trigger> {
      return triggers.receive(signal)
    },

    reset(): void {
      interpreter.reset()
    },

    /**
     * Uninstalls every delegated listener and closes the trigger channel.
     */
    dispose(): void {
      events.dispose()
      triggers.close()
    },
  }
}
