import { createContainer } from '@remix-run/interaction'
import type { ComponentId, NodeId, Trigger } from '@patchkit/core'
import { parseId } from '@patchkit/core'
import { MalformedTriggerAttributeError } from './errors.ts'
import { isCaptured, nativeTypeOf, priorityOf, toVirtualEvent } from './virtual-event.ts'

export const DEFAULT_EVENT_PREFIX = 'patch-event'

export type EventDelegationOptions = {
  /**
   * Prefix of the reservation attributes, `<prefix>-<category>`.
   */
  prefix?: string
  /**
   * Aborting the signal uninstalls every listener, like `dispose()`.
   */
  signal?: AbortSignal
  onTrigger: (trigger: Trigger) => void
}

type Registration = {
  count: number
  dispose: () => void
}

export type EventDelegation = ReturnType<typeof createEventDelegation>

export function encodeReservation(componentId: ComponentId, nodeId: NodeId): string {
  return `${componentId}.${nodeId}`
}

/**
 * Reads `<componentId>.<nodeId>` from a reservation attribute. Anything after a
 * third `.` is ignored.
 */
export function decodeReservation(
  value: string,
): { componentId: ComponentId; nodeId: NodeId } | undefined {
  let [first, second] = value.split('.', 3)
  let componentId = first === undefined ? undefined : parseId(first)
  let nodeId = second === undefined ? undefined : parseId(second)
  if (componentId === undefined || nodeId === undefined) return undefined
  return { componentId, nodeId }
}

/**
 * Installs one native listener per event category on `root` and routes each
 * event to the component and node reserved on its origin element. Categories
 * that do not bubble are listened for in the capture phase.
 */
export function createEventDelegation(root: Element, options: EventDelegationOptions) {
  let prefix = options.prefix ?? DEFAULT_EVENT_PREFIX
  let registrations = new Map<string, Registration>()
  let connectedCtrl = new AbortController()
  let target: EventTarget = root

  options.signal?.addEventListener('abort', dispose, { once: true })

  function attributeName(category: string): string {
    return `${prefix}-${category}`
  }

  function findOrigin(from: EventTarget | null, name: string): Element | null {
    let current: Node | null = from instanceof Node ? from : null
    while (current) {
      if (current instanceof Element && current.hasAttribute(name)) return current
      if (current === root) return null
      current = current.parentNode
    }
    return null
  }

  function decode(event: Event, category: string = event.type): Trigger {
    let name = attributeName(category)
    let origin = findOrigin(event.target, name)
    let value = origin?.getAttribute(name) ?? null
    if (value === null) throw new MalformedTriggerAttributeError(category, null)

    let ids = decodeReservation(value)
    if (!ids) throw new MalformedTriggerAttributeError(category, value)

    return {
      category,
      componentId: ids.componentId,
      nodeId: ids.nodeId,
      event: toVirtualEvent(event, category),
      priority: priorityOf(category),
    }
  }

  function dispatch(category: string, event: Event) {
    let trigger: Trigger
    try {
      trigger = decode(event, category)
    } catch (error: unknown) {
      if (error instanceof MalformedTriggerAttributeError) {
        console.error(`Dropped "${category}" event: ${error.message}`)
        return
      }
      throw error
    }
    options.onTrigger(trigger)
  }

  function listen(category: string): () => void {
    let type = nativeTypeOf(category)
    let listener = (event: Event) => dispatch(category, event)

    if (isCaptured(category)) {
      target.addEventListener(type, listener, { capture: true, signal: connectedCtrl.signal })
      return () => target.removeEventListener(type, listener, { capture: true })
    }

    let container = createContainer(target, { signal: connectedCtrl.signal })
    container.set({ [type]: listener })
    return () => container.dispose()
  }

  function dispose() {
    connectedCtrl.abort()
    registrations.clear()
  }

  return {
    attributeName,

    reserve(element: Element, category: string, componentId: ComponentId, nodeId: NodeId): void {
      element.setAttribute(attributeName(category), encodeReservation(componentId, nodeId))
    },

    unreserve(element: Element, category: string): void {
      element.removeAttribute(attributeName(category))
    },

    /**
     * Adds a logical listener for `category`, installing the native listener
     * on first use. Returns the new reference count.
     */
    retain(category: string): number {
      let registration = registrations.get(category)
      if (registration) return ++registration.count

      registrations.set(category, { count: 1, dispose: listen(category) })
      return 1
    },

    /**
     * Drops a logical listener for `category`, uninstalling the native listener
     * when none are left. Returns the new reference count.
     */
    release(category: string): number {
      let registration = registrations.get(category)
      if (!registration) {
        console.warn(`Released "${category}" listener that was never registered`)
        return 0
      }

      registration.count--
      if (registration.count === 0) {
        registration.dispose()
        registrations.delete(category)
      }
      return registration.count
    },

    count(category: string): number {
      return registrations.get(category)?.count ?? 0
    },

    categories(): string[] {
      return Array.from(registrations.keys())
    },

    decode,

    dispose,
  }
}
