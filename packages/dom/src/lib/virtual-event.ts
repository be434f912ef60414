import type {
  EventPriority,
  KeyboardData,
  Modifiers,
  MouseData,
  VirtualEvent,
  VirtualEventKind,
} from '@patchkit/core'
import table from './event-kinds.json'

type PayloadKind = Exclude<VirtualEventKind, 'other'>

const PAYLOAD_KINDS: PayloadKind[] = [
  'mouse',
  'pointer',
  'wheel',
  'keyboard',
  'form',
  'focus',
  'composition',
  'touch',
  'animation',
  'transition',
]

let kinds = new Map<string, VirtualEventKind>()
for (let kind of PAYLOAD_KINDS) {
  for (let category of table.kinds[kind]) kinds.set(category, kind)
}

let priorities = new Map<string, EventPriority>()
for (let category of table.priorities.high) priorities.set(category, 'high')
for (let category of table.priorities.medium) priorities.set(category, 'medium')

let delegatedAs = new Map<string, string>(Object.entries(table.delegatedAs))
let captured = new Set<string>(table.captured)

export function kindOf(category: string): VirtualEventKind {
  return kinds.get(category) ?? 'other'
}

/**
 * Discrete user input is `high`, continuous input (moves, drags, scrolling)
 * is `medium`, everything else `low`.
 */
export function priorityOf(category: string): EventPriority {
  return priorities.get(category) ?? 'low'
}

/**
 * The native event type listened for at the delegation root. Categories that
 * do not bubble are observed through their bubbling counterpart.
 */
export function nativeTypeOf(category: string): string {
  return delegatedAs.get(category) ?? category
}

/**
 * Categories that never bubble and have no bubbling counterpart. The root
 * only sees them in the capture phase.
 */
export function isCaptured(category: string): boolean {
  return captured.has(category)
}

/**
 * Extracts the payload fields of `event` that matter for its category. An
 * event that is not of the interface its category implies is reported as a
 * bare `other` occurrence.
 */
export function toVirtualEvent(event: Event, category: string = event.type): VirtualEvent {
  switch (kindOf(category)) {
    case 'mouse':
      return event instanceof MouseEvent ? { kind: 'mouse', ...mouseData(event) } : { kind: 'other' }

    case 'pointer':
      if (typeof PointerEvent === 'function' && event instanceof PointerEvent) {
        return {
          kind: 'pointer',
          ...mouseData(event),
          pointerId: event.pointerId,
          pointerType: event.pointerType,
          width: event.width,
          height: event.height,
          pressure: event.pressure,
          isPrimary: event.isPrimary,
        }
      }
      // environments without PointerEvent dispatch these as plain mouse events
      return event instanceof MouseEvent ? { kind: 'mouse', ...mouseData(event) } : { kind: 'other' }

    case 'wheel':
      if (event instanceof WheelEvent) {
        return {
          kind: 'wheel',
          ...mouseData(event),
          deltaX: event.deltaX,
          deltaY: event.deltaY,
          deltaZ: event.deltaZ,
          deltaMode: event.deltaMode,
        }
      }
      return event instanceof MouseEvent ? { kind: 'mouse', ...mouseData(event) } : { kind: 'other' }

    case 'keyboard':
      return event instanceof KeyboardEvent
        ? { kind: 'keyboard', ...keyboardData(event) }
        : { kind: 'other' }

    case 'form':
      return { kind: 'form', value: formValue(event.target) }

    case 'focus':
      return { kind: 'focus' }

    case 'composition':
      return typeof CompositionEvent === 'function' && event instanceof CompositionEvent
        ? { kind: 'composition', data: event.data }
        : { kind: 'other' }

    case 'touch':
      return typeof TouchEvent === 'function' && event instanceof TouchEvent
        ? { kind: 'touch', ...modifiers(event) }
        : { kind: 'other' }

    case 'animation':
      return typeof AnimationEvent === 'function' && event instanceof AnimationEvent
        ? {
            kind: 'animation',
            animationName: event.animationName,
            elapsedTime: event.elapsedTime,
            pseudoElement: event.pseudoElement,
          }
        : { kind: 'other' }

    case 'transition':
      return typeof TransitionEvent === 'function' && event instanceof TransitionEvent
        ? {
            kind: 'transition',
            propertyName: event.propertyName,
            elapsedTime: event.elapsedTime,
            pseudoElement: event.pseudoElement,
          }
        : { kind: 'other' }

    case 'other':
      return { kind: 'other' }
  }
}

function modifiers(event: MouseEvent | KeyboardEvent | TouchEvent): Modifiers {
  return {
    altKey: event.altKey,
    ctrlKey: event.ctrlKey,
    metaKey: event.metaKey,
    shiftKey: event.shiftKey,
  }
}

function mouseData(event: MouseEvent): MouseData {
  return {
    ...modifiers(event),
    clientX: event.clientX,
    clientY: event.clientY,
    pageX: event.pageX,
    pageY: event.pageY,
    screenX: event.screenX,
    screenY: event.screenY,
    button: event.button,
    buttons: event.buttons,
  }
}

function keyboardData(event: KeyboardEvent): KeyboardData {
  return {
    ...modifiers(event),
    key: event.key,
    code: event.code,
    location: event.location,
    repeat: event.repeat,
  }
}

function formValue(target: EventTarget | null): string {
  if (
    target instanceof HTMLInputElement ||
    target instanceof HTMLTextAreaElement ||
    target instanceof HTMLSelectElement
  ) {
    return target.value
  }
  if (target instanceof Node) return target.textContent ?? ''
  return ''
}
