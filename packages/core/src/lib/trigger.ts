import type { ComponentId, NodeId } from './ids.ts'

export type EventPriority = 'high' | 'medium' | 'low'

export interface Modifiers {
  altKey: boolean
  ctrlKey: boolean
  metaKey: boolean
  shiftKey: boolean
}

export interface MouseData extends Modifiers {
  clientX: number
  clientY: number
  pageX: number
  pageY: number
  screenX: number
  screenY: number
  button: number
  buttons: number
}

export interface PointerData extends MouseData {
  pointerId: number
  pointerType: string
  width: number
  height: number
  pressure: number
  isPrimary: boolean
}

export interface WheelData extends MouseData {
  deltaX: number
  deltaY: number
  deltaZ: number
  deltaMode: number
}

export interface KeyboardData extends Modifiers {
  key: string
  code: string
  location: number
  repeat: boolean
}

/**
 * Normalized payload of a native event. `kind` decides which fields were
 * extracted; `other` carries nothing beyond the fact that the event occurred.
 */
export type VirtualEvent =
  | ({ kind: 'mouse' } & MouseData)
  | ({ kind: 'pointer' } & PointerData)
  | ({ kind: 'wheel' } & WheelData)
  | ({ kind: 'keyboard' } & KeyboardData)
  | { kind: 'form'; value: string }
  | { kind: 'focus' }
  | { kind: 'composition'; data: string }
  | ({ kind: 'touch' } & Modifiers)
  | { kind: 'animation'; animationName: string; elapsedTime: number; pseudoElement: string }
  | { kind: 'transition'; propertyName: string; elapsedTime: number; pseudoElement: string }
  | { kind: 'other' }

export type VirtualEventKind = VirtualEvent['kind']

/**
 * An event routed back to the component that registered for it.
 */
export interface Trigger {
  category: string
  componentId: ComponentId
  nodeId: NodeId
  event: VirtualEvent
  priority: EventPriority
}
