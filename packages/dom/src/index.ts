export type { BuilderStack } from './lib/builder-stack.ts'
export { createBuilderStack } from './lib/builder-stack.ts'

export type { Channel } from './lib/channel.ts'
export { ChannelClosedError, createChannel } from './lib/channel.ts'

export type { DomPatcher, DomPatcherOptions } from './lib/dom-patcher.ts'
export { createDomPatcher } from './lib/dom-patcher.ts'

export {
  EditApplicationError,
  MalformedTriggerAttributeError,
  PatchError,
  StackUnderflowError,
  UnexpectedNodeKindError,
  UnknownEditError,
  UnknownNodeIdError,
  UnsupportedReplaceArityError,
} from './lib/errors.ts'

export type { EventDelegation, EventDelegationOptions } from './lib/event-delegation.ts'
export {
  createEventDelegation,
  decodeReservation,
  DEFAULT_EVENT_PREFIX,
  encodeReservation,
} from './lib/event-delegation.ts'

export type { EditInterpreter, EditInterpreterOptions } from './lib/interpreter.ts'
export { createEditInterpreter } from './lib/interpreter.ts'

export type { NodeRegistry, SlotKey } from './lib/node-registry.ts'
export { createNodeRegistry, fromSlotKey, slotKey } from './lib/node-registry.ts'

export {
  isCaptured,
  kindOf,
  nativeTypeOf,
  priorityOf,
  toVirtualEvent,
} from './lib/virtual-event.ts'
