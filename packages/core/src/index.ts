export type { NodeId, ComponentId } from './lib/ids.ts'
export { parseId, toNodeId, U64_MAX } from './lib/ids.ts'

export type { Edit, EditType } from './lib/edits.ts'
export { parseEdit, parseEdits } from './lib/edits.ts'

export type {
  EventPriority,
  KeyboardData,
  Modifiers,
  MouseData,
  PointerData,
  Trigger,
  VirtualEvent,
  VirtualEventKind,
  WheelData,
} from './lib/trigger.ts'

export type {
  MemoComparator,
  PropsType,
  RenderCell,
  RenderCellConfig,
  RenderFunction,
  RenderReturn,
} from './lib/render-cell.ts'
export { createRenderCell } from './lib/render-cell.ts'

export { invariant } from './lib/invariant.ts'
