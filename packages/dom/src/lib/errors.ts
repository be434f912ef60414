import type { EditType, NodeId } from '@patchkit/core'

/**
 * Base class of every error that aborts an edit stream. The interpreter
 * annotates it with the instruction that failed before rethrowing.
 */
export class PatchError extends Error {
  name = 'PatchError'
  editIndex?: number
  editType?: EditType

  annotate(editIndex: number, editType: EditType): this {
    this.editIndex = editIndex
    this.editType = editType
    return this
  }
}

export class UnknownNodeIdError extends PatchError {
  readonly name = 'UnknownNodeIdError'

  constructor(readonly id: NodeId) {
    super(`Unknown node id: ${id}`)
  }
}

export class StackUnderflowError extends PatchError {
  readonly name = 'StackUnderflowError'

  constructor(
    readonly operation: string,
    readonly needed: number,
    readonly size: number,
  ) {
    super(`Builder stack underflow in ${operation}: needed ${needed} node(s), stack holds ${size}`)
  }
}

export class UnsupportedReplaceArityError extends PatchError {
  readonly name = 'UnsupportedReplaceArityError'

  constructor(readonly many: number) {
    super(`ReplaceWith expects at least one new node, got ${many}`)
  }
}

export class UnexpectedNodeKindError extends PatchError {
  readonly name = 'UnexpectedNodeKindError'

  constructor(
    readonly expected: string,
    readonly node: Node,
  ) {
    super(`Expected ${expected}, found ${node.nodeName}`)
  }
}

export class UnknownEditError extends PatchError {
  readonly name = 'UnknownEditError'

  constructor(readonly type: string) {
    super(`Unknown edit instruction: ${type}`)
  }
}

/**
 * Wraps anything else thrown while applying an instruction, such as a DOM
 * exception for an invalid tag or attribute name.
 */
export class EditApplicationError extends PatchError {
  readonly name = 'EditApplicationError'

  constructor(cause: unknown) {
    super(`Edit could not be applied: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    })
  }
}

/**
 * A delegated event whose origin carries no readable reservation attribute.
 * Never escapes the native listener; the event is logged and dropped.
 */
export class MalformedTriggerAttributeError extends Error {
  readonly name = 'MalformedTriggerAttributeError'

  constructor(
    readonly category: string,
    readonly value: string | null,
  ) {
    super(
      value === null
        ? `No reservation attribute for "${category}" on the event origin`
        : `Malformed reservation attribute for "${category}": ${JSON.stringify(value)}`,
    )
  }
}
