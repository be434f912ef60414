import type { Edit, NodeId } from '@patchkit/core'
import { invariant } from '@patchkit/core'
import type { BuilderStack } from './builder-stack.ts'
import type { EventDelegation } from './event-delegation.ts'
import type { NodeRegistry } from './node-registry.ts'
import {
  EditApplicationError,
  PatchError,
  UnexpectedNodeKindError,
  UnknownEditError,
  UnsupportedReplaceArityError,
} from './errors.ts'

export type EditInterpreterOptions = {
  document: Document
  registry: NodeRegistry
  stack: BuilderStack
  events: EventDelegation
  /**
   * Tag of the hidden element created for `CreatePlaceholder`.
   */
  placeholderTag?: string
}

export type EditInterpreter = ReturnType<typeof createEditInterpreter>

type ReplaceableNode = Element | CharacterData | DocumentType

/**
 * Applies edit streams against the DOM, one mutation per instruction, using the
 * builder stack as the only way to refer to the nodes just produced.
 */
export function createEditInterpreter(options: EditInterpreterOptions) {
  let { document, registry, stack, events } = options
  let placeholderTag = options.placeholderTag ?? 'pre'

  // Browsers merge adjacent text nodes when markup is reparsed, which would
  // leave two ids on one node. Remembers the parent whose last appended child
  // was text so a comment can be slipped in between.
  let textParent: Node | null = null

  function create(id: NodeId, node: Node) {
    registry.register(id, node)
    stack.push(node)
  }

  function topElement(): Element {
    let node = stack.top()
    if (!(node instanceof Element)) throw new UnexpectedNodeKindError('an element', node)
    return node
  }

  function appendChildren(many: number) {
    invariant(Number.isInteger(many) && many >= 0, `Invalid AppendChildren count: ${many}`)
    let parent = stack.at(stack.size - (1 + many))
    if (!(parent instanceof Element || parent instanceof DocumentFragment)) {
      throw new UnexpectedNodeKindError('a parent node', parent)
    }

    for (let child of stack.popMany(many)) {
      if (child instanceof Text) {
        if (textParent === parent) parent.appendChild(document.createComment(''))
        textParent = parent
      } else {
        textParent = null
      }
      parent.appendChild(child)
    }
  }

  // consecutive text nodes in a replacement get the same comment marker as
  // consecutive appended text nodes
  function separateText(nodes: Node[]): Node[] {
    let result: Node[] = []
    let previous: Node | undefined
    for (let node of nodes) {
      if (node instanceof Text && previous instanceof Text) {
        result.push(document.createComment(''))
      }
      result.push(node)
      previous = node
    }
    return result
  }

  function replaceWith(many: number) {
    if (!Number.isInteger(many) || many < 1) throw new UnsupportedReplaceArityError(many)
    let old = stack.at(stack.size - (1 + many))
    if (!isReplaceable(old) || !old.parentNode) {
      throw new UnexpectedNodeKindError('an attached node to replace', old)
    }

    let nodes = stack.popMany(many)
    stack.pop()
    old.replaceWith(...separateText(nodes))
    registry.forgetTree(old)
    for (let node of nodes) stack.push(node)
  }

  function remove() {
    let node = stack.pop()
    node.parentNode?.removeChild(node)
    registry.forgetTree(node)
  }

  function removeAllChildren() {
    let parent = stack.top()
    for (let child of Array.from(parent.childNodes)) {
      parent.removeChild(child)
      registry.forgetTree(child)
    }
    if (textParent === parent) textParent = null
  }

  function setAttribute(name: string, value: string, namespace?: string) {
    let element = topElement()

    if (name === 'class') {
      // SVG and other namespaced elements expose className as an animated value
      if (namespace === undefined && element instanceof HTMLElement) element.className = value
      else element.setAttribute('class', value)
      return
    }

    // the element's own namespace does not namespace its attributes
    if (namespace && namespace !== element.namespaceURI) {
      element.setAttributeNS(namespace, name, value)
    } else {
      element.setAttribute(name, value)
    }
  }

  function removeAttribute(name: string) {
    let element = topElement()
    element.removeAttribute(name)

    // removing the attribute alone leaves live form state in place
    if (
      name === 'value' &&
      (element instanceof HTMLInputElement ||
        element instanceof HTMLTextAreaElement ||
        element instanceof HTMLSelectElement)
    ) {
      element.value = ''
    } else if (name === 'checked' && element instanceof HTMLInputElement) {
      element.checked = false
    } else if (name === 'selected' && element instanceof HTMLOptionElement) {
      element.selected = false
    }
  }

  // the diff engine pushes the listener's node before this instruction, as it
  // does for every attribute instruction
  function removeEventListener(eventName: string) {
    if (stack.size > 0) {
      let node = stack.top()
      if (node instanceof Element) events.unreserve(node, eventName)
    }
    events.release(eventName)
  }

  function apply(edit: Edit) {
    switch (edit.type) {
      case 'PushRoot':
        stack.push(registry.lookup(edit.id))
        return
      case 'PopRoot':
        stack.pop()
        return
      case 'CreateElement':
        create(
          edit.id,
          edit.namespace
            ? document.createElementNS(edit.namespace, edit.tag)
            : document.createElement(edit.tag),
        )
        return
      case 'CreateTextNode':
        create(edit.id, document.createTextNode(edit.text))
        return
      case 'CreatePlaceholder': {
        let placeholder = document.createElement(placeholderTag)
        placeholder.hidden = true
        create(edit.id, placeholder)
        return
      }
      case 'AppendChildren':
        appendChildren(edit.many)
        return
      case 'ReplaceWith':
        replaceWith(edit.many)
        return
      case 'Remove':
        remove()
        return
      case 'RemoveAllChildren':
        removeAllChildren()
        return
      case 'SetText':
        stack.top().textContent = edit.text
        return
      case 'SetAttribute':
        setAttribute(edit.name, edit.value, edit.namespace)
        return
      case 'RemoveAttribute':
        removeAttribute(edit.name)
        return
      case 'NewEventListener':
        events.reserve(topElement(), edit.eventName, edit.componentId, edit.nodeId)
        events.retain(edit.eventName)
        return
      case 'RemoveEventListener':
        removeEventListener(edit.eventName)
        return
      default:
        throw new UnknownEditError(typeOf(edit))
    }
  }

  return {
    /**
     * Applies `edits` in order. The first failing instruction aborts the rest
     * of the stream with a `PatchError` carrying its index and type; anything
     * else thrown is wrapped in an `EditApplicationError`. The registry and the
     * DOM are then out of sync and the caller should resynchronize. Returns the
     * number of applied instructions.
     */
    applyEdits(edits: Iterable<Edit>): number {
      let index = 0
      for (let edit of edits) {
        try {
          apply(edit)
        } catch (error: unknown) {
          let failure = error instanceof PatchError ? error : new EditApplicationError(error)
          failure.annotate(index, edit.type)
          console.error(`Edit stream aborted at instruction ${index} (${typeOf(edit)}):`, failure)
          throw failure
        }
        index++
      }

      if (stack.size > 0) {
        console.warn(`Edit stream left ${stack.size} node(s) on the builder stack`)
      }
      return index
    },

    /**
     * Drops the builder stack and text tracking, e.g. before a full resync.
     */
    reset(): void {
      stack.clear()
      textParent = null
    },
  }
}

function isReplaceable(node: Node): node is ReplaceableNode {
  return node instanceof Element || node instanceof CharacterData || node instanceof DocumentType
}

function typeOf(edit: unknown): string {
  if (typeof edit === 'object' && edit !== null && 'type' in edit) return String(edit.type)
  return typeof edit
}
