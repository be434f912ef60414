import { z } from 'zod'
import type { ComponentId, NodeId } from './ids.ts'
import { parseId, U64_MAX } from './ids.ts'

/**
 * One tree mutation produced by the diff engine. A stream of these is applied
 * strictly in order against a builder stack; see the DOM package for the stack
 * effect of each instruction.
 */
export type Edit =
  | { type: 'PushRoot'; id: NodeId }
  | { type: 'PopRoot' }
  | { type: 'CreateElement'; tag: string; id: NodeId; namespace?: string }
  | { type: 'CreateTextNode'; text: string; id: NodeId }
  | { type: 'CreatePlaceholder'; id: NodeId }
  | { type: 'AppendChildren'; many: number }
  | { type: 'ReplaceWith'; many: number }
  | { type: 'Remove' }
  | { type: 'RemoveAllChildren' }
  | { type: 'SetText'; text: string }
  | { type: 'SetAttribute'; name: string; value: string; namespace?: string }
  | { type: 'RemoveAttribute'; name: string }
  | { type: 'NewEventListener'; eventName: string; componentId: ComponentId; nodeId: NodeId }
  /**
   * Applies to the node on top of the builder stack, like the attribute
   * instructions: the listener's node must be pushed first. With an empty
   * stack only the category's listener count drops.
   */
  | { type: 'RemoveEventListener'; eventName: string }

export type EditType = Edit['type']

// ids arrive as bigint in process, and as numbers or decimal strings over JSON
let id = z
  .union([
    z.bigint().nonnegative(),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
    z.string().refine((text) => parseId(text) !== undefined, 'Expected an unsigned 64-bit decimal'),
  ])
  .transform((value) => BigInt(value))
  .refine((value) => value <= U64_MAX, 'Id exceeds 64 bits')

let count = z.number().int()

const editSchema: z.ZodType<Edit, z.ZodTypeDef, unknown> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('PushRoot'), id }),
  z.object({ type: z.literal('PopRoot') }),
  z.object({
    type: z.literal('CreateElement'),
    tag: z.string().min(1),
    id,
    namespace: z.string().optional(),
  }),
  z.object({ type: z.literal('CreateTextNode'), text: z.string(), id }),
  z.object({ type: z.literal('CreatePlaceholder'), id }),
  z.object({ type: z.literal('AppendChildren'), many: count.nonnegative() }),
  z.object({ type: z.literal('ReplaceWith'), many: count }),
  z.object({ type: z.literal('Remove') }),
  z.object({ type: z.literal('RemoveAllChildren') }),
  z.object({ type: z.literal('SetText'), text: z.string() }),
  z.object({
    type: z.literal('SetAttribute'),
    name: z.string().min(1),
    value: z.string(),
    namespace: z.string().optional(),
  }),
  z.object({ type: z.literal('RemoveAttribute'), name: z.string().min(1) }),
  z.object({
    type: z.literal('NewEventListener'),
    eventName: z.string().min(1),
    componentId: id,
    nodeId: id,
  }),
  z.object({ type: z.literal('RemoveEventListener'), eventName: z.string().min(1) }),
])

const editStreamSchema = z.array(editSchema)

/**
 * Validates an edit stream received over the wire (e.g. parsed JSON) and
 * normalizes its ids to `bigint`. Throws a `ZodError` naming the offending
 * instruction when the stream is malformed.
 */
export function parseEdits(input: unknown): Edit[] {
  return editStreamSchema.parse(input)
}

export function parseEdit(input: unknown): Edit {
  return editSchema.parse(input)
}
