import type { ZodType, ZodTypeDef } from 'zod'

/**
 * Runtime description of a component's props. Stands in for the concrete props
 * type once the cell has erased it.
 */
export type PropsType<P> = ZodType<P, ZodTypeDef, unknown>

export type RenderReturn<N> = { type: 'ready'; node: N } | { type: 'default' }

export type RenderFunction<P, N> = (props: P) => N | null | undefined

export type MemoComparator<P> = (prev: P, next: P) => boolean

export interface RenderCellConfig<P, N> {
  /**
   * Display name used when logging render failures.
   */
  name: string
  type: PropsType<P>
  props: P
  render: RenderFunction<P, N>
  /**
   * Decides whether two props values are equal enough to skip a render.
   * Defaults to `Object.is`.
   */
  memo?: MemoComparator<P>
  /**
   * Copies props for `render()` and `duplicate()`. Defaults to
   * `structuredClone`; props holding functions or class instances need their
   * own copy.
   */
  clone?: (props: P) => P
}

/**
 * A component invocation with its props type erased, so cells of different
 * components can live in one collection.
 */
export interface RenderCell<N = unknown> {
  readonly name: string

  /**
   * Renders a copy of the current props. Never throws: an exception in the
   * render function is logged and turned into the default result.
   */
  render(): RenderReturn<N>

  /**
   * `true` when `candidate` has this cell's props type and the comparator
   * considers it equal to the current props.
   */
  memoize(candidate: unknown): boolean

  /**
   * The current props, when they are of the requested type.
   */
  props<P>(type: PropsType<P>): P | undefined

  /**
   * Replaces the current props. Returns `false` and keeps the old props when
   * `candidate` is of another type.
   */
  update(candidate: unknown): boolean

  /**
   * An independent cell over a copy of the current props.
   */
  duplicate(): RenderCell<N>
}

export function createRenderCell<P, N>(config: RenderCellConfig<P, N>): RenderCell<N> {
  let { name, type } = config
  let memo = config.memo ?? Object.is
  let clone = config.clone ?? ((props: P) => structuredClone(props))
  let current = config.props

  return {
    name,

    render() {
      try {
        let node = config.render(clone(current))
        return node == null ? { type: 'default' } : { type: 'ready', node }
      } catch (error: unknown) {
        console.error(`Error while rendering component \`${name}\`:`, error)
        return { type: 'default' }
      }
    },

    memoize(candidate) {
      if (!isType(type, candidate)) return false
      return memo(current, candidate)
    },

    props<T>(expected: PropsType<T>) {
      let value: unknown = current
      return isType(expected, value) ? value : undefined
    },

    update(candidate) {
      if (!isType(type, candidate)) return false
      current = candidate
      return true
    },

    duplicate() {
      return createRenderCell({ ...config, memo, clone, props: clone(current) })
    },
  }
}

function isType<T>(type: PropsType<T>, value: unknown): value is T {
  return type.safeParse(value).success
}
