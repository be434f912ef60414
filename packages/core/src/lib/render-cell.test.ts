import { afterEach, describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import { createRenderCell } from './render-cell.ts'

const CounterProps = z.object({ count: z.number() })
type CounterProps = z.infer<typeof CounterProps>

const LabelProps = z.object({ label: z.string() })

function createCounter(props: CounterProps = { count: 1 }) {
  return createRenderCell({
    name: 'Counter',
    type: CounterProps,
    props,
    render: ({ count }) => `count: ${count}`,
    memo: (prev, next) => prev.count === next.count,
  })
}

function createBroken() {
  return createRenderCell({
    name: 'Broken',
    type: LabelProps,
    props: { label: 'nope' },
    render: (): string => {
      throw new Error('render exploded')
    },
  })
}

describe('createRenderCell', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('render', () => {
    it('returns the rendered tree', () => {
      expect(createCounter().render()).toEqual({ type: 'ready', node: 'count: 1' })
    })

    it('returns the default result when the component renders nothing', () => {
      let cell = createRenderCell({
        name: 'Empty',
        type: LabelProps,
        props: { label: 'x' },
        render: () => null,
      })
      expect(cell.render()).toEqual({ type: 'default' })
    })

    it('logs and contains exceptions thrown while rendering', () => {
      let error = vi.spyOn(console, 'error').mockImplementation(() => {})
      let cell = createBroken()

      expect(() => cell.render()).not.toThrow()
      expect(cell.render()).toEqual({ type: 'default' })
      expect(error).toHaveBeenCalledWith(
        'Error while rendering component `Broken`:',
        expect.objectContaining({ message: 'render exploded' }),
      )
    })

    it('renders a copy of the props', () => {
      let ListProps = z.object({ items: z.array(z.number()) })
      let cell = createRenderCell({
        name: 'List',
        type: ListProps,
        props: { items: [1] },
        render: (props) => {
          props.items.push(99)
          return props.items.length
        },
        memo: (prev, next) => prev.items.join() === next.items.join(),
      })

      expect(cell.render()).toEqual({ type: 'ready', node: 2 })
      expect(cell.render()).toEqual({ type: 'ready', node: 2 })
      expect(cell.memoize({ items: [1] })).toBe(true)
    })

    it('does not affect other cells', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {})
      let broken = createBroken()
      let counter = createCounter({ count: 3 })

      broken.render()
      expect(counter.render()).toEqual({ type: 'ready', node: 'count: 3' })
      broken.render()
      expect(counter.render()).toEqual({ type: 'ready', node: 'count: 3' })
    })
  })

  describe('memoize', () => {
    it('delegates to the comparator for props of the same type', () => {
      let cell = createCounter({ count: 1 })
      expect(cell.memoize({ count: 1 })).toBe(true)
      expect(cell.memoize({ count: 2 })).toBe(false)
    })

    it('is never equal for props of another type', () => {
      let memo = vi.fn(() => true)
      let cell = createRenderCell({
        name: 'Counter',
        type: CounterProps,
        props: { count: 1 },
        render: ({ count }) => count,
        memo,
      })

      expect(cell.memoize({ label: 'one' })).toBe(false)
      expect(cell.memoize('1')).toBe(false)
      expect(cell.memoize(undefined)).toBe(false)
      expect(cell.memoize({ count: '1' })).toBe(false)
      expect(memo).not.toHaveBeenCalled()
    })

    it('compares with Object.is by default', () => {
      let props = { label: 'a' }
      let cell = createRenderCell({
        name: 'Label',
        type: LabelProps,
        props,
        render: ({ label }) => label,
      })

      expect(cell.memoize(props)).toBe(true)
      expect(cell.memoize({ label: 'a' })).toBe(false)
    })
  })

  describe('props', () => {
    it('returns the current props for the matching type', () => {
      let props = { count: 4 }
      let cell = createCounter(props)
      expect(cell.props(CounterProps)).toBe(props)
    })

    it('returns undefined for another type', () => {
      expect(createCounter().props(LabelProps)).toBeUndefined()
      expect(createCounter().props(z.string())).toBeUndefined()
    })
  })

  describe('update', () => {
    it('replaces props of the same type', () => {
      let cell = createCounter({ count: 1 })
      expect(cell.update({ count: 5 })).toBe(true)
      expect(cell.props(CounterProps)).toEqual({ count: 5 })
      expect(cell.render()).toEqual({ type: 'ready', node: 'count: 5' })
    })

    it('keeps the old props when the candidate is of another type', () => {
      let cell = createCounter({ count: 1 })
      expect(cell.update({ label: 'x' })).toBe(false)
      expect(cell.props(CounterProps)).toEqual({ count: 1 })
    })
  })

  describe('duplicate', () => {
    it('copies the props into an independent cell', () => {
      let props = { count: 1 }
      let cell = createCounter(props)
      let copy = cell.duplicate()

      expect(copy.name).toBe('Counter')
      expect(copy.props(CounterProps)).toEqual({ count: 1 })
      expect(copy.props(CounterProps)).not.toBe(props)

      cell.update({ count: 9 })
      expect(copy.render()).toEqual({ type: 'ready', node: 'count: 1' })
      expect(cell.render()).toEqual({ type: 'ready', node: 'count: 9' })
    })

    it('copies keys the props type does not name and nested state', () => {
      let TitleProps = z.object({ title: z.string() })
      let props = { title: 't', extra: 1, tags: ['a'] }
      let cell = createRenderCell({
        name: 'Title',
        type: TitleProps,
        props,
        render: (value) => value,
      })

      let copy = cell.duplicate()
      let copied = copy.props(TitleProps)
      expect(copy.render()).toEqual({
        type: 'ready',
        node: { title: 't', extra: 1, tags: ['a'] },
      })
      expect(copied).toEqual(props)
      expect(copied).not.toBe(props)

      props.tags.push('b')
      expect(copy.render()).toEqual({
        type: 'ready',
        node: { title: 't', extra: 1, tags: ['a'] },
      })
    })

    it('keeps the comparator', () => {
      let copy = createCounter({ count: 2 }).duplicate()
      expect(copy.memoize({ count: 2 })).toBe(true)
      expect(copy.memoize({ label: 'two' })).toBe(false)
    })

    it('uses the supplied clone function', () => {
      let clone = vi.fn((props: CounterProps) => ({ count: props.count + 1 }))
      let cell = createRenderCell({
        name: 'Counter',
        type: CounterProps,
        props: { count: 1 },
        render: ({ count }) => count,
        clone,
      })

      let copy = cell.duplicate()
      expect(clone).toHaveBeenCalledWith({ count: 1 })
      expect(copy.props(CounterProps)).toEqual({ count: 2 })

      // render works on a copy as well
      expect(copy.render()).toEqual({ type: 'ready', node: 3 })
      expect(clone).toHaveBeenLastCalledWith({ count: 2 })
    })
  })
})
