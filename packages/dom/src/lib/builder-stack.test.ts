import { describe, expect, it } from 'vitest'
import { createBuilderStack } from './builder-stack.ts'
import { StackUnderflowError } from './errors.ts'

function nodes(...tags: string[]) {
  return tags.map((tag) => document.createElement(tag))
}

describe('createBuilderStack', () => {
  it('pops in reverse push order', () => {
    let stack = createBuilderStack()
    let [a, b] = nodes('a', 'b')
    stack.push(a)
    stack.push(b)

    expect(stack.top()).toBe(b)
    expect(stack.pop()).toBe(b)
    expect(stack.pop()).toBe(a)
    expect(stack.size).toBe(0)
  })

  it('pops many nodes in push order', () => {
    let stack = createBuilderStack()
    let [a, b, c] = nodes('a', 'b', 'c')
    stack.push(a)
    stack.push(b)
    stack.push(c)

    expect(stack.popMany(2)).toEqual([b, c])
    expect(stack.toArray()).toEqual([a])
    expect(stack.popMany(0)).toEqual([])
    expect(stack.size).toBe(1)
  })

  it('reads positions from the bottom', () => {
    let stack = createBuilderStack()
    let [a, b] = nodes('a', 'b')
    stack.push(a)
    stack.push(b)

    expect(stack.at(0)).toBe(a)
    expect(stack.at(1)).toBe(b)
    expect(() => stack.at(2)).toThrow(StackUnderflowError)
    expect(() => stack.at(-1)).toThrow(StackUnderflowError)
  })

  it('fails loudly when empty', () => {
    let stack = createBuilderStack()
    expect(() => stack.pop()).toThrow(StackUnderflowError)
    expect(() => stack.top()).toThrow(StackUnderflowError)
    expect(() => stack.popMany(1)).toThrow(
      'Builder stack underflow in popMany: needed 1 node(s), stack holds 0',
    )
  })

  it('leaves the stack untouched when popping too many', () => {
    let stack = createBuilderStack()
    let [a] = nodes('a')
    stack.push(a)

    expect(() => stack.popMany(2)).toThrow(StackUnderflowError)
    expect(stack.toArray()).toEqual([a])
  })

  it('rejects negative counts', () => {
    expect(() => createBuilderStack().popMany(-1)).toThrow(RangeError)
  })

  it('clears', () => {
    let stack = createBuilderStack()
    stack.push(document.createElement('a'))
    stack.clear()
    expect(stack.size).toBe(0)
  })
})
