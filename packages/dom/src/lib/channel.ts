export class ChannelClosedError extends Error {
  readonly name = 'ChannelClosedError'

  constructor() {
    super('Channel is closed')
  }
}

/**
 * Unbounded queue between a producer that must never wait (native event
 * dispatch) and a consumer that suspends until the next value arrives.
 */
export interface Channel<T> extends AsyncIterable<T> {
  /**
   * Queues `value`, or hands it straight to the oldest waiting receiver.
   * Returns `false` once the channel is closed.
   */
  send(value: T): boolean

  /**
   * Resolves with the next value. Never times out; aborting `signal` rejects
   * with its reason and gives up the place in line.
   */
  receive(signal?: AbortSignal): Promise<T>

  /**
   * Stops accepting values. Buffered values can still be received, after
   * which receives reject with `ChannelClosedError`.
   */
  close(): void

  readonly closed: boolean

  /**
   * Number of values sent but not yet received.
   */
  readonly buffered: number
}

type Waiter<T> = {
  resolve: (value: T) => void
  reject: (reason: unknown) => void
}

export function createChannel<T>(): Channel<T> {
  // boxed so `T` may itself include undefined
  let buffer: Array<{ value: T }> = []
  let waiters: Waiter<T>[] = []
  let closed = false

  function receive(signal?: AbortSignal): Promise<T> {
    let next = buffer.shift()
    if (next) return Promise.resolve(next.value)
    if (closed) return Promise.reject(new ChannelClosedError())
    if (signal?.aborted) return Promise.reject(signal.reason)

    return new Promise<T>((resolve, reject) => {
      let onAbort = () => {
        let index = waiters.indexOf(waiter)
        if (index !== -1) waiters.splice(index, 1)
        reject(signal?.reason)
      }

      let waiter: Waiter<T> = {
        resolve: (value) => {
          signal?.removeEventListener('abort', onAbort)
          resolve(value)
        },
        reject: (reason) => {
          signal?.removeEventListener('abort', onAbort)
          reject(reason)
        },
      }

      waiters.push(waiter)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }

  return {
    send(value: T): boolean {
      if (closed) return false
      let waiter = waiters.shift()
      if (waiter) waiter.resolve(value)
      else buffer.push({ value })
      return true
    },

    receive,

    close(): void {
      if (closed) return
      closed = true
      for (let waiter of waiters.splice(0, waiters.length)) {
        waiter.reject(new ChannelClosedError())
      }
    },

    get closed() {
      return closed
    },

    get buffered() {
      return buffer.length
    },

    async *[Symbol.asyncIterator]() {
      while (true) {
        let value: T
        try {
          value = await receive()
        } catch (error: unknown) {
          if (error instanceof ChannelClosedError) return
          throw error
        }
        yield value
      }
    },
  }
}
