/**
 * @module keyseq
 */

import { error } from '../../private/util'
import { Entry, Errors, Producer } from '../constants'

/**
 * A cursor over the key/value pairs of a sequence. The cursor is positioned on its first pair as soon as it
 * is obtained, so no explicit `rewind()` is needed before reading.
 * Walking it with `for..of` yields the pairs as `[key, value]` tuples.
 * @typeparam K the key type
 * @typeparam V the value type
 */
export interface SeqIterator<K, V> extends Iterable<Entry<K, V>> {
  /**
   * Returns true while the cursor addresses an existing pair.
   */
  isValid(): boolean

  /**
   * Returns the key at the cursor, or undefined when the cursor is past the end.
   */
  key(): K | undefined

  /**
   * Returns the value at the cursor, or undefined when the cursor is past the end.
   */
  current(): V | undefined

  /**
   * Moves the cursor to the next pair.
   */
  advance(): void

  /**
   * Moves the cursor back to the first pair.
   */
  rewind(): void
}

/**
 * A cursor directly over a one-shot producer. Nothing is remembered: once the producer has advanced past its
 * first pair, the cursor cannot be rewound.
 * @typeparam K the key type
 * @typeparam V the value type
 */
export class ProducerIterator<K, V> implements SeqIterator<K, V> {
  private result?: IteratorResult<Entry<K, V>>
  private advanced = false

  /**
   * @param producer the producer to read
   * @param closeOnLeave whether a walk that stops before the end closes the producer
   */
  constructor(private readonly producer: Producer<K, V>, private readonly closeOnLeave = false) {}

  // the producer only starts running when the first pair is asked for
  private get head(): IteratorResult<Entry<K, V>> {
    if (this.result === undefined) this.result = this.producer.next()
    return this.result
  }

  isValid(): boolean {
    return !this.head.done
  }

  key(): K | undefined {
    const head = this.head
    return head.done ? undefined : head.value[0]
  }

  current(): V | undefined {
    const head = this.head
    return head.done ? undefined : head.value[1]
  }

  advance(): void {
    if (this.head.done) return

    this.advanced = true
    this.result = this.producer.next()
  }

  /**
   * Only succeeds while the producer has not advanced past its first pair.
   */
  rewind(): void {
    if (this.advanced) {
      throw error(
        Errors.NotRewindable,
        'a one-shot producer cannot be rewound after it has advanced'
      )
    }
  }

  *[Symbol.iterator](): Iterator<Entry<K, V>> {
    this.rewind()

    let head = this.head
    try {
      for (; !head.done; head = this.head) {
        yield head.value
        this.advance()
      }
    } finally {
      if (!head.done && this.closeOnLeave) this.close()
    }
  }

  private close(): void {
    this.result = { done: true, value: undefined }
    if (this.producer.return !== undefined) this.producer.return()
  }
}

/**
 * Wraps a one-shot producer and caches every pair the first time it is pulled, so that the pairs can be counted,
 * rewound and walked again without running the producer twice.
 *
 * The first pair is pulled as soon as the iterator is constructed.
 *
 * When the producer yields a key that was already cached, the cached value is replaced in place and the key keeps
 * its original position.
 * @typeparam K the key type
 * @typeparam V the value type
 * @example
 * ```typescript
 * const iterator = new CachingIterator(new Map([['a', 1], ['b', 2]]).entries())
 * iterator.advance()
 * iterator.rewind()
 * [...iterator]
 * result: [['a', 1], ['b', 2]]
 * ```
 */
export class CachingIterator<K, V> implements SeqIterator<K, V> {
  private readonly entries: Entry<K, V>[] = []
  private readonly positions = new Map<K, number>()
  private readonly inner: Iterator<Entry<K, V>>
  private position = 0
  private advanced = false
  private exhausted = false

  constructor(producer: Producer<K, V>) {
    this.inner = this.wrap(producer)
    this.fill(1)
  }

  /**
   * The amount of distinct keys cached so far.
   */
  get size(): number {
    return this.entries.length
  }

  /**
   * True once the wrapped producer has reported that it is done.
   */
  get isExhausted(): boolean {
    return this.exhausted
  }

  isValid(): boolean {
    return this.position < this.entries.length
  }

  key(): K | undefined {
    return this.isValid() ? this.entries[this.position][0] : undefined
  }

  current(): V | undefined {
    return this.isValid() ? this.entries[this.position][1] : undefined
  }

  advance(): void {
    if (!this.isValid()) return

    this.position++
    this.fill(this.position + 1)
  }

  /**
   * Moves the cursor back to the first pair. If the producer has advanced beyond its first pair, it is drained
   * completely first, so that a new walk does not miss pairs that were pending in the producer.
   */
  rewind(): void {
    if (this.advanced) this.drain()

    this.position = 0
  }

  /**
   * Drains the producer and returns all cached pairs in the order they were first seen.
   */
  materialize(): Map<K, V> {
    this.drain()

    return new Map(this.entries)
  }

  /**
   * Walks the cache from its first pair, pulling from the producer only when the end of the cache is reached.
   * Each walk has its own position and does not move the cursor.
   */
  *[Symbol.iterator](): Iterator<Entry<K, V>> {
    for (let index = 0; this.fill(index + 1) > index; index++) {
      const [key, value] = this.entries[index]
      yield [key, value]
    }
  }

  private drain(): void {
    this.fill(Infinity)
  }

  // pulls until the cache holds `size` keys or the producer is done, returns the resulting cache size
  private fill(size: number): number {
    while (this.entries.length < size && !this.exhausted) {
      const result = this.inner.next()
      if (!result.done) this.store(result.value)
    }
    return this.entries.length
  }

  private store([key, value]: Entry<K, V>): void {
    const position = this.positions.get(key)

    if (position === undefined) {
      this.positions.set(key, this.entries.length)
      this.entries.push([key, value])
    } else {
      this.entries[position] = [key, value]
    }
  }

  // a producer that fails counts as exhausted
  private *wrap(producer: Producer<K, V>): Iterator<Entry<K, V>> {
    try {
      for (let result = producer.next(); !result.done; result = producer.next()) {
        yield result.value
        this.advanced = true
      }
    } finally {
      this.exhausted = true
    }
  }
}
