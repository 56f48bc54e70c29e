/**
 * @module keyseq
 */

import { error, Type } from '../../private/util'
import { Effect, Entry, Errors, Key, KeyedFun } from '../constants'
import { LazySeq } from '../keyseq-lazy'
import { ItemType, kindOf } from '../keyseq-typed'

/**
 * The secondary index values of an item, by index name.
 */
export type IndexValues = Readonly<Record<string, Key>>

interface Slot<T> {
  readonly position: number
  readonly item: T
}

function assertIndexValue(value: unknown): asserts value is Key {
  if (!Type.isString(value) && !Type.isInteger(value)) {
    throw error(
      Errors.InvalidIndexValue,
      `index value must be a string or an integer, ${kindOf(value)} given`
    )
  }
}

// 1 and '1' address the same index entry
const normalize = (value: Key): string => String(value)

/**
 * An eager, ordered collection of items that can be looked up by unique secondary index values.
 * @typeparam T the item type
 * @example
 * ```typescript
 * const users = new IndexedCollection<User>()
 * users.add({ id: 7, email: 'jo@example.com' }, { id: 7, email: 'jo@example.com' })
 * users.getBy('email', 'jo@example.com')
 * result: { id: 7, email: 'jo@example.com' }
 * ```
 */
export class IndexedCollection<T> implements Iterable<T> {
  /**
   * Returns a collection with the values of the given pairs, in order.
   * @param source a sequence or any iterable of key/value pairs
   * @param indexer an optional function returning the index values of each value
   * @param itemType an optional type that every value must satisfy
   */
  static fromSeq<K, T>(
    source: Iterable<Entry<K, T>>,
    indexer?: KeyedFun<T, K, IndexValues | undefined>,
    itemType?: ItemType<T>
  ): IndexedCollection<T> {
    const collection = new IndexedCollection<T>(itemType)

    for (const [key, value] of source) {
      collection.add(value, indexer === undefined ? undefined : indexer(value, key))
    }
    return collection
  }

  private items = new Map<number, T>()
  private readonly indexes = new Map<string, Map<string, Slot<T>>>()
  private nextPosition = 0

  /**
   * @param itemType when given, every added item must satisfy it
   */
  constructor(readonly itemType?: ItemType<T>) {}

  /**
   * The amount of items in the collection.
   */
  get size(): number {
    return this.items.size
  }

  /**
   * Returns the amount of items in the collection.
   */
  count(): number {
    return this.items.size
  }

  /**
   * Appends the given item and registers it under the given index values. The item and all index values are checked
   * before anything is stored, so a failed add leaves the collection unchanged.
   * @param item the item to add
   * @param indexes the index values of the item by index name, each must be unique within its index
   */
  add(item: T, indexes: IndexValues = {}): void {
    const itemType = this.itemType

    if (itemType !== undefined && !itemType.matches(item)) {
      throw error(
        Errors.TypeMismatch,
        `collection item must be ${itemType.name}, ${kindOf(item)} given`
      )
    }

    const entries = Object.entries(indexes)

    for (const [indexName, value] of entries) {
      assertIndexValue(value)

      const index = this.indexes.get(indexName)
      if (index !== undefined && index.has(normalize(value))) {
        throw error(Errors.DuplicateIndex, `index "${indexName}:${value}" already exists`)
      }
    }

    const position = this.nextPosition++
    this.items.set(position, item)

    for (const [indexName, value] of entries) {
      let index = this.indexes.get(indexName)
      if (index === undefined) {
        index = new Map()
        this.indexes.set(indexName, index)
      }
      index.set(normalize(value), { position, item })
    }
  }

  /**
   * Removes the first item that is strictly equal to the given item, together with its index values.
   * @returns true if an item was removed
   */
  remove(item: T): boolean {
    for (const [position, value] of this.items) {
      if (value === item) {
        this.removeAt(position)
        return true
      }
    }
    return false
  }

  /**
   * Returns true if the collection holds an item strictly equal to the given item.
   */
  has(item: T): boolean {
    for (const value of this.items.values()) {
      if (value === item) return true
    }
    return false
  }

  /**
   * Returns the item registered under the given value of the given index, or `otherwise` if there is none.
   * When a list of values is given, returns the items found for the distinct values, in the order of the list.
   * @example
   * ```typescript
   * users.getBy('id', [7, '7', 8])
   * result: [{ id: 7, email: 'jo@example.com' }]
   * ```
   */
  getBy(indexName: string, value: Key): T | undefined
  getBy<D>(indexName: string, value: Key, otherwise: D): T | D
  getBy(indexName: string, values: readonly Key[]): T[]
  getBy<D>(
    indexName: string,
    valueOrValues: Key | readonly Key[],
    otherwise?: D
  ): T | D | T[] | undefined {
    const index = this.indexes.get(indexName)

    if (typeof valueOrValues === 'string' || typeof valueOrValues === 'number') {
      assertIndexValue(valueOrValues)

      const slot = index === undefined ? undefined : index.get(normalize(valueOrValues))
      return slot === undefined ? otherwise : slot.item
    }

    const found: T[] = []
    const requested = new Set<string>()

    for (const value of valueOrValues) {
      assertIndexValue(value)
      requested.add(normalize(value))
    }

    if (index === undefined) return found

    for (const value of requested) {
      const slot = index.get(value)
      if (slot !== undefined) found.push(slot.item)
    }
    return found
  }

  /**
   * Reverses the order of the items. Index values keep addressing the same items.
   */
  reverse(): void {
    this.items = new Map([...this.items].reverse())
  }

  /**
   * Calls the given effect with each item and its position, until the effect returns exactly `false`.
   * @returns this exact instance
   */
  each(effect: Effect<T, number>): this {
    for (const [position, item] of this.items) {
      if (effect(item, position) === false) break
    }
    return this
  }

  /**
   * Removes all items and index values.
   */
  clear(): void {
    this.items.clear()
    this.indexes.clear()
  }

  /**
   * Returns the first item, or undefined if the collection is empty.
   */
  first(): T | undefined {
    for (const item of this.items.values()) return item
    return undefined
  }

  /**
   * Returns the last item, or undefined if the collection is empty.
   */
  last(): T | undefined {
    let last: T | undefined
    for (const item of this.items.values()) last = item
    return last
  }

  /**
   * Removes and returns the last item with its index values, or returns undefined if the collection is empty.
   */
  pop(): T | undefined {
    let position: number | undefined
    for (const current of this.items.keys()) position = current

    return position === undefined ? undefined : this.removeAt(position)
  }

  /**
   * Removes and returns the first item with its index values, or returns undefined if the collection is empty.
   */
  shift(): T | undefined {
    const head = this.items.keys().next()

    return head.done ? undefined : this.removeAt(head.value)
  }

  /**
   * Returns the items in order.
   */
  toArray(): T[] {
    return [...this.items.values()]
  }

  toJSON(): T[] {
    return this.toArray()
  }

  /**
   * Returns a sequence over the items keyed by their insertion position. The sequence reads the collection each
   * time it is consumed.
   */
  toSeq(): LazySeq<number, T> {
    return LazySeq.create<number, T>(() => this.items.entries())
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items.values()
  }

  private removeAt(position: number): T | undefined {
    const item = this.items.get(position)
    this.items.delete(position)

    for (const [indexName, index] of this.indexes) {
      for (const [value, slot] of index) {
        if (slot.position === position) index.delete(value)
      }
      if (index.size === 0) this.indexes.delete(indexName)
    }
    return item
  }
}
