/**
 * @module keyseq
 */

import {
  defaultMonitorEffect,
  getIterator,
  isEntries,
  isProducer,
  isProducerFactory,
  isValueArray,
  looseEquals
} from '../../private/keyseq-common'
import { error, Type } from '../../private/util'
import { Effect, Entry, Errors, Key, KeyedFun, MonitorEffect, Pred, Producer } from '../constants'
import { CachingIterator, ProducerIterator, SeqIterator } from '../keyseq-cache'
import { kindOf, TypedDeclaration, typedProducer } from '../keyseq-typed'

/**
 * A function that receives the sequence owning it and returns a new one-shot producer for that sequence.
 * @typeparam K the key type
 * @typeparam V the value type
 */
export type ProducerFactory<K, V> = (seq: LazySeq<K, V>) => Producer<K, V>

/**
 * The source of a sequence: a one-shot producer, a function creating producers, or any iterable of key/value pairs
 * such as a Map or another sequence.
 * @typeparam K the key type
 * @typeparam V the value type
 */
export type SeqSource<K, V> = Producer<K, V> | ProducerFactory<K, V> | Iterable<Entry<K, V>>

/**
 * The type of the values found at the bottom of (possibly nested) sequences with value type V.
 */
export type Leaf<V> = V extends LazySeq<infer _, infer I> ? Leaf<I> : V

/**
 * The value type that results from recursively mapping the leaves of value type V to R.
 */
export type Deep<V, R> = V extends LazySeq<infer K, infer I> ? LazySeq<K, Deep<I, R>> : R

/**
 * The value type that results from materializing value type V, nested sequences becoming Maps and leaves becoming R.
 */
export type Materialized<V, R = Leaf<V>> = V extends LazySeq<infer K, infer I>
  ? Map<K, Materialized<I, R>>
  : R

// receives every pair yielded by a monitored sequence
interface Observer<K, V> {
  observe(value: V, key: K): void
}

// method parameters are compared bivariantly, so keyed functions over any value and key fit
interface AnyKeyed {
  fun(value: unknown, key: unknown): unknown
}
type AnyKeyedFun = AnyKeyed['fun']

// a source that is itself a producer can be read only once, every other source yields a new producer
interface Resolved<K, V> {
  readonly producer: Producer<K, V>
  readonly oneShot: boolean
}

function* observed<K, V>(
  pairs: Iterable<Entry<K, V>>,
  observer: Observer<K, V>
): Iterator<Entry<K, V>> {
  for (const [key, value] of pairs) {
    observer.observe(value, key)
    yield [key, value]
  }
}

// only textual and integral keys form a group
function isGroupKey<G>(value: G): value is Extract<G, Key> {
  return Type.isString(value) || Type.isInteger(value)
}

// the source is classified only when the sequence is consumed
function resolveProducer<K, V>(source: SeqSource<K, V>, owner: LazySeq<K, V>): Resolved<K, V> {
  if (isProducer(source)) return { producer: source, oneShot: true }

  if (isProducerFactory(source)) {
    const produced = source(owner)
    if (!Type.isIterator(produced)) {
      throw error(
        Errors.InvalidProducerResult,
        `a producer factory must return an iterator, ${kindOf(produced)} given`
      )
    }
    return { producer: produced, oneShot: false }
  }

  if (isEntries(source)) return { producer: getIterator(source), oneShot: false }

  throw error(
    Errors.InvalidSource,
    `sequence source must be a producer, a producer factory or an iterable, ${kindOf(source)} given`
  )
}

/**
 * A lazy, chainable sequence of key/value pairs.
 *
 * Transformations return new sequences and do no work until a terminal operation (such as `toArray`, `count`,
 * `each`, `get`, `first` or `last`) consumes them.
 *
 * A sequence created with `useCache` memoizes the pairs of its source the first time they are pulled, so it can be
 * consumed any number of times while the source runs only once. Every sequence derived from it caches as well.
 * Without `useCache`, every terminal operation resolves the source again and a producer function runs again. A
 * one-shot producer keeps the pairs it has not given out yet, and fails with `NotRewindable` when it is walked again
 * after it has advanced.
 * @typeparam K the key type
 * @typeparam V the value type
 */
export class LazySeq<K, V> implements Iterable<Entry<K, V>> {
  /**
   * Returns a sequence over the given source. The source is not inspected until the sequence is first consumed.
   * @param source an array (keyed by index), a one-shot producer, a producer factory, or an iterable of pairs
   * @param useCache whether pairs are cached the first time they are pulled from the source
   * @example
   * ```typescript
   * LazySeq.create(new Map([['a', 1], ['b', 2]])).map(v => v * 10).toMap()
   * result: Map { 'a' => 10, 'b' => 20 }
   * ```
   */
  static create<V>(source: readonly V[], useCache?: boolean): LazySeq<number, V>
  static create<K, V>(source: SeqSource<K, V>, useCache?: boolean): LazySeq<K, V>
  static create<K, V>(
    source: SeqSource<K, V> | readonly V[],
    useCache = false
  ): LazySeq<K, V> | LazySeq<number, V> {
    if (isValueArray(source)) {
      const values = source
      return new LazySeq<number, V>(() => values.entries(), useCache)
    }

    return new LazySeq(source, useCache)
  }

  /**
   * Returns a sequence without pairs.
   */
  static empty<K = never, V = never>(): LazySeq<K, V> {
    return new LazySeq<K, V>([], false)
  }

  /**
   * Returns a sequence that validates each value pulled from the given source against the declared item type, and
   * fails with a `TypeMismatch` error on the first value that does not match.
   * @typeparam V the declared value type
   * @param declaration the declaring name and the item type
   * @param source the untyped source
   * @param useCache whether validated pairs are cached
   * @example
   * ```typescript
   * LazySeq.typed({ name: 'Prices', itemType: ItemType.primitive('number') }, [10, '11']).toArray()
   * result: TypeMismatch: each item of Prices must be number, string given at key "1"
   * ```
   */
  static typed<V>(
    declaration: TypedDeclaration<V>,
    source: readonly unknown[],
    useCache?: boolean
  ): LazySeq<number, V>
  static typed<K, V>(
    declaration: TypedDeclaration<V>,
    source: SeqSource<K, unknown>,
    useCache?: boolean
  ): LazySeq<K, V>
  static typed<K, V>(
    declaration: TypedDeclaration<V>,
    source: SeqSource<K, unknown> | readonly unknown[],
    useCache = false
  ): LazySeq<K, V> | LazySeq<number, V> {
    if (isValueArray(source)) {
      const values = LazySeq.create(source)
      return new LazySeq<number, V>(() => typedProducer(declaration, values), useCache)
    }

    const untyped = LazySeq.create(source)
    return new LazySeq<K, V>(() => typedProducer(declaration, untyped), useCache)
  }

  private readonly produce: () => Resolved<K, V>
  private cached?: CachingIterator<K, V>
  private cursor?: ProducerIterator<K, V>
  private observer?: Observer<K, V>

  private constructor(source: SeqSource<K, V>, readonly useCache: boolean) {
    this.produce = () => resolveProducer(source, this)
  }

  /**
   * Returns a sequence yielding the pairs of the producer that `createProducer` returns when it receives this
   * sequence. The new sequence inherits the caching policy of this one.
   * @typeparam K2 the resulting key type
   * @typeparam V2 the resulting value type
   * @param createProducer a function receiving this sequence and returning a producer of new pairs
   * @example
   * ```typescript
   * seq.of(1, 2, 3).applyCustomOperation(function*(previous) {
   *   for (const [key, value] of previous) yield [`#${key}`, value * value]
   * })
   * result: ('#0' => 1, '#1' => 4, '#2' => 9)
   * ```
   */
  applyCustomOperation<K2, V2>(
    createProducer: (previous: LazySeq<K, V>) => Producer<K2, V2>
  ): LazySeq<K2, V2> {
    return new LazySeq<K2, V2>(() => createProducer(this), this.useCache)
  }

  /**
   * Iterable interface: each call walks the pairs from the start. For a cached sequence the walk reads the cache.
   */
  [Symbol.iterator](): Iterator<Entry<K, V>> {
    const pairs = this.getIterator()
    const observer = this.observer

    if (observer === undefined) return getIterator(pairs)
    return observed(pairs, observer)
  }

  /**
   * Returns the cursor used to consume this sequence. For a cached sequence, this is always the same memoizing
   * iterator, and over a one-shot producer always the same cursor. Otherwise the source is resolved again and a
   * new cursor over it is returned.
   */
  getIterator(): SeqIterator<K, V> {
    if (this.useCache) return this.cache()
    if (this.cursor !== undefined) return this.cursor

    const { producer, oneShot } = this.produce()
    const cursor = new ProducerIterator(producer, !oneShot)

    if (oneShot) this.cursor = cursor
    return cursor
  }

  private cache(): CachingIterator<K, V> {
    if (this.cached === undefined) this.cached = new CachingIterator(this.produce().producer)
    return this.cached
  }

  // repeated keys of a cached sequence hold their last value only once the source is drained
  private settle(): void {
    if (this.useCache) this.cache().materialize()
  }

  /**
   * Returns true if the sequence has no pairs. Pulls at most one pair from the source.
   */
  isEmpty(): boolean {
    return !this.getIterator().isValid()
  }

  /**
   * Returns a sequence of only those pairs for which the given predicate returns a truthy value.
   * @param pred a predicate taking a value and its key, by default the truthiness of the value
   * @example
   * ```typescript
   * seq.of(0, 1, '', 'a').filter()
   * result: (1 => 1, 3 => 'a')
   * ```
   */
  filter(pred: Pred<V, K> = Boolean): LazySeq<K, V> {
    return this.applyCustomOperation<K, V>(function*(previous) {
      for (const [key, value] of previous) {
        if (pred(value, key)) yield [key, value]
      }
    })
  }

  /**
   * Calls the given effect with each value and its key, until the effect returns exactly `false`.
   * Note: eagerly consumes the sequence.
   * @returns this exact instance
   */
  each(effect: Effect<V, K>): this {
    for (const [key, value] of this) {
      if (effect(value, key) === false) break
    }
    return this
  }

  /**
   * Returns a sequence where each value is replaced by the result of `mapFun`, keeping the keys.
   * When `recursive` is true, values that are sequences are mapped recursively instead of being passed to `mapFun`.
   * @typeparam R the result type of mapFun
   * @param mapFun a function taking a value and its key
   * @example
   * ```typescript
   * seq.of(1, 3, 5).map((value, key) => value + key)
   * result: (0 => 1, 1 => 4, 2 => 7)
   * ```
   */
  map<R>(mapFun: KeyedFun<V, K, R>): LazySeq<K, R>
  map<R>(mapFun: KeyedFun<Leaf<V>, unknown, R>, recursive: true): LazySeq<K, Deep<V, R>>
  map(mapFun: AnyKeyedFun, recursive = false): LazySeq<K, unknown> {
    return this.applyCustomOperation<K, unknown>(function*(previous) {
      for (const [key, value] of previous) {
        if (recursive && value instanceof LazySeq) yield [key, value.map(mapFun, true)]
        else yield [key, mapFun(value, key)]
      }
    })
  }

  /**
   * Returns a sequence with the pairs of this sequence in reversed order, keeping the keys.
   * Note: eagerly consumes the sequence.
   */
  reverse(): LazySeq<K, V> {
    return new LazySeq<K, V>(new Map([...this.toMap()].reverse()), this.useCache)
  }

  /**
   * Returns a sequence where each key is replaced by the result of `keyFun`. Object results are converted to
   * strings.
   * @param keyFun a function taking a value and its key, and returning the new key
   * @example
   * ```typescript
   * seq.of({ id: 'a' }, { id: 'b' }).keyBy(v => v.id)
   * result: ('a' => { id: 'a' }, 'b' => { id: 'b' })
   * ```
   */
  keyBy<R extends Key>(keyFun: KeyedFun<V, K, R>): LazySeq<R, V>
  keyBy(keyFun: KeyedFun<V, K, Key | object>): LazySeq<Key, V>
  keyBy(keyFun: KeyedFun<V, K, Key | object>): LazySeq<Key, V> {
    return this.applyCustomOperation<Key, V>(function*(previous) {
      for (const [key, value] of previous) {
        const resolved = keyFun(value, key)
        yield [Type.isObject(resolved) ? String(resolved) : resolved, value]
      }
    })
  }

  /**
   * Returns a sequence of groups: for each distinct key returned by `keyFun`, in the order the keys were first
   * returned, a sequence of the pairs that share that key. Pairs for which `keyFun` returns anything but a string or
   * an integer are left out of every group.
   * Note: eagerly consumes the sequence, the groups themselves are yielded lazily.
   * @typeparam G the type returned by keyFun
   * @param keyFun a function taking a value and its key, and returning the group key
   * @example
   * ```typescript
   * seq.of({ k: 'a' }, { k: 'a' }, { k: 'b' }).groupBy(v => v.k).map(group => group.count())
   * result: ('a' => 2, 'b' => 1)
   * ```
   */
  groupBy<G>(keyFun: KeyedFun<V, K, G>): LazySeq<Extract<G, Key>, LazySeq<K, V>> {
    const groups = new Map<Extract<G, Key>, Map<K, V>>()

    for (const [key, value] of this) {
      const groupKey = keyFun(value, key)
      if (!isGroupKey(groupKey)) continue

      const group = groups.get(groupKey)
      if (group === undefined) groups.set(groupKey, new Map<K, V>([[key, value]]))
      else group.set(key, value)
    }

    const useCache = this.useCache

    return new LazySeq<Extract<G, Key>, LazySeq<K, V>>(function*() {
      for (const [groupKey, group] of groups) {
        yield [groupKey, new LazySeq<K, V>(group, useCache)]
      }
    }, useCache)
  }

  /**
   * Returns a sequence of the keys of this sequence, keyed by position.
   */
  keys(): LazySeq<number, K> {
    return this.applyCustomOperation<number, K>(function*(previous) {
      let index = 0
      for (const [key] of previous) yield [index++, key]
    })
  }

  /**
   * Returns a sequence of the values of this sequence, keyed by position.
   */
  values(): LazySeq<number, V> {
    return this.applyCustomOperation<number, V>(function*(previous) {
      let index = 0
      for (const [, value] of previous) yield [index++, value]
    })
  }

  /**
   * Returns the value of the first pair whose key loosely equals the given key, or `otherwise` if there is none or
   * if the given key is null or undefined.
   * @example
   * ```typescript
   * seq.of('a', 'b').get('1')
   * result: 'b'
   * ```
   */
  get(key: K | null | undefined): V | undefined
  get<D>(key: K | null | undefined, otherwise: D): V | D
  get<D>(key: K | null | undefined, otherwise?: D): V | D | undefined {
    if (key === null || key === undefined) return otherwise

    for (const [entryKey, value] of this) {
      if (looseEquals(entryKey, key)) return value
    }
    return otherwise
  }

  /**
   * Returns the first value for which the optional predicate returns a truthy value, or `otherwise` if there is
   * none. Stops consuming the sequence at the first match.
   * @example
   * ```typescript
   * seq.of(1, 2, 3, 4).first(v => v > 2)
   * result: 3
   * ```
   */
  first(pred?: Pred<V, K>): V | undefined
  first<D>(pred: Pred<V, K> | undefined, otherwise: D): V | D
  first<D>(pred?: Pred<V, K>, otherwise?: D): V | D | undefined {
    for (const [key, value] of this) {
      if (pred === undefined || pred(value, key)) return value
    }
    return otherwise
  }

  /**
   * Returns the last value for which the optional predicate returns a truthy value, or `otherwise` if there is
   * none. A matching value that is null or undefined is returned as such.
   * Note: eagerly consumes the sequence.
   * @example
   * ```typescript
   * seq.of<number | null>(null).last(undefined, 42)
   * result: null
   * ```
   */
  last(pred?: Pred<V, K>): V | undefined
  last<D>(pred: Pred<V, K> | undefined, otherwise: D): V | D
  last<D>(pred?: Pred<V, K>, otherwise?: D): V | D | undefined {
    let found: { value: V } | undefined

    for (const [key, value] of this) {
      if (pred === undefined || pred(value, key)) found = { value }
    }
    return found === undefined ? otherwise : found.value
  }

  /**
   * Returns a sequence that skips the first `amount` pairs of this sequence, then yields the remaining pairs.
   * @example
   * ```typescript
   * seq.of(10, 20, 30, 40).skip(2)
   * result: (2 => 30, 3 => 40)
   * ```
   */
  skip(amount: number): LazySeq<K, V> {
    return this.applyCustomOperation<K, V>(function*(previous) {
      const iterator = getIterator(previous)

      try {
        for (let toSkip = amount; toSkip > 0; toSkip--) {
          if (iterator.next().done) return
        }
        for (let result = iterator.next(); !result.done; result = iterator.next()) {
          yield result.value
        }
      } finally {
        if (iterator.return !== undefined) iterator.return()
      }
    })
  }

  /**
   * Returns a sequence that yields at most the first `amount` pairs of this sequence.
   * @example
   * ```typescript
   * seq.of(10, 20, 30, 40).take(2)
   * result: (0 => 10, 1 => 20)
   * ```
   */
  take(amount: number): LazySeq<K, V> {
    return this.applyCustomOperation<K, V>(function*(previous) {
      if (amount <= 0) return

      let toTake = amount
      for (const entry of previous) {
        yield entry
        if (--toTake <= 0) return
      }
    })
  }

  /**
   * Returns a sequence that calls `resolve` with this sequence when it is consumed, not before. If `resolve` returns
   * a sequence, its pairs are yielded; null or undefined yields nothing; any other value is yielded as the single
   * value at key 0.
   * @typeparam K2 the key type of the resolved sequence
   * @typeparam V2 the value type of the resolved sequence or the resolved value
   * @example
   * ```typescript
   * seq.of(1, 2).defer(previous => (previous.count() > 1 ? previous.map(v => -v) : null))
   * result: (0 => -1, 1 => -2)
   * ```
   */
  defer<K2, V2>(
    resolve: (seq: LazySeq<K, V>) => LazySeq<K2, V2> | V2 | null | undefined
  ): LazySeq<K2 | number, V2> {
    return this.applyCustomOperation<K2 | number, V2>(function*(previous) {
      const resolved = resolve(previous)

      if (resolved === null || resolved === undefined) return
      if (resolved instanceof LazySeq) yield* resolved
      else yield [0, resolved]
    })
  }

  /**
   * Consumes this sequence and returns a sequence over an in-memory copy of its pairs, which no longer depends on the
   * source of this sequence.
   */
  load(): LazySeq<K, V> {
    return new LazySeq<K, V>(this.toMap(), this.useCache)
  }

  /**
   * Returns the amount of pairs in the sequence, counted from the first pair. A cached sequence is rewound
   * afterwards, so it can be consumed again without running its source.
   * Note: count only moves the cursor and does not report pairs to monitors.
   */
  count(): number {
    const iterator = this.getIterator()
    iterator.rewind()

    let count = 0
    for (; iterator.isValid(); iterator.advance()) count++

    if (this.useCache) iterator.rewind()
    return count
  }

  /**
   * Returns a Map with the pairs of this sequence. Nested sequences are kept as they are.
   * A key yielded more than once keeps its first position and its last value.
   */
  toMap(): Map<K, V> {
    this.settle()
    return new Map(this)
  }

  /**
   * Returns a Map with the pairs of this sequence, in which every value that is a sequence is materialized into a Map
   * as well. If `itemCallback` is given, every other value is replaced by its result.
   * @example
   * ```typescript
   * seq.of(1, 2).map(v => seq.of(v, v * 10)).toArray(v => v + 1)
   * result: Map { 0 => Map { 0 => 2, 1 => 11 }, 1 => Map { 0 => 3, 1 => 21 } }
   * ```
   */
  toArray(): Map<K, Materialized<V>>
  toArray<R>(itemCallback: KeyedFun<Leaf<V>, unknown, R>): Map<K, Materialized<V, R>>
  toArray(itemCallback?: AnyKeyedFun): Map<K, unknown> {
    this.settle()
    const result = new Map<K, unknown>()

    for (const [key, value] of this) {
      if (value instanceof LazySeq) {
        result.set(key, itemCallback === undefined ? value.toArray() : value.toArray(itemCallback))
      } else {
        result.set(key, itemCallback === undefined ? value : itemCallback(value, key))
      }
    }
    return result
  }

  /**
   * Allows side-effects at any point in the chain, but does not modify the sequence.
   * @param tag a tag that is passed to the effect
   * @param effect the side-effect to perform for each pair yielded by this sequence
   * @returns this exact instance
   */
  monitor(tag = '', effect: MonitorEffect<V, K> = defaultMonitorEffect): this {
    const current = this.observer

    this.observer = {
      observe: (value, key) => {
        if (current !== undefined) current.observe(value, key)
        effect(value, key, tag)
      }
    }

    return this
  }

  /**
   * Returns a fixed tag string to avoid unnecessary evaluation of the pairs.
   */
  toString(): string {
    return '[LazySeq]'
  }
}

/**
 * Returns a LazySeq over the given source.
 * @param source an array (keyed by index), a one-shot producer, a producer factory, or an iterable of pairs
 * @param useCache whether pairs are cached the first time they are pulled from the source
 * @example
 * ```typescript
 * seq(['a', 'b']).keys().toMap()
 * result: Map { 0 => 0, 1 => 1 }
 * ```
 */
export function seq<V>(source: readonly V[], useCache?: boolean): LazySeq<number, V>
export function seq<K, V>(source: SeqSource<K, V>, useCache?: boolean): LazySeq<K, V>
export function seq<K, V>(
  source: SeqSource<K, V> | readonly V[],
  useCache = false
): LazySeq<K, V> | LazySeq<number, V> {
  if (isValueArray(source)) return LazySeq.create(source, useCache)
  return LazySeq.create(source, useCache)
}

export namespace seq {
  /**
   * Returns a sequence without pairs.
   */
  export function empty<K = never, V = never>(): LazySeq<K, V> {
    return LazySeq.empty()
  }

  /**
   * Returns a sequence of the given values, keyed by position.
   * @example
   * ```typescript
   * seq.of(1, 3, 5)
   * result: (0 => 1, 1 => 3, 2 => 5)
   * ```
   */
  export function of<V>(...values: V[]): LazySeq<number, V> {
    return LazySeq.create(values)
  }

  /**
   * Returns a sequence of the own enumerable properties of the given record.
   * @example
   * ```typescript
   * seq.fromRecord({ a: 1, b: 2 })
   * result: ('a' => 1, 'b' => 2)
   * ```
   */
  export function fromRecord<V>(
    record: Readonly<Record<string, V>>,
    useCache = false
  ): LazySeq<string, V> {
    return LazySeq.create<string, V>(() => getIterator(Object.entries(record)), useCache)
  }

  /**
   * Returns a sequence of the given key/value pairs.
   */
  export function fromEntries<K, V>(
    entries: Iterable<Entry<K, V>>,
    useCache = false
  ): LazySeq<K, V> {
    return LazySeq.create<K, V>(() => getIterator(entries), useCache)
  }

  /**
   * Returns a sequence whose pairs come from a new producer created by `factory` on every consumption, or only once
   * when `useCache` is true.
   * @example
   * ```typescript
   * seq.generate(function*(): Iterator<[string, number]> {
   *   yield ['a', expensive()]
   * }, true)
   * ```
   */
  export function generate<K, V>(factory: ProducerFactory<K, V>, useCache = false): LazySeq<K, V> {
    return LazySeq.create(factory, useCache)
  }

  export const typed = LazySeq.typed
}
