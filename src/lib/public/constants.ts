/**
 * @module keyseq
 */

export const Errors = {
  InvalidSource: 'InvalidSource',
  InvalidProducerResult: 'InvalidProducerResult',
  TypeMismatch: 'TypeMismatch',
  DuplicateIndex: 'DuplicateIndex',
  InvalidIndexValue: 'InvalidIndexValue',
  NotRewindable: 'NotRewindable'
} as const

export type ErrorName = typeof Errors[keyof typeof Errors]

/**
 * A key that can address an entry in an index or a group.
 */
export type Key = string | number

/**
 * A key/value pair as yielded by a sequence.
 * @typeparam K the key type
 * @typeparam V the value type
 */
export type Entry<K, V> = [K, V]

/**
 * A one-shot producer of key/value pairs, such as a generator object. It can be consumed once.
 * @typeparam K the key type
 * @typeparam V the value type
 */
export type Producer<K, V> = Iterator<Entry<K, V>>

/**
 * A non-empty array, consisting of at least one element.
 * @typeparam E the array element type
 */
export type NonEmpty<E> = [E, ...E[]]

/**
 * Any function that takes a value of type V and its key of type K, and returns a result of type R
 * @typeparam V the value type
 * @typeparam K the key type
 * @typeparam R the result type
 */
export type KeyedFun<V, K, R> = (value: V, key: K) => R

/**
 * A function taking a value and its key, and returning a truthy or falsy result.
 */
export type Pred<V, K> = KeyedFun<V, K, unknown>

/**
 * A function that takes a value and its key, and performs some side effect.
 * Returning exactly `false` stops an `each` loop.
 */
export type Effect<V, K> = KeyedFun<V, K, unknown>

/**
 * A type used by the .monitor() function to allow lazy side effects.
 * @typeparam V the value type
 * @typeparam K the key type
 */
export type MonitorEffect<V, K> = (value: V, key: K, tag?: string) => void
