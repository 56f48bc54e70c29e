import { Entry, MonitorEffect, Producer } from '../../public/constants'
import { ProducerFactory, SeqSource } from '../../public/keyseq-lazy'
import { Type } from '../util'

export function getIterator<T>(iterable: Iterable<T>): Iterator<T> {
  return iterable[Symbol.iterator]()
}

export function isProducer<K, V>(source: SeqSource<K, V>): source is Producer<K, V> {
  return Type.isIterator(source)
}

export function isProducerFactory<K, V>(source: SeqSource<K, V>): source is ProducerFactory<K, V> {
  return Type.isFunction(source)
}

export function isEntries<K, V>(source: SeqSource<K, V>): source is Iterable<Entry<K, V>> {
  return Type.isIterable(source)
}

export function isValueArray<K, V>(source: SeqSource<K, V> | readonly V[]): source is readonly V[] {
  return Type.isArray(source)
}

// loose comparison, 1 matches '1'
export function looseEquals(a: unknown, b: unknown): boolean {
  return a == b
}

export const defaultMonitorEffect: MonitorEffect<unknown, unknown> = (v, k, t) =>
  console.log(`${t || ''}[${String(k)}]: ${String(v)}`)
