import seq, { Errors, ItemType, Key, LazySeq } from '../src/lib/public/keyseq'
import {
  addKey,
  countingSource,
  double,
  duplicateKeys,
  errorName,
  isEven,
  letters
} from './test-utils'

const expectSeq = <K, V>(s: LazySeq<K, V>) => (entries: [K, V][]) =>
  expect([...s]).toEqual(entries)

// untyped input, as passed in by a JavaScript caller
const untyped = (json: string) => JSON.parse(json)

describe('LazySeq', () => {
  const tens = seq.of(10, 20, 30, 40)

  test('creation', () => {
    expectSeq(seq.empty())([])
    expectSeq(seq.of(1, 2, 3))([[0, 1], [1, 2], [2, 3]])
    expectSeq(seq(['a', 'b']))([[0, 'a'], [1, 'b']])
    expectSeq(seq(new Map([['a', 1], ['b', 2]])))([['a', 1], ['b', 2]])
    expectSeq(seq.fromRecord({ a: 1, b: 2 }))([['a', 1], ['b', 2]])
    expectSeq(seq.fromEntries([['x', true]]))([['x', true]])
    expectSeq(seq(seq.of(5)))([[0, 5]])
    expectSeq(seq(letters()))([[0, 'a'], [1, 'b'], [2, 'c']])
    expectSeq(LazySeq.create([7]))([[0, 7]])
  })

  test('fromEntries keeps the given keys', () => {
    expectSeq(seq.fromEntries([['x', 1], ['y', 2]]))([['x', 1], ['y', 2]])
    expectSeq(seq.fromEntries(new Map([[3, 'c']]), true))([[3, 'c']])
  })

  test('a consumed one-shot producer cannot be walked again without cache', () => {
    const once = seq(letters())

    expect(once.count()).toBe(3)
    expect(errorName(() => once.count())).toBe(Errors.NotRewindable)
    expect(errorName(() => [...once])).toBe(Errors.NotRewindable)
  })

  test('a one-shot producer keeps the pairs it has not given out', () => {
    const probed = seq(letters())
    expect(probed.isEmpty()).toBe(false)
    expect([...probed.toArray()]).toEqual([[0, 'a'], [1, 'b'], [2, 'c']])

    const peeked = seq(letters())
    expect(peeked.first()).toBe('a')
    expect(peeked.first()).toBe('a')
    expectSeq(peeked)([[0, 'a'], [1, 'b'], [2, 'c']])
  })

  test('a one-shot producer that advanced during an early exit cannot be walked again', () => {
    const once = seq(letters())

    expect(once.get(1)).toBe('b')
    expect(errorName(() => once.toArray())).toBe(Errors.NotRewindable)
  })

  test('a walk that stops early closes the producer it started', () => {
    const closed: string[] = []
    const numbers = seq.generate(function*(): Generator<[number, number]> {
      try {
        yield [0, 1]
        yield [1, 2]
        yield [2, 3]
      } finally {
        closed.push('closed')
      }
    })

    expect(numbers.first()).toBe(1)
    expect(numbers.take(2).count()).toBe(2)
    numbers.filter(v => v > 1).each(() => false)
    expect([...numbers.skip(1).take(1)]).toEqual([[1, 2]])
    expect(numbers.monitor('m', () => undefined).get(0)).toBe(1)
    expect(closed).toEqual(['closed', 'closed', 'closed', 'closed', 'closed'])
  })

  test('sources are classified on first consumption', () => {
    const invalid = seq(untyped('42'))
    const notAProducer = seq.generate(() => untyped('{"value": 1}'))

    expect(errorName(() => invalid.toArray())).toBe(Errors.InvalidSource)
    expect(errorName(() => invalid.isEmpty())).toBe(Errors.InvalidSource)
    expect(errorName(() => notAProducer.count())).toBe(Errors.InvalidProducerResult)
  })

  test('producer factories receive the owning sequence', () => {
    const owners: unknown[] = []
    const owned = seq.generate(function*(owner): Generator<[string, number]> {
      owners.push(owner)
      yield ['a', 1]
    })

    owned.toArray()
    expect(owners[0]).toBe(owned)
  })

  test('a cached sequence runs its producer once', () => {
    const { stats, factory } = countingSource([1, 2, 3])
    const cached = seq.generate(factory, true)

    expect([...cached.toArray()]).toEqual([[0, 1], [1, 2], [2, 3]])
    expect([...cached.toArray()]).toEqual([[0, 1], [1, 2], [2, 3]])
    expect(cached.count()).toBe(3)
    expect(cached.first()).toBe(1)
    expect(stats.runs).toBe(1)
    expect(stats.pulls).toBe(3)
  })

  test('an uncached sequence runs its producer on every consumption', () => {
    const { stats, factory } = countingSource([1, 2])
    const uncached = seq.generate(factory)

    uncached.toArray()
    uncached.toArray()
    expect(uncached.count()).toBe(2)
    expect(stats.runs).toBe(3)
  })

  test('derived sequences inherit the caching policy', () => {
    const { stats, factory } = countingSource([1, 2, 3])
    const doubled = seq.generate(factory, true).map(double)

    expect(doubled.useCache).toBe(true)
    expectSeq(doubled)([[0, 2], [1, 4], [2, 6]])
    expectSeq(doubled)([[0, 2], [1, 4], [2, 6]])
    expect(stats.runs).toBe(1)
    expect(seq.of(1).filter().useCache).toBe(false)
  })

  test('transformations are lazy', () => {
    const { stats, factory } = countingSource([1, 2, 3])

    seq
      .generate(factory)
      .map(double)
      .filter(isEven)
      .keyBy(v => `k${v}`)
      .skip(1)
      .take(1)
      .defer(previous => previous)

    expect(stats.runs).toBe(0)
  })

  test('isEmpty probes a single pair', () => {
    const { stats, factory } = countingSource([1, 2, 3])

    expect(seq.generate(factory).isEmpty()).toBe(false)
    expect(stats.pulls).toBe(1)
    expect(seq.empty().isEmpty()).toBe(true)
  })

  test('count', () => {
    expect(seq.empty().count()).toBe(0)
    expect(tens.count()).toBe(4)
    expect(tens.filter(v => v > 15).count()).toBe(3)
  })

  test('count equals the size of the materialized sequence', () => {
    const { factory } = countingSource(['a', 'b', 'c'])
    const cached = seq.generate(factory, true)

    expect(cached.count()).toBe(cached.toArray().size)

    const duplicates = seq(duplicateKeys(), true)
    expect(duplicates.count()).toBe(2)
    expect(duplicates.toArray().size).toBe(2)
  })

  test('count starts from the first pair wherever the cursor is', () => {
    const cached = seq(letters(), true)

    cached.getIterator().advance()
    expect(cached.count()).toBe(3)
    expect(cached.getIterator().key()).toBe(0)
  })

  test('a cached sequence whose producer failed stays usable', () => {
    const numbers = seq.typed(
      { name: 'Numbers', itemType: ItemType.primitive('number') },
      [1, 'x', 3],
      true
    )

    expect(errorName(() => numbers.toArray())).toBe(Errors.TypeMismatch)
    expect(numbers.count()).toBe(1)
    expect([...numbers.toArray()]).toEqual([[0, 1]])
  })

  test('count rewinds a cached sequence', () => {
    const cached = seq(letters(), true)

    expect(cached.count()).toBe(3)
    expect(cached.getIterator().key()).toBe(0)
    expect(cached.count()).toBe(3)
    expectSeq(cached)([[0, 'a'], [1, 'b'], [2, 'c']])
  })

  test('a later duplicate key overwrites the value in place', () => {
    expect([...seq(duplicateKeys()).toMap()]).toEqual([['a', 3], ['b', 2]])
    expect([...seq(duplicateKeys(), true).toMap()]).toEqual([['a', 3], ['b', 2]])
  })

  test('a cached sequence with duplicate keys materializes the same way every time', () => {
    const cached = seq(duplicateKeys(), true)

    expect([...cached.toArray()]).toEqual([['a', 3], ['b', 2]])
    expect([...cached.toArray()]).toEqual([['a', 3], ['b', 2]])
    expect([...cached.reverse().toMap()]).toEqual([['b', 2], ['a', 3]])
    expect([...seq(duplicateKeys(), true).load()]).toEqual([['a', 3], ['b', 2]])
  })

  test('filter', () => {
    expectSeq(seq.of(1, 2, 3, 4).filter(isEven))([[1, 2], [3, 4]])
    expectSeq(seq.of<unknown>(0, 1, '', 'a', null).filter())([[1, 1], [3, 'a']])
    expectSeq(seq.of(5, 6, 7).filter((_, k) => k !== 1))([[0, 5], [2, 7]])
  })

  test('map', () => {
    const f = (v: number) => v + 1
    const g = (v: number) => v * 3

    expectSeq(seq.of(1, 3, 5).map(addKey))([[0, 1], [1, 4], [2, 7]])
    expect([...tens.map(f).map(g)]).toEqual([...tens.map(v => g(f(v)))])
    expectSeq(seq.of('a').map((v, k) => `${k}:${v}`))([[0, '0:a']])
  })

  test('recursive map', () => {
    const nested = seq.of(seq.of(1, 2), seq.of(3))

    expect(nested.map(double, true).toArray()).toEqual(
      new Map([[0, new Map([[0, 2], [1, 4]])], [1, new Map([[0, 6]])]])
    )
    expectSeq(nested.map(inner => inner.count()))([[0, 2], [1, 1]])
  })

  test('each', () => {
    const visited: number[] = []
    const numbers = seq.of(1, 2, 3, 4)

    const result = numbers.each(v => {
      visited.push(v)
      return v !== 3
    })

    expect(visited).toEqual([1, 2, 3])
    expect(result).toBe(numbers)
  })

  test('each only stops on false', () => {
    const visited: number[] = []

    seq.of(0, 1, 2, 3).each(v => {
      visited.push(v)
      return [0, '', null, undefined][v]
    })

    expect(visited).toEqual([0, 1, 2, 3])
  })

  test('reverse', () => {
    expectSeq(seq.of('a', 'b', 'c').reverse())([[2, 'c'], [1, 'b'], [0, 'a']])
    expectSeq(seq.empty().reverse())([])
  })

  test('keyBy', () => {
    const x = { id: 'x' }
    const y = { id: 'y' }

    expectSeq(seq.of(x, y).keyBy(v => v.id))([['x', x], ['y', y]])
    expectSeq(seq.of(1, 2).keyBy((v, k) => v * 10 + k))([[10, 1], [21, 2]])
  })

  test('keyBy converts object keys to strings', () => {
    class Tag {
      constructor(readonly label: string) {}

      toString() {
        return `tag:${this.label}`
      }
    }

    expectSeq(seq.of(new Tag('a'), new Tag('b')).keyBy(v => v).keys())([
      [0, 'tag:a'],
      [1, 'tag:b']
    ])
  })

  test('groupBy', () => {
    const items = [{ k: 'a', n: 1 }, { k: 'a', n: 2 }, { k: 'b', n: 3 }]
    const groups = seq(items).groupBy(v => v.k)

    expectSeq(groups.map(group => [...group]))([
      ['a', [[0, items[0]], [1, items[1]]]],
      ['b', [[2, items[2]]]]
    ])
    expectSeq(groups.map(group => group.count()))([['a', 2], ['b', 1]])
  })

  test('groupBy drops keys that are neither strings nor integers', () => {
    const mixed = seq.of<string | number | boolean | object>(1, 2.5, 'x', {}, true, 2)
    const groups = mixed.groupBy(v => v)

    expectSeq(groups.keys())([[0, 1], [1, 'x'], [2, 2]])
  })

  test('groupBy assigns groups eagerly', () => {
    let calls = 0

    seq.of(1, 2, 3).groupBy(v => {
      calls++
      return v % 2
    })

    expect(calls).toBe(3)
  })

  test('keys and values', () => {
    const pairs = seq(new Map([['a', 1], ['b', 2]]))

    expectSeq(pairs.keys())([[0, 'a'], [1, 'b']])
    expectSeq(pairs.values())([[0, 1], [1, 2]])
  })

  test('get', () => {
    const abc = seq.of('a', 'b', 'c')

    expect(abc.get(1)).toBe('b')
    expect(abc.get(5)).toBeUndefined()
    expect(abc.get(5, 'z')).toBe('z')
    expect(abc.get(null, 'z')).toBe('z')
    expect(abc.get(undefined)).toBeUndefined()
  })

  test('get compares keys loosely', () => {
    const mixedKeys = seq(new Map<Key, string>([[1, 'one'], ['2', 'two']]))

    expect(mixedKeys.get('1')).toBe('one')
    expect(mixedKeys.get(2)).toBe('two')
  })

  test('first', () => {
    const { stats, factory } = countingSource([1, 2, 3, 4])

    expect(seq.generate(factory).first()).toBe(1)
    expect(stats.pulls).toBe(1)
    expect(tens.first(v => v > 25)).toBe(30)
    expect(tens.first(v => v > 99)).toBeUndefined()
    expect(tens.first(v => v > 99, 0)).toBe(0)
    expect(seq.empty<number, number>().first(undefined, 42)).toBe(42)
  })

  test('last', () => {
    expect(seq.of(null).last()).toBeNull()
    expect(seq.of(null).last(undefined, 42)).toBeNull()
    expect(seq<number>([]).last(undefined, 42)).toBe(42)
    expect(seq<number>([]).last()).toBeUndefined()
    expect(seq.of(1, 2, 3, 4).last(isEven)).toBe(4)
    expect(seq.of(1, 3).last(isEven, 0)).toBe(0)
  })

  test('skip', () => {
    expectSeq(tens.skip(2))([[2, 30], [3, 40]])
    expectSeq(tens.skip(10))([])
    expectSeq(tens.skip(0))([[0, 10], [1, 20], [2, 30], [3, 40]])
  })

  test('take', () => {
    const { stats, factory } = countingSource([1, 2, 3, 4])

    expectSeq(tens.take(2))([[0, 10], [1, 20]])
    expectSeq(tens.take(0))([])
    expectSeq(tens.take(10))([[0, 10], [1, 20], [2, 30], [3, 40]])

    seq.generate(factory).take(2).toArray()
    expect(stats.pulls).toBe(2)
  })

  test('defer', () => {
    let resolved = 0
    const deferred = seq.of(1, 2).defer(previous => {
      resolved++
      return previous.map(v => -v)
    })

    expect(resolved).toBe(0)
    expectSeq(deferred)([[0, -1], [1, -2]])
    expect(resolved).toBe(1)
  })

  test('defer with a plain or absent result', () => {
    expectSeq(seq.of(1, 2, 3).defer(previous => previous.count()))([[0, 3]])
    expectSeq(seq.of(1).defer(() => null))([])
    expectSeq(seq.of(1).defer(() => undefined))([])
    expectSeq(seq.of(1).defer(() => 0))([[0, 0]])
  })

  test('load', () => {
    const { stats, factory } = countingSource([1, 2])
    const loaded = seq.generate(factory).load()

    expect(stats.runs).toBe(1)
    expectSeq(loaded)([[0, 1], [1, 2]])
    expect(loaded.count()).toBe(2)
    expect(stats.runs).toBe(1)
  })

  test('toArray materializes nested sequences', () => {
    const nested = seq.of(1, 2).map(v => seq.of(v, v * 10))

    expect(nested.toArray()).toEqual(
      new Map([[0, new Map([[0, 1], [1, 10]])], [1, new Map([[0, 2], [1, 20]])]])
    )
    expect(nested.toArray(v => v + 1)).toEqual(
      new Map([[0, new Map([[0, 2], [1, 11]])], [1, new Map([[0, 3], [1, 21]])]])
    )
    expect(seq.of(1, 2).toArray(double)).toEqual(new Map([[0, 2], [1, 4]]))
  })

  test('toArray twice on a cached sequence gives equal results', () => {
    const { factory } = countingSource(['x', 'y', 'z'])
    const cached = seq.generate(factory, true).map(v => v.toUpperCase())

    expect([...cached.toArray()]).toEqual([...cached.toArray()])
  })

  test('toMap keeps nested sequences', () => {
    const inner = seq.of(1)
    const map = seq.of(inner).toMap()

    expect(map.get(0)).toBe(inner)
  })

  test('applyCustomOperation', () => {
    const squares = seq.of(1, 2, 3).applyCustomOperation(function*(
      previous
    ): Generator<[string, number]> {
      for (const [key, value] of previous) yield [`#${key}`, value * value]
    })

    expectSeq(squares)([['#0', 1], ['#1', 4], ['#2', 9]])
  })

  test('monitor', () => {
    const seen: string[] = []
    const monitored = seq
      .of('a', 'b')
      .monitor('first', (v, k, tag) => seen.push(`${tag}[${k}]=${v}`))
      .monitor('second', (v, k, tag) => seen.push(`${tag}[${k}]=${v}`))

    expect([...monitored.toArray().values()]).toEqual(['a', 'b'])
    expect(seen).toEqual(['first[0]=a', 'second[0]=a', 'first[1]=b', 'second[1]=b'])
  })

  test('monitor logs by default', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined)

    seq
      .of(1)
      .monitor('nums')
      .toArray()

    expect(log).toHaveBeenCalledWith('nums[0]: 1')
    log.mockRestore()
  })

  test('toString does not evaluate', () => {
    const { stats, factory } = countingSource([1])

    expect(String(seq.generate(factory))).toBe('[LazySeq]')
    expect(stats.runs).toBe(0)
  })

  test('typed sequences validate items as they flow', () => {
    const prices = seq.typed(
      { name: 'Prices', itemType: ItemType.primitive('number') },
      [10, '11', 12]
    )
    const seen: number[] = []

    expect(errorName(() => prices.each(v => seen.push(v)))).toBe(Errors.TypeMismatch)
    expect(seen).toEqual([10])
    expect(() => prices.toArray()).toThrow(
      'each item of Prices must be number, string given at key "1"'
    )
  })

  test('typed sequences over other sources', () => {
    const names = seq.typed(
      { name: 'Names', itemType: ItemType.charClass('alpha') },
      new Map([['first', 'Ada'], ['last', 'Byron']]),
      true
    )

    expectSeq(names.map(v => v.length))([['first', 3], ['last', 5]])
    expect(names.useCache).toBe(true)
  })

  test('typed sequences reject an empty item type name when consumed', () => {
    const itemType = { ...ItemType.primitive('int'), name: '' }
    const unnamed = seq.typed({ name: 'Unnamed', itemType }, [1])

    expect(errorName(() => unnamed.toArray())).toBe(Errors.InvalidSource)
  })
})
