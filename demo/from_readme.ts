import seq, { IndexedCollection, ItemType } from '../src/lib/public/keyseq'

// Simple

console.log(
  seq
    .of(1, 3, 5)
    .map(v => v * 2)
    .toArray()
)

console.log(
  'Words by length:',
  seq(['This', 'is', 'a', 'test'])
    .groupBy(w => w.length)
    .map(group => [...group.values()].map(([, word]) => word))
    .toArray()
)

// Caching

let runs = 0

const expensive = seq.generate(function*(): Generator<[string, number]> {
  runs++
  yield ['answer', 42]
  yield ['question', 0]
}, true)

expensive.count()
expensive.toArray()
console.log('Producer runs with cache:', runs)

// Deferred decisions

const maybeDoubled = seq
  .of(1, 2, 3)
  .defer(previous => (previous.count() > 2 ? previous.map(v => v * 2) : null))
console.log('Deferred:', maybeDoubled.toArray())

// Typed sequences and indexed collections

const prices = seq.typed({ name: 'Prices', itemType: ItemType.primitive('number') }, [3, 5, 8])

const indexed = IndexedCollection.fromSeq(prices, (price, position) => ({ price, position }))
console.log('Price at position 1:', indexed.getBy('position', 1))

seq
  .of('a', 'b')
  .monitor('letters')
  .toArray()
