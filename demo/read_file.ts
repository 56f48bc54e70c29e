/**
 * Usage from command line:
 * `node read_file.js -file '../inputfile.txt' -split '|,:'`
 * all options are optional
 */

import * as fs from 'fs'
import seq from '../src/lib/public/keyseq'

// Process command line arguments
const args = process.argv.slice(2)

const options = seq(args)
  .filter((_, index) => index % 2 === 0)
  .map((_, index) => args[index + 1])
  .keyBy((_, index) => args[index].slice(1))

const file = options.get('file', 'README.md')
const split = options.get('split', '\n ')

// Read the file only once, however often the words are consumed
const words = seq.generate(function*(): Generator<[number, string]> {
  const text = fs.readFileSync(file, 'utf8')
  let index = 0

  for (const word of text.split(new RegExp(`[${split}]`))) {
    if (word.length > 1) yield [index++, word]
  }
}, true)

const histogram = words
  .groupBy(word => word.toLowerCase())
  .map(group => group.count())
  .toMap()

const top = seq(new Map([...histogram].sort(([, a], [, b]) => b - a)))
  .take(5)
  .toMap()

let total = 0
let longest = ''

words.each(word => {
  total += word.length
  if (word.length > longest.length) longest = word
})

console.log('Words:', words.count())
console.log('Top 5:', top)
console.log('Average length:', total / words.count())
console.log('Longest:', longest)
