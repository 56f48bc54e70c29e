/**
 * @module keyseq
 */

import { error, Type } from '../../private/util'
import { Entry, Errors, NonEmpty } from '../constants'

/**
 * The primitive kinds an item can be checked against, with the type each kind guarantees.
 */
export interface PrimitiveTypes {
  string: string
  number: number
  int: number
  integer: number
  float: number
  numeric: number | string
  bool: boolean
  array: unknown[]
  object: object
  null: null
  undefined: undefined
  callable: Function
  function: Function
  iterable: Iterable<unknown>
  scalar: string | number | boolean | bigint
  bigint: bigint
  symbol: symbol
}

export type PrimitiveKind = keyof PrimitiveTypes

/**
 * Character classes that a textual item can be checked against. The whole, non-empty string must match.
 */
export type CharClass =
  | 'alnum'
  | 'alpha'
  | 'cntrl'
  | 'digit'
  | 'graph'
  | 'lower'
  | 'print'
  | 'punct'
  | 'space'
  | 'upper'
  | 'xdigit'

type Guard<V> = (value: unknown) => value is V

const isNumeric = (v: unknown): v is number | string =>
  (typeof v === 'number' && !isNaN(v)) ||
  (typeof v === 'string' && v.trim() !== '' && !isNaN(Number(v)))

const PRIMITIVES: { readonly [P in PrimitiveKind]: Guard<PrimitiveTypes[P]> } = {
  string: Type.isString,
  number: (v): v is number => typeof v === 'number',
  int: Type.isInteger,
  integer: Type.isInteger,
  float: (v): v is number => typeof v === 'number' && !Number.isInteger(v),
  numeric: isNumeric,
  bool: (v): v is boolean => typeof v === 'boolean',
  array: Type.isArray,
  object: (v): v is object => Type.isObject(v) && !Type.isArray(v),
  null: (v): v is null => v === null,
  undefined: (v): v is undefined => v === undefined,
  callable: Type.isFunction,
  function: Type.isFunction,
  iterable: (v): v is Iterable<unknown> => Type.isIterable(v),
  scalar: (v): v is string | number | boolean | bigint =>
    ['string', 'number', 'boolean', 'bigint'].includes(typeof v),
  bigint: (v): v is bigint => typeof v === 'bigint',
  symbol: (v): v is symbol => typeof v === 'symbol'
}

const CHAR_CLASSES: { readonly [C in CharClass]: RegExp } = {
  alnum: /^[A-Za-z0-9]+$/,
  alpha: /^[A-Za-z]+$/,
  cntrl: /^[\x00-\x1f\x7f]+$/,
  digit: /^[0-9]+$/,
  graph: /^[\x21-\x7e]+$/,
  lower: /^[a-z]+$/,
  print: /^[\x20-\x7e]+$/,
  punct: /^[!-\/:-@\[-`{-~]+$/,
  space: /^[ \t\n\r\v\f]+$/,
  upper: /^[A-Z]+$/,
  xdigit: /^[0-9A-Fa-f]+$/
}

const isPrimitiveKind = (name: string): name is PrimitiveKind =>
  Object.prototype.hasOwnProperty.call(PRIMITIVES, name)

const isCharClass = (name: string): name is CharClass =>
  Object.prototype.hasOwnProperty.call(CHAR_CLASSES, name)

// true when some constructor in the prototype chain of `value` carries the given name
function hasTypeName(value: unknown, name: string): boolean {
  if (!Type.isObject(value) && !Type.isFunction(value)) return false

  let proto: unknown = Object.getPrototypeOf(value)

  while (Type.isObject(proto)) {
    const ctor: unknown = Reflect.get(proto, 'constructor')
    if (Type.isFunction(ctor) && ctor.name === name) return true
    proto = Object.getPrototypeOf(proto)
  }
  return false
}

/**
 * A declared item type. Every variant carries the guard used to validate items, and the name used to report
 * mismatches.
 * @typeparam V the type that items matching this item type have
 */
export interface ItemType<V = unknown> {
  readonly kind: 'primitive' | 'charClass' | 'instance' | 'capability' | 'named'
  readonly name: string
  readonly matches: Guard<V>
}

export namespace ItemType {
  /**
   * Returns an ItemType that accepts values of the given primitive kind.
   * @example
   * ```typescript
   * ItemType.primitive('int').matches(3.5)
   * result: false
   * ```
   */
  export function primitive<P extends PrimitiveKind>(kind: P): ItemType<PrimitiveTypes[P]> {
    return { kind: 'primitive', name: kind, matches: PRIMITIVES[kind] }
  }

  /**
   * Returns an ItemType that accepts non-empty strings of which every character is in the given class.
   * @example
   * ```typescript
   * ItemType.charClass('digit').matches('0042')
   * result: true
   * ```
   */
  export function charClass(cls: CharClass): ItemType<string> {
    const pattern = CHAR_CLASSES[cls]

    return {
      kind: 'charClass',
      name: cls,
      matches: (v): v is string => Type.isString(v) && pattern.test(v)
    }
  }

  /**
   * Returns an ItemType that accepts instances of the given class or its subclasses.
   */
  export function instanceOf<V>(ctor: abstract new (...args: never[]) => V): ItemType<V> {
    return { kind: 'instance', name: ctor.name, matches: (v): v is V => v instanceof ctor }
  }

  /**
   * Returns an ItemType that accepts any object having a function for each of the given members.
   * @typeparam V the interface the members belong to
   * @param name the name used in mismatch reports
   * @param members the members that must be functions
   * @example
   * ```typescript
   * ItemType.capability<Comparable>('Comparable', ['compareTo'])
   * ```
   */
  export function capability<V extends object>(
    name: string,
    members: NonEmpty<keyof V & string>
  ): ItemType<V> {
    const matches = (v: unknown): v is V => {
      if (!Type.isObject(v) && !Type.isFunction(v)) return false

      for (const member of members) {
        if (!Type.isFunction(Reflect.get(v, member))) return false
      }
      return true
    }

    return { kind: 'capability', name, matches }
  }

  /**
   * Returns an ItemType for a type name. The name is tried, in this order, as a primitive kind, as a character
   * class, and finally as the name of a constructor in the prototype chain of the item.
   * @param name the type name, `boolean` is accepted as an alias of `bool`
   * @example
   * ```typescript
   * ItemType.fromName('Date').matches(new Date())
   * result: true
   * ```
   */
  export function fromName(name: string): ItemType {
    const lower = name.toLowerCase()
    const normalized = lower === 'boolean' ? 'bool' : lower

    if (isPrimitiveKind(normalized)) return primitive(normalized)
    if (isCharClass(normalized)) return charClass(normalized)

    return { kind: 'named', name, matches: (v): v is unknown => hasTypeName(v, name) }
  }
}

/**
 * Returns true if the given value satisfies the given item type or type name. Never throws.
 * @param value the value to check
 * @param type an ItemType, or a type name resolved with `ItemType.fromName`
 * @example
 * ```typescript
 * validate('abc', 'alpha')
 * result: true
 * ```
 */
export function validate(value: unknown, type: ItemType | string): boolean {
  const itemType = Type.isString(type) ? ItemType.fromName(type) : type
  return itemType.matches(value)
}

/**
 * Returns a short description of the kind of the given value, as used in mismatch reports.
 * @example
 * ```typescript
 * kindOf(new Date())
 * result: 'Date'
 * ```
 */
export function kindOf(value: unknown): string {
  if (value === null) return 'null'
  if (Type.isArray(value)) return 'array'
  if (!Type.isObject(value)) return typeof value

  const ctor: unknown = Reflect.get(value, 'constructor')
  if (Type.isFunction(ctor) && ctor.name !== '' && ctor.name !== 'Object') return ctor.name
  return 'object'
}

/**
 * The item type declared for a typed sequence.
 * @typeparam V the type of the items
 */
export interface TypedDeclaration<V> {
  /**
   * The name of the declaring sequence, used when reporting a mismatch.
   */
  readonly name: string
  readonly itemType: ItemType<V>
}

/**
 * Returns a producer that yields the pairs of `entries` after validating each value against the declared item type,
 * and that fails on the first value that does not match.
 * @typeparam K the key type
 * @typeparam V the declared value type
 */
export function* typedProducer<K, V>(
  declaration: TypedDeclaration<V>,
  entries: Iterable<Entry<K, unknown>>
): Iterator<Entry<K, V>> {
  const { name, itemType } = declaration

  if (itemType.name === '') {
    throw error(Errors.InvalidSource, `item type of ${name} must not be empty`)
  }

  for (const [key, value] of entries) {
    if (!itemType.matches(value)) {
      throw error(
        Errors.TypeMismatch,
        `each item of ${name} must be ${itemType.name}, ` +
          `${kindOf(value)} given at key "${String(key)}"`
      )
    }
    yield [key, value]
  }
}
