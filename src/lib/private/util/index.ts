import { ErrorName } from '../../public/constants'

export class Type {
  static isFunction = (f: unknown): f is Function => typeof f === 'function'

  static isObject = (o: unknown): o is object => typeof o === 'object' && o !== null

  static isArray = (a: unknown): a is unknown[] => Array.isArray(a)

  static isString = (s: unknown): s is string => typeof s === 'string'

  static isInteger = (n: unknown): n is number => Number.isInteger(n)

  static isIterable = (o: unknown) =>
    (Type.isObject(o) || Type.isFunction(o)) && Type.isFunction(Reflect.get(o, Symbol.iterator))

  static isIterator = (o: unknown) =>
    (Type.isObject(o) || Type.isFunction(o)) && Type.isFunction(Reflect.get(o, 'next'))
}

export const error = (name: ErrorName, msg?: string): Error => {
  const result = Error(msg)
  result.name = name
  return result
}
