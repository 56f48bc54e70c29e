/**
 * @module keyseq
 */

import { seq } from './keyseq-lazy'

export * from './constants'
export * from './keyseq-cache'
export * from './keyseq-indexed'
export * from './keyseq-lazy'
export * from './keyseq-typed'

export default seq
