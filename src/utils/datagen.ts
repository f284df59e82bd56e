import { randomBytes } from 'crypto'

/**
 * Random lowercase hex string of the given length
 */
export function randomString(length: number = 8): string {
  return randomBytes(Math.ceil(length / 2)).toString('hex').slice(0, length)
}

/**
 * Generate a unique, human-recognizable name: `<prefix><random hex>`.
 *
 * @example randName('new_prop_value') // 'new_prop_value3f9a1c0e'
 */
export function randName(prefix: string = ''): string {
  return `${prefix}${randomString(8)}`
}
