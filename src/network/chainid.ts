import { bytesToBigInt, utf8ToBytes } from '../utils/bytes'
import { blake2bN } from '../utils/hash'

/** Largest chain id accepted by Ethereum tooling (floor(MAX_SAFE_INTEGER / 2) - 36). */
export const MAX_CHAIN_ID = 4503599627370476n

/** Chain id of a chain configured by name: blake2b-64 of the name, big-endian, reduced below MAX_CHAIN_ID. */
export function chainIdFromName(name: string): bigint {
  return bytesToBigInt(blake2bN(utf8ToBytes(name), 8)) % MAX_CHAIN_ID
}

export default chainIdFromName
