/**
 * @packageDocumentation
 * Public entry for vaultline: re-exports the client, handles and the
 * lower-level building blocks (signer, builder, broadcaster, query engine).
 */

export { version, userAgent } from './version'
export * from './errors'

// Client & handles
export * from './client'
export * from './account'
export * from './machine'

// Network configuration
export * from './network/config'
export * from './network/chainid'
export { NetworksFileSchema, NetworkEntrySchema, formatZodError } from './network/schema'

// RPC
export * from './rpc'
export * from './object/client'

// Wallet & address
export * from './wallet'
export * from './address'

// Transactions
export * from './tx/message'
export * from './tx/methods'
export * from './tx/calls'
export * from './tx/encode'
export * from './tx/sequence'
export * from './tx/build'
export * from './tx/broadcast'
export * from './tx/send'

// Queries
export * from './query/engine'
export * from './query/decode'
export * from './query/height'
export * from './query/listing'
export * from './query/range'

// Shared utilities
export * from './utils/bytes'
export * from './utils/hash'
export * from './utils/cbor'
export * from './utils/parse'
export { createLogger, setDefaultLevel, type Logger, type LogLevel } from './utils/logger'
