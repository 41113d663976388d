/**
 * @module rpc
 * JSON-RPC plumbing shared by the consensus-node client and the parent-chain
 * balance lookup.
 *
 * - Exposes typed JSON-RPC request/response shapes
 * - Defines the minimal transport interface every client is written against
 * - Re-exports the HTTP transport and the consensus-node client
 *
 * Usage:
 *   import { createHttpClient, CometClient } from 'vaultline/rpc'
 *   const node = new CometClient(createHttpClient('http://127.0.0.1:26657'))
 *   const res = await node.abciQuery(bytes, 0n)
 */

export * from './types'
export * from './http'
export * from './comet'
