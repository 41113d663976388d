/**
 * Actor method numbers and well-known actor addresses.
 */

import { Address } from '../address'
import { methodNumber } from './message'

/** Plain value transfer. */
export const METHOD_SEND = 0n

/** Address manager: creates machines and lists them by owner. */
export const MACHINE_MANAGER_ACTOR = Address.fromId(17)

/** Blobs actor: storage credits and blob resolution status. */
export const BLOBS_ACTOR = Address.fromId(66)

export const Method = {
  // address manager
  CreateExternal: methodNumber('CreateExternal'),
  ListMetadata: methodNumber('ListMetadata'),
  // every machine
  GetMetadata: methodNumber('GetMetadata'),
  // bucket
  AddObject: methodNumber('AddObject'),
  DeleteObject: methodNumber('DeleteObject'),
  GetObject: methodNumber('GetObject'),
  ListObjects: methodNumber('ListObjects'),
  UpdateObjectMetadata: methodNumber('UpdateObjectMetadata'),
  // timehub
  Push: methodNumber('Push'),
  Get: methodNumber('Get'),
  Count: methodNumber('Count'),
  Peaks: methodNumber('Peaks'),
  Root: methodNumber('Root'),
  // blobs
  GetStats: methodNumber('GetStats'),
  GetAccount: methodNumber('GetAccount'),
  BuyCredit: methodNumber('BuyCredit'),
  ApproveCredit: methodNumber('ApproveCredit'),
  RevokeCredit: methodNumber('RevokeCredit'),
  GetCreditApproval: methodNumber('GetCreditApproval'),
  GetBlobStatus: methodNumber('GetBlobStatus'),
  // gateway
  Fund: methodNumber('Fund'),
  Release: methodNumber('Release')
} as const

export type MethodName = keyof typeof Method

/** Reverse lookup for logs and diagnostics. */
export function methodName(num: bigint): MethodName | 'Send' | undefined {
  if (num === METHOD_SEND) return 'Send'
  for (const [name, n] of Object.entries(Method)) {
    if (n === num && isMethodName(name)) return name
  }
  return undefined
}

function isMethodName(s: string): s is MethodName {
  return s in Method
}
