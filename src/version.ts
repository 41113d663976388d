/**
 * Library version. Must match package.json.
 */

export const version = '0.1.0'

/** Banner sent as the user-agent of RPC and object API requests. */
export function userAgent(): string {
  return `vaultline/${version} (node ${process.versions.node})`
}
