/**
 * @package vaultline/wallet
 * Barrel exports for wallet utilities:
 *  - Secret key parsing and generation
 *  - Address derivation (delegated and 0x forms)
 *  - Signers (in-memory secp256k1 wallet, read-only void signer)
 *
 * Usage:
 *   import { Wallet, parseSecretKey } from 'vaultline/wallet'
 *   const wallet = new Wallet(parseSecretKey(process.env.VAULTLINE_PRIVATE_KEY ?? ''))
 *   console.log(wallet.address.toString(), wallet.ethAddress)
 */

export * from './key'
export * from './signer'
