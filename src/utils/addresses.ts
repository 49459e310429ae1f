import { StrKey } from "@stellar/stellar-sdk";

/**
 * Address utilities for Stellar/Soroban address handling.
 */

/**
 * Validate a Stellar public key (G... address).
 *
 * @example
 * ```ts
 * isValidPublicKey('GAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAWHF'); // true
 * isValidPublicKey('CABC123...'); // false (contract address)
 * ```
 */
export function isValidPublicKey(address: string): boolean {
  try {
    return StrKey.isValidEd25519PublicKey(address);
  } catch {
    return false;
  }
}

/**
 * Validate a Soroban contract address (C... address). Pools are
 * identified by their contract address.
 */
export function isValidContractId(address: string): boolean {
  try {
    return StrKey.isValidContract(address);
  } catch {
    return false;
  }
}

/**
 * Validate any Stellar address (public key or contract).
 *
 * Position owners and rebalancers may be accounts or contracts
 * (a vault or an automation contract).
 */
export function isValidAddress(address: string): boolean {
  return isValidPublicKey(address) || isValidContractId(address);
}
