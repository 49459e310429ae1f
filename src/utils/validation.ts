import { ValidationError } from "../errors";
import { isValidAddress, isValidContractId } from "./addresses";

/**
 * Assert an account or contract address.
 */
export function validateAddress(address: string, field: string): void {
  if (!isValidAddress(address)) {
    throw new ValidationError(`Invalid ${field}: ${address}`, { field, address });
  }
}

/**
 * Assert a pool identifier, which must be a contract address.
 */
export function validatePoolId(poolId: string): void {
  if (!isValidContractId(poolId)) {
    throw new ValidationError(`Invalid poolId: ${poolId}`, { field: "poolId", address: poolId });
  }
}

/**
 * Assert a non-empty tick range.
 */
export function validateTickRange(tickLower: number, tickUpper: number): void {
  if (!Number.isInteger(tickLower) || !Number.isInteger(tickUpper)) {
    throw new ValidationError("Ticks must be integers", { tickLower, tickUpper });
  }
  if (tickLower >= tickUpper) {
    throw new ValidationError("tickLower must be below tickUpper", { tickLower, tickUpper });
  }
}

export function validateTickSpacing(tickSpacing: number): void {
  if (!Number.isInteger(tickSpacing) || tickSpacing <= 0) {
    throw new ValidationError("tickSpacing must be a positive integer", { tickSpacing });
  }
}
