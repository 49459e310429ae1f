import { ValidationError } from '../src/errors';
import { isValidAddress, isValidContractId, isValidPublicKey } from '../src/utils/addresses';
import {
  validateAddress,
  validatePoolId,
  validateTickRange,
  validateTickSpacing,
} from '../src/utils/validation';
import { ALICE, POOL } from './fixtures';

describe('addresses', () => {
  it('tells accounts and contracts apart', () => {
    expect(isValidPublicKey(ALICE)).toBe(true);
    expect(isValidPublicKey(POOL)).toBe(false);
    expect(isValidContractId(POOL)).toBe(true);
    expect(isValidContractId(ALICE)).toBe(false);
  });

  it('accepts either kind as an address', () => {
    expect(isValidAddress(ALICE)).toBe(true);
    expect(isValidAddress(POOL)).toBe(true);
    expect(isValidAddress('')).toBe(false);
    expect(isValidAddress('GABC')).toBe(false);
  });
});

describe('validation', () => {
  it('names the field of an invalid address', () => {
    expect(() => validateAddress('nope', 'owner')).toThrow('Invalid owner: nope');
    expect(() => validateAddress(ALICE, 'owner')).not.toThrow();
  });

  it('requires pool ids to be contract addresses', () => {
    expect(() => validatePoolId(ALICE)).toThrow(ValidationError);
    expect(() => validatePoolId(POOL)).not.toThrow();
  });

  it('requires integer ticks with lower below upper', () => {
    expect(() => validateTickRange(-10, 10)).not.toThrow();
    expect(() => validateTickRange(10, 10)).toThrow('tickLower must be below tickUpper');
    expect(() => validateTickRange(0.5, 10)).toThrow('Ticks must be integers');
  });

  it('requires a positive integer tick spacing', () => {
    expect(() => validateTickSpacing(1)).not.toThrow();
    expect(() => validateTickSpacing(0)).toThrow(ValidationError);
    expect(() => validateTickSpacing(2.5)).toThrow(ValidationError);
  });
});
