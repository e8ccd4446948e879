import { describe, it, expect } from 'vitest';
import { isWalletCoreError } from '../errors';
import { TonTxSigner, type TonTransactionParams } from './ton';

const TRANSFER: TonTransactionParams = {
  privateKey: 'e4eb84c208bf3f47d481a7097e8bd88b61d1422321a29ecea4b88d7dd3d366a4',
  to: 'EQBOXIamiT04p4k_GC84DiTnWm_XxCp-YB0vL3bKNdbG_8tp',
  value: '1500000000',
  seqno: 7,
};

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isWalletCoreError(error) ? error.code : 'UNKNOWN';
  }
  return undefined;
}

describe('TonTxSigner', () => {
  it('should sign the transfer intent with Ed25519', () => {
    expect(TonTxSigner.signTransaction(TRANSFER)).toBe(
      'Q4ijUHa1TDSCy8q+xSvahCR8oH4SuZZeuNuH+S1YMKxVNaqcbK6FM4TFWABRF+kObupCqGDLn4xhO9KFOBk6DA=='
    );
  });

  it('should change the signature when the seqno changes', () => {
    expect(TonTxSigner.signTransaction({ ...TRANSFER, seqno: 8 })).not.toBe(TonTxSigner.signTransaction(TRANSFER));
  });

  it('should sign leading-zero amounts as their canonical value', () => {
    expect(TonTxSigner.signTransaction({ ...TRANSFER, value: '007' })).toBe(
      TonTxSigner.signTransaction({ ...TRANSFER, value: '7' })
    );
    expect(TonTxSigner.signTransaction({ ...TRANSFER, value: '01500000000' })).toBe(
      'Q4ijUHa1TDSCy8q+xSvahCR8oH4SuZZeuNuH+S1YMKxVNaqcbK6FM4TFWABRF+kObupCqGDLn4xhO9KFOBk6DA=='
    );
  });

  it('should reject bad recipients, amounts and sequence numbers', () => {
    expect(errorCode(() => TonTxSigner.signTransaction({ ...TRANSFER, to: 'EQBOX' }))).toBe('INVALID_ADDRESS_FORMAT');
    expect(errorCode(() => TonTxSigner.signTransaction({ ...TRANSFER, value: 'ten' }))).toBe('INVALID_AMOUNT_FORMAT');
    expect(errorCode(() => TonTxSigner.signTransaction({ ...TRANSFER, seqno: 2 ** 32 }))).toBe('INVALID_AMOUNT_FORMAT');
  });
});
