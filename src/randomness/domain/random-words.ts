import { AbiCoder, keccak256 } from 'ethers';

const coder = AbiCoder.defaultAbiCoder();

/**
 * Expand one seed into `count` 256-bit words: word i is keccak256(abi.encode(seed, i)).
 */
export function expandRandomWords(seed: bigint, count: number): bigint[] {
  const words: bigint[] = [];
  for (let i = 0; i < count; i++) {
    words.push(BigInt(keccak256(coder.encode(['uint256', 'uint256'], [seed, i]))));
  }
  return words;
}

export function validateRequest(request: { numWords: number; requestConfirmations: number; callbackGasLimit: number }): void {
  if (!Number.isInteger(request.numWords) || request.numWords < 1) {
    throw new RangeError(`numWords must be a positive integer (got ${request.numWords})`);
  }
  if (!Number.isInteger(request.requestConfirmations) || request.requestConfirmations < 0) {
    throw new RangeError(`requestConfirmations must be a non-negative integer (got ${request.requestConfirmations})`);
  }
  if (!Number.isInteger(request.callbackGasLimit) || request.callbackGasLimit < 0) {
    throw new RangeError(`callbackGasLimit must be a non-negative integer (got ${request.callbackGasLimit})`);
  }
}
