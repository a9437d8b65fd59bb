/**
 * Parameters of a verifiable randomness request, in the shape VRF coordinators take them.
 */
export interface RandomWordsRequest {
  keyHash: string;
  subscriptionId: bigint;
  requestConfirmations: number;
  callbackGasLimit: number;
  numWords: number;
  nativePayment: boolean;
}

/**
 * Receives the fulfillment of a request it issued.
 */
export interface RandomnessConsumer {
  fulfillRandomWords(requestId: bigint, randomWords: bigint[]): Promise<void>;
}

/**
 * Boundary to the randomness oracle network. `requestRandomWords` returns as soon as the
 * request is accepted; the oracle calls the consumer back later, once per request.
 */
export interface RandomnessOracleClient {
  requestRandomWords(consumer: RandomnessConsumer, request: RandomWordsRequest): Promise<bigint>;
  getPendingRequests(): PendingRandomnessRequest[];
}

export const RANDOMNESS_ORACLE_CLIENT = 'RANDOMNESS_ORACLE_CLIENT';

export interface PendingRandomnessRequest extends RandomWordsRequest {
  requestId: bigint;
  consumer: RandomnessConsumer;
  requestedAt: Date;
}
