import { Injectable, Logger } from '@nestjs/common';
import {
  PendingRandomnessRequest,
  RandomnessConsumer,
  RandomnessOracleClient,
  RandomWordsRequest,
} from '../domain/randomness-oracle';
import { InvalidRandomWordsError, UnknownRandomnessRequestError } from '../domain/randomness.errors';
import { expandRandomWords, validateRequest } from '../domain/random-words';

/**
 * In-process coordinator whose fulfillments are triggered explicitly, either by tests or
 * by the operator through the VRF controller. Request ids count up from 1.
 */
@Injectable()
export class MockVrfCoordinator implements RandomnessOracleClient {
  private readonly logger = new Logger(MockVrfCoordinator.name);
  private readonly pending = new Map<bigint, PendingRandomnessRequest>();
  private nextRequestId = 1n;

  async requestRandomWords(consumer: RandomnessConsumer, request: RandomWordsRequest): Promise<bigint> {
    validateRequest(request);

    const requestId = this.nextRequestId++;
    this.pending.set(requestId, {
      ...request,
      requestId,
      consumer,
      requestedAt: new Date(),
    });

    this.logger.log(`Randomness request ${requestId} accepted (${request.numWords} word(s))`);
    return requestId;
  }

  /**
   * Deliver the words for a pending request. Without explicit words they are derived from
   * the request id. The request is consumed before the callback runs, so a consumer that
   * throws cannot be fulfilled a second time.
   */
  async fulfillRandomWords(requestId: bigint, randomWords?: bigint[]): Promise<bigint[]> {
    const request = this.pending.get(requestId);
    if (!request) {
      throw new UnknownRandomnessRequestError(requestId);
    }

    const words = randomWords ?? expandRandomWords(requestId, request.numWords);
    if (words.length !== request.numWords) {
      throw new InvalidRandomWordsError(request.numWords, words.length);
    }

    this.pending.delete(requestId);
    this.logger.log(`Fulfilling randomness request ${requestId}`);
    await request.consumer.fulfillRandomWords(requestId, words);
    return words;
  }

  getPendingRequest(requestId: bigint): PendingRandomnessRequest | undefined {
    return this.pending.get(requestId);
  }

  getPendingRequests(): PendingRandomnessRequest[] {
    return [...this.pending.values()];
  }
}
