import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import axios from 'axios';
import { AbiCoder, keccak256 } from 'ethers';
import { ConfigService } from '../../database/config.service';
import {
  PendingRandomnessRequest,
  RandomnessConsumer,
  RandomnessOracleClient,
  RandomWordsRequest,
} from '../domain/randomness-oracle';
import { expandRandomWords, validateRequest } from '../domain/random-words';

/**
 * Public beacon as served by the drand HTTP API.
 */
export interface DrandBeacon {
  round: number;
  randomness: string;
  signature: string;
}

interface DrandPendingRequest extends PendingRandomnessRequest {
  targetRound: number;
}

const POLL_INTERVAL_NAME = 'drand-vrf-poll';

/** Status codes drand answers with for rounds that are not published yet */
const ROUND_NOT_READY = [404, 425];

/**
 * Coordinator backed by the drand randomness beacon. A request is bound to a round that
 * has not been published yet, `requestConfirmations` rounds past the latest one, and is
 * fulfilled once the poller sees that round.
 *
 * Pending requests live in memory only; a restart drops them.
 */
@Injectable()
export class DrandVrfCoordinator implements RandomnessOracleClient, OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DrandVrfCoordinator.name);
  private readonly pending = new Map<bigint, DrandPendingRequest>();
  private readonly coder = AbiCoder.defaultAbiCoder();
  private nonce = 0n;
  private polling = false;

  constructor(
    private readonly configService: ConfigService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  onModuleInit() {
    const interval = setInterval(() => {
      this.poll().catch((error: unknown) => this.logger.error('Drand poll failed:', error));
    }, this.configService.drandPollIntervalMs);
    this.schedulerRegistry.addInterval(POLL_INTERVAL_NAME, interval);
    this.logger.log(`Polling ${this.configService.drandUrl} every ${this.configService.drandPollIntervalMs}ms`);
  }

  onModuleDestroy() {
    if (this.schedulerRegistry.doesExist('interval', POLL_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(POLL_INTERVAL_NAME);
    }
  }

  async requestRandomWords(consumer: RandomnessConsumer, request: RandomWordsRequest): Promise<bigint> {
    validateRequest(request);

    const latest = await this.fetchBeacon('latest');
    if (!latest) {
      throw new Error('drand has no published beacon to anchor the request');
    }

    // The target round must still be in the future, even with zero confirmations.
    const targetRound = latest.round + Math.max(1, request.requestConfirmations);
    const requestId = BigInt(
      keccak256(
        this.coder.encode(
          ['bytes32', 'uint256', 'uint256'],
          [request.keyHash, request.subscriptionId, this.nonce++],
        ),
      ),
    );

    this.pending.set(requestId, {
      ...request,
      requestId,
      consumer,
      requestedAt: new Date(),
      targetRound,
    });

    this.logger.log(`Randomness request ${requestId} waiting for drand round ${targetRound}`);
    return requestId;
  }

  /**
   * Fulfill every request whose target round has been published.
   */
  async poll(): Promise<void> {
    if (this.polling || this.pending.size === 0) return;
    this.polling = true;

    try {
      const rounds = new Set([...this.pending.values()].map((request) => request.targetRound));
      for (const round of [...rounds].sort((a, b) => a - b)) {
        const beacon = await this.fetchBeacon(round);
        if (!beacon) continue;

        const seed = BigInt(`0x${beacon.randomness}`);
        const due = [...this.pending.values()].filter((request) => request.targetRound === round);

        for (const request of due) {
          this.pending.delete(request.requestId);
          try {
            await request.consumer.fulfillRandomWords(
              request.requestId,
              expandRandomWords(seed, request.numWords),
            );
            this.logger.log(`Randomness request ${request.requestId} fulfilled from round ${round}`);
          } catch (error) {
            this.logger.error(`Consumer rejected fulfillment of request ${request.requestId}:`, error);
          }
        }
      }
    } finally {
      this.polling = false;
    }
  }

  getPendingRequests(): PendingRandomnessRequest[] {
    return [...this.pending.values()];
  }

  private async fetchBeacon(round: number | 'latest'): Promise<DrandBeacon | null> {
    try {
      const response = await axios.get<DrandBeacon>(`${this.configService.drandUrl}/public/${round}`, {
        timeout: 10_000,
      });
      const beacon = response.data;
      if (!Number.isInteger(beacon.round) || !/^[0-9a-f]{64}$/i.test(beacon.randomness)) {
        throw new Error(`Malformed drand beacon for round ${round}`);
      }
      return beacon;
    } catch (error) {
      if (axios.isAxiosError(error) && ROUND_NOT_READY.includes(error.response?.status ?? 0)) {
        return null;
      }
      throw error;
    }
  }
}
