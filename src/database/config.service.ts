import { Inject, Injectable, Optional } from '@nestjs/common';
import * as dotenv from 'dotenv';
import { PayoutPolicy } from '../payouts/domain/payout-policy';

dotenv.config();

export const ENV_VARIABLES = 'ENV_VARIABLES';

export type VrfProvider = 'mock' | 'drand';

const ZERO_KEY_HASH = `0x${'0'.repeat(64)}`;

@Injectable()
export class ConfigService {
  private readonly env: Record<string, string | undefined>;

  constructor(
    @Optional()
    @Inject(ENV_VARIABLES)
    env?: Record<string, string | undefined>,
  ) {
    this.env = env ?? process.env;
  }

  get mongoUri(): string {
    return this.env.MONGODB_URI || 'mongodb://localhost:27017/raffle';
  }

  get port(): number {
    return this.integer('PORT', 3001);
  }

  get nodeEnv(): string {
    return this.env.NODE_ENV || 'development';
  }

  get redisUrl(): string | undefined {
    return this.env.REDIS_URL?.trim() || undefined;
  }

  get jwtSecret(): string {
    const secret = this.env.JWT_SECRET?.trim();
    if (secret) return secret;
    if (this.nodeEnv === 'production') {
      throw new Error('JWT_SECRET must be set in production');
    }
    return 'raffle-dev-secret';
  }

  get jwtExpiresIn(): string {
    return this.env.JWT_EXPIRES_IN || '1d';
  }

  get authNonceTtlSeconds(): number {
    return this.integer('AUTH_NONCE_TTL_SECONDS', 300);
  }

  /**
   * Ledger account that holds the pooled entrance payments.
   */
  get raffleVaultAddress(): string {
    return this.env.RAFFLE_VAULT_ADDRESS || '0x0000000000000000000000000000000000000001';
  }

  get payoutPolicy(): PayoutPolicy {
    const raw = this.env.PAYOUT_POLICY || PayoutPolicy.ATOMIC;
    if (raw === PayoutPolicy.ATOMIC || raw === PayoutPolicy.PARTIAL) {
      return raw;
    }
    throw new Error(`PAYOUT_POLICY must be "atomic" or "partial" (got ${raw})`);
  }

  get vrfProvider(): VrfProvider {
    const raw = this.env.VRF_PROVIDER || 'mock';
    if (raw === 'mock' || raw === 'drand') {
      return raw;
    }
    throw new Error(`VRF_PROVIDER must be "mock" or "drand" (got ${raw})`);
  }

  get vrfKeyHash(): string {
    const raw = this.env.VRF_KEY_HASH || ZERO_KEY_HASH;
    if (!/^0x[0-9a-fA-F]{64}$/.test(raw)) {
      throw new Error(`VRF_KEY_HASH must be a 32-byte hex string (got ${raw})`);
    }
    return raw;
  }

  get vrfSubscriptionId(): bigint {
    const raw = this.env.VRF_SUBSCRIPTION_ID || '0';
    if (!/^\d+$/.test(raw)) {
      throw new Error(`VRF_SUBSCRIPTION_ID must be an unsigned integer (got ${raw})`);
    }
    return BigInt(raw);
  }

  get vrfCallbackGasLimit(): number {
    return this.integer('VRF_CALLBACK_GAS_LIMIT', 500_000);
  }

  get vrfRequestConfirmations(): number {
    return this.integer('VRF_REQUEST_CONFIRMATIONS', 3);
  }

  get vrfNumWords(): number {
    const value = this.integer('VRF_NUM_WORDS', 1);
    if (value < 1) {
      throw new Error(`VRF_NUM_WORDS must be at least 1 (got ${value})`);
    }
    return value;
  }

  /**
   * Address allowed to drive the mock oracle and flag ledger accounts.
   * Operator routes are disabled when unset.
   */
  get operatorAddress(): string | undefined {
    return this.env.OPERATOR_ADDRESS?.trim() || undefined;
  }

  get drandUrl(): string {
    return (this.env.DRAND_URL || 'https://api.drand.sh').replace(/\/+$/, '');
  }

  get drandPollIntervalMs(): number {
    return this.integer('DRAND_POLL_INTERVAL_MS', 3000);
  }

  private integer(name: string, fallback: number): number {
    const raw = this.env[name]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`${name} must be a non-negative integer (got ${raw})`);
    }
    return value;
  }
}
