import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { hexlify, randomBytes, verifyMessage } from 'ethers';
import { normalizeAddress } from '../common/ethereum';
import { ConfigService } from '../database/config.service';
import { RedisService } from '../redis/redis.service';
import { LoginDto } from './dto/login.dto';
import { LoginResponseDto, NonceResponseDto } from './dto/login-response.dto';

/** Redis key prefix for pending sign-in nonces */
const KEY_AUTH_NONCE = 'auth:nonce:';

export interface JwtPayload {
  sub: string;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly redisService: RedisService,
    private readonly configService: ConfigService,
  ) {}

  static signInMessage(address: string, nonce: string): string {
    return `Sign in to the raffle\nAddress: ${address}\nNonce: ${nonce}`;
  }

  async issueNonce(rawAddress: string): Promise<NonceResponseDto> {
    const address = normalizeAddress(rawAddress);
    const nonce = hexlify(randomBytes(16));
    const ttl = this.configService.authNonceTtlSeconds;

    await this.redisService.set(`${KEY_AUTH_NONCE}${address}`, nonce, ttl);

    return {
      address,
      nonce,
      message: AuthService.signInMessage(address, nonce),
      expiresInSeconds: ttl,
    };
  }

  /**
   * Exchange a signed nonce for an access token. The nonce is consumed whether or not
   * the signature checks out.
   */
  async login(loginDto: LoginDto): Promise<LoginResponseDto> {
    const address = normalizeAddress(loginDto.address);
    const nonce = await this.redisService.take<string>(`${KEY_AUTH_NONCE}${address}`);

    if (!nonce) {
      throw new UnauthorizedException('No pending sign-in for this address');
    }

    let signer: string;
    try {
      signer = verifyMessage(AuthService.signInMessage(address, nonce), loginDto.signature);
    } catch (error) {
      this.logger.warn(`Malformed signature from ${address}: ${String(error)}`);
      throw new UnauthorizedException('Invalid signature');
    }

    if (signer !== address) {
      throw new UnauthorizedException('Invalid signature');
    }

    const payload: JwtPayload = { sub: address };
    return {
      accessToken: this.jwtService.sign(payload),
      address,
    };
  }
}
