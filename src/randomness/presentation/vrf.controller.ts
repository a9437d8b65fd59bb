import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  NotFoundException,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { OperatorGuard } from '../../auth/guards/operator.guard';
import { parseUint } from '../../common/ethereum';
import { FulfillRandomWordsDto } from '../application/dto/fulfill-random-words.dto';
import { PendingRequestResponseDto } from '../application/dto/pending-request-response.dto';
import { RANDOMNESS_ORACLE_CLIENT, RandomnessOracleClient } from '../domain/randomness-oracle';
import { MockVrfCoordinator } from '../infrastructure/mock-vrf-coordinator';

@Controller('vrf')
export class VrfController {
  constructor(
    @Inject(RANDOMNESS_ORACLE_CLIENT)
    private readonly oracle: RandomnessOracleClient,
  ) {}

  @Get('requests')
  getPendingRequests(): PendingRequestResponseDto[] {
    return this.oracle.getPendingRequests().map((request) => ({
      requestId: request.requestId.toString(),
      keyHash: request.keyHash,
      subscriptionId: request.subscriptionId.toString(),
      requestConfirmations: request.requestConfirmations,
      callbackGasLimit: request.callbackGasLimit,
      numWords: request.numWords,
      nativePayment: request.nativePayment,
      requestedAt: request.requestedAt.toISOString(),
    }));
  }

  /**
   * Stand-in for the oracle network when running with the mock coordinator.
   */
  @Post('requests/:requestId/fulfill')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard('jwt'), OperatorGuard)
  async fulfill(@Param('requestId') requestId: string, @Body() dto: FulfillRandomWordsDto) {
    if (!(this.oracle instanceof MockVrfCoordinator)) {
      throw new NotFoundException('Manual fulfillment is only available with the mock coordinator');
    }

    const words = await this.oracle.fulfillRandomWords(
      parseUint(requestId, 'requestId'),
      dto.randomWords?.map((word) => BigInt(word)),
    );
    return { requestId, randomWords: words.map((word) => word.toString()) };
  }
}
