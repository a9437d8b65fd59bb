import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '../../database/config.service';
import { LedgerService } from '../../ledger/application/ledger.service';
import { PayoutPolicy } from '../domain/payout-policy';
import { computeOwnerFee, PayoutReceipt } from '../domain/payout-receipt';
import { TransferFailedError } from '../domain/payout.errors';

/**
 * Splits the raffle vault between the session owner and the winner.
 *
 * The owner fee is sent first. The winner then receives whatever the vault still holds,
 * re-read after the fee transfer rather than computed up front. When the winner transfer
 * fails, the configured {@link PayoutPolicy} decides whether the fee is clawed back.
 */
@Injectable()
export class PayoutEngine {
  private readonly logger = new Logger(PayoutEngine.name);

  constructor(
    private readonly ledgerService: LedgerService,
    private readonly configService: ConfigService,
  ) {}

  async distribute(owner: string, winner: string): Promise<PayoutReceipt> {
    const vault = this.configService.raffleVaultAddress;
    const policy = this.configService.payoutPolicy;

    const totalBalance = await this.ledgerService.balanceOf(vault);
    const ownerFee = computeOwnerFee(totalBalance);

    try {
      await this.ledgerService.transfer(vault, owner, ownerFee);
    } catch (error) {
      this.logger.error(`Owner fee of ${ownerFee} to ${owner} failed`, error);
      throw new TransferFailedError(owner, ownerFee, error);
    }

    const winnerPayout = await this.ledgerService.balanceOf(vault);

    try {
      await this.ledgerService.transfer(vault, winner, winnerPayout);
    } catch (error) {
      this.logger.error(`Prize of ${winnerPayout} to ${winner} failed`, error);

      if (policy === PayoutPolicy.ATOMIC) {
        try {
          await this.ledgerService.reclaim(owner, vault, ownerFee);
          this.logger.warn(`Owner fee of ${ownerFee} returned to the vault from ${owner}`);
        } catch (reclaimError) {
          this.logger.error(`Could not return owner fee of ${ownerFee} from ${owner} to the vault`, reclaimError);
        }
      } else {
        this.logger.warn(`Owner fee of ${ownerFee} stays with ${owner} although the winner was not paid`);
      }

      throw new TransferFailedError(winner, winnerPayout, error);
    }

    this.logger.log(`Paid ${ownerFee} to owner ${owner} and ${winnerPayout} to winner ${winner}`);
    return { owner, winner, totalBalance, ownerFee, winnerPayout };
  }

  /**
   * Undo a completed distribution, moving both payouts back into the vault.
   */
  async refund(receipt: PayoutReceipt): Promise<void> {
    const vault = this.configService.raffleVaultAddress;
    await this.ledgerService.reclaim(receipt.winner, vault, receipt.winnerPayout);
    await this.ledgerService.reclaim(receipt.owner, vault, receipt.ownerFee);
    this.logger.warn(`Refunded ${receipt.ownerFee} from ${receipt.owner} and ${receipt.winnerPayout} from ${receipt.winner}`);
  }
}
