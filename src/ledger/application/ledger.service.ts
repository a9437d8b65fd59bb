import { Inject, Injectable, Logger } from '@nestjs/common';
import { normalizeAddress } from '../../common/ethereum';
import { LedgerAccount } from '../domain/ledger-account.entity';
import { ILedgerRepository, LEDGER_REPOSITORY } from '../domain/ledger.repository';
import { InsufficientBalanceError, TransferRejectedError } from '../domain/ledger.errors';
import { LedgerAccountResponseDto } from './dto/ledger-account-response.dto';

/**
 * Native-value balances. Callers are expected to serialize writes to the same accounts;
 * the raffle does so through its executor.
 */
@Injectable()
export class LedgerService {
  private readonly logger = new Logger(LedgerService.name);

  constructor(
    @Inject(LEDGER_REPOSITORY)
    private readonly ledgerRepository: ILedgerRepository,
  ) {}

  async balanceOf(address: string): Promise<bigint> {
    const account = await this.ledgerRepository.findByAddress(normalizeAddress(address));
    return account?.balance ?? 0n;
  }

  async getAccount(address: string): Promise<LedgerAccountResponseDto> {
    const normalized = normalizeAddress(address);
    const account = await this.ledgerRepository.findByAddress(normalized);
    return this.toResponseDto(account ?? LedgerAccount.empty(normalized));
  }

  /**
   * Value arriving from outside the ledger, such as the payment attached to a raffle entry.
   */
  async deposit(address: string, amount: bigint): Promise<bigint> {
    const account = await this.load(address);
    account.credit(amount);
    const saved = await this.ledgerRepository.save(account);
    return saved.balance;
  }

  async transfer(from: string, to: string, amount: bigint): Promise<void> {
    await this.move(from, to, amount, true);
  }

  /**
   * Move back value paid out by a step that is being undone. The recipient's
   * `rejectsTransfers` flag does not apply.
   */
  async reclaim(from: string, to: string, amount: bigint): Promise<void> {
    await this.move(from, to, amount, false);
  }

  /**
   * Remove value credited by {@link deposit}, when the entry that paid it is undone.
   */
  async withdraw(address: string, amount: bigint): Promise<bigint> {
    const account = await this.load(address);
    if (account.balance < amount) {
      throw new InsufficientBalanceError(account.address, account.balance, amount);
    }
    account.debit(amount);
    const saved = await this.ledgerRepository.save(account);
    return saved.balance;
  }

  async setRejectsTransfers(address: string, rejectsTransfers: boolean): Promise<LedgerAccountResponseDto> {
    const account = await this.load(address);
    account.rejectsTransfers = rejectsTransfers;
    account.updatedAt = new Date();
    const saved = await this.ledgerRepository.save(account);
    this.logger.log(`${saved.address} ${rejectsTransfers ? 'now rejects' : 'accepts'} incoming transfers`);
    return this.toResponseDto(saved);
  }

  private async move(from: string, to: string, amount: bigint, honorRejection: boolean): Promise<void> {
    const sender = await this.load(from);
    if (sender.balance < amount) {
      throw new InsufficientBalanceError(sender.address, sender.balance, amount);
    }
    // A self-transfer leaves the balance as it is.
    if (sender.address === normalizeAddress(to)) return;

    const recipient = await this.load(to);
    if (honorRejection && recipient.rejectsTransfers) {
      this.logger.warn(`Transfer of ${amount} from ${sender.address} rejected by ${recipient.address}`);
      throw new TransferRejectedError(recipient.address, amount);
    }

    sender.debit(amount);
    recipient.credit(amount);
    await this.ledgerRepository.save(sender);
    await this.ledgerRepository.save(recipient);
  }

  private async load(address: string): Promise<LedgerAccount> {
    const normalized = normalizeAddress(address);
    const account = await this.ledgerRepository.findByAddress(normalized);
    return account ?? LedgerAccount.empty(normalized);
  }

  private toResponseDto(account: LedgerAccount): LedgerAccountResponseDto {
    return {
      address: account.address,
      balance: account.balance.toString(),
      rejectsTransfers: account.rejectsTransfers,
    };
  }
}
