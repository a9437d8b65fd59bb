import { LedgerAccount } from './ledger-account.entity';

export interface ILedgerRepository {
  findByAddress(address: string): Promise<LedgerAccount | null>;
  save(account: LedgerAccount): Promise<LedgerAccount>;
}

export const LEDGER_REPOSITORY = 'LEDGER_REPOSITORY';
