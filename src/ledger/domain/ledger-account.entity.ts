export interface ILedgerAccount {
  id?: string;
  address: string;
  balance: bigint;
  rejectsTransfers: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export class LedgerAccount implements ILedgerAccount {
  id?: string;
  address: string;
  balance: bigint;
  rejectsTransfers: boolean;
  createdAt: Date;
  updatedAt: Date;

  constructor(partial: Partial<ILedgerAccount>) {
    this.id = partial.id;
    this.address = partial.address || '';
    this.balance = partial.balance ?? 0n;
    this.rejectsTransfers = partial.rejectsTransfers ?? false;
    this.createdAt = partial.createdAt || new Date();
    this.updatedAt = partial.updatedAt || new Date();
  }

  static empty(address: string): LedgerAccount {
    return new LedgerAccount({ address });
  }

  credit(amount: bigint): void {
    this.balance += amount;
    this.updatedAt = new Date();
  }

  debit(amount: bigint): void {
    if (amount > this.balance) {
      throw new RangeError(`Balance of ${this.address} is ${this.balance}, cannot debit ${amount}`);
    }
    this.balance -= amount;
    this.updatedAt = new Date();
  }
}
