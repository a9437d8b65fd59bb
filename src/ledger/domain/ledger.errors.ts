import { UnprocessableEntityException } from '@nestjs/common';

/**
 * The receiving account refuses incoming value, like a contract without a payable fallback.
 */
export class TransferRejectedError extends UnprocessableEntityException {
  readonly code = 'TransferRejected';

  constructor(
    readonly recipient: string,
    readonly amount: bigint,
  ) {
    super({
      code: 'TransferRejected',
      message: `Account ${recipient} rejected a transfer of ${amount}`,
      recipient,
      amount: amount.toString(),
    });
  }
}

export class InsufficientBalanceError extends UnprocessableEntityException {
  readonly code = 'InsufficientBalance';

  constructor(
    readonly account: string,
    readonly balance: bigint,
    readonly amount: bigint,
  ) {
    super({
      code: 'InsufficientBalance',
      message: `Account ${account} holds ${balance}, cannot send ${amount}`,
      account,
      balance: balance.toString(),
      amount: amount.toString(),
    });
  }
}
