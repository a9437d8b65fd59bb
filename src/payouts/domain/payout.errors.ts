import { UnprocessableEntityException } from '@nestjs/common';

export class TransferFailedError extends UnprocessableEntityException {
  readonly code = 'TransferFailed';

  constructor(
    readonly recipient: string,
    readonly amount: bigint,
    cause?: unknown,
  ) {
    super(
      {
        code: 'TransferFailed',
        message: `Transfer of ${amount} to ${recipient} failed`,
        recipient,
        amount: amount.toString(),
      },
      { cause },
    );
  }
}
