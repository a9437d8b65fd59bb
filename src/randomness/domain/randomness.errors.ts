import { BadRequestException, NotFoundException } from '@nestjs/common';

export class UnknownRandomnessRequestError extends NotFoundException {
  readonly code = 'UnknownRandomnessRequest';

  constructor(readonly requestId: bigint) {
    super({
      code: 'UnknownRandomnessRequest',
      message: `No pending randomness request ${requestId}`,
      requestId: requestId.toString(),
    });
  }
}

export class InvalidRandomWordsError extends BadRequestException {
  readonly code = 'InvalidRandomWords';

  constructor(
    readonly expected: number,
    readonly received: number,
  ) {
    super({
      code: 'InvalidRandomWords',
      message: `Expected ${expected} random words, received ${received}`,
      expected,
      received,
    });
  }
}
