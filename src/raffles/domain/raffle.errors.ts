import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
} from '@nestjs/common';

export type RaffleErrorCode =
  | 'AlreadyInSession'
  | 'NotOpen'
  | 'OwnerCannotEnter'
  | 'InsufficientFee'
  | 'NotOwner'
  | 'RandomnessPending'
  | 'NoPlayers'
  | 'PlayerIndexOutOfRange';

export class AlreadyInSessionError extends ConflictException {
  readonly code: RaffleErrorCode = 'AlreadyInSession';

  constructor(readonly owner: string) {
    super({ code: 'AlreadyInSession', message: `A raffle opened by ${owner} is still in session`, owner });
  }
}

export class NotOpenError extends ConflictException {
  readonly code: RaffleErrorCode = 'NotOpen';

  constructor() {
    super({ code: 'NotOpen', message: 'The raffle is not open' });
  }
}

export class OwnerCannotEnterError extends ForbiddenException {
  readonly code: RaffleErrorCode = 'OwnerCannotEnter';

  constructor() {
    super({ code: 'OwnerCannotEnter', message: 'The raffle owner cannot enter their own raffle' });
  }
}

export class InsufficientFeeError extends BadRequestException {
  readonly code: RaffleErrorCode = 'InsufficientFee';

  constructor(
    readonly required: bigint,
    readonly paid: bigint,
  ) {
    super({
      code: 'InsufficientFee',
      message: `Entrance fee is ${required}, paid ${paid}`,
      required: required.toString(),
      paid: paid.toString(),
    });
  }
}

export class NotOwnerError extends ForbiddenException {
  readonly code: RaffleErrorCode = 'NotOwner';

  constructor(readonly caller: string) {
    super({ code: 'NotOwner', message: `${caller} is not the raffle owner`, caller });
  }
}

export class RandomnessPendingError extends ConflictException {
  readonly code: RaffleErrorCode = 'RandomnessPending';

  constructor(readonly requestId: bigint) {
    super({
      code: 'RandomnessPending',
      message: `Randomness request ${requestId} is still pending`,
      requestId: requestId.toString(),
    });
  }
}

export class NoPlayersError extends ConflictException {
  readonly code: RaffleErrorCode = 'NoPlayers';

  constructor() {
    super({ code: 'NoPlayers', message: 'There are no players to pick a winner from' });
  }
}

export class PlayerIndexOutOfRangeError extends NotFoundException {
  readonly code: RaffleErrorCode = 'PlayerIndexOutOfRange';

  constructor(
    readonly index: number,
    readonly length: number,
  ) {
    super({
      code: 'PlayerIndexOutOfRange',
      message: `No player at index ${index} (${length} recorded)`,
      index,
      length,
    });
  }
}
