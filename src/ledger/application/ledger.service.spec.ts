import { BadRequestException } from '@nestjs/common';
import { InMemoryLedgerRepository } from '../../../test/fakes/in-memory-ledger.repository';
import { ALICE, BOB } from '../../../test/raffle-harness';
import { InsufficientBalanceError, TransferRejectedError } from '../domain/ledger.errors';
import { LedgerService } from './ledger.service';

describe('LedgerService', () => {
  let service: LedgerService;

  beforeEach(() => {
    service = new LedgerService(new InMemoryLedgerRepository());
  });

  it('reports zero for unknown accounts', async () => {
    expect(await service.balanceOf(ALICE)).toBe(0n);
    expect(await service.getAccount(ALICE.toLowerCase())).toEqual({
      address: ALICE,
      balance: '0',
      rejectsTransfers: false,
    });
  });

  it('credits deposits', async () => {
    await service.deposit(ALICE, 5n);

    expect(await service.deposit(ALICE, 7n)).toBe(12n);
  });

  it('moves value between accounts', async () => {
    await service.deposit(ALICE, 10n);

    await service.transfer(ALICE, BOB, 4n);

    expect(await service.balanceOf(ALICE)).toBe(6n);
    expect(await service.balanceOf(BOB)).toBe(4n);
  });

  it('refuses to overdraw', async () => {
    await service.deposit(ALICE, 3n);

    await expect(service.transfer(ALICE, BOB, 4n)).rejects.toBeInstanceOf(InsufficientBalanceError);
    expect(await service.balanceOf(ALICE)).toBe(3n);
  });

  it('refuses transfers to accounts that reject them', async () => {
    await service.deposit(ALICE, 10n);
    const account = await service.setRejectsTransfers(BOB, true);

    expect(account.rejectsTransfers).toBe(true);
    await expect(service.transfer(ALICE, BOB, 1n)).rejects.toBeInstanceOf(TransferRejectedError);
    expect(await service.balanceOf(ALICE)).toBe(10n);

    await service.setRejectsTransfers(BOB, false);
    await service.transfer(ALICE, BOB, 1n);
    expect(await service.balanceOf(BOB)).toBe(1n);
  });

  it('leaves the balance alone on a self-transfer', async () => {
    await service.deposit(ALICE, 10n);

    await service.transfer(ALICE, ALICE.toLowerCase(), 4n);

    expect(await service.balanceOf(ALICE)).toBe(10n);
    await expect(service.transfer(ALICE, ALICE, 11n)).rejects.toBeInstanceOf(InsufficientBalanceError);
  });

  it('reclaims into accounts that reject ordinary transfers', async () => {
    await service.deposit(ALICE, 10n);
    await service.setRejectsTransfers(BOB, true);

    await service.reclaim(ALICE, BOB, 3n);

    expect(await service.balanceOf(ALICE)).toBe(7n);
    expect(await service.balanceOf(BOB)).toBe(3n);
  });

  it('withdraws deposited value but never below zero', async () => {
    await service.deposit(ALICE, 10n);

    expect(await service.withdraw(ALICE, 4n)).toBe(6n);
    await expect(service.withdraw(ALICE, 7n)).rejects.toBeInstanceOf(InsufficientBalanceError);
    expect(await service.balanceOf(ALICE)).toBe(6n);
  });

  it('rejects malformed addresses', async () => {
    await expect(service.balanceOf('0x1234')).rejects.toBeInstanceOf(BadRequestException);
  });
});
