import { Body, Controller, Get, Param, Patch, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { OperatorGuard } from '../../auth/guards/operator.guard';
import { LedgerService } from '../application/ledger.service';
import { UpdateRejectsTransfersDto } from '../application/dto/update-rejects-transfers.dto';

@Controller('ledger')
export class LedgerController {
  constructor(private readonly ledgerService: LedgerService) {}

  @Get(':address')
  async getAccount(@Param('address') address: string) {
    return this.ledgerService.getAccount(address);
  }

  /**
   * Make an account refuse incoming transfers, to exercise failed payouts.
   */
  @Patch(':address/rejects-transfers')
  @UseGuards(AuthGuard('jwt'), OperatorGuard)
  async updateRejectsTransfers(
    @Param('address') address: string,
    @Body() dto: UpdateRejectsTransfersDto,
  ) {
    return this.ledgerService.setRejectsTransfers(address, dto.rejectsTransfers);
  }
}
