import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Post, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { CurrentCaller } from '../../auth/decorators/current-caller.decorator';
import { parseUint } from '../../common/ethereum';
import { EnterRaffleDto } from '../application/dto/enter-raffle.dto';
import { OpenRaffleDto } from '../application/dto/open-raffle.dto';
import { RaffleEventLogService } from '../application/raffle-event-log.service';
import { RafflesService } from '../application/raffles.service';

@Controller('raffle')
export class RafflesController {
  constructor(
    private readonly rafflesService: RafflesService,
    private readonly eventLog: RaffleEventLogService,
  ) {}

  @Get()
  async getRaffle() {
    return this.rafflesService.getRaffle();
  }

  @Get('owner')
  async getRaffleOwner() {
    return { owner: await this.rafflesService.getRaffleOwner() };
  }

  @Get('previous-owner')
  async getRafflePreviousOwner() {
    return { previousOwner: await this.rafflesService.getRafflePreviousOwner() };
  }

  @Get('entrance-fee')
  async getEntranceFee() {
    return { entranceFee: (await this.rafflesService.getEntranceFee()).toString() };
  }

  @Get('state')
  async getRaffleState() {
    return { state: await this.rafflesService.getRaffleState() };
  }

  @Get('recent-winner')
  async getRecentWinner() {
    return { recentWinner: await this.rafflesService.getRecentWinner() };
  }

  @Get('players/count')
  async getPlayersCount() {
    return { count: await this.rafflesService.getPlayersCount() };
  }

  @Get('players/:index')
  async getPlayer(@Param('index', ParseIntPipe) index: number) {
    return { index, player: await this.rafflesService.getPlayer(index) };
  }

  @Get('previous-players/:index')
  async getPlayerFromPreviousSession(@Param('index', ParseIntPipe) index: number) {
    return { index, player: await this.rafflesService.getPlayerFromPreviousSession(index) };
  }

  @Get('events')
  async getEvents() {
    return this.eventLog.findAll();
  }

  @Post('open')
  @UseGuards(AuthGuard('jwt'))
  async open(@CurrentCaller() caller: string, @Body() dto: OpenRaffleDto) {
    return this.rafflesService.openRaffle(caller, parseUint(dto.fee, 'fee'));
  }

  @Post('enter')
  @UseGuards(AuthGuard('jwt'))
  async enter(@CurrentCaller() caller: string, @Body() dto: EnterRaffleDto) {
    return this.rafflesService.enterRaffle(caller, parseUint(dto.payment, 'payment'));
  }

  @Post('end')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard('jwt'))
  async end(@CurrentCaller() caller: string) {
    return this.rafflesService.endRaffle(caller);
  }
}
