import { Logger, Module } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { ConfigService } from '../database/config.service';
import { RANDOMNESS_ORACLE_CLIENT, RandomnessOracleClient } from './domain/randomness-oracle';
import { DrandVrfCoordinator } from './infrastructure/drand-vrf-coordinator';
import { MockVrfCoordinator } from './infrastructure/mock-vrf-coordinator';
import { VrfController } from './presentation/vrf.controller';

@Module({
  controllers: [VrfController],
  providers: [
    {
      provide: RANDOMNESS_ORACLE_CLIENT,
      useFactory: (configService: ConfigService, schedulerRegistry: SchedulerRegistry): RandomnessOracleClient => {
        if (configService.vrfProvider === 'drand') {
          return new DrandVrfCoordinator(configService, schedulerRegistry);
        }
        new Logger('RandomnessModule').warn(
          'Using the mock VRF coordinator; winners are only drawn when the operator fulfills requests',
        );
        return new MockVrfCoordinator();
      },
      inject: [ConfigService, SchedulerRegistry],
    },
  ],
  exports: [RANDOMNESS_ORACLE_CLIENT],
})
export class RandomnessModule {}
