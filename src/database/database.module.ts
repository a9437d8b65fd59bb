import { Global, Logger, Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { Connection } from 'mongoose';
import { ConfigModule } from './config.module';
import { ConfigService } from './config.service';

@Global()
@Module({
  imports: [
    ConfigModule,
    MongooseModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: async (configService: ConfigService) => ({
        uri: configService.mongoUri,
        autoIndex: configService.nodeEnv !== 'production',
        connectionFactory: (connection: Connection) => {
          const logger = new Logger('DatabaseModule');
          connection.on('connected', () => logger.log('MongoDB connected'));
          connection.on('disconnected', () => logger.warn('MongoDB disconnected'));
          return connection;
        },
      }),
      inject: [ConfigService],
    }),
  ],
  exports: [MongooseModule],
})
export class DatabaseModule {}
