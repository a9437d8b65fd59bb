import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ConfigService } from './database/config.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.enableShutdownHooks();

  const port = configService.port;
  await app.listen(port);
  new Logger('Bootstrap').log(`Raffle API listening on port ${port} (${configService.nodeEnv})`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error('Failed to start', err);
  process.exitCode = 1;
});
