import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'
import { loadAppConfig, logLevelsFrom } from './config/app-config'

async function bootstrap() {
  const config = loadAppConfig(process.env)
  const app = await NestFactory.create(AppModule, { logger: logLevelsFrom(config.logLevel) })

  app.enableCors({
    origin: config.corsOrigin,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    exposedHeaders: ['Content-Disposition'],
  })
  app.enableShutdownHooks()

  await app.listen(config.port)
  Logger.log(`Listening on :${config.port}`, 'Bootstrap')
}

bootstrap().catch((err: unknown) => {
  Logger.error(`Fatal error: ${String(err)}`, err instanceof Error ? err.stack : undefined, 'Bootstrap')
  process.exit(1)
})
