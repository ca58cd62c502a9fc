import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";
import {
  configureApp,
  enabledLogLevels,
  exitOnBootstrapFailure,
  fastifyLogLevel,
  initSentry,
} from "@time-relay/service-kit";
import { AppModule } from "./app.module";
import { getResolverEnv } from "./config/env";

async function bootstrap(): Promise<void> {
  initSentry("resolver-service");
  const env = getResolverEnv();
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ logger: { level: fastifyLogLevel(env.logLevel) } }),
    { logger: enabledLogLevels(env.logLevel) },
  );

  configureApp(app);
  await app.listen(env.port, "0.0.0.0");
  new Logger("Bootstrap").log(`${env.serviceName} listening on 0.0.0.0:${env.port}`);
}

bootstrap().catch(exitOnBootstrapFailure);
