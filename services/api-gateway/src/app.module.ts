import { Module } from "@nestjs/common";
import { APP_INTERCEPTOR } from "@nestjs/core";
import { CLOCK, RequestTraceInterceptor, SystemClock } from "@time-relay/service-kit";
import { GATEWAY_CONFIG, getGatewayEnv } from "./config/env";
import { GatewayController } from "./modules/gateway/gateway.controller";
import { ResolverClient } from "./modules/gateway/resolver-client.service";
import { TimeRelayService } from "./modules/gateway/time-relay.service";
import { HealthController } from "./modules/health/health.controller";
import { InfoController } from "./modules/info/info.controller";

@Module({
  controllers: [InfoController, HealthController, GatewayController],
  providers: [
    ResolverClient,
    TimeRelayService,
    { provide: GATEWAY_CONFIG, useFactory: getGatewayEnv },
    { provide: CLOCK, useClass: SystemClock },
    {
      provide: APP_INTERCEPTOR,
      useClass: RequestTraceInterceptor,
    },
  ],
})
export class AppModule {}
