import { Module } from "@nestjs/common";
import { APP_INTERCEPTOR } from "@nestjs/core";
import { CLOCK, RequestTraceInterceptor, SystemClock } from "@time-relay/service-kit";
import { getResolverEnv, RESOLVER_CONFIG } from "./config/env";
import { HealthController } from "./modules/health/health.controller";
import { InfoController } from "./modules/info/info.controller";
import { TimeController } from "./modules/time/time.controller";
import { TimeService } from "./modules/time/time.service";
import { defaultTimezoneAliases, TIMEZONE_ALIASES } from "./modules/time/timezone-aliases";

@Module({
  controllers: [InfoController, HealthController, TimeController],
  providers: [
    TimeService,
    { provide: RESOLVER_CONFIG, useFactory: getResolverEnv },
    { provide: TIMEZONE_ALIASES, useValue: defaultTimezoneAliases },
    { provide: CLOCK, useClass: SystemClock },
    {
      provide: APP_INTERCEPTOR,
      useClass: RequestTraceInterceptor,
    },
  ],
})
export class AppModule {}
