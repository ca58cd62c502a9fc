import { Controller, Get, Inject } from "@nestjs/common";
import { HealthStatus } from "@time-relay/types";
import { RESOLVER_CONFIG, ResolverEnv } from "../../config/env";
import { CLOCK, Clock } from "@time-relay/service-kit";

@Controller("health")
export class HealthController {
  constructor(
    @Inject(RESOLVER_CONFIG) private readonly config: Readonly<ResolverEnv>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  @Get()
  getHealth(): HealthStatus {
    return { status: "healthy", service: this.config.serviceName, timestamp: this.clock.now().toISOString() };
  }
}
