import { Controller, Get, Inject } from "@nestjs/common";
import { CLOCK, Clock } from "@time-relay/service-kit";
import { HealthStatus } from "@time-relay/types";
import { GATEWAY_CONFIG, GatewayEnv } from "../../config/env";

/** Liveness of the gateway itself; the resolver is never called from here. */
@Controller("health")
export class HealthController {
  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: Readonly<GatewayEnv>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  @Get()
  health(): HealthStatus {
    return { status: "healthy", service: this.config.serviceName, timestamp: this.clock.now().toISOString() };
  }
}
