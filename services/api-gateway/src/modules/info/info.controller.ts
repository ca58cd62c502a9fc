import { Controller, Get, Inject } from "@nestjs/common";
import { ServiceInfo } from "@time-relay/types";
import { GATEWAY_CONFIG, GatewayEnv } from "../../config/env";

@Controller()
export class InfoController {
  constructor(@Inject(GATEWAY_CONFIG) private readonly config: Readonly<GatewayEnv>) {}

  @Get()
  info(): ServiceInfo {
    return {
      name: this.config.serviceName,
      version: this.config.version,
      description: "Time Service Gateway",
    };
  }
}
