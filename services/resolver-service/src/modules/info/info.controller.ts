import { Controller, Get, Inject } from "@nestjs/common";
import { ServiceInfo } from "@time-relay/types";
import { RESOLVER_CONFIG, ResolverEnv } from "../../config/env";

@Controller()
export class InfoController {
  constructor(@Inject(RESOLVER_CONFIG) private readonly config: Readonly<ResolverEnv>) {}

  @Get()
  info(): ServiceInfo {
    return {
      name: this.config.serviceName,
      version: this.config.version,
      description: "Time Service Provider",
    };
  }
}
