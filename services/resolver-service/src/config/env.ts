import { LogLevel } from "@nestjs/common";
import { asLogLevel } from "@time-relay/service-kit";

export const RESOLVER_CONFIG = Symbol("RESOLVER_CONFIG");

export interface ResolverEnv {
  port: number;
  serviceName: string;
  version: string;
  logLevel: LogLevel;
}

function asNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function getResolverEnv(): Readonly<ResolverEnv> {
  return Object.freeze({
    port: asNumber(process.env.RESOLVER_PORT, 4000),
    serviceName: "api2",
    version: process.env.SERVICE_VERSION || "1.0.0",
    logLevel: asLogLevel(process.env.LOG_LEVEL),
  });
}
