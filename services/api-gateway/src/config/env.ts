import { LogLevel } from "@nestjs/common";
import { asLogLevel } from "@time-relay/service-kit";

export const GATEWAY_CONFIG = Symbol("GATEWAY_CONFIG");

export interface GatewayEnv {
  port: number;
  serviceName: string;
  version: string;
  resolverUrl: string;
  resolverTimeoutMs: number;
  logLevel: LogLevel;
}

const DEFAULT_RESOLVER_URL = "http://api2:4000";
const DEFAULT_RESOLVER_TIMEOUT_MS = 5000;
// setTimeout clamps anything larger to 1ms.
const MAX_TIMER_MS = 2_147_483_647;

function asNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function asTimerMs(value: string | undefined, fallback: number): number {
  const parsed = asNumber(value, fallback);
  return parsed > 0 && parsed <= MAX_TIMER_MS ? parsed : fallback;
}

export function asResolverUrl(value: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch (err) {
    throw new Error(`RESOLVER_URL must be an absolute http(s) URL, got "${value}"`, { cause: err });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`RESOLVER_URL must be an absolute http(s) URL, got "${value}"`);
  }
  return value.replace(/\/+$/, "");
}

export function getGatewayEnv(): Readonly<GatewayEnv> {
  return Object.freeze({
    port: asNumber(process.env.GATEWAY_PORT, 3000),
    serviceName: "api1",
    version: process.env.SERVICE_VERSION || "1.0.0",
    resolverUrl: asResolverUrl(process.env.RESOLVER_URL || process.env.API2_URL || DEFAULT_RESOLVER_URL),
    resolverTimeoutMs: asTimerMs(process.env.RESOLVER_TIMEOUT_MS, DEFAULT_RESOLVER_TIMEOUT_MS),
    logLevel: asLogLevel(process.env.LOG_LEVEL),
  });
}
