import { Inject, Injectable } from "@nestjs/common";
import { TimeResponse } from "@time-relay/types";
import { plainToInstance } from "class-transformer";
import { validateSync } from "class-validator";
import { GATEWAY_CONFIG, GatewayEnv } from "../../config/env";
import { TimeResponseDto } from "./dto/time-response.dto";

export const REQUEST_ID_HEADER = "x-request-id";

export type ResolverCallErrorKind = "timeout" | "unreachable" | "bad_status" | "bad_payload" | "cancelled";

export class ResolverCallError extends Error {
  constructor(
    readonly kind: ResolverCallErrorKind,
    message: string,
    readonly upstreamStatus?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ResolverCallError";
  }
}

type GetTimeRequest = {
  requestId: string;
  timezone?: string;
  signal?: AbortSignal;
};

/**
 * Single-shot HTTP client for the resolver's `/time` endpoint. Each call is
 * bounded by `resolverTimeoutMs` and is never retried.
 */
@Injectable()
export class ResolverClient {
  constructor(@Inject(GATEWAY_CONFIG) private readonly config: Readonly<GatewayEnv>) {}

  get baseUrl(): string {
    return this.config.resolverUrl;
  }

  async getTime(input: GetTimeRequest): Promise<TimeResponse> {
    const url = this.timeUrl(input.timezone);
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.resolverTimeoutMs);
    const onCallerAbort = () => controller.abort();
    if (input.signal?.aborted) controller.abort();
    input.signal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      let raw: string;
      try {
        const response = await fetch(url, {
          method: "GET",
          headers: { accept: "application/json", [REQUEST_ID_HEADER]: input.requestId },
          signal: controller.signal,
        });
        if (!response.ok) {
          await response.body?.cancel();
          throw new ResolverCallError("bad_status", `Resolver returned status ${response.status}`, response.status);
        }
        raw = await response.text();
      } catch (err) {
        if (err instanceof ResolverCallError) throw err;
        throw this.transportError(err, timedOut, controller.signal.aborted);
      }
      return this.parse(raw);
    } finally {
      clearTimeout(timer);
      input.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private timeUrl(timezone?: string): URL {
    let url: URL;
    try {
      url = new URL(`${this.config.resolverUrl}/time`);
    } catch (err) {
      throw new ResolverCallError("unreachable", `Invalid resolver URL "${this.config.resolverUrl}"`, undefined, { cause: err });
    }
    if (timezone !== undefined) url.searchParams.set("timezone", timezone);
    return url;
  }

  private transportError(err: unknown, timedOut: boolean, aborted: boolean): ResolverCallError {
    if (timedOut) {
      return new ResolverCallError("timeout", `Resolver did not answer within ${this.config.resolverTimeoutMs}ms`, undefined, { cause: err });
    }
    if (aborted) {
      return new ResolverCallError("cancelled", "Client went away before the resolver answered", undefined, { cause: err });
    }
    const reason = err instanceof Error ? err.message : String(err);
    return new ResolverCallError("unreachable", `Failed to connect to resolver: ${reason}`, undefined, { cause: err });
  }

  private parse(raw: string): TimeResponse {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ResolverCallError("bad_payload", "Resolver response is not valid JSON", undefined, { cause: err });
    }
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new ResolverCallError("bad_payload", "Resolver response is not a JSON object");
    }

    const dto = plainToInstance(TimeResponseDto, parsed);
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const fields = errors.map((error) => error.property).join(", ");
      throw new ResolverCallError("bad_payload", `Resolver response failed validation: ${fields}`);
    }

    return {
      timestamp: dto.timestamp,
      timezone: dto.timezone,
      request_id: dto.request_id,
      source: dto.source,
    };
  }
}
