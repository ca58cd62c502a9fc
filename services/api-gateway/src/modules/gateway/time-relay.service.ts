import { Injectable, Logger } from "@nestjs/common";
import { TimeResponse } from "@time-relay/types";
import { DownstreamException } from "./downstream.exception";
import { ResolverCallError, ResolverClient } from "./resolver-client.service";

type RelayRequest = {
  requestId: string;
  timezone?: string;
  signal?: AbortSignal;
};

@Injectable()
export class TimeRelayService {
  private readonly logger = new Logger(TimeRelayService.name);

  constructor(private readonly resolver: ResolverClient) {}

  async relay(input: RelayRequest): Promise<TimeResponse> {
    const { requestId } = input;
    const started = Date.now();
    this.logger.log(
      `Forwarding time request request_id=${requestId} timezone=${input.timezone ?? "(default)"} to ${this.resolver.baseUrl}`,
    );

    let upstream: TimeResponse;
    try {
      upstream = await this.resolver.getTime(input);
    } catch (err) {
      if (!(err instanceof ResolverCallError)) throw err;
      const elapsedMs = Date.now() - started;
      const detail = `request_id=${requestId} kind=${err.kind} elapsed=${elapsedMs}ms: ${err.message}`;
      if (err.kind === "cancelled") {
        this.logger.warn(`Resolver call abandoned ${detail}`);
      } else {
        this.logger.error(`Resolver call failed ${detail}`);
      }
      throw DownstreamException.fromCallError(err, requestId);
    }

    if (upstream.request_id !== requestId) {
      this.logger.warn(`Resolver answered request_id=${upstream.request_id} for forwarded request_id=${requestId}`);
    }
    this.logger.log(
      `Received resolver response request_id=${upstream.request_id} timestamp=${upstream.timestamp} elapsed=${Date.now() - started}ms`,
    );

    return {
      timestamp: upstream.timestamp,
      timezone: upstream.timezone,
      request_id: upstream.request_id,
      source: "api1->api2",
    };
  }
}
