import { TimeResponse } from "@time-relay/types";
import { Inject, Injectable, Logger } from "@nestjs/common";
import { CLOCK, Clock } from "@time-relay/service-kit";
import { decideRequestId } from "./request-id";
import { DEFAULT_ZONE, TIMEZONE_ALIASES, TimezoneAliasTable } from "./timezone-aliases";
import { formatInZone } from "./zoned-time";

export type ResolvedZone = {
  requested: string;
  zone: string;
  recognized: boolean;
};

type TimeRequest = {
  timezone?: string;
  requestIdHeader?: string;
  requestIdQuery?: string;
};

@Injectable()
export class TimeService {
  private readonly logger = new Logger(TimeService.name);

  constructor(
    @Inject(TIMEZONE_ALIASES) private readonly aliases: TimezoneAliasTable,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  resolveZone(timezone?: string): ResolvedZone {
    const requested = timezone ?? DEFAULT_ZONE;
    const zone = this.aliases.get(requested);
    if (zone) return { requested, zone, recognized: true };
    return { requested, zone: DEFAULT_ZONE, recognized: false };
  }

  currentTime(input: TimeRequest): TimeResponse {
    const { requestId, origin, rejected } = decideRequestId(input.requestIdHeader, input.requestIdQuery);
    if (rejected !== undefined) {
      this.logger.warn(`Ignoring malformed request id "${rejected}", minted ${requestId}`);
    }

    const resolved = this.resolveZone(input.timezone);
    this.logger.log(
      `Processing time request request_id=${requestId} (${origin}) timezone=${resolved.requested} zone=${resolved.zone}`,
    );
    if (!resolved.recognized) {
      this.logger.log(`Unsupported timezone "${resolved.requested}", defaulting to UTC request_id=${requestId}`);
    }

    const timestamp = formatInZone(this.clock.now(), resolved.zone);
    this.logger.debug(`Time request processed request_id=${requestId} timestamp=${timestamp}`);

    return {
      timestamp,
      timezone: resolved.requested,
      request_id: requestId,
      source: "api2",
    };
  }
}
