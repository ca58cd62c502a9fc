import { TimeSource } from "@time-relay/types";
import { IsIn, IsISO8601, IsString, IsUUID } from "class-validator";

const TIME_SOURCES: TimeSource[] = ["api2", "api1->api2"];

/** Shape check for what the resolver sends back. */
export class TimeResponseDto {
  @IsISO8601({ strict: true })
  timestamp!: string;

  @IsString()
  timezone!: string;

  @IsUUID()
  request_id!: string;

  @IsIn(TIME_SOURCES)
  source!: TimeSource;
}
