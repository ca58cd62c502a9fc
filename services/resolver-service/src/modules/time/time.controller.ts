import { Controller, Get, Headers, Query, Res } from "@nestjs/common";
import { TimeResponse } from "@time-relay/types";
import { FastifyReply } from "fastify";
import { TimeQueryDto } from "./dto/time-query.dto";
import { REQUEST_ID_HEADER } from "./request-id";
import { TimeService } from "./time.service";

@Controller("time")
export class TimeController {
  constructor(private readonly time: TimeService) {}

  @Get()
  getTime(
    @Query() query: TimeQueryDto,
    @Headers(REQUEST_ID_HEADER) requestIdHeader: string | undefined,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): TimeResponse {
    const response = this.time.currentTime({
      timezone: query.timezone,
      requestIdHeader,
      requestIdQuery: query.request_id,
    });
    reply.header(REQUEST_ID_HEADER, response.request_id);
    return response;
  }
}
