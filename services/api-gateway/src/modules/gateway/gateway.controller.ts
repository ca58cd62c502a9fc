import { Controller, Get, Query, Res } from "@nestjs/common";
import { TimeResponse } from "@time-relay/types";
import { randomUUID } from "crypto";
import { FastifyReply } from "fastify";
import { TimeQueryDto } from "./dto/time-query.dto";
import { REQUEST_ID_HEADER } from "./resolver-client.service";
import { TimeRelayService } from "./time-relay.service";

@Controller("time")
export class GatewayController {
  constructor(private readonly relay: TimeRelayService) {}

  @Get()
  async getTime(
    @Query() query: TimeQueryDto,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): Promise<TimeResponse> {
    const requestId = randomUUID();
    reply.header(REQUEST_ID_HEADER, requestId);

    // Abandon the downstream call if the client disconnects first.
    const disconnect = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableEnded) disconnect.abort();
    };
    reply.raw.once("close", onClose);

    try {
      const response = await this.relay.relay({ requestId, timezone: query.timezone, signal: disconnect.signal });
      reply.header(REQUEST_ID_HEADER, response.request_id);
      return response;
    } finally {
      reply.raw.off("close", onClose);
    }
  }
}
