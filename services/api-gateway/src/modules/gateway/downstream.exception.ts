import { HttpException, HttpStatus } from "@nestjs/common";
import { DownstreamErrorBody, DownstreamErrorCode } from "@time-relay/types";
import { ResolverCallError, ResolverCallErrorKind } from "./resolver-client.service";

const MAPPING: Record<ResolverCallErrorKind, { status: HttpStatus; code: DownstreamErrorCode }> = {
  unreachable: { status: HttpStatus.SERVICE_UNAVAILABLE, code: "DOWNSTREAM_UNAVAILABLE" },
  cancelled: { status: HttpStatus.SERVICE_UNAVAILABLE, code: "DOWNSTREAM_UNAVAILABLE" },
  timeout: { status: HttpStatus.GATEWAY_TIMEOUT, code: "DOWNSTREAM_TIMEOUT" },
  bad_status: { status: HttpStatus.BAD_GATEWAY, code: "DOWNSTREAM_BAD_STATUS" },
  bad_payload: { status: HttpStatus.BAD_GATEWAY, code: "DOWNSTREAM_BAD_RESPONSE" },
};

export class DownstreamException extends HttpException {
  constructor(readonly body: DownstreamErrorBody, status: HttpStatus) {
    super(body, status);
  }

  static fromCallError(err: ResolverCallError, requestId: string, now = new Date()): DownstreamException {
    const { status, code } = MAPPING[err.kind];
    const body: DownstreamErrorBody = {
      error: code,
      message: err.message,
      request_id: requestId,
      timestamp: now.toISOString(),
    };
    if (err.upstreamStatus !== undefined) body.upstream_status = err.upstreamStatus;
    return new DownstreamException(body, status);
  }
}
