import { CallHandler, ExecutionContext, HttpException, Injectable, Logger, NestInterceptor } from "@nestjs/common";
import { FastifyReply, FastifyRequest } from "fastify";
import { Observable } from "rxjs";
import { finalize, tap } from "rxjs/operators";

@Injectable()
export class RequestTraceInterceptor implements NestInterceptor {
  private readonly logger = new Logger("HTTP");

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== "http") return next.handle();
    const req = context.switchToHttp().getRequest<FastifyRequest>();
    const reply = context.switchToHttp().getResponse<FastifyReply>();
    const start = Date.now();
    let failedStatus: number | undefined;

    return next.handle().pipe(
      tap({
        error: (err: unknown) => {
          failedStatus = err instanceof HttpException ? err.getStatus() : 500;
        },
      }),
      finalize(() => {
        const route = (req.routeOptions.url || req.url).split("?")[0];
        const status = failedStatus ?? reply.statusCode;
        const requestId = reply.getHeader("x-request-id") ?? "-";
        this.logger.log(
          `${req.method.toUpperCase()} ${route} ${status} ${Date.now() - start}ms request_id=${String(requestId)}`,
        );
      }),
    );
  }
}
