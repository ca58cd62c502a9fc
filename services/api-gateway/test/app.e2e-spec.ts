import { createServer, IncomingMessage, request, Server, ServerResponse } from "http";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";
import { Test } from "@nestjs/testing";
import { configureApp } from "@time-relay/service-kit";
import { DownstreamErrorBody, HealthStatus, ServiceInfo, TimeResponse } from "@time-relay/types";
import { AppModule as ResolverAppModule } from "../../resolver-service/src/app.module";
import { TimeService } from "../../resolver-service/src/modules/time/time.service";
import { AppModule } from "../src/app.module";
import { GATEWAY_CONFIG, GatewayEnv } from "../src/config/env";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

function gatewayConfig(resolverUrl: string, resolverTimeoutMs = 2000): Readonly<GatewayEnv> {
  return { port: 0, serviceName: "api1", version: "1.0.0", resolverUrl, resolverTimeoutMs, logLevel: "error" };
}

async function createGateway(config: Readonly<GatewayEnv>): Promise<NestFastifyApplication> {
  const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
    .overrideProvider(GATEWAY_CONFIG)
    .useValue(config)
    .compile();
  const app = configureApp(
    moduleRef.createNestApplication<NestFastifyApplication>(new FastifyAdapter(), { logger: false }),
  );
  await app.init();
  await app.getHttpAdapter().getInstance().ready();
  return app;
}

async function createResolver(): Promise<NestFastifyApplication> {
  const moduleRef = await Test.createTestingModule({ imports: [ResolverAppModule] }).compile();
  const app = configureApp(
    moduleRef.createNestApplication<NestFastifyApplication>(new FastifyAdapter(), { logger: false }),
  );
  await app.listen(0, "127.0.0.1");
  return app;
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}

type StandIn = { url: string; close: () => Promise<void> };

async function startStandIn(handler: (req: IncomingMessage, res: ServerResponse) => void): Promise<StandIn> {
  const server: Server = createServer(handler);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("stand-in server has no TCP address");
  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

describe("api-gateway (e2e)", () => {
  describe("with a running resolver", () => {
    let resolver: NestFastifyApplication;
    let gateway: NestFastifyApplication;

    beforeAll(async () => {
      resolver = await createResolver();
      gateway = await createGateway(gatewayConfig(await resolver.getUrl()));
    });

    afterAll(async () => {
      await gateway.close();
      await resolver.close();
    });

    afterEach(() => {
      jest.restoreAllMocks();
    });

    it("GET / returns service info", async () => {
      const res = await gateway.inject({ method: "GET", url: "/" });
      expect(res.statusCode).toBe(200);
      expect(res.json<ServiceInfo>()).toEqual({ name: "api1", version: "1.0.0", description: "Time Service Gateway" });
    });

    it("GET /health reports healthy", async () => {
      const res = await gateway.inject({ method: "GET", url: "/health" });
      expect(res.statusCode).toBe(200);
      const body = res.json<HealthStatus>();
      expect(body.status).toBe("healthy");
      expect(body.service).toBe("api1");
      expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
    });

    it("relays EST and attributes the answer to both tiers", async () => {
      const viaGateway = await gateway.inject({ method: "GET", url: "/time?timezone=EST" });
      const direct = await resolver.inject({ method: "GET", url: "/time?timezone=EST" });

      expect(viaGateway.statusCode).toBe(200);
      expect(direct.statusCode).toBe(200);
      const relayed = viaGateway.json<TimeResponse>();
      const answered = direct.json<TimeResponse>();
      expect(relayed.source).toBe("api1->api2");
      expect(answered.source).toBe("api2");
      expect(relayed.timezone).toBe("EST");
      expect(answered.timezone).toBe("EST");
      expect(relayed.timestamp).toMatch(/-0[45]:00$/);
    });

    it("keeps the request id it minted across the hop", async () => {
      const timeService = resolver.get(TimeService);
      const spy = jest.spyOn(timeService, "currentTime");

      const res = await gateway.inject({ method: "GET", url: "/time?timezone=CET" });
      const body = res.json<TimeResponse>();

      expect(body.request_id).toMatch(UUID);
      expect(res.headers["x-request-id"]).toBe(body.request_id);
      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy.mock.calls[0][0]).toEqual({
        timezone: "CET",
        requestIdHeader: body.request_id,
        requestIdQuery: undefined,
      });
    });

    it("mints a fresh request id per request", async () => {
      const first = await gateway.inject({ method: "GET", url: "/time" });
      const second = await gateway.inject({ method: "GET", url: "/time" });
      expect(first.json<TimeResponse>().request_id).not.toBe(second.json<TimeResponse>().request_id);
    });

    it("passes an unrecognized timezone through and gets UTC", async () => {
      const res = await gateway.inject({ method: "GET", url: "/time?timezone=INVALID" });
      expect(res.statusCode).toBe(200);
      const body = res.json<TimeResponse>();
      expect(body.timezone).toBe("INVALID");
      expect(body.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });

    it("defaults an omitted timezone to UTC", async () => {
      const res = await gateway.inject({ method: "GET", url: "/time" });
      expect(res.json<TimeResponse>().timezone).toBe("UTC");
    });
  });

  describe("when the resolver is unreachable", () => {
    let gateway: NestFastifyApplication;

    beforeAll(async () => {
      const standIn = await startStandIn((_req, res) => res.end());
      const closedUrl = standIn.url;
      await standIn.close();
      gateway = await createGateway(gatewayConfig(closedUrl, 1000));
    });

    afterAll(async () => {
      await gateway.close();
    });

    it("fails with 503 and the request id", async () => {
      const res = await gateway.inject({ method: "GET", url: "/time?timezone=EST" });
      expect(res.statusCode).toBe(503);
      const body = res.json<DownstreamErrorBody & { source?: string }>();
      expect(body.error).toBe("DOWNSTREAM_UNAVAILABLE");
      expect(body.request_id).toBe(res.headers["x-request-id"]);
      expect(body.source).toBeUndefined();
    });

    it("keeps reporting healthy", async () => {
      const res = await gateway.inject({ method: "GET", url: "/health" });
      expect(res.statusCode).toBe(200);
      expect(res.json<HealthStatus>().status).toBe("healthy");
    });
  });

  describe("when the resolver hangs", () => {
    let standIn: StandIn;
    let gateway: NestFastifyApplication;

    beforeAll(async () => {
      standIn = await startStandIn(() => undefined);
      gateway = await createGateway(gatewayConfig(standIn.url, 200));
    });

    afterAll(async () => {
      await gateway.close();
      await standIn.close();
    });

    it("fails with 504 within the timeout bound", async () => {
      const started = Date.now();
      const res = await gateway.inject({ method: "GET", url: "/time?timezone=PST" });
      expect(res.statusCode).toBe(504);
      expect(res.json<DownstreamErrorBody>().error).toBe("DOWNSTREAM_TIMEOUT");
      expect(Date.now() - started).toBeLessThan(2000);
    });
  });

  describe("when the resolver misbehaves", () => {
    let standIn: StandIn;
    let gateway: NestFastifyApplication;
    let reply: { status: number; body: string } = { status: 200, body: "{}" };

    beforeAll(async () => {
      standIn = await startStandIn((_req, res) => {
        res.writeHead(reply.status, { "content-type": "application/json" });
        res.end(reply.body);
      });
      gateway = await createGateway(gatewayConfig(standIn.url, 1000));
    });

    afterAll(async () => {
      await gateway.close();
      await standIn.close();
    });

    it("maps an error status to 502 with the upstream status", async () => {
      reply = { status: 500, body: JSON.stringify({ error: "internal" }) };
      const res = await gateway.inject({ method: "GET", url: "/time" });
      expect(res.statusCode).toBe(502);
      const body = res.json<DownstreamErrorBody>();
      expect(body.error).toBe("DOWNSTREAM_BAD_STATUS");
      expect(body.upstream_status).toBe(500);
    });

    it("maps a malformed body to 502", async () => {
      reply = { status: 200, body: JSON.stringify({ timestamp: "soon" }) };
      const res = await gateway.inject({ method: "GET", url: "/time" });
      expect(res.statusCode).toBe(502);
      expect(res.json<DownstreamErrorBody>().error).toBe("DOWNSTREAM_BAD_RESPONSE");
    });
  });

  describe("when the client disconnects", () => {
    const resolverTimeoutMs = 10_000;
    const arrived = deferred<void>();
    const upstreamClosed = deferred<number>();
    let standIn: StandIn;
    let gateway: NestFastifyApplication;

    beforeAll(async () => {
      standIn = await startStandIn((req) => {
        req.socket.once("close", () => upstreamClosed.resolve(Date.now()));
        arrived.resolve();
      });
      gateway = await createGateway(gatewayConfig(standIn.url, resolverTimeoutMs));
      await gateway.listen(0, "127.0.0.1");
    });

    afterAll(async () => {
      await gateway.close();
      await standIn.close();
    });

    it("abandons the downstream call long before the timeout", async () => {
      const client = request(`${await gateway.getUrl()}/time?timezone=EST`);
      // destroy() surfaces as "socket hang up" on the client side
      client.on("error", () => undefined);
      client.end();

      await arrived.promise;
      const disconnectedAt = Date.now();
      client.destroy();

      const closedAt = await upstreamClosed.promise;
      expect(closedAt - disconnectedAt).toBeLessThan(1000);
    });
  });
});
