import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { toDeviceIdentifier } from "../bluetooth/transport.ts";
import type { DiscoveryScanner } from "../discovery/scanner.ts";
import { httpLog, describeError } from "../logger.ts";
import { createCommand } from "../protocol/commands.ts";
import type { SessionRegistry } from "../session/registry.ts";
import { parseCommandRequest, parseDiscoverRequest, readJson } from "./body.ts";
import { HttpError, errorBody, statusFor } from "./http-error.ts";
import { Router, type RouteContext } from "./router.ts";

export interface GatewayServerInit {
  registry: SessionRegistry;
  scanner: DiscoveryScanner;
  /** Scan duration when a discover request names none */
  scanDurationMs: number;
}

function deviceId(context: RouteContext): string {
  const id = toDeviceIdentifier(context.params["id"] ?? "");
  if (!id) throw new HttpError(400, "BadRequest", "Missing device identifier");
  return id;
}

/**
 * The gateway's routes. Every device route goes through the registry, so a
 * request for an unknown device creates its session.
 */
export function createRouter({ registry, scanner, scanDurationMs }: GatewayServerInit): Router {
  return new Router()
    .add("GET", "/health", async () => ({
      body: { status: "ok", sessions: registry.size, scanning: scanner.scanning },
    }))
    .add("GET", "/devices", async () => ({ body: registry.list() }))
    .add("POST", "/discover", async ({ request }) => {
      const { durationMs } = await readJson(request, parseDiscoverRequest);
      const ids = await scanner.scan(durationMs ?? scanDurationMs);
      const found = new Set(ids);
      return { body: registry.list().filter((device) => found.has(device.id)) };
    })
    .add("GET", "/devices/:id/state", async (context) => {
      const session = registry.get(deviceId(context));
      return { body: await session.getState({ forceFresh: context.query.get("fresh") === "true" }) };
    })
    .add("GET", "/devices/:id/details", async (context) => {
      const session = registry.get(deviceId(context));
      return { body: await session.readDetails() };
    })
    .add("POST", "/devices/:id/commands", async (context) => {
      const id = deviceId(context);
      const { command, level } = await readJson(context.request, parseCommandRequest);
      const session = registry.get(id);
      await session.execute(createCommand(command, { level }));
      // The command's response refreshed the cache
      return { body: await session.getState() };
    })
    .add("DELETE", "/devices/:id/connection", async (context) => {
      const session = registry.get(deviceId(context));
      await session.close();
      return { body: { id: session.id, status: session.status } };
    });
}

function sendJson(response: ServerResponse, status: number, body: unknown): void {
  response.setHeader("Content-Type", "application/json");
  response.writeHead(status);
  response.end(JSON.stringify(body));
}

async function handle(router: Router, request: IncomingMessage, response: ServerResponse): Promise<void> {
  const method = request.method ?? "GET";
  const url = new URL(request.url ?? "/", "http://localhost");

  try {
    const { handler, params } = router.match(method, url.pathname);
    const result = await handler({ request, params, query: url.searchParams });
    const status = result.status ?? 200;
    sendJson(response, status, result.body);
    httpLog("%s %s -> %d", method, url.pathname, status);
  } catch (error) {
    const status = statusFor(error);
    httpLog("%s %s -> %d %s", method, url.pathname, status, describeError(error));
    if (response.headersSent) {
      response.end();
    } else {
      sendJson(response, status, errorBody(error));
    }
  }
}

/**
 * HTTP server for the gateway API. Not yet listening.
 */
export function createGatewayServer(init: GatewayServerInit): Server {
  const router = createRouter(init);
  return createServer((request, response) => {
    handle(router, request, response).catch((error: unknown) => {
      httpLog("response failed: %s", describeError(error));
      response.destroy();
    });
  });
}
