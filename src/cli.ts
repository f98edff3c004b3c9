import { NobleTransport } from "./bluetooth/noble-transport.ts";
import { loadConfig, sessionOptions } from "./config.ts";
import { DeviceDiscoveredEvent, DiscoveryScanner, ScanErrorEvent } from "./discovery/index.ts";
import { cliLog, describeError } from "./logger.ts";
import { createGatewayServer } from "./server/app.ts";
import { SessionRegistry } from "./session/registry.ts";

async function main(): Promise<void> {
  const config = loadConfig();
  const transport = await NobleTransport.create();
  const registry = new SessionRegistry({ transport, sessionOptions: sessionOptions(config) });
  const scanner = new DiscoveryScanner({ transport, registry });

  scanner.addEventListener("discovered", (event) => {
    if (event instanceof DeviceDiscoveredEvent) cliLog("found %s (%s)", event.device.id, event.device.name);
  });
  scanner.addEventListener("error", (event) => {
    if (event instanceof ScanErrorEvent) cliLog("discovery failed: %s", event.error.message);
  });

  const server = createGatewayServer({ registry, scanner, scanDurationMs: config.scanDurationMs });
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, config.host, () => {
      server.off("error", reject);
      resolve();
    });
  });
  const address = server.address();
  const port = typeof address === "object" && address ? address.port : config.port;
  console.log(`Gateway listening on http://${config.host}:${port}`);

  if (config.scanIntervalMs > 0) scanner.start(config.scanIntervalMs, config.scanDurationMs);
  registry.startEviction(config.evictionIntervalMs, config.idleTimeoutMs);

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    cliLog("%s received, shutting down", signal);

    scanner.stop();
    await registry.closeAll();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          console.error(`Shutdown failed: ${describeError(error)}`);
          process.exit(1);
        }
      );
    });
  }
}

main().catch((error: unknown) => {
  console.error(`Gateway failed to start: ${describeError(error)}`);
  process.exit(1);
});
