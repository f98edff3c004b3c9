import createDebug from "debug";

/** Root namespace; enable with DEBUG=prana-gateway:* */
export const log = createDebug("prana-gateway");

export const sessionLog = log.extend("session");
export const registryLog = log.extend("registry");
export const discoveryLog = log.extend("discovery");
export const httpLog = log.extend("http");
export const nobleLog = log.extend("noble");
export const cliLog = log.extend("cli");

/** Message of an unknown thrown value */
export function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
