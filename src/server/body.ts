import type { IncomingMessage } from "node:http";
import Ajv, { type JTDParser, type JTDSchemaType } from "ajv/dist/jtd";
import { HttpError } from "./http-error.ts";

/** Largest request body accepted */
export const MAX_BODY_BYTES = 16 * 1024;

export interface DiscoverRequest {
  durationMs?: number;
}

export interface CommandRequest {
  command: string;
  level?: number;
}

const discoverSchema: JTDSchemaType<DiscoverRequest> = {
  optionalProperties: {
    durationMs: { type: "uint32" },
  },
};

const commandSchema: JTDSchemaType<CommandRequest> = {
  properties: {
    command: { type: "string" },
  },
  optionalProperties: {
    level: { type: "uint8" },
  },
};

const ajv = new Ajv();
export const parseDiscoverRequest = ajv.compileParser(discoverSchema);
export const parseCommandRequest = ajv.compileParser(commandSchema);

async function readText(request: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  // Drain oversized bodies so the error response can still be written
  for await (const chunk of request) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size <= MAX_BODY_BYTES) chunks.push(buffer);
  }
  if (size > MAX_BODY_BYTES) {
    throw new HttpError(413, "PayloadTooLarge", `Request body exceeds ${MAX_BODY_BYTES} bytes`);
  }
  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Reads and validates a JSON request body. An empty body is read as `{}`.
 *
 * @throws HttpError 400 if the body does not match the parser's schema
 */
export async function readJson<T>(request: IncomingMessage, parse: JTDParser<T>): Promise<T> {
  const text = (await readText(request)).trim() || "{}";
  const body = parse(text);
  if (body === undefined) {
    throw new HttpError(400, "BadRequest", `Invalid request body: ${parse.message ?? "malformed JSON"}`);
  }
  return body;
}
