/**
 * Oracle Callback Gateway
 *
 * HTTP surface through which the confidential-compute oracle hands results back
 * to a SettlementSystem. Bodies are validated with zod; the system itself checks
 * the attestation. A callback whose attestation does not verify still ends its
 * request (failed, refunds credited) and is answered 401 with that outcome in
 * `details`.
 *
 * Routes:
 * - GET  /health
 * - GET  /requests/pending
 * - POST /callbacks/bidding
 * - POST /callbacks/verification
 * - POST /callbacks/failure
 */

import http from "node:http";
import type { IncomingMessage, ServerResponse } from "node:http";
import {
  describeError,
  log as defaultLog,
  SettlementError,
  type CompletionOutcome,
  type ErrorKind,
  type Logger,
  type SettlementSystem,
} from "@cipherlicense/core";
import type { ZodType, ZodTypeDef } from "zod";
import { completionBodySchema, failureBodySchema } from "./schemas";

export interface CallbackServerOptions {
  system: SettlementSystem;
  port?: number; // 0 for random port
  host?: string;
  maxBodyBytes?: number;
  log?: Logger;
}

export interface CallbackServer {
  url: string;
  close(): Promise<void>;
}

export const STATUS_FOR_KIND: Record<ErrorKind, number> = {
  invalid_input: 400,
  attestation_invalid: 401,
  authorization: 403,
  invalid_state: 409,
  transfer_failure: 502,
};

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
  }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value)));
}

function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size <= limit) chunks.push(chunk);
    });
    req.on("end", () => {
      if (size > limit) {
        reject(new HttpError(413, `Request body exceeds ${limit} bytes`));
        return;
      }
      resolve(Buffer.concat(chunks).toString("utf8"));
    });
    req.on("error", reject);
  });
}

async function parseBody<T>(req: IncomingMessage, schema: ZodType<T, ZodTypeDef, unknown>, limit: number): Promise<T> {
  const raw = await readBody(req, limit);
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new HttpError(400, "Invalid JSON body");
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new HttpError(400, "Invalid request body", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`),
    });
  }
  return parsed.data;
}

export async function startCallbackServer(opts: CallbackServerOptions): Promise<CallbackServer> {
  const { system, port = 0, host = "127.0.0.1", maxBodyBytes = 64 * 1024 } = opts;
  const log = opts.log ?? defaultLog;

  async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const path = new URL(req.url ?? "/", `http://${host}`).pathname;

    if (req.method === "GET" && path === "/health") {
      sendJson(res, 200, {
        ok: true,
        trusted_signers: system.config.oracle_signers,
        pending_requests: system.listPendingRequests().length,
      });
      return;
    }

    if (req.method === "GET" && path === "/requests/pending") {
      const requests = system.listPendingRequests().map((request) => ({
        request_id: request.request_id,
        callback: request.callback,
        handles: request.handles,
        created_at_ms: request.created_at_ms,
      }));
      sendJson(res, 200, { requests });
      return;
    }

    let outcome: CompletionOutcome;
    if (req.method === "POST" && path === "/callbacks/bidding") {
      const body = await parseBody(req, completionBodySchema, maxBodyBytes);
      outcome = system.completeBidding(body.request_id, body.cleartexts, body.attestation);
    } else if (req.method === "POST" && path === "/callbacks/verification") {
      const body = await parseBody(req, completionBodySchema, maxBodyBytes);
      outcome = system.completeVerification(body.request_id, body.cleartexts, body.attestation);
    } else if (req.method === "POST" && path === "/callbacks/failure") {
      const body = await parseBody(req, failureBodySchema, maxBodyBytes);
      outcome = system.reportFailure(body.request_id, body.reason, body.attestation);
    } else if (path.startsWith("/callbacks/") && req.method !== "POST") {
      throw new HttpError(405, "Method not allowed");
    } else {
      throw new HttpError(404, "Not found");
    }

    if (outcome.status === "failed" && outcome.cause === "attestation_invalid") {
      throw new SettlementError("ATTESTATION_INVALID", outcome.reason ?? "Attestation did not verify", { ...outcome });
    }
    log("info", "Oracle callback applied", { path, ...outcome });
    sendJson(res, 200, outcome);
  }

  const server = http.createServer((req, res) => {
    route(req, res).catch((error: unknown) => {
      if (error instanceof SettlementError) {
        log("warn", "Oracle callback rejected", { code: error.code, message: error.message });
        sendJson(res, STATUS_FOR_KIND[error.kind], {
          error: error.message,
          code: error.code,
          kind: error.kind,
          ...(error.details ? { details: error.details } : {}),
        });
      } else if (error instanceof HttpError) {
        sendJson(res, error.status, { error: error.message, ...(error.details ? { details: error.details } : {}) });
      } else {
        log("error", "Callback gateway failure", { error: describeError(error) });
        sendJson(res, 500, { error: "Internal error" });
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    server.close();
    throw new Error("Callback server is not listening on a TCP port");
  }

  return {
    url: `http://${host}:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeIdleConnections();
      }),
  };
}
