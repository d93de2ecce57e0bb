import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import type { ModelCapabilityIndex } from "../catalog";
import type { BridgeSettings } from "../config";
import type { CredentialStore } from "../credentials";
import { logger } from "../logger";
import { describeUpstreamError, parseJson } from "../upstream";
import { DuplicateDetector, createRequestIdGenerator } from "./duplicate-detector";
import { parseInboundRequest } from "./protocol";
import type { RequestAcceptor } from "./request-acceptor";

export type ProxyOptions = BridgeSettings["proxy"];

export interface BridgeServerDeps {
  acceptor: RequestAcceptor;
  credentials: Pick<CredentialStore, "get">;
  capabilities: Pick<ModelCapabilityIndex, "refresh" | "list">;
  favorites: { list(): string[] };
  options: ProxyOptions;
}

type ErrorBody = {
  error: { message: string; type: string; code: string | number; param?: string };
};

const NETWORK_ERROR_MESSAGE = "Network error, please try again";

function waitForDrain(res: ServerResponse): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      res.off("drain", done);
      res.off("close", done);
      resolve();
    };
    res.once("drain", done);
    res.once("close", done);
  });
}

/** Local OpenAI-compatible endpoint the IDE talks to. */
export class BridgeServer {
  private server: ReturnType<typeof createServer> | null = null;
  private readonly duplicates = new DuplicateDetector();
  private readonly nextRequestId = createRequestIdGenerator();

  constructor(private readonly deps: BridgeServerDeps) {}

  get isRunning(): boolean {
    return this.server !== null;
  }

  getPort(): number | undefined {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : undefined;
  }

  async start(): Promise<void> {
    if (this.server) {
      return;
    }
    const { host, port } = this.deps.options;

    const server = createServer(async (req, res) => {
      try {
        await this.handleRequest(req, res);
      } catch (error) {
        logger.warn({ err: error, url: req.url }, "Bridge request failed");
        if (!res.headersSent) {
          this.writeError(req, res, 500, "Internal server error", "server_error", 500);
        } else {
          res.end();
        }
      }
    });

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    this.server = server;
    logger.info({ host, port: this.getPort() }, "Bridge server listening");
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
    logger.info("Bridge server stopped");
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", "http://localhost");

    if (method === "OPTIONS") {
      this.writeCorsHeaders(req, res);
      res.statusCode = 204;
      res.end();
      return;
    }

    if (method === "POST" && url.pathname === "/v1/chat/completions") {
      await this.handleChatCompletion(req, res);
      return;
    }

    if (method === "GET" && url.pathname === "/v1/models") {
      await this.handleModels(req, res);
      return;
    }

    if (method === "GET" && url.pathname === "/health") {
      const credential = await this.deps.credentials.get();
      this.writeJson(req, res, 200, {
        status: "ok",
        credential: credential ? "present" : "missing",
      });
      return;
    }

    this.writeError(
      req,
      res,
      404,
      `Unknown route: ${method} ${url.pathname}`,
      "invalid_request_error",
      "not_found",
    );
  }

  private async handleChatCompletion(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const requestId = this.nextRequestId();
    const startedAt = Date.now();
    const raw = await this.readBody(req);

    if (this.duplicates.check(raw, req.socket.remoteAddress)) {
      logger.warn({ requestId }, "Duplicate chat request received within 1s");
    }

    const body = parseJson(raw);
    if (body === undefined) {
      this.writeError(req, res, 400, "Invalid JSON format", "invalid_request_error", "invalid_json");
      return;
    }
    const parsed = parseInboundRequest(body);
    if (!parsed.success) {
      this.writeError(req, res, 400, parsed.message, "invalid_request_error", "invalid_request");
      return;
    }
    const inbound = parsed.request;
    logger.info(
      {
        requestId,
        modelId: inbound.model,
        messages: inbound.messages.length,
        stream: inbound.stream ?? false,
      },
      "Chat completion request",
    );

    const credential = await this.deps.credentials.get();
    if (!credential) {
      this.writeError(
        req,
        res,
        401,
        "API key not configured. Run `credentials ensure` or set a key with `credentials set`.",
        "authentication_error",
        "api_key_missing",
      );
      return;
    }

    this.refreshCatalogInBackground(requestId);
    const outcome = await this.deps.acceptor.dispatch(inbound, credential, requestId);

    switch (outcome.kind) {
      case "rejected":
        if (outcome.reason === "capability") {
          this.writeJson(req, res, 400, {
            error: {
              message: outcome.message,
              type: "invalid_request_error",
              code: "model_capability_error",
              param: "model",
            },
          });
        } else {
          this.writeError(req, res, 400, outcome.message, "invalid_request_error", "invalid_request");
        }
        return;
      case "upstream-error": {
        if (outcome.status === undefined) {
          logger.warn({ requestId, error: outcome.message }, "Upstream unreachable");
          this.writeError(req, res, 503, NETWORK_ERROR_MESSAGE, "api_error", 503);
          return;
        }
        const message = describeUpstreamError(outcome.status, outcome.body ?? "");
        logger.warn({ requestId, status: outcome.status }, "Upstream rejected chat request");
        if (outcome.request.stream) {
          this.writeStreamedError(req, res, message, requestId);
        } else {
          this.writeError(req, res, outcome.status, message, "upstream_error", outcome.status);
        }
        return;
      }
      case "forwarded":
        await this.pipeResponse(req, res, outcome.response);
        logger.info(
          { requestId, status: outcome.response.status, durationMs: Date.now() - startedAt },
          "Chat completion forwarded",
        );
        return;
    }
  }

  /** Validation runs against the snapshot at hand; a stale one reads as a miss. */
  private refreshCatalogInBackground(requestId: string): void {
    this.deps.capabilities.refresh().catch((error: unknown) => {
      logger.warn({ err: error, requestId }, "Background catalog refresh failed");
    });
  }

  private async handleModels(req: IncomingMessage, res: ServerResponse): Promise<void> {
    await this.deps.capabilities.refresh();
    const favorites = this.deps.favorites.list();
    const ids =
      favorites.length > 0
        ? favorites
        : this.deps.capabilities.list().map((model) => model.modelId);
    const created = Math.floor(Date.now() / 1000);
    this.writeJson(req, res, 200, {
      object: "list",
      data: ids.map((id) => ({
        id,
        object: "model",
        created,
        owned_by: id.includes("/") ? id.slice(0, id.indexOf("/")) : "router",
      })),
    });
  }

  private async pipeResponse(
    req: IncomingMessage,
    res: ServerResponse,
    response: Response,
  ): Promise<void> {
    this.writeCorsHeaders(req, res);
    res.statusCode = response.status;
    res.setHeader("content-type", response.headers.get("content-type") ?? "application/json");
    if (response.headers.get("content-type")?.includes("text/event-stream")) {
      res.setHeader("cache-control", "no-cache");
      res.setHeader("connection", "keep-alive");
    }
    const reader = response.body?.getReader();
    if (!reader) {
      res.end();
      return;
    }

    let clientGone = false;
    const onClose = () => {
      clientGone = true;
      reader.cancel().catch((error: unknown) => {
        logger.debug({ err: error }, "Cancelling upstream body failed");
      });
    };
    res.once("close", onClose);
    try {
      while (!clientGone) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        if (!res.write(value)) {
          await waitForDrain(res);
        }
      }
    } finally {
      res.off("close", onClose);
      reader.releaseLock();
    }
    if (clientGone) {
      logger.info("Client disconnected; upstream body cancelled");
      return;
    }
    res.end();
  }

  private writeStreamedError(
    req: IncomingMessage,
    res: ServerResponse,
    message: string,
    requestId: string,
  ): void {
    this.writeCorsHeaders(req, res);
    res.statusCode = 200;
    res.setHeader("content-type", "text/event-stream");
    res.setHeader("cache-control", "no-cache");
    const chunk = {
      id: `chatcmpl-error-${requestId}`,
      object: "chat.completion.chunk",
      created: Math.floor(Date.now() / 1000),
      model: "error",
      choices: [
        { index: 0, delta: { role: "assistant", content: message }, finish_reason: "stop" },
      ],
    };
    res.write(`data: ${JSON.stringify(chunk)}\n\n`);
    res.end("data: [DONE]\n\n");
  }

  private async readBody(req: IncomingMessage): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks).toString("utf8");
  }

  private writeError(
    req: IncomingMessage,
    res: ServerResponse,
    statusCode: number,
    message: string,
    type: string,
    code: string | number,
  ): void {
    const body: ErrorBody = { error: { message, type, code } };
    this.writeJson(req, res, statusCode, body);
  }

  private writeJson(
    req: IncomingMessage,
    res: ServerResponse,
    statusCode: number,
    body: Record<string, unknown>,
  ): void {
    this.writeCorsHeaders(req, res);
    res.statusCode = statusCode;
    res.setHeader("content-type", "application/json; charset=utf-8");
    res.end(JSON.stringify(body));
  }

  private writeCorsHeaders(req: IncomingMessage, res: ServerResponse): void {
    const origin = req.headers.origin;
    const allowOrigins = this.deps.options.allowOrigins;
    if (allowOrigins.includes("*")) {
      res.setHeader("access-control-allow-origin", origin ?? "*");
    } else if (origin && allowOrigins.includes(origin)) {
      res.setHeader("access-control-allow-origin", origin);
    } else {
      return;
    }
    res.setHeader("vary", "Origin");
    res.setHeader("access-control-allow-headers", "Content-Type, Authorization");
    res.setHeader("access-control-allow-methods", "GET,POST,OPTIONS");
  }
}
