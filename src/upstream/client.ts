import type { z } from "zod";
import type { BridgeSettings } from "../config";
import { logger } from "../logger";
import type {
  ApiResult,
  CreatedCredential,
  ModelCapabilities,
  OutboundRequest,
  RemoteCredentialSummary,
  RouterApi,
} from "./types";
import {
  CredentialCreateResponseSchema,
  CredentialDeleteResponseSchema,
  CredentialListResponseSchema,
  ModelListResponseSchema,
  UpstreamErrorBodySchema,
  type CredentialSummaryPayload,
  type ModelEntryPayload,
} from "./schemas";

export type UpstreamOptions = BridgeSettings["upstream"];

export const PROVISIONING_KEY_MISSING = "Provisioning key is not configured";

type Failure = Extract<ApiResult<never>, { ok: false }>;

function toSummary(payload: CredentialSummaryPayload): RemoteCredentialSummary {
  return {
    remoteId: payload.hash,
    name: payload.name,
    label: payload.label,
    limit: payload.limit ?? null,
    usage: payload.usage ?? 0,
    disabled: payload.disabled ?? false,
    createdAt: payload.created_at,
    updatedAt: payload.updated_at ?? null,
  };
}

function toCapabilities(entry: ModelEntryPayload): ModelCapabilities {
  return {
    modelId: entry.id,
    name: entry.name ?? entry.id,
    inputModalities: entry.architecture?.input_modalities ?? ["text"],
    contextLength: entry.context_length ?? undefined,
  };
}

export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Pulls `error.message` out of an upstream error body, falling back to the raw text. */
export function extractErrorMessage(body: string): string | undefined {
  const parsed = UpstreamErrorBodySchema.safeParse(parseJson(body));
  if (parsed.success && parsed.data.error.message) {
    return parsed.data.error.message;
  }
  const trimmed = body.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export class RouterApiClient implements RouterApi {
  constructor(private readonly options: UpstreamOptions) {}

  get hasProvisioningKey(): boolean {
    return Boolean(this.options.provisioningKey);
  }

  async listCredentials(): Promise<ApiResult<RemoteCredentialSummary[]>> {
    const result = await this.requestJson("listCredentials", "GET", "/keys", {
      credential: this.options.provisioningKey,
      schema: CredentialListResponseSchema,
    });
    if (!result.ok) {
      return result;
    }
    return { ok: true, status: result.status, data: result.data.data.map(toSummary) };
  }

  async createCredential(name: string, limit?: number): Promise<ApiResult<CreatedCredential>> {
    const result = await this.requestJson("createCredential", "POST", "/keys", {
      credential: this.options.provisioningKey,
      body: limit === undefined ? { name } : { name, limit },
      schema: CredentialCreateResponseSchema,
    });
    if (!result.ok) {
      return result;
    }
    const summary = toSummary(result.data.data);
    return {
      ok: true,
      status: result.status,
      data: { value: result.data.key, remoteId: summary.remoteId, summary },
    };
  }

  async deleteCredential(remoteId: string): Promise<ApiResult<{ deleted: boolean }>> {
    return this.requestJson(
      "deleteCredential",
      "DELETE",
      `/keys/${encodeURIComponent(remoteId)}`,
      {
        credential: this.options.provisioningKey,
        schema: CredentialDeleteResponseSchema,
      },
    );
  }

  async listModels(): Promise<ApiResult<ModelCapabilities[]>> {
    const result = await this.requestJson("listModels", "GET", "/models", {
      schema: ModelListResponseSchema,
      requireCredential: false,
    });
    if (!result.ok) {
      return result;
    }
    return { ok: true, status: result.status, data: result.data.data.map(toCapabilities) };
  }

  /**
   * Forwards a translated request. The body is left unread on success so callers
   * can pipe streamed and buffered responses alike.
   */
  async sendChatCompletion(
    request: OutboundRequest,
    credential: string,
  ): Promise<ApiResult<Response>> {
    const sent = await this.send("sendChatCompletion", "POST", "/chat/completions", {
      credential,
      body: request,
    });
    if (!sent.ok) {
      return sent;
    }
    const response = sent.data;
    if (!response.ok) {
      return this.failFromResponse("sendChatCompletion", response);
    }
    return sent;
  }

  private buildHeaders(credential: string | undefined, hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {};
    if (credential) {
      headers.Authorization = `Bearer ${credential}`;
    }
    if (hasBody) {
      headers["Content-Type"] = "application/json";
    }
    if (this.options.appUrl) {
      headers["HTTP-Referer"] = this.options.appUrl;
    }
    if (this.options.appName) {
      headers["X-Title"] = this.options.appName;
    }
    return headers;
  }

  private async send(
    operation: string,
    method: string,
    path: string,
    params: { credential?: string; body?: unknown },
  ): Promise<ApiResult<Response>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    try {
      const response = await fetch(`${this.options.baseUrl}${path}`, {
        method,
        headers: this.buildHeaders(params.credential, params.body !== undefined),
        body: params.body === undefined ? undefined : JSON.stringify(params.body),
        signal: controller.signal,
      });
      return { ok: true, status: response.status, data: response };
    } catch (error) {
      const message = controller.signal.aborted
        ? `Request timed out after ${this.options.timeoutMs}ms`
        : `Network error: ${error instanceof Error ? error.message : String(error)}`;
      logger.warn({ operation, path, error: message }, "Upstream request failed");
      return { ok: false, message, cause: error };
    } finally {
      clearTimeout(timeout);
    }
  }

  private async failFromResponse(operation: string, response: Response): Promise<Failure> {
    let body = "";
    try {
      body = await response.text();
    } catch (error) {
      logger.debug({ operation, error }, "Failed to read upstream error body");
    }
    const message = extractErrorMessage(body) ?? `HTTP ${response.status}`;
    logger.warn({ operation, status: response.status, error: message }, "Upstream returned an error");
    return { ok: false, status: response.status, message, body };
  }

  private async requestJson<S extends z.ZodType>(
    operation: string,
    method: string,
    path: string,
    params: { schema: S; credential?: string; body?: unknown; requireCredential?: boolean },
  ): Promise<ApiResult<z.output<S>>> {
    if (params.requireCredential !== false && !params.credential) {
      return { ok: false, message: PROVISIONING_KEY_MISSING };
    }
    const sent = await this.send(operation, method, path, params);
    if (!sent.ok) {
      return sent;
    }
    const response = sent.data;
    if (!response.ok) {
      return this.failFromResponse(operation, response);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      logger.warn({ operation, status: response.status }, "Upstream returned malformed JSON");
      return { ok: false, status: response.status, message: "Malformed JSON response", cause: error };
    }

    const parsed = params.schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "invalid";
      logger.warn({ operation, detail }, "Upstream response did not match expected shape");
      return {
        ok: false,
        status: response.status,
        message: `Unexpected response shape (${detail})`,
        cause: parsed.error,
      };
    }
    return { ok: true, status: response.status, data: parsed.data };
  }
}
