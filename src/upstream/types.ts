export type ApiResult<T> =
  | { ok: true; data: T; status: number }
  | { ok: false; message: string; status?: number; body?: string; cause?: unknown };

/** Metadata the upstream exposes for a delegated credential. Never carries the secret. */
export interface RemoteCredentialSummary {
  remoteId: string;
  name: string;
  label: string;
  limit: number | null;
  usage: number;
  disabled: boolean;
  createdAt: string;
  updatedAt: string | null;
}

export interface CreatedCredential {
  value: string;
  remoteId: string;
  summary: RemoteCredentialSummary;
}

export interface ModelCapabilities {
  modelId: string;
  name: string;
  inputModalities: string[];
  contextLength?: number;
}

/** Content parts are forwarded as received; untagged or unknown parts included. */
export type OutboundContentPart = unknown;

export interface OutboundMessage {
  role: string;
  content: string | OutboundContentPart[];
  name?: string;
}

export interface OutboundRequest {
  model: string;
  messages: OutboundMessage[];
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  frequency_penalty?: number;
  presence_penalty?: number;
  stop?: string[];
  stream: boolean;
  user?: string;
}

/** The upstream calls the rest of the bridge depends on. */
export interface RouterApi {
  listCredentials(): Promise<ApiResult<RemoteCredentialSummary[]>>;
  createCredential(name: string, limit?: number): Promise<ApiResult<CreatedCredential>>;
  deleteCredential(remoteId: string): Promise<ApiResult<{ deleted: boolean }>>;
  listModels(): Promise<ApiResult<ModelCapabilities[]>>;
  sendChatCompletion(request: OutboundRequest, credential: string): Promise<ApiResult<Response>>;
}
