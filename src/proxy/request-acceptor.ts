import { logger } from "../logger";
import type { OutboundRequest, RouterApi } from "../upstream";
import type { CapabilityValidator } from "./capability-validator";
import type { InboundRequest } from "./protocol";
import { validateTranslatedRequest, type RequestTranslator } from "./request-translator";

export type AcceptOutcome =
  | { accepted: true; request: OutboundRequest }
  | { accepted: false; reason: "capability" | "invalid_request"; message: string };

export type DispatchOutcome =
  | { kind: "rejected"; reason: "capability" | "invalid_request"; message: string }
  | {
      kind: "upstream-error";
      request: OutboundRequest;
      status?: number;
      message: string;
      body?: string;
    }
  | { kind: "forwarded"; request: OutboundRequest; response: Response };

/**
 * Inspect, validate, translate, then forward. Rejections are produced before any
 * network call.
 */
export class RequestAcceptor {
  constructor(
    private readonly validator: CapabilityValidator,
    private readonly translator: RequestTranslator,
    private readonly upstream: Pick<RouterApi, "sendChatCompletion">,
  ) {}

  accept(inbound: InboundRequest, requestId: string): AcceptOutcome {
    const validation = this.validator.validate(inbound, requestId);
    if (!validation.valid) {
      return { accepted: false, reason: "capability", message: validation.message };
    }

    const request = this.translator.translate(inbound);
    const check = validateTranslatedRequest(request);
    if (!check.valid) {
      logger.info({ requestId, reason: check.reason }, "Rejected invalid request");
      return { accepted: false, reason: "invalid_request", message: check.reason };
    }
    return { accepted: true, request };
  }

  async dispatch(
    inbound: InboundRequest,
    credential: string,
    requestId: string,
  ): Promise<DispatchOutcome> {
    const outcome = this.accept(inbound, requestId);
    if (!outcome.accepted) {
      return { kind: "rejected", reason: outcome.reason, message: outcome.message };
    }

    const { request } = outcome;
    const result = await this.upstream.sendChatCompletion(request, credential);
    if (!result.ok) {
      return {
        kind: "upstream-error",
        request,
        status: result.status,
        message: result.message,
        body: result.body,
      };
    }
    return { kind: "forwarded", request, response: result.data };
  }
}
