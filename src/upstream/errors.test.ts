import { describe, expect, it } from "vitest";
import { describeUpstreamError, detectUnsupportedModality, isFreeTierEnded } from "./errors";

function errorBody(message: string): string {
  return JSON.stringify({ error: { message } });
}

describe("describeUpstreamError", () => {
  it("renders a capability message when no endpoint supports image input", () => {
    const message = describeUpstreamError(
      404,
      errorBody("No endpoints found that support image input"),
    );

    expect(message).toBe(
      [
        "This model doesn't support image input.",
        "Try a vision-capable model like:",
        "- openai/gpt-4o",
        "- openai/gpt-4o-mini",
        "- anthropic/claude-4.5-sonnet",
        "- google/gemini-2.5-pro",
        "",
        "Check model capabilities: https://openrouter.ai/models",
      ].join("\n"),
    );
  });

  it("names the unavailable model when no endpoints exist for it", () => {
    const message = describeUpstreamError(500, errorBody("No endpoints found for vendor/retired."));

    expect(message).toBe(
      [
        "Model Unavailable: vendor/retired",
        "",
        "This model is currently unavailable. Try:",
        "- openai/gpt-4o-mini (fast, affordable)",
        "- anthropic/claude-3.5-sonnet (high quality)",
        "- google/gemini-pro-1.5 (large context)",
        "",
        "Check model status: https://openrouter.ai/models",
      ].join("\n"),
    );
  });

  it("explains an ended free tier and names the paid slug", () => {
    const message = describeUpstreamError(
      404,
      "The free period has ended. Please migrate to the paid slug: vendor/model-pro",
    );

    expect(message).toContain("Free Tier Ended");
    expect(message).toContain("switch to the paid version: `vendor/model-pro`");
  });

  it("only treats capability patterns as capability errors on 404", () => {
    expect(describeUpstreamError(404, errorBody("Model does not support audio input"))).toMatch(
      /^This model doesn't support audio input\./,
    );
    expect(describeUpstreamError(400, errorBody("Model does not support audio input"))).toBe(
      "Model does not support audio input",
    );
  });

  it("maps well-known statuses to actionable text", () => {
    expect(describeUpstreamError(401, errorBody("User not found"))).toBe(
      "Authentication failed: User not found",
    );
    expect(describeUpstreamError(401, "")).toBe(
      "Authentication failed. Please check your API key.",
    );
    expect(describeUpstreamError(402, errorBody("Balance too low"))).toBe(
      "Insufficient credits: Balance too low",
    );
    expect(describeUpstreamError(429, errorBody("Too many requests"))).toBe(
      "Rate limit exceeded. Please wait a moment and try again.",
    );
    expect(describeUpstreamError(429, errorBody("Rate limited on free model"))).toBe(
      "Rate limit exceeded. Please wait a moment and try again.\n\nTip: Free tier models have lower rate limits. Consider using a paid model for higher limits.",
    );
    expect(describeUpstreamError(418, "")).toBe("Request failed (HTTP 418). Please try again.");
  });

  it("includes details in server error messages", () => {
    expect(describeUpstreamError(502, errorBody("Provider returned error"))).toBe(
      [
        "Upstream server error (HTTP 502).",
        "",
        "Details: Provider returned error",
        "",
        "This is usually a temporary issue. Please try again in a moment.",
        "If the problem persists, check the status page: https://status.openrouter.ai",
      ].join("\n"),
    );
  });
});

describe("detectUnsupportedModality", () => {
  it("checks image, audio, video, then file patterns", () => {
    expect(detectUnsupportedModality("video not supported, pdf not supported")).toBe("video");
    expect(detectUnsupportedModality("This endpoint does not SUPPORT PDF")).toBe("file");
    expect(detectUnsupportedModality("plain failure")).toBeNull();
  });
});

describe("isFreeTierEnded", () => {
  it("requires the word free together with an ended-period hint", () => {
    expect(isFreeTierEnded("free period has ended")).toBe(true);
    expect(isFreeTierEnded("period has ended")).toBe(false);
  });
});
