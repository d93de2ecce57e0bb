import { describe, expect, it } from "vitest";
import { classify, modalityOfPart } from "./content-inspector";
import type { InboundMessage } from "./protocol";

const mixed: InboundMessage[] = [
  { role: "system", content: "You are helpful." },
  {
    role: "user",
    content: [
      { type: "text", text: "What is in these?" },
      { type: "image_url", image_url: { url: "data:image/png;base64,AAAA" } },
      { type: "input_audio", input_audio: { data: "AAAA", format: "wav" } },
    ],
  },
  { role: "user", content: [{ type: "document", filename: "report.pdf", file_data: "AAAA" }] },
];

describe("classify", () => {
  it("ignores plain string content", () => {
    expect(classify([{ role: "user", content: "hi" }])).toEqual(new Set());
  });

  it("collects each modality once across messages", () => {
    expect(classify(mixed)).toEqual(new Set(["image", "audio", "file"]));
  });

  it("returns the same set regardless of message order or repetition", () => {
    const reversed = [...mixed].reverse();

    expect(classify(reversed)).toEqual(classify(mixed));
    expect(classify(mixed)).toEqual(classify(mixed));
  });

  it("ignores unknown part kinds", () => {
    expect(
      classify([{ role: "user", content: [{ type: "hologram", payload: "x" }, { type: "text" }] }]),
    ).toEqual(new Set());
  });

  it("skips parts without a string type tag", () => {
    expect(
      classify([
        {
          role: "user",
          content: [{ text: "no tag" }, "loose string", null, 42, { type: 7 }, { type: "video_url" }],
        },
      ]),
    ).toEqual(new Set(["video"]));
  });
});

describe("modalityOfPart", () => {
  it("maps every known part tag", () => {
    expect(modalityOfPart("image_url")).toBe("image");
    expect(modalityOfPart("audio")).toBe("audio");
    expect(modalityOfPart("video_url")).toBe("video");
    expect(modalityOfPart("video")).toBe("video");
    expect(modalityOfPart("file")).toBe("file");
    expect(modalityOfPart("toString")).toBeUndefined();
  });
});
