import { describe, expect, it } from "vitest";
import { DuplicateDetector, createRequestIdGenerator } from "./duplicate-detector";

describe("DuplicateDetector", () => {
  it("flags the same body from the same peer within the window", () => {
    let clock = 0;
    const detector = new DuplicateDetector(1000, () => clock);

    expect(detector.check('{"model":"x"}', "127.0.0.1")).toBe(false);
    clock = 500;
    expect(detector.check('{"model":"x"}', "127.0.0.1")).toBe(true);
    expect(detector.check('{"model":"x"}', "10.0.0.2")).toBe(false);
    expect(detector.check('{"model":"y"}', "127.0.0.1")).toBe(false);
  });

  it("forgets bodies once the window has passed", () => {
    let clock = 0;
    const detector = new DuplicateDetector(1000, () => clock);

    detector.check("body", "127.0.0.1");
    clock = 1000;

    expect(detector.check("body", "127.0.0.1")).toBe(false);
  });
});

describe("createRequestIdGenerator", () => {
  it("produces zero-padded sequential ids per generator", () => {
    const next = createRequestIdGenerator();

    expect([next(), next(), next()]).toEqual(["000001", "000002", "000003"]);
    expect(createRequestIdGenerator()()).toBe("000001");
  });
});
