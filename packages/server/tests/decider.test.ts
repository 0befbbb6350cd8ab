import { describe, it, expect } from "vitest";
import sharp from "sharp";
import { decide, fitWithin, orientedSize, sampleTransparency } from "../src/lib/decider.js";
import { solidJpeg, solidPng, solidWebp, testPolicy } from "./helpers.js";

describe("fitWithin", () => {
  it("scales the longest edge down to the limit", () => {
    expect(fitWithin(4000, 3000, 3840)).toEqual({ width: 3840, height: 2880 });
    expect(fitWithin(3000, 4000, 3840)).toEqual({ width: 2880, height: 3840 });
  });

  it("never enlarges", () => {
    expect(fitWithin(100, 50, 3840)).toEqual({ width: 100, height: 50 });
  });

  it("keeps at least one pixel on the short edge", () => {
    expect(fitWithin(10000, 1, 3840)).toEqual({ width: 3840, height: 1 });
  });
});

describe("orientedSize", () => {
  it("swaps edges for rotated orientations", () => {
    expect(orientedSize({ width: 40, height: 20, orientation: 6 })).toEqual({ width: 20, height: 40 });
    expect(orientedSize({ width: 40, height: 20, orientation: 3 })).toEqual({ width: 40, height: 20 });
  });
});

describe("sampleTransparency", () => {
  it("treats undecodable input as transparent", async () => {
    expect(await sampleTransparency(Buffer.from("not an image"), 100)).toBe(true);
  });

  it("finds a transparent region on an otherwise opaque image", async () => {
    const canvas = await solidPng(40, 40, 0);
    const square = await solidPng(20, 20);
    const image = await sharp(canvas).composite([{ input: square, left: 0, top: 0 }]).png().toBuffer();
    expect(await sampleTransparency(image, 16)).toBe(true);
  });

  it("reports opaque pixels as opaque", async () => {
    expect(await sampleTransparency(await solidPng(30, 30), 16)).toBe(false);
  });
});

describe("decide", () => {
  it("passes small JPEGs through", async () => {
    const jpeg = await solidJpeg(40, 30);
    const decision = await decide(jpeg, "image/jpeg", testPolicy);
    expect(decision).toMatchObject({
      passThrough: true,
      needsResize: false,
      outputFormat: "jpeg",
      hasMeaningfulTransparency: false,
      sourceFormat: "jpeg",
      sourceWidth: 40,
      sourceHeight: 30,
      targetWidth: 40,
      targetHeight: 30,
      sourceBytes: jpeg.length,
    });
  });

  it("sends opaque RGBA PNGs to JPEG", async () => {
    const decision = await decide(await solidPng(20, 20), "image/png", testPolicy);
    expect(decision.hasMeaningfulTransparency).toBe(false);
    expect(decision.outputFormat).toBe("jpeg");
    expect(decision.sourceFormat).toBe("png");
  });

  it("keeps PNG for real transparency", async () => {
    const decision = await decide(await solidPng(20, 20, 0.5), "image/png", testPolicy);
    expect(decision.hasMeaningfulTransparency).toBe(true);
    expect(decision.outputFormat).toBe("png");
  });

  it("resizes oversized images", async () => {
    const decision = await decide(await solidJpeg(400, 200), "image/jpeg", { ...testPolicy, maxEdge: 100 });
    expect(decision).toMatchObject({
      passThrough: false,
      needsResize: true,
      targetWidth: 100,
      targetHeight: 50,
    });
  });

  it("re-encodes heavy files even when the dimensions fit", async () => {
    const decision = await decide(await solidJpeg(40, 30), "image/jpeg", { ...testPolicy, resizeThresholdBytes: 10 });
    expect(decision).toMatchObject({ passThrough: false, needsResize: true, targetWidth: 40, targetHeight: 30 });
  });

  it("never passes other containers through", async () => {
    const decision = await decide(await solidWebp(40, 30), "image/webp", testPolicy);
    expect(decision.sourceFormat).toBe("webp");
    expect(decision.passThrough).toBe(false);
    expect(decision.outputFormat).toBe("jpeg");
  });

  it("sniffs bytes behind a generic content type", async () => {
    const decision = await decide(await solidJpeg(10, 10), "application/octet-stream", testPolicy);
    expect(decision.sourceFormat).toBe("jpeg");
  });

  it("reports orientation-corrected dimensions", async () => {
    const rotated = await sharp(await solidJpeg(40, 20)).withMetadata({ orientation: 6 }).jpeg().toBuffer();
    const decision = await decide(rotated, "image/jpeg", testPolicy);
    expect(decision.sourceWidth).toBe(20);
    expect(decision.sourceHeight).toBe(40);
  });

  it("rejects non-images", async () => {
    await expect(decide(Buffer.from("hello"), "text/plain", testPolicy)).rejects.toMatchObject({
      code: "UnsupportedFormat",
    });
  });

  it("rejects bytes that claim to be an image but do not decode", async () => {
    await expect(decide(Buffer.from("definitely not a png"), "image/png", testPolicy)).rejects.toMatchObject({
      code: "UnsupportedFormat",
    });
  });
});
