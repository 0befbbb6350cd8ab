import { describe, it, expect, vi } from "vitest";
import sharp from "sharp";
import type { OutputFormat, ProcessingDecision } from "@mailpaste/core";
import {
  BaselineJpegEncoder,
  EncoderChain,
  SharpPngOptimizer,
  type Encoder,
} from "../src/lib/encoders.js";
import { sniffImageType } from "../src/lib/mime.js";
import { solidJpeg, solidPng, solidWebp } from "./helpers.js";

function decision(overrides: Partial<ProcessingDecision>): ProcessingDecision {
  return {
    passThrough: false,
    needsResize: false,
    targetWidth: 40,
    targetHeight: 30,
    hasMeaningfulTransparency: false,
    outputFormat: "jpeg",
    sourceFormat: "jpeg",
    sourceWidth: 40,
    sourceHeight: 30,
    sourceBytes: 1000,
    ...overrides,
  };
}

function fakeEncoder(
  name: string,
  format: OutputFormat,
  encode: (input: Buffer) => Promise<Buffer>,
  available = true,
) {
  return {
    name,
    format,
    probe: vi.fn(async () => available),
    encode: vi.fn(encode),
  } satisfies Encoder;
}

const fails = async (): Promise<Buffer> => {
  throw new Error("encoder crashed");
};

describe("EncoderChain.probe", () => {
  it("probes each encoder once", async () => {
    const jpeg = fakeEncoder("fake-jpeg", "jpeg", async () => Buffer.from("x"));
    const chain = new EncoderChain({ encoders: [jpeg] });
    await chain.probe();
    await chain.probe();
    expect(jpeg.probe).toHaveBeenCalledTimes(1);
  });

  it("groups available encoders by format", async () => {
    const chain = new EncoderChain({
      encoders: [
        fakeEncoder("a", "jpeg", fails, false),
        fakeEncoder("b", "jpeg", fails),
        fakeEncoder("c", "png", fails),
      ],
    });
    const available = await chain.probe();
    expect(available.jpeg.map((e) => e.name)).toEqual(["b"]);
    expect(available.png.map((e) => e.name)).toEqual(["c"]);
  });
});

describe("EncoderChain.encode", () => {
  it("keeps pass-through bytes untouched", async () => {
    const png = await solidPng(40, 30);
    const encoder = fakeEncoder("fake-jpeg", "jpeg", fails);
    const chain = new EncoderChain({ encoders: [encoder] });
    const out = await chain.encode(png, decision({ passThrough: true, sourceFormat: "png" }));
    expect(out.data).toBe(png);
    expect(out.mime).toBe("image/png");
    expect(out.width).toBe(40);
    expect(out.height).toBe(30);
    expect(encoder.encode).not.toHaveBeenCalled();
  });

  it("still rejects corrupt pass-through input", async () => {
    const chain = new EncoderChain({ encoders: [] });
    await expect(
      chain.encode(Buffer.from("not an image at all"), decision({ passThrough: true })),
    ).rejects.toMatchObject({ code: "EncodingFailed" });
  });

  it("skips unavailable encoders", async () => {
    const missing = fakeEncoder("missing", "jpeg", async () => Buffer.from("never"), false);
    const present = fakeEncoder("present", "jpeg", async () => Buffer.from("fake jpeg bytes"));
    const chain = new EncoderChain({ encoders: [missing, present] });
    const out = await chain.encode(await solidJpeg(40, 30), decision({}));
    expect(missing.encode).not.toHaveBeenCalled();
    expect(out.data.toString()).toBe("fake jpeg bytes");
    expect(out.mime).toBe("image/jpeg");
    // The fake output has no readable header, so the target size is reported.
    expect(out.width).toBe(40);
    expect(out.height).toBe(30);
  });

  it("falls back to the next JPEG encoder on failure", async () => {
    const first = fakeEncoder("first", "jpeg", fails);
    const second = fakeEncoder("second", "jpeg", async () => Buffer.from("second"));
    const chain = new EncoderChain({ encoders: [first, second] });
    const out = await chain.encode(await solidJpeg(40, 30), decision({}));
    expect(first.encode).toHaveBeenCalledTimes(1);
    expect(out.data.toString()).toBe("second");
  });

  it("treats empty output as a failure", async () => {
    const empty = fakeEncoder("empty", "jpeg", async () => Buffer.alloc(0));
    const real = new BaselineJpegEncoder(85);
    const chain = new EncoderChain({ encoders: [empty, real] });
    const out = await chain.encode(await solidPng(40, 30), decision({ sourceFormat: "png" }));
    expect(sniffImageType(out.data)).toBe("image/jpeg");
  });

  it("keeps the original bytes when every JPEG encoder fails", async () => {
    const jpeg = await solidJpeg(40, 30);
    const chain = new EncoderChain({ encoders: [fakeEncoder("broken", "jpeg", fails)] });
    const out = await chain.encode(jpeg, decision({}));
    expect(out.data).toBe(jpeg);
    expect(out.mime).toBe("image/jpeg");
  });

  it("reports upright dimensions for kept bytes with an EXIF rotation", async () => {
    const rotated = await sharp(await solidJpeg(40, 20)).withMetadata({ orientation: 6 }).jpeg().toBuffer();
    const chain = new EncoderChain({ encoders: [fakeEncoder("broken", "jpeg", fails)] });
    const out = await chain.encode(
      rotated,
      decision({ targetWidth: 20, targetHeight: 40, sourceWidth: 20, sourceHeight: 40 }),
    );
    expect(out.data).toBe(rotated);
    expect(out.width).toBe(20);
    expect(out.height).toBe(40);
  });

  it("falls back to the lossless intermediate for other containers", async () => {
    const webp = await solidWebp(40, 30);
    const chain = new EncoderChain({ encoders: [fakeEncoder("broken", "jpeg", fails)] });
    const out = await chain.encode(webp, decision({ sourceFormat: "webp" }));
    expect(out.mime).toBe("image/png");
    expect(sniffImageType(out.data)).toBe("image/png");
    expect(out.width).toBe(40);
  });

  it("uses a smaller optimizer result", async () => {
    const optimizer = fakeEncoder("tiny", "png", async () => Buffer.from("tiny"));
    const chain = new EncoderChain({ encoders: [optimizer] });
    const out = await chain.encode(await solidPng(40, 30, 0.5), decision({ outputFormat: "png", sourceFormat: "png" }));
    expect(out.data.toString()).toBe("tiny");
    expect(out.mime).toBe("image/png");
  });

  it("ignores an optimizer result that is not smaller", async () => {
    const optimizer = fakeEncoder("bloat", "png", async (input) => Buffer.concat([input, Buffer.alloc(64)]));
    const chain = new EncoderChain({ encoders: [optimizer] });
    const out = await chain.encode(await solidPng(40, 30, 0.5), decision({ outputFormat: "png", sourceFormat: "png" }));
    expect(sniffImageType(out.data)).toBe("image/png");
    expect(out.data.subarray(out.data.length - 64).equals(Buffer.alloc(64))).toBe(false);
  });

  it("tries the next optimizer only when one fails", async () => {
    const broken = fakeEncoder("broken", "png", fails);
    const working = fakeEncoder("working", "png", async () => Buffer.from("ok"));
    const unused = fakeEncoder("unused", "png", async () => Buffer.from("no"));
    const chain = new EncoderChain({ encoders: [broken, working, unused] });
    const out = await chain.encode(await solidPng(40, 30, 0.5), decision({ outputFormat: "png", sourceFormat: "png" }));
    expect(out.data.toString()).toBe("ok");
    expect(unused.encode).not.toHaveBeenCalled();
  });

  it("resizes and re-encodes real images", async () => {
    const chain = new EncoderChain({ encoders: [new BaselineJpegEncoder(85), new SharpPngOptimizer()] });
    const out = await chain.encode(
      await solidJpeg(400, 200),
      decision({ needsResize: true, targetWidth: 100, targetHeight: 50, sourceWidth: 400, sourceHeight: 200 }),
    );
    expect(out.mime).toBe("image/jpeg");
    expect(out.width).toBe(100);
    expect(out.height).toBe(50);
    const metadata = await sharp(out.data).metadata();
    expect(metadata.format).toBe("jpeg");
  });

  it("flattens transparency onto white for JPEG output", async () => {
    const chain = new EncoderChain({ encoders: [new BaselineJpegEncoder(90)] });
    const out = await chain.encode(await solidPng(8, 8, 0), decision({ targetWidth: 8, targetHeight: 8, sourceFormat: "png" }));
    const { data } = await sharp(out.data).raw().toBuffer({ resolveWithObject: true });
    expect(data[0]).toBeGreaterThan(245);
    expect(data[1]).toBeGreaterThan(245);
    expect(data[2]).toBeGreaterThan(245);
  });
});
