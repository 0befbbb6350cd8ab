/**
 * Encoder chain: orient, resize, then compress through the best encoder
 * that is available, falling back down a fixed priority list.
 *
 * Encoders are probed once; one that is missing at start-up is simply not
 * part of the chain. Only a failure to decode the input at all surfaces as
 * EncodingFailed: every encoder failure after that is absorbed.
 */

import { spawn } from "node:child_process";
import sharp from "sharp";
import type { AssetMime, OutputFormat, ProcessingDecision } from "@mailpaste/core";
import { orientedSize } from "./decider.js";
import { PipelineError, errorMessage } from "./errors.js";
import { mimeForFormat, sniffImageType } from "./mime.js";
import type { EncoderSettings } from "./config.js";
import { silentLogger, type Logger } from "./logger.js";

const WHITE = { r: 255, g: 255, b: 255 };

export interface Encoder {
  readonly name: string;
  readonly format: OutputFormat;
  /** Whether this encoder can run here. Called once per chain. */
  probe(): Promise<boolean>;
  encode(input: Buffer): Promise<Buffer>;
}

export interface EncodedImage {
  data: Buffer;
  mime: AssetMime;
  width: number;
  height: number;
}

/** mozjpeg through sharp: progressive, trellis-quantised, no chroma subsampling. */
export class MozJpegEncoder implements Encoder {
  readonly name = "mozjpeg";
  readonly format = "jpeg";

  constructor(
    private readonly quality: number,
    private readonly progressive: boolean,
  ) {}

  async probe(): Promise<boolean> {
    // Prebuilt libvips lists mozjpeg among its dependency versions.
    return Object.entries(sharp.versions).some(([lib, version]) => lib === "mozjpeg" && Boolean(version));
  }

  encode(input: Buffer): Promise<Buffer> {
    return sharp(input)
      .flatten({ background: WHITE })
      .jpeg({
        quality: this.quality,
        mozjpeg: true,
        progressive: this.progressive,
        chromaSubsampling: "4:4:4",
      })
      .toBuffer();
  }
}

/** Plain libjpeg baseline encoding at a slightly lower quality. */
export class BaselineJpegEncoder implements Encoder {
  readonly name = "libjpeg";
  readonly format = "jpeg";

  constructor(private readonly quality: number) {}

  async probe(): Promise<boolean> {
    return true;
  }

  encode(input: Buffer): Promise<Buffer> {
    return sharp(input)
      .flatten({ background: WHITE })
      .jpeg({ quality: this.quality, mozjpeg: false, progressive: false, chromaSubsampling: "4:4:4" })
      .toBuffer();
  }
}

/**
 * oxipng as an external process, reading stdin and writing stdout.
 * An empty stdout means it found nothing to improve.
 */
export class OxipngOptimizer implements Encoder {
  readonly name = "oxipng";
  readonly format = "png";

  constructor(
    private readonly binary: string,
    private readonly timeoutMs = 30_000,
  ) {}

  probe(): Promise<boolean> {
    if (!this.binary) return Promise.resolve(false);
    return new Promise((resolve) => {
      const child = spawn(this.binary, ["--version"], { stdio: "ignore" });
      child.on("error", () => resolve(false));
      child.on("close", (code) => resolve(code === 0));
    });
  }

  encode(input: Buffer): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.binary, ["-o", "4", "--strip", "safe", "--stdout", "-"], {
        stdio: ["pipe", "pipe", "ignore"],
      });
      const chunks: Buffer[] = [];
      const timer = setTimeout(() => child.kill("SIGKILL"), this.timeoutMs);

      child.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
      child.on("error", (err) => {
        clearTimeout(timer);
        reject(err);
      });
      child.on("close", (code, signal) => {
        clearTimeout(timer);
        if (code === 0) resolve(Buffer.concat(chunks));
        else reject(new Error(`oxipng exited with ${signal ?? `code ${code}`}`));
      });
      child.stdin.on("error", () => {
        // EPIPE when the process dies early; the close handler reports it.
      });
      child.stdin.end(input);
    });
  }
}

/** Maximum-effort lossless re-encode through libspng/zlib. */
export class SharpPngOptimizer implements Encoder {
  readonly name = "sharp-png";
  readonly format = "png";

  async probe(): Promise<boolean> {
    return true;
  }

  encode(input: Buffer): Promise<Buffer> {
    return sharp(input).png({ compressionLevel: 9, adaptiveFiltering: true, palette: false }).toBuffer();
  }
}

interface AvailableEncoders {
  jpeg: Encoder[];
  png: Encoder[];
}

export interface EncoderChainOptions {
  encoders: Encoder[];
  logger?: Logger;
}

export class EncoderChain {
  private readonly encoders: Encoder[];
  private readonly logger: Logger;
  private available: Promise<AvailableEncoders> | null = null;

  constructor(options: EncoderChainOptions) {
    this.encoders = options.encoders;
    this.logger = options.logger ?? silentLogger;
  }

  /** The default chain: mozjpeg → libjpeg for JPEG, oxipng → sharp for PNG. */
  static fromSettings(settings: EncoderSettings, logger?: Logger): EncoderChain {
    return new EncoderChain({
      encoders: [
        new MozJpegEncoder(settings.jpegQuality, settings.jpegProgressive),
        new BaselineJpegEncoder(settings.jpegFallbackQuality),
        new OxipngOptimizer(settings.oxipngPath),
        new SharpPngOptimizer(),
      ],
      logger,
    });
  }

  /** Probe every encoder once and remember the answer. */
  probe(): Promise<AvailableEncoders> {
    if (!this.available) {
      this.available = (async () => {
        const flags = await Promise.all(
          this.encoders.map((encoder) => encoder.probe().catch(() => false)),
        );
        const usable = this.encoders.filter((_, i) => flags[i]);
        const skipped = this.encoders.filter((_, i) => !flags[i]).map((e) => e.name);
        this.logger.log(
          `[encode] encoders: ${usable.map((e) => e.name).join(", ") || "none"}` +
            (skipped.length > 0 ? ` (unavailable: ${skipped.join(", ")})` : ""),
        );
        return {
          jpeg: usable.filter((e) => e.format === "jpeg"),
          png: usable.filter((e) => e.format === "png"),
        };
      })();
    }
    return this.available;
  }

  async encode(data: Buffer, decision: ProcessingDecision): Promise<EncodedImage> {
    if (decision.passThrough) {
      await assertDecodable(data);
      return {
        data,
        mime: decision.sourceFormat === "png" ? "image/png" : "image/jpeg",
        width: decision.sourceWidth,
        height: decision.sourceHeight,
      };
    }

    const prepared = await prepare(data, decision);
    const available = await this.probe();

    const encoded =
      decision.outputFormat === "png"
        ? await this.encodePng(prepared, available.png)
        : await this.encodeJpeg(data, prepared, decision, available.jpeg);

    const size = await finalSize(encoded.data, decision);
    this.logger.log(
      `[encode] ${decision.sourceFormat} ${decision.sourceWidth}x${decision.sourceHeight} ` +
        `(${decision.sourceBytes} bytes) → ${encoded.mime} ${size.width}x${size.height} (${encoded.data.length} bytes)`,
    );
    return { ...encoded, ...size };
  }

  private async encodeJpeg(
    original: Buffer,
    prepared: Buffer,
    decision: ProcessingDecision,
    encoders: Encoder[],
  ): Promise<Pick<EncodedImage, "data" | "mime">> {
    for (const encoder of encoders) {
      try {
        const out = await encoder.encode(prepared);
        if (out.length > 0) return { data: out, mime: "image/jpeg" };
        this.logger.warn(`[encode] ${encoder.name} produced no output`);
      } catch (err) {
        this.logger.warn(`[encode] ${encoder.name} failed: ${errorMessage(err)}`);
      }
    }

    // Nothing could encode: keep the bytes we had before the encode step.
    this.logger.warn("[encode] every JPEG encoder failed, keeping pre-encode bytes");
    if (!decision.needsResize) {
      const originalMime = sniffImageType(original);
      if (originalMime === "image/jpeg" || originalMime === "image/png") {
        return { data: original, mime: originalMime };
      }
    }
    return { data: prepared, mime: "image/png" };
  }

  private async encodePng(prepared: Buffer, optimizers: Encoder[]): Promise<Pick<EncodedImage, "data" | "mime">> {
    let best = prepared;
    for (const optimizer of optimizers) {
      try {
        const out = await optimizer.encode(best);
        if (out.length > 0 && out.length < best.length) {
          best = out;
        }
        break;
      } catch (err) {
        this.logger.warn(`[encode] ${optimizer.name} failed: ${errorMessage(err)}`);
      }
    }
    return { data: best, mime: mimeForFormat("png") };
  }
}

/**
 * Apply EXIF orientation and the resize, producing a lossless PNG so the
 * final lossy encode is the only lossy step.
 */
async function prepare(data: Buffer, decision: ProcessingDecision): Promise<Buffer> {
  try {
    let pipeline = sharp(data).rotate();
    if (decision.needsResize) {
      pipeline = pipeline.resize(decision.targetWidth, decision.targetHeight, {
        fit: "inside",
        withoutEnlargement: true,
      });
    }
    return await pipeline.png({ compressionLevel: 6 }).toBuffer();
  } catch (err) {
    throw new PipelineError("EncodingFailed", `failed to decode image: ${errorMessage(err)}`, { cause: err });
  }
}

async function assertDecodable(data: Buffer): Promise<void> {
  try {
    await sharp(data, { failOn: "error" }).raw().toBuffer();
  } catch (err) {
    throw new PipelineError("EncodingFailed", `image data is corrupt: ${errorMessage(err)}`, { cause: err });
  }
}

async function finalSize(data: Buffer, decision: ProcessingDecision): Promise<{ width: number; height: number }> {
  try {
    // Kept source bytes may still carry an EXIF rotation.
    const { width, height } = orientedSize(await sharp(data).metadata());
    if (width && height) return { width, height };
  } catch {
    // Fall through to the dimensions we asked for.
  }
  return { width: decision.targetWidth, height: decision.targetHeight };
}
