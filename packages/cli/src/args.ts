/**
 * Argument parsing for the mailpaste CLI. Kept free of side effects so it
 * can be tested without touching config or storage.
 */

import type { BatchInput } from "@mailpaste/core";

export type Command =
  | { name: "help" }
  | { name: "transform"; file: string; out?: string }
  | { name: "asset"; inputs: string[]; batch: boolean };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = `Usage: mailpaste <command> [options]

Commands:
  transform <file.html> [--out FILE]   Rehost images and rewrite HTML for Gmail
  asset <url|data-uri|path>...         Rehost images, printing each asset as JSON

Options:
  --out FILE                 transform: write the HTML to FILE instead of printing JSON
  --batch                    asset: send all inputs as one fail-fast batch
  --help, -h                 Show this help

Examples:
  mailpaste transform draft.html --out draft.gmail.html
  mailpaste asset https://example.com/photo.jpg ./diagram.png
  mailpaste asset --batch a.png b.jpg`;

export function parseArgs(argv: string[]): Command {
  if (argv.length === 0 || argv.includes("--help") || argv.includes("-h")) {
    return { name: "help" };
  }

  const [command, ...rest] = argv;
  switch (command) {
    case "transform": {
      const outIdx = rest.indexOf("--out");
      const out = outIdx >= 0 ? rest[outIdx + 1] : undefined;
      if (outIdx >= 0 && !out) throw new UsageError("--out needs a file name");
      const positional = rest.filter((a, i) => !a.startsWith("--") && (outIdx < 0 || i !== outIdx + 1));
      if (positional.length !== 1) throw new UsageError("transform takes exactly one HTML file");
      return { name: "transform", file: positional[0], out };
    }
    case "asset": {
      const inputs = rest.filter((a) => !a.startsWith("--"));
      if (inputs.length === 0) throw new UsageError("asset needs at least one input");
      return { name: "asset", inputs, batch: rest.includes("--batch") };
    }
    default:
      throw new UsageError(`unknown command: ${command}`);
  }
}

/** How one positional input should be loaded. */
export function classifyInput(input: string): "url" | "dataUri" | "path" {
  if (/^https?:\/\//i.test(input)) return "url";
  if (/^data:/i.test(input)) return "dataUri";
  return "path";
}

/** Turn inputs into batch items; local files are read through `readFile`. */
export async function toBatchInputs(
  inputs: string[],
  readFile: (path: string) => Promise<Uint8Array>,
): Promise<BatchInput[]> {
  const items: BatchInput[] = [];
  for (const input of inputs) {
    switch (classifyInput(input)) {
      case "url":
        items.push({ url: input });
        break;
      case "dataUri":
        items.push({ dataUri: input });
        break;
      case "path":
        items.push({ data: await readFile(input) });
        break;
    }
  }
  return items;
}
