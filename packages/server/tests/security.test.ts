import { describe, it, expect, vi } from "vitest";
import type { LookupAddress, LookupOptions } from "node:dns";
import {
  assertPublicDestination,
  guardedLookup,
  isPrivateAddress,
  isPrivateHostname,
  type LookupFn,
} from "../src/lib/security.js";
import { PipelineError } from "../src/lib/errors.js";
import { publicLookup, tableLookup } from "./helpers.js";

describe("isPrivateAddress", () => {
  it.each([
    "0.0.0.0",
    "10.1.2.3",
    "100.64.0.1",
    "127.0.0.1",
    "169.254.169.254",
    "172.16.0.1",
    "172.31.255.255",
    "192.0.0.8",
    "192.168.1.1",
    "198.18.0.1",
    "224.0.0.1",
    "255.255.255.255",
  ])("blocks IPv4 %s", (ip) => {
    expect(isPrivateAddress(ip)).toBe(true);
  });

  it.each(["8.8.8.8", "93.184.216.34", "172.32.0.1", "100.128.0.1"])("allows IPv4 %s", (ip) => {
    expect(isPrivateAddress(ip)).toBe(false);
  });

  it.each(["::", "::1", "fc00::1", "fd12:3456::1", "fe80::1", "ff02::1", "::ffff:127.0.0.1", "::ffff:10.0.0.1"])(
    "blocks IPv6 %s",
    (ip) => {
      expect(isPrivateAddress(ip)).toBe(true);
    },
  );

  it.each(["2606:4700:4700::1111", "::ffff:8.8.8.8"])("allows IPv6 %s", (ip) => {
    expect(isPrivateAddress(ip)).toBe(false);
  });

  it("treats non-addresses as private", () => {
    expect(isPrivateAddress("example.com")).toBe(true);
  });
});

describe("isPrivateHostname", () => {
  it.each(["localhost", "api.localhost", "printer.local", "db.internal", "127.0.0.1", "[::1]"])(
    "blocks %s",
    (host) => {
      expect(isPrivateHostname(host)).toBe(true);
    },
  );

  it("allows ordinary names", () => {
    expect(isPrivateHostname("images.example.com")).toBe(false);
  });
});

describe("assertPublicDestination", () => {
  it("rejects internal names without a lookup", async () => {
    const lookup = vi.fn(publicLookup);
    await expect(assertPublicDestination("localhost", lookup)).rejects.toMatchObject({
      code: "ForbiddenDestination",
    });
    expect(lookup).not.toHaveBeenCalled();
  });

  it("rejects names resolving to private addresses", async () => {
    const lookup = tableLookup({ "metadata.example.com": "169.254.169.254" });
    const err = await assertPublicDestination("metadata.example.com", lookup).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PipelineError);
    expect(err).toMatchObject({
      code: "ForbiddenDestination",
      message: "metadata.example.com resolves to private address 169.254.169.254",
    });
  });

  it("rejects when any one of several addresses is private", async () => {
    const lookup = async () => [
      { address: "93.184.216.34", family: 4 },
      { address: "10.0.0.7", family: 4 },
    ];
    await expect(assertPublicDestination("mixed.example.com", lookup)).rejects.toMatchObject({
      code: "ForbiddenDestination",
    });
  });

  it("reports unresolvable names as an invalid source", async () => {
    await expect(assertPublicDestination("nowhere.example.com", tableLookup({}))).rejects.toMatchObject({
      code: "InvalidSource",
    });
  });

  it("accepts public names", async () => {
    await expect(assertPublicDestination("images.example.com", publicLookup)).resolves.toBeUndefined();
  });
});

interface LookupResult {
  err: Error | null;
  address: string | LookupAddress[];
  family?: number;
}

function runLookup(lookup: LookupFn, hostname: string, options: LookupOptions): Promise<LookupResult> {
  return new Promise((resolve) => {
    guardedLookup(lookup)(hostname, options, (err, address, family) => resolve({ err, address, family }));
  });
}

describe("guardedLookup", () => {
  it("answers with the first address for a single lookup", async () => {
    const result = await runLookup(publicLookup, "cdn.example.com", {});
    expect(result).toEqual({ err: null, address: "93.184.216.34", family: 4 });
  });

  it("answers with every address when asked for all", async () => {
    const lookup: LookupFn = async () => [
      { address: "93.184.216.34", family: 4 },
      { address: "2606:2800:220:1::1", family: 6 },
    ];
    const result = await runLookup(lookup, "cdn.example.com", { all: true });
    expect(result.err).toBeNull();
    expect(result.address).toEqual([
      { address: "93.184.216.34", family: 4 },
      { address: "2606:2800:220:1::1", family: 6 },
    ]);
  });

  it("refuses a name that resolves to a private address at connect time", async () => {
    const result = await runLookup(tableLookup({ "rebind.example": "127.0.0.1" }), "rebind.example", { all: true });
    expect(result.err).toBeInstanceOf(PipelineError);
    expect(result.err).toMatchObject({
      code: "ForbiddenDestination",
      message: "rebind.example resolves to private address 127.0.0.1",
    });
  });

  it("reports resolver failures as InvalidSource", async () => {
    const result = await runLookup(tableLookup({}), "missing.example", {});
    expect(result.err).toMatchObject({ code: "InvalidSource", message: "could not resolve missing.example" });
  });
});
