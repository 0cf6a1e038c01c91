import type { Bundle, Manifest, RegistryClient } from "@armory/core";
import { RegistryFetchError } from "@armory/errors";
import { createManifest } from "@armory/test-utils";
import { describe, expect, it } from "vitest";
import { type RetryPolicy, RetryingRegistryClient } from "../../retrying.js";

class FlakyClient implements RegistryClient {
  readonly name = "flaky";
  attempts = 0;

  constructor(
    private readonly failures: readonly Error[],
    private readonly manifest: Manifest = createManifest({ name: "a" }),
  ) {}

  async fetchManifest(): Promise<Manifest> {
    const failure = this.failures[this.attempts++];
    if (failure !== undefined) throw failure;
    return this.manifest;
  }

  async fetchBundle(): Promise<Bundle> {
    const failure = this.failures[this.attempts++];
    if (failure !== undefined) throw failure;
    return new Map();
  }
}

const unavailable = () => new RegistryFetchError("a", "*", "unavailable");

describe("RetryingRegistryClient", () => {
  it("retries transient failures until one succeeds", async () => {
    const inner = new FlakyClient([unavailable(), unavailable()]);
    const client = new RetryingRegistryClient(inner, { baseDelayMs: 0 });

    await expect(client.fetchManifest("a", "*")).resolves.toMatchObject({ name: "a" });
    expect(inner.attempts).toBe(3);
  });

  it("gives up after the configured attempts", async () => {
    const inner = new FlakyClient([unavailable(), unavailable(), unavailable(), unavailable()]);
    const client = new RetryingRegistryClient(inner, { baseDelayMs: 0 });

    await expect(client.fetchBundle("a", "1.0.0")).rejects.toMatchObject({ reason: "unavailable" });
    expect(inner.attempts).toBe(3);
  });

  it("does not retry a missing version", async () => {
    const inner = new FlakyClient([new RegistryFetchError("a", ">=9.0.0", "no-matching-version")]);
    const client = new RetryingRegistryClient(inner, { baseDelayMs: 0 });

    await expect(client.fetchManifest("a", ">=9.0.0")).rejects.toMatchObject({
      reason: "no-matching-version",
    });
    expect(inner.attempts).toBe(1);
  });

  it("does not retry errors that are not registry errors", async () => {
    const inner = new FlakyClient([new Error("boom")]);
    const client = new RetryingRegistryClient(inner, { baseDelayMs: 0 });

    await expect(client.fetchManifest("a", "*")).rejects.toThrow("boom");
    expect(inner.attempts).toBe(1);
  });

  it("backs off exponentially from the base delay", () => {
    const client = new RetryingRegistryClient(new FlakyClient([]));
    expect([1, 2, 3].map((retry) => client.delayFor(retry))).toEqual([200, 400, 800]);
  });

  it.each<RetryPolicy>([{ attempts: 0 }, { attempts: 1.5 }, { baseDelayMs: -1 }, { factor: 0.5 }])(
    "rejects policy %j",
    (policy) => {
      expect(() => new RetryingRegistryClient(new FlakyClient([]), policy)).toThrow(RangeError);
    },
  );
});
