import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { applyHttpOverrides, loadAppConfig } from "./config-loader.js";
import { defaultAppConfig, resolveHttpDeadlines } from "./config.js";
import { UserFacingError } from "./errors.js";

function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "prsweep-config-"));
}

function writeConfig(dir: string, contents: string, name = ".prsweep.yaml"): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, contents);
  return filePath;
}

describe("loadAppConfig", () => {
  it("uses defaults when no config file exists", () => {
    const { config, configPath } = loadAppConfig({ cwd: makeTempDir(), env: {} });

    expect(configPath).toBeNull();
    expect(config).toEqual(defaultAppConfig());
    expect(config.http).toEqual({
      max_concurrent: 20,
      timeout_seconds: 30,
      connect_timeout_seconds: 10,
      max_retries: 3,
      retry_min_delay_ms: 100,
      retry_max_delay_ms: 5000,
    });
    expect(config.prow_hosts).toEqual(["prow.ci.openshift.org"]);
  });

  it("discovers .prsweep.yaml in the working directory and expands env vars", () => {
    const dir = makeTempDir();
    const filePath = writeConfig(
      dir,
      ["http:", "  max_concurrent: 8", "prow_hosts:", "  - ${PROW_HOST}"].join("\n"),
    );

    const { config, configPath } = loadAppConfig({ cwd: dir, env: { PROW_HOST: "prow.example.test" } });

    expect(configPath).toBe(filePath);
    expect(config.http.max_concurrent).toBe(8);
    expect(config.http.timeout_seconds).toBe(30);
    expect(config.prow_hosts).toEqual(["prow.example.test"]);
  });

  it("lets environment variables override the file", () => {
    const dir = makeTempDir();
    writeConfig(dir, ["http:", "  max_concurrent: 8", "  timeout_seconds: 12"].join("\n"));

    const { config } = loadAppConfig({
      cwd: dir,
      env: {
        PRSWEEP_MAX_CONCURRENT_HTTP_STREAMS: "4",
        PRSWEEP_HTTP_CONNECT_TIMEOUT_SECS: "2.5",
      },
    });

    expect(config.http.max_concurrent).toBe(4);
    expect(config.http.timeout_seconds).toBe(12);
    expect(config.http.connect_timeout_seconds).toBe(2.5);
  });

  it("reads an explicit path relative to cwd", () => {
    const dir = makeTempDir();
    writeConfig(dir, "http:\n  max_retries: 0\n", "custom.yaml");

    const { config, configPath } = loadAppConfig({ cwd: dir, explicitPath: "custom.yaml", env: {} });

    expect(configPath).toBe(path.join(dir, "custom.yaml"));
    expect(config.http.max_retries).toBe(0);
  });

  it("fails when an explicit path is missing", () => {
    const dir = makeTempDir();

    expect(() => loadAppConfig({ cwd: dir, explicitPath: "nope.yaml", env: {} })).toThrow(
      `Config file not found at ${path.join(dir, "nope.yaml")}.`,
    );
  });

  it("reports schema violations as user-facing errors", () => {
    const dir = makeTempDir();
    const filePath = writeConfig(dir, ["http:", "  max_concurrent: lots", "extra: 1"].join("\n"));

    let caught: unknown;
    try {
      loadAppConfig({ cwd: dir, env: {} });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(UserFacingError);
    if (!(caught instanceof UserFacingError)) return;
    expect(caught.title).toBe("Configuration invalid.");
    expect(caught.next).toBe(`Review ${filePath}.`);
    expect(caught.message).toContain("http.max_concurrent: Expected number, received string");
    expect(caught.message).toContain("<root>: Unrecognized keys: extra");
  });

  it("rejects non-numeric environment overrides", () => {
    expect(() =>
      loadAppConfig({ cwd: makeTempDir(), env: { PRSWEEP_HTTP_TIMEOUT_SECS: "soon" } }),
    ).toThrow('PRSWEEP_HTTP_TIMEOUT_SECS must be a number, received "soon".');
  });

  it("rejects unset variables referenced by the file", () => {
    const dir = makeTempDir();
    writeConfig(dir, "prow_hosts:\n  - ${MISSING_HOST}\n");

    expect(() => loadAppConfig({ cwd: dir, env: {} })).toThrow(
      "Environment variable MISSING_HOST is not set",
    );
  });

  it("rejects inverted retry bounds", () => {
    const dir = makeTempDir();
    writeConfig(dir, "http:\n  retry_min_delay_ms: 900\n  retry_max_delay_ms: 100\n");

    expect(() => loadAppConfig({ cwd: dir, env: {} })).toThrow(
      "retry_min_delay_ms must not exceed retry_max_delay_ms",
    );
  });
});

describe("applyHttpOverrides", () => {
  it("gives command-line flags the last word", () => {
    const config = applyHttpOverrides(defaultAppConfig(), { concurrency: 2, timeoutSeconds: 5 });

    expect(config.http.max_concurrent).toBe(2);
    expect(config.http.timeout_seconds).toBe(5);
    expect(config.http.connect_timeout_seconds).toBe(10);
  });

  it("leaves the config alone without overrides", () => {
    const base = defaultAppConfig();

    expect(applyHttpOverrides(base, {})).toEqual(base);
  });

  it("validates overridden values", () => {
    expect(() => applyHttpOverrides(defaultAppConfig(), { concurrency: 0 })).toThrow(
      UserFacingError,
    );
  });
});

describe("resolveHttpDeadlines", () => {
  it("converts seconds and keeps connect within the overall deadline", () => {
    const http = { ...defaultAppConfig().http, timeout_seconds: 5, connect_timeout_seconds: 10 };

    expect(resolveHttpDeadlines(http)).toEqual({ requestTimeoutMs: 5000, connectTimeoutMs: 5000 });
    expect(resolveHttpDeadlines(defaultAppConfig().http)).toEqual({
      requestTimeoutMs: 30_000,
      connectTimeoutMs: 10_000,
    });
  });
});
