import { describe, expect, it } from "vitest";

import { resolveLogUrl, toLogUrl } from "./url-resolver.js";

describe("resolveLogUrl", () => {
  it("rewrites prow view links to the raw build log in storage", () => {
    const url =
      "https://prow.ci.openshift.org/view/gs/test-platform-results/pr-logs/pull/org_repo/1234/pull-ci-unit/98765";

    expect(resolveLogUrl(url)).toBe(
      "https://storage.googleapis.com/test-platform-results/pr-logs/pull/org_repo/1234/pull-ci-unit/98765/build-log.txt",
    );
  });

  it("treats any host whose first label is prow as a prow host", () => {
    expect(resolveLogUrl("https://prow.ci.example/view/gs/bucket/job/1")).toBe(
      "https://storage.googleapis.com/bucket/job/1/build-log.txt",
    );
  });

  it("honors configured prow hosts", () => {
    const url = "https://ci.internal.example/view/gs/bucket/job/7";

    expect(resolveLogUrl(url)).toBeNull();
    expect(resolveLogUrl(url, { prowHosts: ["ci.internal.example"] })).toBe(
      "https://storage.googleapis.com/bucket/job/7/build-log.txt",
    );
  });

  it("drops trailing slashes, query and fragment and does not double the log file", () => {
    expect(resolveLogUrl("https://prow.ci.example/view/gs/bucket/job/2/?tab=logs#top")).toBe(
      "https://storage.googleapis.com/bucket/job/2/build-log.txt",
    );
    expect(resolveLogUrl("https://prow.ci.example/view/gs/bucket/job/3/build-log.txt")).toBe(
      "https://storage.googleapis.com/bucket/job/3/build-log.txt",
    );
  });

  it("keeps the path in front of the viewer segment", () => {
    expect(resolveLogUrl("https://prow.ci.example/deck/view/gs/bucket/job/5")).toBe(
      "https://storage.googleapis.com/deck/bucket/job/5/build-log.txt",
    );
  });

  it("returns null for prow links outside /view/gs/", () => {
    expect(resolveLogUrl("https://prow.ci.example/pr-history?org=o&repo=r&pr=1")).toBeNull();
  });

  it("returns null for GitHub Actions run pages", () => {
    expect(
      resolveLogUrl("https://github.com/owner/repo/actions/runs/123456/job/789"),
    ).toBeNull();
  });

  it("passes raw and storage URLs through", () => {
    expect(resolveLogUrl("https://raw.example.com/logs/run-1.txt")).toBe(
      "https://raw.example.com/logs/run-1.txt",
    );
    expect(resolveLogUrl("https://storage.googleapis.com/bucket/job/build-log.txt")).toBe(
      "https://storage.googleapis.com/bucket/job/build-log.txt",
    );
  });

  it("returns null for issue comment links", () => {
    expect(
      resolveLogUrl("https://github.com/owner/repo/pull/5#issuecomment-424242"),
    ).toBeNull();
  });

  it("returns null for other and unparseable URLs", () => {
    expect(resolveLogUrl("https://ci.example.com/job/42")).toBeNull();
    expect(resolveLogUrl("not a url")).toBeNull();
    expect(resolveLogUrl("")).toBeNull();
    expect(resolveLogUrl("ftp://raw.example.com/log.txt")).toBeNull();
  });
});

describe("toLogUrl", () => {
  it("accepts only http and https URLs", () => {
    expect(toLogUrl(" http://localhost:8080/raw/log ")).toBe("http://localhost:8080/raw/log");
    expect(toLogUrl("file:///tmp/raw.log")).toBeNull();
  });
});
