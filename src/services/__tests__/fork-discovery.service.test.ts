import { beforeEach, describe, expect, it } from "vitest";

import { FakeRepositoryHost, createCapturingLogger, messages } from "../../__tests__/test-utils";
import { ForkDiscoveryService } from "../fork-discovery.service";

describe("ForkDiscoveryService", () => {
  let host: FakeRepositoryHost;
  let service: ForkDiscoveryService;
  let lines: ReturnType<typeof createCapturingLogger>["lines"];

  beforeEach(() => {
    host = new FakeRepositoryHost();
    const capturing = createCapturingLogger();
    lines = capturing.lines;
    service = new ForkDiscoveryService(host, capturing.logger);
  });

  it("should return forks with their upstream and ignore source repositories", async () => {
    host.addFork("octo", "widgets", "upstream-org/widgets", "trunk").addSource("octo", "dotfiles");

    const result = await service.discoverForks("octo");

    expect(result.errors).toEqual([]);
    expect(result.forks).toEqual([
      {
        repoName: "widgets",
        ownerAccount: "octo",
        upstreamFullName: "upstream-org/widgets",
        upstreamDefaultBranch: "trunk",
      },
    ]);
    expect(host.detailRequests).toEqual(["octo/widgets"]);
    expect(messages(lines, "info")).toContain("  📦 Found 1 fork(s)");
  });

  it("should default the upstream branch to main", async () => {
    host.addFork("octo", "widgets", "upstream-org/widgets", null);

    const { forks } = await service.discoverForks("octo");

    expect(forks[0].upstreamDefaultBranch).toBe("main");
  });

  it("should report an account without forks", async () => {
    host.addSource("octo", "dotfiles");

    await expect(service.discoverForks("octo")).resolves.toEqual({ forks: [], errors: [] });
    expect(messages(lines, "info")).toContain("  ℹ️  No forks found for octo");
  });

  it("should record a failed listing as an account error", async () => {
    host.listErrors.octo = new Error("Bad credentials");

    await expect(service.discoverForks("octo")).resolves.toEqual({
      forks: [],
      errors: [{ scope: "octo", message: "GitHub API Error - Bad credentials" }],
    });
  });

  it("should skip a fork whose details cannot be read", async () => {
    host.addFork("octo", "widgets", "upstream-org/widgets").addFork("octo", "gadgets", "upstream-org/gadgets");
    host.detailErrors["octo/widgets"] = new Error("Server Error");

    const result = await service.discoverForks("octo");

    expect(result.forks.map((fork) => fork.repoName)).toEqual(["gadgets"]);
    expect(result.errors).toEqual([{ scope: "octo/widgets", message: "Failed to fetch details - Server Error" }]);
  });

  it("should skip a fork without a parent without recording an error", async () => {
    host.addFork("octo", "orphan", null);

    const result = await service.discoverForks("octo");

    expect(result).toEqual({ forks: [], errors: [] });
    expect(messages(lines, "warn")).toEqual(["  ⚠️  Skipping orphan: no parent repository reported"]);
    expect(messages(lines, "info")).toContain("  ⚠️  No valid forks with upstream found");
  });
});
