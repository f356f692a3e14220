import { join } from "node:path";

import { describe, expect, it, vi } from "vitest";

import type { WorkerPoolConfig } from "../../src/core/config.js";
import { createEventBus } from "../../src/core/event-bus.js";
import type { RepositoryDescriptor } from "../../src/core/types.js";
import {
  buildCloneArgs,
  cloneBackoffSeconds,
  cloneTargetPath,
  processOne,
} from "../../src/repo/cloner.js";
import type { GitRunOptions, GitRunResult } from "../../src/repo/git-runner.js";

const DEST = join("/", "srv", "repos");

const alpha: RepositoryDescriptor = {
  name: "alpha",
  httpCloneUrl: "https://github.test/acme/alpha.git",
  sshCloneUrl: "git@github.test:acme/alpha.git",
  archived: false,
};

function makeConfig(overrides: Partial<WorkerPoolConfig> = {}): WorkerPoolConfig {
  return {
    destinationDirectory: DEST,
    concurrency: 2,
    useSsh: false,
    shallow: true,
    mirror: false,
    retryLimit: 2,
    ...overrides,
  };
}

const ok: GitRunResult = { status: "exited", exitCode: 0 };
const exited = (exitCode: number): GitRunResult => ({ status: "exited", exitCode });

/** Answers each git call from `script`, keyed by subcommand, in order. */
function createFakeGit(script: Record<string, GitRunResult[]>) {
  const calls: Array<{ args: string[]; cwd?: string }> = [];
  const runGit = vi.fn(async (args: readonly string[], options: GitRunOptions = {}) => {
    calls.push({ args: [...args], cwd: options.cwd });
    const queue = script[args[0] ?? ""] ?? [];
    return queue.shift() ?? ok;
  });

  return { runGit, calls };
}

function createOutput() {
  const lines: string[] = [];
  return { lines, output: { write: (line: string) => lines.push(line) } };
}

describe("cloneTargetPath", () => {
  it("uses the repository name, with .git for mirrors", () => {
    expect(cloneTargetPath(alpha, makeConfig())).toBe(join(DEST, "alpha"));
    expect(cloneTargetPath(alpha, makeConfig({ mirror: true, shallow: false }))).toBe(
      join(DEST, "alpha.git"),
    );
  });
});

describe("buildCloneArgs", () => {
  it("builds a shallow clone that keeps every branch", () => {
    expect(buildCloneArgs("u", "t", { mirror: false, shallow: true })).toEqual([
      "clone",
      "--depth",
      "1",
      "--no-single-branch",
      "u",
      "t",
    ]);
  });

  it("builds a full clone", () => {
    expect(buildCloneArgs("u", "t", { mirror: false, shallow: false })).toEqual([
      "clone",
      "u",
      "t",
    ]);
  });

  it("prefers mirror over shallow", () => {
    expect(buildCloneArgs("u", "t", { mirror: true, shallow: true })).toEqual([
      "clone",
      "--mirror",
      "u",
      "t",
    ]);
  });
});

describe("cloneBackoffSeconds", () => {
  it("doubles from five seconds", () => {
    expect([0, 1, 2, 3].map(cloneBackoffSeconds)).toEqual([5, 10, 20, 40]);
  });
});

describe("processOne", () => {
  describe("fresh clones", () => {
    it("shallow clones over HTTPS when the target is missing", async () => {
      const git = createFakeGit({});

      const outcome = await processOne(alpha, makeConfig(), {
        runGit: git.runGit,
        pathExists: async () => false,
      });

      expect(outcome).toEqual({ status: "cloned", name: "alpha", attempts: 1 });
      expect(git.calls).toEqual([
        {
          args: [
            "clone",
            "--depth",
            "1",
            "--no-single-branch",
            alpha.httpCloneUrl,
            join(DEST, "alpha"),
          ],
          cwd: undefined,
        },
      ]);
    });

    it("uses the SSH URL for a full clone with useSsh", async () => {
      const git = createFakeGit({});

      await processOne(alpha, makeConfig({ useSsh: true, shallow: false }), {
        runGit: git.runGit,
        pathExists: async () => false,
      });

      expect(git.calls[0]?.args).toEqual(["clone", alpha.sshCloneUrl, join(DEST, "alpha")]);
    });

    it("mirrors into <name>.git", async () => {
      const git = createFakeGit({});
      const pathExists = vi.fn(async (_path: string) => false);

      await processOne(alpha, makeConfig({ mirror: true, shallow: false }), {
        runGit: git.runGit,
        pathExists,
      });

      expect(pathExists).toHaveBeenCalledWith(join(DEST, "alpha.git"));
      expect(git.calls[0]?.args).toEqual([
        "clone",
        "--mirror",
        alpha.httpCloneUrl,
        join(DEST, "alpha.git"),
      ]);
    });
  });

  describe("existing checkouts", () => {
    it("fetches and fast-forwards in place", async () => {
      const git = createFakeGit({});

      const outcome = await processOne(alpha, makeConfig(), {
        runGit: git.runGit,
        pathExists: async () => true,
      });

      expect(outcome).toEqual({ status: "updated", name: "alpha", fastForward: true });
      expect(git.calls).toEqual([
        { args: ["fetch", "--all", "--prune"], cwd: join(DEST, "alpha") },
        { args: ["pull", "--ff-only"], cwd: join(DEST, "alpha") },
      ]);
    });

    it("still reports updated when the fast-forward is refused", async () => {
      const git = createFakeGit({ pull: [exited(128)] });

      const outcome = await processOne(alpha, makeConfig(), {
        runGit: git.runGit,
        pathExists: async () => true,
      });

      expect(outcome).toEqual({ status: "updated", name: "alpha", fastForward: false });
      expect(git.calls).toHaveLength(2);
    });

    it("updates a mirror with remote update", async () => {
      const git = createFakeGit({});

      const outcome = await processOne(alpha, makeConfig({ mirror: true, shallow: false }), {
        runGit: git.runGit,
        pathExists: async () => true,
      });

      expect(outcome).toEqual({ status: "updated", name: "alpha", fastForward: true });
      expect(git.calls).toEqual([
        { args: ["remote", "update", "--prune"], cwd: join(DEST, "alpha.git") },
      ]);
    });

    it("falls back to a fresh clone when the fetch fails", async () => {
      const git = createFakeGit({ fetch: [exited(1)] });
      const { lines, output } = createOutput();

      const outcome = await processOne(alpha, makeConfig(), {
        runGit: git.runGit,
        pathExists: async () => true,
        output,
      });

      expect(outcome).toEqual({ status: "cloned", name: "alpha", attempts: 1 });
      expect(git.calls.map((call) => call.args[0])).toEqual(["fetch", "clone"]);
      expect(lines).toEqual(["[alpha] update failed (exit code 1); trying a fresh clone"]);
    });

    it("falls back to a fresh clone when git cannot start for the update", async () => {
      const git = createFakeGit({
        remote: [{ status: "error", message: "spawn git EAGAIN" }],
      });
      const { lines, output } = createOutput();

      const outcome = await processOne(alpha, makeConfig({ mirror: true, shallow: false }), {
        runGit: git.runGit,
        pathExists: async () => true,
        output,
      });

      expect(outcome.status).toBe("cloned");
      expect(lines).toEqual(["[alpha] update failed (spawn git EAGAIN); trying a fresh clone"]);
    });
  });

  describe("retries", () => {
    it("retries a failed clone with doubling backoff", async () => {
      const git = createFakeGit({ clone: [exited(128), exited(128), ok] });
      const sleep = vi.fn(async (_ms: number) => {});
      const { lines, output } = createOutput();
      const bus = createEventBus();
      const retries: unknown[] = [];
      bus.on("clone:retrying", (event) => retries.push(event));

      const outcome = await processOne(alpha, makeConfig({ retryLimit: 2 }), {
        runGit: git.runGit,
        pathExists: async () => false,
        sleep,
        output,
        bus,
      });

      expect(outcome).toEqual({ status: "cloned", name: "alpha", attempts: 3 });
      expect(sleep.mock.calls).toEqual([[5_000], [10_000]]);
      expect(lines).toEqual([
        "[alpha] clone failed with exit code 128. Retrying in 5s (attempt 1/2)...",
        "[alpha] clone failed with exit code 128. Retrying in 10s (attempt 2/2)...",
      ]);
      expect(retries).toEqual([
        { name: "alpha", exitCode: 128, delaySeconds: 5, attempt: 1, maxRetries: 2 },
        { name: "alpha", exitCode: 128, delaySeconds: 10, attempt: 2, maxRetries: 2 },
      ]);
    });

    it("gives up after retryLimit retries", async () => {
      const git = createFakeGit({ clone: [exited(128), exited(128), exited(128), exited(128)] });
      const sleep = vi.fn(async (_ms: number) => {});

      const outcome = await processOne(alpha, makeConfig({ retryLimit: 3 }), {
        runGit: git.runGit,
        pathExists: async () => false,
        sleep,
      });

      expect(outcome).toEqual({
        status: "failed",
        name: "alpha",
        code: "CLONE_FAILED",
        reason: "clone failed with exit code 128",
        exitCode: 128,
      });
      expect(git.calls).toHaveLength(4);
      expect(sleep.mock.calls).toEqual([[5_000], [10_000], [20_000]]);
    });

    it("tries once with a retry limit of zero", async () => {
      const git = createFakeGit({ clone: [exited(1)] });
      const sleep = vi.fn(async (_ms: number) => {});

      const outcome = await processOne(alpha, makeConfig({ retryLimit: 0 }), {
        runGit: git.runGit,
        pathExists: async () => false,
        sleep,
      });

      expect(outcome).toMatchObject({ status: "failed", exitCode: 1 });
      expect(git.calls).toHaveLength(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("reports git that never starts as a spawn failure", async () => {
      const spawnFailure: GitRunResult = { status: "error", message: "spawn git ENOENT" };
      const git = createFakeGit({ clone: [spawnFailure, spawnFailure] });
      const { lines, output } = createOutput();

      const outcome = await processOne(alpha, makeConfig({ retryLimit: 1 }), {
        runGit: git.runGit,
        pathExists: async () => false,
        sleep: async () => {},
        output,
      });

      expect(outcome).toEqual({
        status: "failed",
        name: "alpha",
        code: "GIT_SPAWN_FAILED",
        reason: "git could not run: spawn git ENOENT",
      });
      expect(lines).toEqual([
        "[alpha] clone failed with spawn git ENOENT. Retrying in 5s (attempt 1/1)...",
      ]);
    });
  });

  it("prefixes git output lines with the repository name and drops blank ones", async () => {
    const { lines, output } = createOutput();

    await processOne(alpha, makeConfig(), {
      runGit: async (_args, options = {}) => {
        options.onLine?.("Cloning into '/srv/repos/alpha'...");
        options.onLine?.("   ");
        options.onLine?.("Receiving objects: 100% (12/12), done.  ");
        return ok;
      },
      pathExists: async () => false,
      output,
    });

    expect(lines).toEqual([
      "[alpha] Cloning into '/srv/repos/alpha'...",
      "[alpha] Receiving objects: 100% (12/12), done.",
    ]);
  });

  it("turns unexpected errors into a failed outcome instead of rejecting", async () => {
    const outcome = await processOne(alpha, makeConfig(), {
      runGit: async () => ok,
      pathExists: async () => {
        throw new Error("EACCES: permission denied");
      },
    });

    expect(outcome).toEqual({
      status: "failed",
      name: "alpha",
      code: "CLONE_FAILED",
      reason: "EACCES: permission denied",
    });
  });
});
