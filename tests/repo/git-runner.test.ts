import { Readable } from "node:stream";

import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

import { execa } from "execa";

import { describeGitResult, isSuccessful, runGit } from "../../src/repo/git-runner.js";

const mockedExeca = vi.mocked(execa);

function mockSubprocess(result: Record<string, unknown>, output: string[] = []) {
  return Object.assign(Promise.resolve(result), {
    all: Readable.from(output),
  }) as unknown as ReturnType<typeof execa>;
}

describe("runGit", () => {
  beforeEach(() => {
    mockedExeca.mockReset();
  });

  it("runs git without prompts and streams combined output line by line", async () => {
    mockedExeca.mockReturnValue(
      mockSubprocess({ exitCode: 0 }, ["Cloning into 'alpha'...\nremote: Enumer", "ating objects: 3\n"]),
    );
    const lines: string[] = [];

    const result = await runGit(["clone", "https://github.test/acme/alpha.git", "alpha"], {
      cwd: "/srv/repos",
      onLine: (line) => lines.push(line),
    });

    expect(result).toEqual({ status: "exited", exitCode: 0 });
    expect(lines).toEqual(["Cloning into 'alpha'...", "remote: Enumerating objects: 3"]);
    expect(mockedExeca).toHaveBeenCalledWith(
      "git",
      ["clone", "https://github.test/acme/alpha.git", "alpha"],
      expect.objectContaining({
        cwd: "/srv/repos",
        all: true,
        reject: false,
        stdin: "ignore",
        env: { GIT_TERMINAL_PROMPT: "0" },
      }),
    );
  });

  it("returns a nonzero exit code instead of throwing", async () => {
    mockedExeca.mockReturnValue(
      mockSubprocess({ exitCode: 128, shortMessage: "Command failed with exit code 128" }),
    );

    await expect(runGit(["pull", "--ff-only"])).resolves.toEqual({
      status: "exited",
      exitCode: 128,
    });
  });

  it("reports a process that never exited", async () => {
    mockedExeca.mockReturnValue(
      mockSubprocess({
        exitCode: undefined,
        shortMessage: "Command failed with ENOENT: git fetch\nspawn git ENOENT",
        message: "long message",
      }),
    );

    await expect(runGit(["fetch"])).resolves.toEqual({
      status: "error",
      message: "Command failed with ENOENT: git fetch\nspawn git ENOENT",
    });
  });

  it("catches a synchronous execa failure", async () => {
    mockedExeca.mockImplementation(() => {
      throw new Error("Invalid option");
    });

    await expect(runGit(["status"])).resolves.toEqual({
      status: "error",
      message: "Invalid option",
    });
  });
});

describe("git result helpers", () => {
  it("treats only exit code 0 as success", () => {
    expect(isSuccessful({ status: "exited", exitCode: 0 })).toBe(true);
    expect(isSuccessful({ status: "exited", exitCode: 1 })).toBe(false);
    expect(isSuccessful({ status: "error", message: "spawn git ENOENT" })).toBe(false);
  });

  it("describes a result for log lines", () => {
    expect(describeGitResult({ status: "exited", exitCode: 128 })).toBe("exit code 128");
    expect(describeGitResult({ status: "error", message: "spawn git ENOENT" })).toBe(
      "spawn git ENOENT",
    );
  });
});
