import type { RepoErrorCode } from "./errors.js";

export interface RepositoryDescriptor {
  readonly name: string;
  readonly httpCloneUrl: string;
  readonly sshCloneUrl: string;
  readonly archived: boolean;
}

export interface ClonedOutcome {
  status: "cloned";
  name: string;
  /** Number of `git clone` invocations it took, 1 when the first one succeeded. */
  attempts: number;
}

export interface UpdatedOutcome {
  status: "updated";
  name: string;
  /**
   * `false` when the fetch succeeded but `git pull --ff-only` did not, e.g. a
   * diverged local branch. Mirrors are always `true`.
   */
  fastForward: boolean;
}

export interface FailedOutcome {
  status: "failed";
  name: string;
  code: RepoErrorCode;
  reason: string;
  exitCode?: number;
}

export type CloneOutcome = ClonedOutcome | UpdatedOutcome | FailedOutcome;

export interface RunSummary {
  total: number;
  successCount: number;
  cloned: number;
  updated: number;
  notFastForwarded: string[];
  failures: FailedOutcome[];
}

/**
 * Line sink shared by concurrent workers. Implementations must keep any live
 * progress display intact while printing.
 */
export interface OutputChannel {
  write(line: string): void;
}

export const silentOutput: OutputChannel = {
  write: () => {},
};
