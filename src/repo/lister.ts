import { Octokit } from "@octokit/rest";
import { z } from "zod";

import {
  CloneError,
  type CloneEventBus,
  DEFAULT_API_URL,
  type RepositoryDescriptor,
  type Sleep,
  apiError,
  isRecord,
  sleep as defaultSleep,
  toErrorMessage,
  truncate,
} from "../core/index.js";

export const PAGE_SIZE = 100;
const DEFAULT_RATE_LIMIT_WAIT_SECONDS = 60;
const RATE_LIMIT_PATTERN = /rate limit/i;

const RepositoryRecordSchema = z.object({
  name: z.string().min(1),
  clone_url: z.string().min(1),
  ssh_url: z.string().min(1),
  archived: z.boolean(),
});

export interface RepositoryListerOptions {
  org: string;
  baseUrl?: string;
  bus?: CloneEventBus;
  sleep?: Sleep;
  /** Clock in milliseconds, used against `X-RateLimit-Reset`. */
  now?: () => number;
  /** Replaces the global `fetch` Octokit uses. */
  fetch?: typeof globalThis.fetch;
}

export interface ListRepositoriesParams {
  token?: string;
  includeArchived: boolean;
}

interface HttpFailure {
  status: number;
  hasResponse: boolean;
  text: string;
  rateLimitReset?: string;
}

const quiet = (): void => {};

/**
 * Walks `GET /orgs/{org}/repos` page by page until an empty page comes back.
 * Rate-limited pages are retried after the reset time, without limit.
 */
export class RepositoryLister {
  private readonly octokit: Octokit;
  private readonly org: string;
  private readonly bus?: CloneEventBus;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  public constructor(options: RepositoryListerOptions) {
    this.org = options.org;
    this.bus = options.bus;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.octokit = new Octokit({
      baseUrl: options.baseUrl ?? DEFAULT_API_URL,
      userAgent: "orgclone",
      log: { debug: quiet, info: quiet, warn: quiet, error: quiet },
      ...(options.fetch ? { request: { fetch: options.fetch } } : {}),
    });
  }

  public async listRepositories(params: ListRepositoriesParams): Promise<RepositoryDescriptor[]> {
    const token = params.token?.trim();
    const descriptors: RepositoryDescriptor[] = [];
    const seen = new Set<string>();

    for (let page = 1; ; page += 1) {
      const records = await this.fetchPage(page, token);
      if (records.length === 0) {
        break;
      }

      for (const [index, record] of records.entries()) {
        const repo = parseRepositoryRecord(record, { page, index });
        if (seen.has(repo.name)) {
          continue;
        }

        seen.add(repo.name);
        if (repo.archived && !params.includeArchived) {
          continue;
        }

        descriptors.push(repo);
      }

      this.bus?.emit("listing:page", { page, count: records.length });
    }

    return descriptors;
  }

  private async fetchPage(page: number, token: string | undefined): Promise<unknown[]> {
    for (;;) {
      try {
        const response = await this.octokit.request("GET /orgs/{org}/repos", {
          org: this.org,
          per_page: PAGE_SIZE,
          page,
          type: "all",
          sort: "full_name",
          direction: "asc",
          headers: {
            accept: "application/vnd.github+json",
            ...(token ? { authorization: `Bearer ${token}` } : {}),
          },
        });

        const data: unknown = response.data;
        if (!Array.isArray(data)) {
          throw apiError(
            "API_RESPONSE_INVALID",
            `Unexpected response for page ${page}: ${truncate(String(JSON.stringify(data)), 500)}`,
            { context: { org: this.org, page } },
          );
        }

        return data;
      } catch (error) {
        if (error instanceof CloneError) {
          throw error;
        }

        const failure = readHttpFailure(error);
        if (failure && isRateLimited(failure)) {
          const waitSeconds = rateLimitWaitSeconds(failure.rateLimitReset, this.now());
          this.bus?.emit("listing:rate-limited", { page, waitSeconds });
          await this.sleep(waitSeconds * 1000);
          continue;
        }

        throw toListingError(error, failure, this.org, page);
      }
    }
  }
}

export function parseRepositoryRecord(
  record: unknown,
  position: { page: number; index: number },
): RepositoryDescriptor {
  const parsed = RepositoryRecordSchema.safeParse(record);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "<root>");
    throw apiError(
      "API_RESPONSE_INVALID",
      `Repository record ${position.index} on page ${position.page} is missing or has invalid fields: ${[...new Set(fields)].join(", ")}`,
      { context: { ...position, issues: parsed.error.issues.map((issue) => issue.message) } },
    );
  }

  return Object.freeze({
    name: parsed.data.name,
    httpCloneUrl: parsed.data.clone_url,
    sshCloneUrl: parsed.data.ssh_url,
    archived: parsed.data.archived,
  });
}

/**
 * Seconds until `X-RateLimit-Reset` (epoch seconds), at least 1. Falls back to
 * 60 when the header is missing or not an integer.
 */
export function rateLimitWaitSeconds(resetHeader: string | undefined, nowMs: number): number {
  const raw = resetHeader?.trim() ?? "";
  if (!/^-?\d+$/.test(raw)) {
    return DEFAULT_RATE_LIMIT_WAIT_SECONDS;
  }

  return Math.max(1, Number.parseInt(raw, 10) - Math.floor(nowMs / 1000));
}

function isRateLimited(failure: HttpFailure): boolean {
  return failure.status === 403 && RATE_LIMIT_PATTERN.test(failure.text);
}

function readHttpFailure(error: unknown): HttpFailure | undefined {
  if (!isRecord(error) || typeof error.status !== "number") {
    return undefined;
  }

  const response = isRecord(error.response) ? error.response : undefined;
  const headers = response && isRecord(response.headers) ? response.headers : undefined;
  const reset = headers?.["x-ratelimit-reset"];
  const data = response?.data;
  const body = typeof data === "string" ? data : JSON.stringify(data ?? "");
  const message = typeof error.message === "string" ? error.message : "";

  return {
    status: error.status,
    hasResponse: response !== undefined,
    text: `${message}\n${body}`,
    rateLimitReset: typeof reset === "string" || typeof reset === "number" ? String(reset) : undefined,
  };
}

function toListingError(
  error: unknown,
  failure: HttpFailure | undefined,
  org: string,
  page: number,
): CloneError {
  const message = toErrorMessage(error);

  if (!failure || !failure.hasResponse) {
    return apiError("NETWORK_ERROR", `Could not reach the GitHub API (page ${page}): ${message}`, {
      context: { org, page },
      cause: error,
    });
  }

  return apiError(
    "API_ERROR",
    `GitHub API returned ${failure.status} while listing "${org}" (page ${page}): ${message}`,
    { context: { org, page, status: failure.status }, cause: error },
  );
}
