import { EventEmitter } from "eventemitter3";

import type { CloneOutcome, RepositoryDescriptor } from "./types.js";

export interface CloneEvents {
  "listing:page": { page: number; count: number };
  "listing:rate-limited": { page: number; waitSeconds: number };
  "clone:started": { repo: RepositoryDescriptor };
  "clone:retrying": {
    name: string;
    exitCode: number | null;
    delaySeconds: number;
    attempt: number;
    maxRetries: number;
  };
  "clone:completed": { outcome: CloneOutcome; completed: number; total: number };
}

type CloneEventArgs = {
  [K in keyof CloneEvents]: [payload: CloneEvents[K]];
};

export type CloneEventBus = EventEmitter<CloneEventArgs>;

export function createEventBus(): CloneEventBus {
  return new EventEmitter<CloneEventArgs>();
}
