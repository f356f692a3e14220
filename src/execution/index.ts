export { runPool } from "./pool.js";
export type { PoolDeps, ProcessOne } from "./pool.js";
