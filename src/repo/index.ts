export {
  buildCloneArgs,
  cloneBackoffSeconds,
  cloneTargetPath,
  processOne,
} from "./cloner.js";
export type { CloneWorkerDeps } from "./cloner.js";
export { describeGitResult, isSuccessful, runGit } from "./git-runner.js";
export type { GitRunOptions, GitRunResult, GitRunner } from "./git-runner.js";
export {
  PAGE_SIZE,
  RepositoryLister,
  parseRepositoryRecord,
  rateLimitWaitSeconds,
} from "./lister.js";
export type { ListRepositoriesParams, RepositoryListerOptions } from "./lister.js";
