/**
 * Picks the API credential: `--token`, then GITHUB_TOKEN, then GH_TOKEN.
 * Blank values are skipped.
 */
export function resolveGitHubToken(
  flagToken: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  for (const candidate of [flagToken, env.GITHUB_TOKEN, env.GH_TOKEN]) {
    const token = candidate?.trim();
    if (token) {
      return token;
    }
  }

  return undefined;
}
