/**
 * Repository URL utilities
 */

/**
 * Extract repository name from a git URL, or `null` when there is none.
 *
 * @example
 * extractRepoName('git@github.com:acme/widgets.git') // 'widgets'
 * extractRepoName('https://example.com/org/api.git') // 'api'
 * extractRepoName('/srv/git/core') // 'core'
 */
export function extractRepoName(url: string): string | null {
  // Handle SSH: git@host:org/repo.git
  // Handle HTTPS and local paths: https://host/org/repo.git, /srv/git/repo
  const match = url.replace(/\/+$/, '').match(/(?:^|[/:])([^/:]+?)(?:\.git)?$/);
  return match ? match[1] : null;
}
