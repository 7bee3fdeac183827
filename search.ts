export interface OwnerAndRepository {
  owner: string;
  repository?: string;
}

/**
 * Pull the repo:, org:, owner: and user: qualifiers out of a search query
 */
export function getOwnersAndRepositories(searchQuery: string): OwnerAndRepository[] {
  const results: OwnerAndRepository[] = [];

  for (const term of searchQuery.split(/\s+/)) {
    const [qualifier, value] = term.split(':', 2);
    if (!value) continue;

    if (qualifier === 'repo' && value.includes('/')) {
      const [owner, repository] = value.split('/', 2);
      results.push({ owner, repository });
    } else if (qualifier === 'org' || qualifier === 'owner' || qualifier === 'user') {
      results.push({ owner: value });
    }
  }

  return results;
}

export function describeRepositories(searchQuery: string): string {
  return getOwnersAndRepositories(searchQuery)
    .map(entry => (entry.repository ? `${entry.owner}/${entry.repository}` : entry.owner))
    .join(', ');
}

export function isDiscussionQuery(searchQuery: string): boolean {
  return searchQuery.includes('type:discussions');
}
