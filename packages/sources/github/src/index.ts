import {
  asNumber,
  asString,
  collectFromQueries,
  defineSource,
  fetchJson,
  isRecord,
  type CollectOptions,
  type CollectResult,
  type RawRecord,
} from '@jobcorpus/source-sdk';

const API_URL = 'https://api.github.com/search/repositories';
const PER_PAGE = 10;
const QUERIES = [
  'job description software engineer',
  'interview questions programming',
  'resume template developer',
  'hiring process tech',
] as const;

interface GitHubRepository {
  name: string;
  fullName?: string;
  owner: string;
  description: string;
  htmlUrl: string;
  stars?: number;
  language?: string;
}

function toGitHubRepository(value: unknown): GitHubRepository | null {
  if (!isRecord(value)) {
    return null;
  }

  const name = asString(value.name)?.trim();
  const htmlUrl = asString(value.html_url)?.trim();
  const owner = isRecord(value.owner) ? asString(value.owner.login) : undefined;
  if (!name || !htmlUrl || !owner) {
    return null;
  }

  return {
    name,
    fullName: asString(value.full_name),
    owner,
    description: asString(value.description) ?? '',
    htmlUrl,
    stars: asNumber(value.stargazers_count),
    language: asString(value.language),
  };
}

function toRawRecord(repo: GitHubRepository): RawRecord {
  return {
    source: 'GitHub',
    title: repo.name,
    company: repo.owner,
    description: repo.description,
    url: repo.htmlUrl,
    type: 'repository',
    score: repo.stars,
    extras: {
      fullName: repo.fullName,
      language: repo.language,
    },
  };
}

async function searchRepositories(query: string): Promise<RawRecord[]> {
  const params = new URLSearchParams({ q: query, sort: 'stars', order: 'desc', per_page: String(PER_PAGE) });
  const payload = await fetchJson(`${API_URL}?${params.toString()}`, {
    label: 'GitHub API',
    headers: { Accept: 'application/vnd.github+json' },
  });

  if (!isRecord(payload) || !Array.isArray(payload.items)) {
    throw new Error('GitHub API returned invalid payload');
  }

  return payload.items
    .map(toGitHubRepository)
    .filter((repo): repo is GitHubRepository => repo !== null)
    .map(toRawRecord);
}

export async function collect(options: CollectOptions = {}): Promise<CollectResult> {
  return collectFromQueries(QUERIES, searchRepositories, {
    label: 'GitHub',
    limit: options.limit,
    describe: (query) => `query "${query}"`,
  });
}

export const githubSource = defineSource({
  manifest: {
    id: 'github',
    name: 'GitHub',
    version: '0.1.0',
  },
  collect,
});
