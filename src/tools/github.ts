import { z } from 'zod';
import { errorMessage } from '../errors';
import { defineFunction, type Tool } from '../types';
import { getJson, parseResponse, type QueryParams } from './http';
import { hasParams, limitParam, nullable } from './params';

const GITHUB_API_BASE = 'https://api.github.com';

export interface GitHubToolOptions {
  /** 可选；不带 token 也能用，只是限流更严格 (60 次/小时) */
  token?: string;
  baseUrl?: string;
}

export type RepositorySummary = {
  name: string;
  fullName: string;
  owner: string | null;
  description: string | null;
  url: string;
  stars: number;
  forks: number;
  language: string | null;
  topics: string[];
  createdAt: string | null;
  updatedAt: string | null;
  openIssues: number;
};

export type RepositorySearch = {
  query: string;
  totalCount: number;
  returnedCount: number;
  repositories: RepositorySummary[];
};

export type RepositoryDetails = {
  repository: RepositorySummary & {
    homepage: string | null;
    watchers: number;
    languages: Record<string, number>;
    license: string | null;
    pushedAt: string | null;
    defaultBranch: string | null;
    isFork: boolean;
    isArchived: boolean;
    topContributors: { username: string; contributions: number }[];
  };
};

export type UserRepositories = {
  user: {
    username: string;
    name: string | null;
    bio: string | null;
    publicRepos: number;
    followers: number;
    following: number;
    profileUrl: string;
  };
  repositories: RepositorySummary[];
  returnedCount: number;
};

// --- GitHub REST 响应 (只取用到的字段) ---

const RepoSchema = z.object({
  name: z.string(),
  full_name: z.string(),
  owner: nullable(z.object({ login: z.string() })),
  description: nullable(z.string()),
  html_url: z.string(),
  homepage: nullable(z.string()),
  stargazers_count: z.number().default(0),
  forks_count: z.number().default(0),
  watchers_count: z.number().default(0),
  open_issues_count: z.number().default(0),
  language: nullable(z.string()),
  topics: z.array(z.string()).default([]),
  license: nullable(z.object({ name: z.string() })),
  created_at: nullable(z.string()),
  updated_at: nullable(z.string()),
  pushed_at: nullable(z.string()),
  default_branch: nullable(z.string()),
  fork: z.boolean().default(false),
  archived: z.boolean().default(false),
});

type Repo = z.infer<typeof RepoSchema>;

const SearchSchema = z.object({
  total_count: z.number(),
  items: z.array(RepoSchema),
});

const UserSchema = z.object({
  login: z.string(),
  name: nullable(z.string()),
  bio: nullable(z.string()),
  public_repos: z.number().default(0),
  followers: z.number().default(0),
  following: z.number().default(0),
  html_url: z.string(),
});

const LanguagesSchema = z.record(z.number());
const ContributorsSchema = z.array(z.object({ login: z.string(), contributions: z.number() }));

function toSummary(repo: Repo): RepositorySummary {
  return {
    name: repo.name,
    fullName: repo.full_name,
    owner: repo.owner?.login ?? null,
    description: repo.description,
    url: repo.html_url,
    stars: repo.stargazers_count,
    forks: repo.forks_count,
    language: repo.language,
    topics: repo.topics,
    createdAt: repo.created_at,
    updatedAt: repo.updated_at,
    openIssues: repo.open_issues_count,
  };
}

function formatRepositoryLines(repositories: RepositorySummary[]): string[] {
  return repositories.slice(0, 5).flatMap((repo) => [
    `- **${repo.fullName}**: ${repo.description ?? 'No description'}`,
    `  ⭐ ${repo.stars} | 🍴 ${repo.forks} | Language: ${repo.language ?? 'N/A'}`,
  ]);
}

export function createGitHubTool({ token, baseUrl = GITHUB_API_BASE }: GitHubToolOptions = {}): Tool {
  const headers: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    'User-Agent': 'ops-assistant',
    'X-GitHub-Api-Version': '2022-11-28',
  };
  if (token) headers.Authorization = `Bearer ${token}`;

  const request = (path: string, params?: QueryParams) =>
    getJson(`${baseUrl}${path}`, { tool: 'github', params, headers });

  /** 次要信息 (语言、贡献者) 拿不到时不影响主结果 */
  async function bestEffort<T>(label: string, load: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await load();
    } catch (error) {
      console.warn(`[GitHub] ${label} unavailable: ${errorMessage(error)}`);
      return fallback;
    }
  }

  const searchRepositories = defineFunction({
    name: 'search_repositories',
    description: 'Search GitHub repositories by keyword, sorted by stars',
    parameters: z.object({
      query: z.string().trim().min(1).describe('Search keywords; GitHub qualifiers such as language:python are allowed'),
      limit: limitParam(5).describe('Maximum number of repositories (1-100, default 5)'),
    }),
    handler: async ({ query, limit }): Promise<RepositorySearch> => {
      console.log(`[GitHub] Searching repositories for: ${query}`);
      const body = await request('/search/repositories', { q: query, sort: 'stars', order: 'desc', per_page: limit });
      const result = parseResponse('github', SearchSchema, body);
      const repositories = result.items.slice(0, limit).map(toSummary);
      return { query, totalCount: result.total_count, returnedCount: repositories.length, repositories };
    },
    summarize: (data) =>
      data.repositories.length > 0
        ? formatRepositoryLines(data.repositories).join('\n')
        : `No repositories found for "${data.query}".`,
  });

  const getRepositoryDetails = defineFunction({
    name: 'get_repository_details',
    description: 'Get detailed information about a specific repository, including languages and top contributors',
    parameters: z.object({
      owner: z.string().trim().min(1).describe('Repository owner (user or organization)'),
      repo: z.string().trim().min(1).describe('Repository name'),
    }),
    handler: async ({ owner, repo }): Promise<RepositoryDetails> => {
      console.log(`[GitHub] Getting details for repository: ${owner}/${repo}`);
      const base = `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
      const details = parseResponse('github', RepoSchema, await request(base));

      const languages = await bestEffort<Record<string, number>>(
        'languages',
        async () => parseResponse('github', LanguagesSchema, await request(`${base}/languages`)),
        {}
      );
      const contributors = await bestEffort<z.infer<typeof ContributorsSchema>>(
        'contributors',
        async () => parseResponse('github', ContributorsSchema, await request(`${base}/contributors`, { per_page: 5 })),
        []
      );

      return {
        repository: {
          ...toSummary(details),
          homepage: details.homepage,
          watchers: details.watchers_count,
          languages,
          license: details.license?.name ?? null,
          pushedAt: details.pushed_at,
          defaultBranch: details.default_branch,
          isFork: details.fork,
          isArchived: details.archived,
          topContributors: contributors.slice(0, 5).map((c) => ({ username: c.login, contributions: c.contributions })),
        },
      };
    },
    summarize: ({ repository }) =>
      [
        `**${repository.fullName}**`,
        `- Description: ${repository.description ?? 'No description'}`,
        `- Stars: ${repository.stars} | Forks: ${repository.forks}`,
        `- Language: ${repository.language ?? 'N/A'}`,
        `- URL: ${repository.url}`,
      ].join('\n'),
  });

  const getUserRepos = defineFunction({
    name: 'get_user_repos',
    description: 'Get a GitHub user profile and their most recently updated public repositories',
    parameters: z.object({
      username: z.string().trim().min(1).describe('GitHub username'),
      limit: limitParam(10).describe('Maximum number of repositories (1-100, default 10)'),
    }),
    handler: async ({ username, limit }): Promise<UserRepositories> => {
      console.log(`[GitHub] Getting repositories for user: ${username}`);
      const path = `/users/${encodeURIComponent(username)}`;
      const user = parseResponse('github', UserSchema, await request(path));
      const repos = parseResponse(
        'github',
        z.array(RepoSchema),
        await request(`${path}/repos`, { sort: 'updated', direction: 'desc', per_page: limit })
      );
      const repositories = repos.slice(0, limit).map(toSummary);

      return {
        user: {
          username: user.login,
          name: user.name,
          bio: user.bio,
          publicRepos: user.public_repos,
          followers: user.followers,
          following: user.following,
          profileUrl: user.html_url,
        },
        repositories,
        returnedCount: repositories.length,
      };
    },
    summarize: ({ user, repositories }) =>
      [
        `**User: ${user.username}** (${user.name ?? 'N/A'})`,
        `Public repos: ${user.publicRepos} | Followers: ${user.followers}`,
        ...formatRepositoryLines(repositories),
      ].join('\n'),
  });

  return {
    name: 'github',
    description: 'GitHub API integration for searching and retrieving repository information',
    functions: [searchRepositories, getRepositoryDetails, getUserRepos],
    inferFunction: (parameters) => {
      if (hasParams(parameters, 'owner', 'repo')) return 'get_repository_details';
      if (hasParams(parameters, 'username')) return 'get_user_repos';
      return 'search_repositories';
    },
  };
}
