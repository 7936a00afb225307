import { describe, expect, it } from 'vitest';
import { createGitHubTool } from '../tools/github';
import { captureToolError, getFunction, jsonResponse, requestedHeaders, requestedUrl, stubFetch } from './helpers';

function repo(name: string, overrides: Record<string, unknown> = {}) {
  return {
    name,
    full_name: `octo-org/${name}`,
    owner: { login: 'octo-org' },
    description: `${name} description`,
    html_url: `https://github.com/octo-org/${name}`,
    homepage: null,
    stargazers_count: 100,
    forks_count: 10,
    watchers_count: 100,
    open_issues_count: 3,
    language: 'TypeScript',
    topics: ['cli'],
    license: { key: 'mit', name: 'MIT License' },
    created_at: '2024-01-01T00:00:00Z',
    updated_at: '2026-10-01T00:00:00Z',
    pushed_at: '2026-10-02T00:00:00Z',
    default_branch: 'main',
    fork: false,
    archived: false,
    ...overrides,
  };
}

const alphaSummary = {
  name: 'alpha',
  fullName: 'octo-org/alpha',
  owner: 'octo-org',
  description: 'alpha description',
  url: 'https://github.com/octo-org/alpha',
  stars: 100,
  forks: 10,
  language: 'TypeScript',
  topics: ['cli'],
  createdAt: '2024-01-01T00:00:00Z',
  updatedAt: '2026-10-01T00:00:00Z',
  openIssues: 3,
};

describe('github tool', () => {
  it('searches repositories by stars', async () => {
    const tool = createGitHubTool({ token: 'test-token' });
    const fetchMock = stubFetch(
      jsonResponse({
        total_count: 42,
        items: [repo('alpha'), repo('beta', { description: null, language: null, stargazers_count: 50 }), repo('gamma')],
      })
    );

    const output = await getFunction(tool, 'search_repositories').invoke({ query: 'cli tools', limit: '2' });

    const url = requestedUrl(fetchMock);
    expect(url.origin + url.pathname).toBe('https://api.github.com/search/repositories');
    expect(Object.fromEntries(url.searchParams)).toEqual({ q: 'cli tools', sort: 'stars', order: 'desc', per_page: '2' });
    const headers = requestedHeaders(fetchMock);
    expect(headers.get('accept')).toBe('application/vnd.github+json');
    expect(headers.get('authorization')).toBe('Bearer test-token');
    expect(headers.get('user-agent')).toBe('ops-assistant');

    expect(output.data).toMatchObject({ query: 'cli tools', totalCount: 42, returnedCount: 2 });
    expect(output.data.repositories).toEqual([
      alphaSummary,
      {
        ...alphaSummary,
        name: 'beta',
        fullName: 'octo-org/beta',
        description: null,
        url: 'https://github.com/octo-org/beta',
        stars: 50,
        language: null,
      },
    ]);
    expect(output.summary).toBe(
      [
        '- **octo-org/alpha**: alpha description',
        '  ⭐ 100 | 🍴 10 | Language: TypeScript',
        '- **octo-org/beta**: No description',
        '  ⭐ 50 | 🍴 10 | Language: N/A',
      ].join('\n')
    );
  });

  it('sends no authorization header without a token', async () => {
    const fetchMock = stubFetch(jsonResponse({ total_count: 0, items: [] }));

    const output = await getFunction(createGitHubTool(), 'search_repositories').invoke({ query: 'zzz' });

    expect(requestedHeaders(fetchMock).has('authorization')).toBe(false);
    expect(requestedUrl(fetchMock).searchParams.get('per_page')).toBe('5');
    expect(output.summary).toBe('No repositories found for "zzz".');
  });

  it('gets repository details and tolerates missing secondary data', async () => {
    const fetchMock = stubFetch(
      jsonResponse(repo('alpha', { homepage: 'https://alpha.example.com' })),
      jsonResponse({ message: 'Server Error' }, 500),
      jsonResponse([
        { login: 'dev-one', contributions: 120, type: 'User' },
        { login: 'dev-two', contributions: 30, type: 'User' },
      ])
    );

    const output = await getFunction(createGitHubTool(), 'get_repository_details').invoke({
      owner: 'octo-org',
      repo: 'alpha',
    });

    expect(fetchMock.mock.calls.map((_, i) => requestedUrl(fetchMock, i).toString())).toEqual([
      'https://api.github.com/repos/octo-org/alpha',
      'https://api.github.com/repos/octo-org/alpha/languages',
      'https://api.github.com/repos/octo-org/alpha/contributors?per_page=5',
    ]);
    expect(output.data).toEqual({
      repository: {
        ...alphaSummary,
        homepage: 'https://alpha.example.com',
        watchers: 100,
        languages: {},
        license: 'MIT License',
        pushedAt: '2026-10-02T00:00:00Z',
        defaultBranch: 'main',
        isFork: false,
        isArchived: false,
        topContributors: [
          { username: 'dev-one', contributions: 120 },
          { username: 'dev-two', contributions: 30 },
        ],
      },
    });
    expect(output.summary).toBe(
      [
        '**octo-org/alpha**',
        '- Description: alpha description',
        '- Stars: 100 | Forks: 10',
        '- Language: TypeScript',
        '- URL: https://github.com/octo-org/alpha',
      ].join('\n')
    );
  });

  it('fails when the repository does not exist', async () => {
    const fetchMock = stubFetch(jsonResponse({ message: 'Not Found' }, 404));

    const error = await captureToolError(
      getFunction(createGitHubTool(), 'get_repository_details').invoke({ owner: 'octo-org', repo: 'missing' })
    );

    expect(error).toMatchObject({ kind: 'not_found', message: 'github: resource not found (HTTP 404) - Not Found' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('gets a user profile with recently updated repositories', async () => {
    const fetchMock = stubFetch(
      jsonResponse({
        login: 'octocat',
        name: null,
        bio: 'Builds things',
        public_repos: 8,
        followers: 1200,
        following: 9,
        html_url: 'https://github.com/octocat',
      }),
      jsonResponse([repo('alpha')])
    );

    const output = await getFunction(createGitHubTool(), 'get_user_repos').invoke({ username: 'octocat', limit: 3 });

    expect(requestedUrl(fetchMock, 0).pathname).toBe('/users/octocat');
    expect(requestedUrl(fetchMock, 1).toString()).toBe(
      'https://api.github.com/users/octocat/repos?sort=updated&direction=desc&per_page=3'
    );
    expect(output.data).toEqual({
      user: {
        username: 'octocat',
        name: null,
        bio: 'Builds things',
        publicRepos: 8,
        followers: 1200,
        following: 9,
        profileUrl: 'https://github.com/octocat',
      },
      repositories: [alphaSummary],
      returnedCount: 1,
    });
    expect(output.summary).toBe(
      [
        '**User: octocat** (N/A)',
        'Public repos: 8 | Followers: 1200',
        '- **octo-org/alpha**: alpha description',
        '  ⭐ 100 | 🍴 10 | Language: TypeScript',
      ].join('\n')
    );
  });

  it('clamps the limit parameter', () => {
    const fn = getFunction(createGitHubTool(), 'search_repositories');

    expect(fn.validate({ query: 'x', limit: 500 })).toEqual({ ok: true, params: { query: 'x', limit: 100 } });
    expect(fn.validate({ query: 'x', limit: 0 })).toEqual({ ok: true, params: { query: 'x', limit: 1 } });
    expect(fn.validate({ query: '  ' })).toEqual({
      ok: false,
      issues: ['query: String must contain at least 1 character(s)'],
    });
  });

  it('infers the function from the parameters', () => {
    const tool = createGitHubTool();

    expect(tool.inferFunction?.({ owner: 'a', repo: 'b' }, '')).toBe('get_repository_details');
    expect(tool.inferFunction?.({ username: 'a' }, '')).toBe('get_user_repos');
    expect(tool.inferFunction?.({ owner: 'a' }, '')).toBe('search_repositories');
  });
});
