import { describe, expect, it, vi } from 'vitest';
import { SearchError } from '../errors.js';
import { buildSearchQuery, searchPlugins } from './search.js';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json' },
    });
}

function respondWith(response: Response) {
    return vi.fn(async (_url: string, _init: RequestInit) => response);
}

const ITEMS = [
    {
        name: 'hookline-plugin-notes',
        full_name: 'someone/hookline-plugin-notes',
        description: 'Sync todos to notes',
        owner: { login: 'someone' },
        stargazers_count: 12,
        html_url: 'https://github.com/someone/hookline-plugin-notes',
        updated_at: '2026-01-02T03:04:05Z',
    },
    {
        name: 'hookline-plugin-notes-lite',
        full_name: 'other/hookline-plugin-notes-lite',
        description: null,
        owner: { login: 'other' },
        stargazers_count: 0,
        html_url: 'https://github.com/other/hookline-plugin-notes-lite',
        updated_at: '2025-06-01T00:00:00Z',
    },
];

describe('buildSearchQuery', () => {
    it('always requires the plugin topic', () => {
        expect(buildSearchQuery('notes')).toBe('hookline-plugin-notes in:name topic:hookline-plugin');
        expect(buildSearchQuery('')).toBe('hookline-plugin- in:name topic:hookline-plugin');
    });

    it('adds an extra topic filter', () => {
        expect(buildSearchQuery('notes', 'productivity'))
            .toBe('hookline-plugin-notes in:name topic:hookline-plugin topic:productivity');
    });
});

describe('searchPlugins', () => {
    it('queries repositories by stars and maps the results', async () => {
        const fetchFn = respondWith(jsonResponse({ total_count: 2, items: ITEMS }));

        const results = await searchPlugins('notes', { tag: 'productivity', token: 'test-token', fetch: fetchFn });

        expect(fetchFn).toHaveBeenCalledTimes(1);
        const [url, init] = fetchFn.mock.calls[0];
        const parsed = new URL(url);
        expect(parsed.origin + parsed.pathname).toBe('https://api.github.com/search/repositories');
        expect(parsed.searchParams.get('q')).toBe('hookline-plugin-notes in:name topic:hookline-plugin topic:productivity');
        expect(parsed.searchParams.get('sort')).toBe('stars');
        expect(parsed.searchParams.get('per_page')).toBe('20');
        expect(init.headers).toEqual({
            Accept: 'application/vnd.github+json',
            'User-Agent': 'hookline',
            Authorization: 'Bearer test-token',
        });

        expect(results).toEqual([
            {
                name: 'hookline-plugin-notes',
                fullName: 'someone/hookline-plugin-notes',
                description: 'Sync todos to notes',
                author: 'someone',
                stars: 12,
                url: 'https://github.com/someone/hookline-plugin-notes',
                updatedAt: '2026-01-02T03:04:05Z',
            },
            {
                name: 'hookline-plugin-notes-lite',
                fullName: 'other/hookline-plugin-notes-lite',
                description: '',
                author: 'other',
                stars: 0,
                url: 'https://github.com/other/hookline-plugin-notes-lite',
                updatedAt: '2025-06-01T00:00:00Z',
            },
        ]);
    });

    it('sends no authorization without a token', async () => {
        const fetchFn = respondWith(jsonResponse({ items: [] }));

        expect(await searchPlugins('', { fetch: fetchFn })).toEqual([]);
        expect(fetchFn.mock.calls[0][1].headers).not.toHaveProperty('Authorization');
    });

    it('reports a rate limit separately', async () => {
        const fetchFn = respondWith(jsonResponse({ message: 'API rate limit exceeded' }, 403));

        const err = await searchPlugins('notes', { fetch: fetchFn }).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(SearchError);
        expect(err).toHaveProperty('code', 'SEARCH_RATE_LIMITED');
        expect(err).toHaveProperty('status', 403);
        expect(err).toHaveProperty('message', 'GitHub API rate limit exceeded; try again later or set GITHUB_TOKEN');
    });

    it('reports other HTTP failures with their status', async () => {
        const fetchFn = respondWith(jsonResponse({}, 502));

        const err = await searchPlugins('notes', { fetch: fetchFn }).catch((e: unknown) => e);

        expect(err).toHaveProperty('code', 'SEARCH_FAILED');
        expect(err).toHaveProperty('message', 'GitHub search returned HTTP 502');
    });

    it('rejects a response without items', async () => {
        const fetchFn = respondWith(jsonResponse({ total_count: 0 }));

        await expect(searchPlugins('notes', { fetch: fetchFn }))
            .rejects.toThrow('unexpected GitHub response: items: Required');
    });

    it('wraps network failures', async () => {
        const fetchFn = vi.fn(async (_url: string, _init: RequestInit): Promise<Response> => {
            throw new TypeError('fetch failed');
        });

        const err = await searchPlugins('notes', { fetch: fetchFn }).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(SearchError);
        expect(err).toHaveProperty('message', 'GitHub search request failed: fetch failed');
        expect(err).toHaveProperty('cause', expect.any(TypeError));
    });
});
