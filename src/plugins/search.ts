import { z } from 'zod';
import { SearchError, errorMessage } from '../errors.js';

/**
 * Plugin Search — finds plugin repositories on GitHub
 *
 * Plugins are published as repositories named `hookline-plugin-<name>`
 * carrying the `hookline-plugin` topic. Both are required of every result.
 */

export const PLUGIN_REPO_PREFIX = 'hookline-plugin-';
export const PLUGIN_TOPIC = 'hookline-plugin';

const SEARCH_URL = 'https://api.github.com/search/repositories';
const SEARCH_TIMEOUT_MS = 10_000;
const PER_PAGE = 20;

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface SearchOptions {
    /** Extra GitHub topic the repository must carry */
    tag?: string;
    /** Sent as a bearer token for the higher rate limit */
    token?: string;
    fetch?: FetchFn;
    timeoutMs?: number;
}

export interface SearchResult {
    name: string;
    fullName: string;
    description: string;
    author: string;
    stars: number;
    url: string;
    updatedAt: string;
}

const SearchResponseSchema = z.object({
    items: z.array(z.object({
        name: z.string(),
        full_name: z.string(),
        description: z.string().nullish(),
        owner: z.object({ login: z.string() }),
        stargazers_count: z.number(),
        html_url: z.string(),
        updated_at: z.string(),
    })),
});

export function buildSearchQuery(query: string, tag?: string): string {
    let q = `${PLUGIN_REPO_PREFIX}${query.trim()} in:name topic:${PLUGIN_TOPIC}`;
    if (tag) q += ` topic:${tag}`;
    return q;
}

/**
 * Search GitHub for plugin repositories, most starred first
 */
export async function searchPlugins(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const url = new URL(SEARCH_URL);
    url.searchParams.set('q', buildSearchQuery(query, options.tag));
    url.searchParams.set('sort', 'stars');
    url.searchParams.set('per_page', String(PER_PAGE));

    const headers: Record<string, string> = {
        Accept: 'application/vnd.github+json',
        'User-Agent': 'hookline',
    };
    if (options.token) {
        headers.Authorization = `Bearer ${options.token}`;
    }

    const fetchFn = options.fetch ?? fetch;
    let res: Response;
    try {
        res = await fetchFn(url.toString(), {
            headers,
            signal: AbortSignal.timeout(options.timeoutMs ?? SEARCH_TIMEOUT_MS),
        });
    } catch (err) {
        throw new SearchError(`GitHub search request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (res.status === 403 || res.status === 429) {
        throw new SearchError('GitHub API rate limit exceeded; try again later or set GITHUB_TOKEN', {
            status: res.status,
            rateLimited: true,
        });
    }
    if (!res.ok) {
        throw new SearchError(`GitHub search returned HTTP ${res.status}`, { status: res.status });
    }

    let body: unknown;
    try {
        body = await res.json();
    } catch (err) {
        throw new SearchError(`parsing GitHub response: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        throw new SearchError(`unexpected GitHub response: ${where}${issue?.message ?? 'invalid shape'}`);
    }

    return parsed.data.items.map(item => ({
        name: item.name,
        fullName: item.full_name,
        description: item.description ?? '',
        author: item.owner.login,
        stars: item.stargazers_count,
        url: item.html_url,
        updatedAt: item.updated_at,
    }));
}
