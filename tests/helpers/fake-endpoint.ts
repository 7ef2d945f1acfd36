import { buildStatusUrl, type PostRecord } from '../../types/post';
import type { SearchEndpoint, SearchPage, SearchPageRequest } from '../../core/search-runner.types';

export function makePost(id: string, overrides: Partial<PostRecord> = {}): PostRecord {
  return {
    id,
    createdAt: '2024-01-01T00:00:00.000Z',
    username: 'user' + id,
    displayName: 'User ' + id,
    text: 'post ' + id,
    likeCount: 0,
    retweetCount: 0,
    replyCount: 0,
    quoteCount: 0,
    lang: 'en',
    url: buildStatusUrl(id),
    externalUrls: [],
    ...overrides,
  };
}

/** Posts p<page>-<n>, e.g. p1-1 ... p1-50 */
export function makePage(pageNumber: number, size: number, nextCursor: string | null): SearchPage {
  const posts = Array.from({ length: size }, (_, i) => makePost(`p${pageNumber}-${i + 1}`));
  return { posts, nextCursor, resultCount: size };
}

export type ScriptStep = SearchPage | Error | ((request: SearchPageRequest) => SearchPage);

/**
 * Replays a fixed script of pages and errors, recording every request.
 */
export class ScriptedEndpoint implements SearchEndpoint {
  public readonly requests: SearchPageRequest[] = [];
  private step = 0;

  constructor(private readonly script: ScriptStep[]) {}

  async searchRecent(request: SearchPageRequest): Promise<SearchPage> {
    this.requests.push(request);
    const next = this.script[this.step];
    this.step += 1;
    if (next === undefined) {
      throw new Error(`Unexpected request #${this.step}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return typeof next === 'function' ? next(request) : next;
  }
}

/**
 * Always answers with a full page of whatever size was asked for.
 */
export class EndlessEndpoint implements SearchEndpoint {
  public readonly requests: SearchPageRequest[] = [];

  async searchRecent(request: SearchPageRequest): Promise<SearchPage> {
    this.requests.push(request);
    const pageNumber = this.requests.length;
    return makePage(pageNumber, request.maxResults, `cursor-${pageNumber}`);
  }
}
