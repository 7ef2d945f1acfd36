/**
 * Post record types shared by the search runner and the output writer
 */

/**
 * One post returned by recent search, flattened with its author
 */
export interface PostRecord {
    /** Post ID (snowflake, kept as a string) */
    readonly id: string;

    /** Creation time (ISO 8601) */
    readonly createdAt: string;

    /** Author handle, without @ */
    readonly username: string;

    /** Author display name */
    readonly displayName: string;

    readonly text: string;

    readonly likeCount: number;
    readonly retweetCount: number;
    readonly replyCount: number;
    readonly quoteCount: number;

    /** Language detected by the platform, null when absent */
    readonly lang: string | null;

    /** Canonical status URL derived from the ID */
    readonly url: string;

    /** Expanded external links, in the order they appear in the post */
    readonly externalUrls: readonly string[];
}

/**
 * Flat row written to CSV / JSON output
 */
export interface PostOutputRow {
    id: string;
    date: string;
    user_username: string;
    user_displayname: string;
    content: string;
    like_count: number;
    retweet_count: number;
    reply_count: number;
    quote_count: number;
    lang: string | null;
    url: string;
    external_urls: string | null;
}

export const POST_OUTPUT_COLUMNS = [
    'id',
    'date',
    'user_username',
    'user_displayname',
    'content',
    'like_count',
    'retweet_count',
    'reply_count',
    'quote_count',
    'lang',
    'url',
    'external_urls',
] as const satisfies ReadonlyArray<keyof PostOutputRow>;

export function buildStatusUrl(id: string): string {
    return `https://x.com/i/web/status/${id}`;
}

export function toOutputRow(post: PostRecord): PostOutputRow {
    return {
        id: post.id,
        date: post.createdAt,
        user_username: post.username,
        user_displayname: post.displayName,
        content: post.text,
        like_count: post.likeCount,
        retweet_count: post.retweetCount,
        reply_count: post.replyCount,
        quote_count: post.quoteCount,
        lang: post.lang,
        url: post.url,
        external_urls: post.externalUrls.length > 0 ? post.externalUrls.join(' ') : null,
    };
}
