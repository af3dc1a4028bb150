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

const BASE_URL = 'https://www.reddit.com';
const LISTING_LIMIT = 10;
const SUBREDDITS = ['cscareerquestions', 'jobs', 'programming', 'ITCareerQuestions'] as const;

interface RedditPost {
  id: string;
  title: string;
  selftext: string;
  permalink: string;
  author?: string;
  score?: number;
}

function toRedditPost(child: unknown): RedditPost | null {
  if (!isRecord(child) || !isRecord(child.data)) {
    return null;
  }

  const data = child.data;
  const id = asString(data.id);
  const title = asString(data.title)?.trim();
  const permalink = asString(data.permalink);
  if (!id || !title || !permalink) {
    return null;
  }

  return {
    id,
    title,
    selftext: asString(data.selftext) ?? '',
    permalink,
    author: asString(data.author),
    score: asNumber(data.score),
  };
}

function toRawRecord(post: RedditPost, subreddit: string): RawRecord {
  return {
    source: 'Reddit',
    title: post.title,
    company: `r/${subreddit}`,
    description: post.selftext,
    url: `${BASE_URL}${post.permalink}`,
    type: 'discussion',
    score: post.score,
    extras: {
      postId: post.id,
      author: post.author,
    },
  };
}

async function fetchSubreddit(subreddit: string): Promise<RawRecord[]> {
  const payload = await fetchJson(`${BASE_URL}/r/${subreddit}/hot.json?limit=${LISTING_LIMIT}`, {
    label: 'Reddit API',
  });

  if (!isRecord(payload) || !isRecord(payload.data) || !Array.isArray(payload.data.children)) {
    throw new Error('Reddit API returned invalid payload');
  }

  return payload.data.children
    .map(toRedditPost)
    .filter((post): post is RedditPost => post !== null)
    .map((post) => toRawRecord(post, subreddit));
}

export async function collect(options: CollectOptions = {}): Promise<CollectResult> {
  return collectFromQueries(SUBREDDITS, fetchSubreddit, {
    label: 'Reddit',
    limit: options.limit,
    describe: (subreddit) => `r/${subreddit}`,
  });
}

export const redditSource = defineSource({
  manifest: {
    id: 'reddit',
    name: 'Reddit',
    version: '0.1.0',
  },
  collect,
});
