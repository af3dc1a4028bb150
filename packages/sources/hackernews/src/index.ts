import {
  asNumber,
  asString,
  collectFromQueries,
  defineSource,
  fetchJson,
  type CollectOptions,
  type CollectResult,
  type RawRecord,
  isRecord,
} from '@jobcorpus/source-sdk';

const API_URL = 'https://hacker-news.firebaseio.com/v0';
const MAX_STORIES = 30;
const JOB_KEYWORDS = ['job', 'hiring', 'career', 'interview', 'resume', 'developer', 'engineer', 'programmer'];

interface HackerNewsStory {
  id: number;
  title: string;
  by: string;
  text: string;
  score?: number;
  url?: string;
}

function toStory(value: unknown): HackerNewsStory | null {
  if (!isRecord(value)) {
    return null;
  }

  const id = asNumber(value.id);
  const title = asString(value.title)?.trim();
  if (id === undefined || !title) {
    return null;
  }

  return {
    id,
    title,
    by: asString(value.by) ?? 'Anonymous',
    text: asString(value.text) ?? '',
    score: asNumber(value.score),
    url: asString(value.url),
  };
}

export function isJobRelated(title: string): boolean {
  const lower = title.toLowerCase();
  return JOB_KEYWORDS.some((keyword) => lower.includes(keyword));
}

function toRawRecord(story: HackerNewsStory): RawRecord {
  return {
    source: 'HackerNews',
    title: story.title,
    company: story.by,
    description: story.text,
    url: `https://news.ycombinator.com/item?id=${story.id}`,
    type: 'story',
    score: story.score,
    extras: {
      storyId: story.id,
      link: story.url,
    },
  };
}

async function fetchTopStoryIds(): Promise<number[]> {
  const payload = await fetchJson(`${API_URL}/topstories.json`, { label: 'HackerNews API' });
  if (!Array.isArray(payload)) {
    throw new Error('HackerNews API returned non-array payload');
  }

  return payload.filter((id): id is number => typeof id === 'number').slice(0, MAX_STORIES);
}

async function fetchStory(id: number): Promise<RawRecord[]> {
  const payload = await fetchJson(`${API_URL}/item/${id}.json`, { label: 'HackerNews API' });
  const story = toStory(payload);
  if (!story || !isJobRelated(story.title)) {
    return [];
  }

  return [toRawRecord(story)];
}

export async function collect(options: CollectOptions = {}): Promise<CollectResult> {
  const ids = await fetchTopStoryIds();
  return collectFromQueries(ids, fetchStory, {
    label: 'HackerNews',
    limit: options.limit,
    describe: (id) => `item ${id}`,
  });
}

export const hackerNewsSource = defineSource({
  manifest: {
    id: 'hackernews',
    name: 'Hacker News',
    version: '0.1.0',
  },
  collect,
});
