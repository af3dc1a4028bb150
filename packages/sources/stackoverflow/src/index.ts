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

const API_URL = 'https://api.stackexchange.com/2.3/questions';
const PAGE_SIZE = 10;
const TAGS = ['career', 'job', 'interview', 'resume', 'hiring'] as const;

interface StackExchangeQuestion {
  questionId: number;
  title: string;
  body: string;
  link: string;
  score?: number;
  tags: string[];
}

function toQuestion(value: unknown): StackExchangeQuestion | null {
  if (!isRecord(value)) {
    return null;
  }

  const questionId = asNumber(value.question_id);
  const title = asString(value.title)?.trim();
  const link = asString(value.link)?.trim();
  if (questionId === undefined || !title || !link) {
    return null;
  }

  return {
    questionId,
    title,
    body: asString(value.body) ?? '',
    link,
    score: asNumber(value.score),
    tags: Array.isArray(value.tags) ? value.tags.filter((tag): tag is string => typeof tag === 'string') : [],
  };
}

function toRawRecord(question: StackExchangeQuestion): RawRecord {
  return {
    source: 'StackOverflow',
    title: question.title,
    company: 'Community',
    description: question.body,
    url: question.link,
    type: 'question',
    score: question.score,
    extras: {
      questionId: question.questionId,
      tags: question.tags,
    },
  };
}

async function fetchTag(tag: string): Promise<RawRecord[]> {
  const params = new URLSearchParams({
    order: 'desc',
    sort: 'votes',
    tagged: tag,
    site: 'stackoverflow',
    pagesize: String(PAGE_SIZE),
    filter: 'withbody',
  });
  const payload = await fetchJson(`${API_URL}?${params.toString()}`, { label: 'StackExchange API' });

  if (!isRecord(payload) || !Array.isArray(payload.items)) {
    throw new Error('StackExchange API returned invalid payload');
  }

  return payload.items
    .map(toQuestion)
    .filter((question): question is StackExchangeQuestion => question !== null)
    .map(toRawRecord);
}

export async function collect(options: CollectOptions = {}): Promise<CollectResult> {
  return collectFromQueries(TAGS, fetchTag, {
    label: 'StackOverflow',
    limit: options.limit,
    describe: (tag) => `tag "${tag}"`,
  });
}

export const stackOverflowSource = defineSource({
  manifest: {
    id: 'stackoverflow',
    name: 'StackOverflow',
    version: '0.1.0',
  },
  collect,
});
