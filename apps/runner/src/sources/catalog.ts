import type { Source } from '@jobcorpus/source-sdk';
import { githubSource } from '@jobcorpus/source-github';
import { hackerNewsSource } from '@jobcorpus/source-hackernews';
import { redditSource } from '@jobcorpus/source-reddit';
import { stackOverflowSource } from '@jobcorpus/source-stackoverflow';

const allSources: Source[] = [githubSource, stackOverflowSource, redditSource, hackerNewsSource];

function buildSourceMap(sources: Source[]): Map<string, Source> {
  const sourceMap = new Map<string, Source>();

  for (const source of sources) {
    const { id } = source.manifest;
    if (sourceMap.has(id)) {
      throw new Error(`Duplicate source id: ${id}`);
    }

    sourceMap.set(id, source);
  }

  return sourceMap;
}

const sourceMap = buildSourceMap(allSources);

export function getAllSources(): Source[] {
  return [...allSources];
}

export function getSourceById(sourceId: string): Source {
  const source = sourceMap.get(sourceId);
  if (!source) {
    throw new Error(`Unknown source id: ${sourceId}`);
  }

  return source;
}

/**
 * Sources named by id, in the order given. No ids means every source.
 */
export function resolveSources(sourceIds?: readonly string[]): Source[] {
  if (!sourceIds || sourceIds.length === 0) {
    return getAllSources();
  }

  return [...new Set(sourceIds)].map(getSourceById);
}
