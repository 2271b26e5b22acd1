import type { InstanceKind } from '../../types/index.js';
import type { ItemDescriptor, ItemType, SortOrder, WantedRecord } from './types.js';

/**
 * What differs between Sonarr and Radarr from the client's point of view.
 */
export interface ArrProfile {
  kind: InstanceKind;
  itemType: ItemType;
  searchCommand: string;
  /** Body key carrying the ids for `searchCommand`. */
  idsField: string;
  missingSort: SortOrder;
  cutoffSort: SortOrder;
  /** Newest-first ordering used by the `recent` strategy. */
  recentSort: SortOrder;
  toItem(record: WantedRecord): ItemDescriptor;
}

function parseDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function pad(n: number | undefined): string {
  return String(n ?? 0).padStart(2, '0');
}

const sonarr: ArrProfile = {
  kind: 'sonarr',
  itemType: 'episode',
  searchCommand: 'EpisodeSearch',
  idsField: 'episodeIds',
  missingSort: { key: 'airDateUtc', direction: 'descending' },
  cutoffSort: { key: 'airDateUtc', direction: 'descending' },
  recentSort: { key: 'airDateUtc', direction: 'descending' },
  toItem(record) {
    const series = record.series?.title ?? 'Unknown series';
    const episode = record.title ?? 'TBA';
    return {
      id: record.id,
      itemType: 'episode',
      title: `${series} S${pad(record.seasonNumber)}E${pad(record.episodeNumber)} ${episode}`,
      date: parseDate(record.airDateUtc),
      monitored: record.monitored ?? true,
      qualityResolution: record.episodeFile?.quality?.quality?.resolution ?? null,
    };
  },
};

const radarr: ArrProfile = {
  kind: 'radarr',
  itemType: 'movie',
  searchCommand: 'MoviesSearch',
  idsField: 'movieIds',
  missingSort: { key: 'title', direction: 'ascending' },
  cutoffSort: { key: 'title', direction: 'ascending' },
  recentSort: { key: 'added', direction: 'descending' },
  toItem(record) {
    return {
      id: record.id,
      itemType: 'movie',
      title: record.title ?? `Movie ${record.id}`,
      date: parseDate(record.added),
      monitored: record.monitored ?? true,
      qualityResolution: record.movieFile?.quality?.quality?.resolution ?? null,
    };
  },
};

const PROFILES: Record<InstanceKind, ArrProfile> = { sonarr, radarr };

export function profileFor(kind: InstanceKind): ArrProfile {
  return PROFILES[kind];
}
