import { z } from 'zod';

// --- API response schemas ---

const qualitySchema = z
  .object({
    quality: z
      .object({
        name: z.string().optional(),
        resolution: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const fileSchema = z.object({ quality: qualitySchema.optional() }).passthrough();

/**
 * One record from /wanted/missing or /wanted/cutoff. Sonarr returns episodes,
 * Radarr returns movies; only the fields the engine reads are declared.
 */
export const wantedRecordSchema = z
  .object({
    id: z.number().int(),
    title: z.string().nullish(),
    monitored: z.boolean().optional(),
    airDateUtc: z.string().nullish(),
    added: z.string().nullish(),
    seasonNumber: z.number().optional(),
    episodeNumber: z.number().optional(),
    series: z.object({ title: z.string().nullish() }).passthrough().optional(),
    episodeFile: fileSchema.nullish(),
    movieFile: fileSchema.nullish(),
  })
  .passthrough();

export const wantedPageSchema = z
  .object({
    page: z.number().int(),
    pageSize: z.number().int(),
    totalRecords: z.number().int(),
    records: z.array(wantedRecordSchema),
  })
  .passthrough();

export const commandSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    status: z.string(),
    queued: z.string().nullish(),
    started: z.string().nullish(),
    ended: z.string().nullish(),
    message: z.string().nullish(),
  })
  .passthrough();

export const systemStatusSchema = z
  .object({
    appName: z.string().optional(),
    version: z.string(),
    instanceName: z.string().optional(),
  })
  .passthrough();

export const qualityProfileSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    upgradeAllowed: z.boolean().optional(),
    cutoff: z.number().optional(),
  })
  .passthrough();

export type WantedRecord = z.infer<typeof wantedRecordSchema>;
export type SystemStatus = z.infer<typeof systemStatusSchema>;
export type QualityProfile = z.infer<typeof qualityProfileSchema>;

// --- Normalized client types ---

export type ItemType = 'episode' | 'movie';

/** An item the engine may search, normalized across instance kinds. */
export interface ItemDescriptor {
  id: number;
  itemType: ItemType;
  title: string;
  /** Air date (episodes) or date added (movies). */
  date: Date | null;
  monitored: boolean;
  /** Vertical resolution of the current file, if any. */
  qualityResolution: number | null;
}

export interface PageCursor {
  /** 1-based page number. */
  page: number;
  pageSize: number;
}

export type SortDirection = 'ascending' | 'descending';

export interface SortOrder {
  key: string;
  direction: SortDirection;
}

export interface Page {
  items: ItemDescriptor[];
  page: number;
  pageSize: number;
  totalRecords: number;
  hasMore: boolean;
}

export interface CommandHandle {
  commandId: number;
  name: string;
  itemIds: number[];
}

export type CommandState = 'queued' | 'started' | 'completed' | 'failed' | 'aborted' | 'cancelled' | 'unknown';

export interface CommandStatus {
  commandId: number;
  name: string;
  state: CommandState;
  message: string | null;
  endedAt: Date | null;
}

export interface HealthResult {
  ok: boolean;
  latencyMs: number;
  version: string | null;
  error: string | null;
}

export interface RequestOptions {
  signal?: AbortSignal;
}
