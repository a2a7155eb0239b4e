import { z } from 'zod';
import type { JobRecord } from '../types';

export const STATE_VERSION = 1;

// Largest capacity a stored table may claim; anything above restores at the default.
export const MAX_CAPACITY = 2 ** 24;

// `completed_at` is required on completed records and stripped from pending ones.
export const JobRecordSchema: z.ZodType<JobRecord> = z.discriminatedUnion('status', [
  z.object({
    job_id: z.string(),
    status: z.literal('pending'),
    submitted_at: z.string(),
  }),
  z.object({
    job_id: z.string(),
    status: z.literal('completed'),
    submitted_at: z.string(),
    completed_at: z.string(),
  }),
]);

// Section schemas never fail: a missing or mistyped field degrades to empty.
const looseList = z.array(z.unknown()).catch([]);

export const QueueSectionSchema = z
  .object({ items: looseList })
  .catch({ items: [] });

export const HistorySectionSchema = z
  .object({ entries: looseList })
  .catch({ entries: [] });

export const HashTableSectionSchema = z
  .object({
    capacity: z.number().int().positive().max(MAX_CAPACITY).optional().catch(undefined),
    entries: looseList,
  })
  .catch({ capacity: undefined, entries: [] });

export const ConfigSectionSchema = z.record(z.string(), z.unknown()).catch({});

export const HistoryPairSchema = z.tuple([z.string(), z.string()]);

export const KeyValuePairSchema = z.tuple([z.string(), z.unknown()]);

export const StateDocumentSchema = z.record(z.string(), z.unknown());
