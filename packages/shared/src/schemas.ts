import { z } from 'zod';
import { compareDates } from './dates';
import { createLogger } from './logger';
import { type EntityData, MAX_YEAR, MIN_YEAR } from './types';

const log = createLogger('Schemas');

// --- Sub-Schemas ---

export const TimelineDateSchema = z
  .object({
    year: z.number().int().min(MIN_YEAR).max(MAX_YEAR),
    month: z.number().int().min(1).max(12).optional(),
    day: z.number().int().min(1).max(31).optional(),
  })
  .refine((date) => date.day === undefined || date.month !== undefined, {
    message: 'A day cannot be set without a month',
    path: ['day'],
  });

// --- Main Entity Schema ---

export const EntitySchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    start: TimelineDateSchema,
    end: TimelineDateSchema.optional(),
    tags: z.array(z.string()).optional(),
  })
  .refine((entity) => !entity.end || compareDates(entity.end, entity.start) >= 0, {
    message: 'End date is earlier than start date',
    path: ['end'],
  });

// Export the array schema for API responses
export const EntityListSchema = z.array(EntitySchema);

/**
 * Validates an untrusted payload (API response, JSON fixture).
 * Invalid payloads are logged and yield an empty list.
 */
export function parseEntityList(raw: unknown): EntityData[] {
  const result = EntityListSchema.safeParse(raw);
  if (!result.success) {
    log.error('Data Validation Failed!', result.error.flatten());
    return [];
  }
  return result.data;
}
