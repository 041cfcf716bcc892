import { z } from 'zod';
import {
  SENSOR_ID_MAX_LENGTH,
  TEMPERATURE_MAX_C,
  TEMPERATURE_MIN_C,
  ValidationError,
} from '@weather-station/domain';
import type { NewReading, ReadingInput } from '@weather-station/domain';

export const RECENT_LIMIT_MAX = 100;

const readingSchema = z.object({
  temperature: z
    .number({ invalid_type_error: 'temperature must be a number' })
    .finite()
    .min(TEMPERATURE_MIN_C, `temperature must be between ${TEMPERATURE_MIN_C}°C and ${TEMPERATURE_MAX_C}°C`)
    .max(TEMPERATURE_MAX_C, `temperature must be between ${TEMPERATURE_MIN_C}°C and ${TEMPERATURE_MAX_C}°C`),
  sensorId: z.string().trim().min(1, 'sensorId must not be empty').max(SENSOR_ID_MAX_LENGTH),
  ts: z
    .union([z.date(), z.string().datetime({ offset: true })])
    .optional()
    .transform((value) => (typeof value === 'string' ? new Date(value) : value))
    .refine((value) => value === undefined || !Number.isNaN(value.getTime()), 'ts must be a valid date'),
});

const recentLimitSchema = z.number().int().min(0).max(RECENT_LIMIT_MAX);

/** Validates a submitted reading, stamping it with `now` when it carries no timestamp. */
export function toNewReading(input: ReadingInput, now: Date): NewReading {
  const parsed = readingSchema.safeParse(input);
  if (!parsed.success) {
    throw fromZodError('invalid reading', parsed.error);
  }
  return {
    ts: parsed.data.ts ?? now,
    temperature: parsed.data.temperature,
    sensorId: parsed.data.sensorId,
  };
}

export function checkRecentLimit(limit: number): number {
  const parsed = recentLimitSchema.safeParse(limit);
  if (!parsed.success) {
    throw fromZodError(`limit must be an integer between 0 and ${RECENT_LIMIT_MAX}`, parsed.error);
  }
  return parsed.data;
}

function fromZodError(message: string, error: z.ZodError): ValidationError {
  return new ValidationError(
    message,
    error.issues.map((issue) => ({
      field: issue.path.length > 0 ? issue.path.join('.') : 'value',
      message: issue.message,
    })),
  );
}
