import { z } from 'zod';

const measureSchema = z.object({
  value: z.number(),
  unit: z.string().optional(),
}).passthrough();

const coordinateSchema = measureSchema.nullable();

export const observationTimeSchema = z.object({
  day: measureSchema.extend({ value: z.number().int().min(1).max(31) }),
  hour: measureSchema.extend({ value: z.number().int().min(0).max(24) }),
});

export const windIndicatorSchema = z.object({
  value: z.union([z.literal(0), z.literal(1), z.literal(3), z.literal(4)]),
  unit: z.enum(['m/s', 'KT']),
  estimated: z.boolean(),
});

export const stationPositionSchema = z.object({
  latitude: coordinateSchema,
  longitude: coordinateSchema,
}).passthrough();

/**
 * Section 0 of a report. Everything past Section 0 passes through untouched
 * and is checked group by group while it is encoded.
 */
export const reportSchema = z.object({
  station_type: z.object({ value: z.enum(['AAXX', 'BBXX', 'OOXX']) }),
  callsign: z.object({ value: z.string().regex(/^[A-Za-z0-9]{3,}$/) }).optional(),
  obs_time: observationTimeSchema,
  wind_indicator: windIndicatorSchema.nullable().optional(),
  station_id: z.object({ value: z.string().regex(/^\d{5}$/) }).optional(),
  station_position: stationPositionSchema.optional(),
}).passthrough().superRefine((report, ctx) => {
  if (report.station_type.value === 'AAXX' && report.station_id === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['station_id'],
      message: 'station_id is required for AAXX reports',
    });
  }
  if (report.station_type.value !== 'AAXX' && report.callsign === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['callsign'],
      message: `callsign is required for ${report.station_type.value} reports`,
    });
  }
});

export const encodeOptionsSchema = z.object({
  useVisibility90: z.boolean().optional(),
  useCloudHeight90: z.boolean().optional(),
}).strict();

export function formatIssues(error: z.ZodError, subject: string): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : subject}: ${issue.message}`)
    .join('; ');
}
