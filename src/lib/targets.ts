/**
 * Target Store - Nearby Alerts
 *
 * Loads and validates the saved places. The whole list is rejected on the
 * first malformed record; partial loads are not supported.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { logger } from './logger';
import { TargetLoadError, describeError } from './errors';
import {
  DEFAULT_RADIUS_METERS,
  DEFAULT_TARGET_NAME,
  GEOFENCE_ID_SEPARATOR,
} from './constants';

// ============================================
// TYPES
// ============================================

export interface Target {
  id: string;
  name: string;
  latitude: number;
  longitude: number;
  radiusMeters?: number;
}

export interface TargetSource {
  describe(): string;
  read(): Promise<string>;
}

// ============================================
// GEOFENCE KEY
// ============================================

export function makeGeofenceKey(id: string, name: string): string {
  return `${id}${GEOFENCE_ID_SEPARATOR}${name}`;
}

export function geofenceKeyOf(target: Target): string {
  return makeGeofenceKey(target.id, target.name);
}

/**
 * Display name embedded in a key. A key without separator is its own name.
 */
export function geofenceNameFromKey(key: string): string {
  const separatorIndex = key.indexOf(GEOFENCE_ID_SEPARATOR);
  if (separatorIndex === -1) {
    return key;
  }
  return key.substring(separatorIndex + GEOFENCE_ID_SEPARATOR.length);
}

export function effectiveRadius(target: Target): number {
  return target.radiusMeters ?? DEFAULT_RADIUS_METERS;
}

// ============================================
// SCHEMA
// ============================================

const noSeparator = (value: string) => !value.includes(GEOFENCE_ID_SEPARATOR);

const targetSchema = z.object({
  id: z
    .string()
    .min(1, 'id is required')
    .refine(noSeparator, `id must not contain "${GEOFENCE_ID_SEPARATOR}"`),
  name: z
    .string()
    .nullish()
    .transform(value => value ?? DEFAULT_TARGET_NAME)
    .refine(noSeparator, `name must not contain "${GEOFENCE_ID_SEPARATOR}"`),
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
  radiusMeters: z.number().finite().positive().nullish(),
});

const targetListSchema = z.array(targetSchema).superRefine((targets, ctx) => {
  const seen = new Set<string>();
  targets.forEach((target, index) => {
    if (seen.has(target.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'id'],
        message: `duplicate id "${target.id}"`,
      });
    }
    seen.add(target.id);
  });
});

// ============================================
// PARSING
// ============================================

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate already-decoded JSON into targets
 */
export function parseTargets(data: unknown): Target[] {
  const parsed = targetListSchema.safeParse(data);
  if (!parsed.success) {
    throw new TargetLoadError(`Invalid target list: ${formatIssues(parsed.error)}`);
  }

  return parsed.data.map(record => {
    const target: Target = {
      id: record.id,
      name: record.name,
      latitude: record.latitude,
      longitude: record.longitude,
    };
    if (record.radiusMeters != null) {
      target.radiusMeters = record.radiusMeters;
    }
    return target;
  });
}

export function parseTargetsJson(raw: string): Target[] {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new TargetLoadError(`Target list is not valid JSON: ${describeError(error)}`);
  }
  return parseTargets(data);
}

// ============================================
// SOURCES
// ============================================

export function createFileTargetSource(path: string): TargetSource {
  return {
    describe: () => path,
    read: async () => {
      try {
        return await readFile(path, 'utf8');
      } catch (error) {
        throw new TargetLoadError(`Cannot read ${path}: ${describeError(error)}`);
      }
    },
  };
}

export async function loadTargets(source: TargetSource): Promise<Target[]> {
  logger.debug('targets', `Loading saved places from ${source.describe()}`);
  const targets = parseTargetsJson(await source.read());
  logger.info('targets', `Loaded ${targets.length} saved place(s)`);
  return targets;
}
