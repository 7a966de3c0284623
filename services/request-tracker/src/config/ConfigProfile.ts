// Read-only view of one configuration profile

import { z } from 'zod';
import {
  BooleanValueSchema,
  DurationValueSchema,
  IntegerValueSchema,
} from '../schemas/configSchemas';

/**
 * Typed lookups into a configuration profile. Every lookup is total:
 * an absent or unparseable value yields the given default.
 */
export interface ConfigProfile {
  getBool(key: string, defaultValue: boolean): boolean;
  getInt(key: string, defaultValue: number): number;
  /** Duration in nanoseconds */
  getDuration(key: string, defaultValue: number): number;
}

export class MapConfigProfile implements ConfigProfile {
  private readonly values: ReadonlyMap<string, unknown>;

  constructor(values: Record<string, unknown> = {}) {
    this.values = new Map(Object.entries(values));
  }

  getBool(key: string, defaultValue: boolean): boolean {
    return this.read(key, BooleanValueSchema, defaultValue);
  }

  getInt(key: string, defaultValue: number): number {
    return this.read(key, IntegerValueSchema, defaultValue);
  }

  getDuration(key: string, defaultValue: number): number {
    return this.read(key, DurationValueSchema, defaultValue);
  }

  /**
   * Copy of this profile with some values replaced; the original is left untouched
   */
  withOverrides(overrides: Record<string, unknown>): MapConfigProfile {
    return new MapConfigProfile({ ...Object.fromEntries(this.values), ...overrides });
  }

  private read<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, defaultValue: T): T {
    const raw = this.values.get(key);
    if (raw === undefined) {
      return defaultValue;
    }
    const parsed = schema.safeParse(raw);
    return parsed.success ? parsed.data : defaultValue;
  }
}
