import { z } from 'zod';
import type { RootSettings } from './type.js';

export const RootSettingsSchema = z.object({
  datePrefix: z.boolean().default(false),
  frontmatter: z.boolean().default(false),
}).strict();

export const DEFAULT_ROOT_SETTINGS: RootSettings = RootSettingsSchema.parse({});

/**
 * Layer settings overrides on top of a base, skipping fields left undefined.
 */
export const mergeRootSettings = (base: RootSettings, overrides: Partial<RootSettings> = {}): RootSettings => ({
  datePrefix: overrides.datePrefix ?? base.datePrefix,
  frontmatter: overrides.frontmatter ?? base.frontmatter,
});
