import { z } from 'zod';
import { RESPONSE_TYPES } from './dialogue_types';

const TemplateConfigEntrySchema = z.object({
    path: z.string().min(1),
});

const LanguageTemplatesSchema = z.object({
    ru: TemplateConfigEntrySchema.optional(),
    en: TemplateConfigEntrySchema.optional(),
}).strict();

/**
 * Shape of a `--templates-config` file: per response type and language, the
 * path of a replacement template. Relative paths are resolved against the
 * config file's directory.
 */
export const TemplatesConfigSchema = z.object({
    templates: z.record(z.enum(RESPONSE_TYPES), LanguageTemplatesSchema),
});

export type FullTemplatesConfig = z.infer<typeof TemplatesConfigSchema>;

/** Slots the fallback template must carry. */
export const FALLBACK_SLOTS = ['original', 'graphStatus'] as const;
