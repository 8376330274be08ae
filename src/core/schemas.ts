// Zod schemas for HAL documents and halkit configuration

import { z } from 'zod';
import { ILLEGAL_REL_CHARS, MAX_LENGTHS } from './validation.js';

/**
 * HAL link object
 */
export const HalLinkSchema = z.object({
  href: z.string().min(1, 'Link href is required'),
  templated: z.boolean().optional(),
  type: z.string().optional(),
  deprecation: z.string().optional(),
  name: z.string().optional(),
  profile: z.string().optional(),
  title: z.string().optional(),
  hreflang: z.string().optional()
});

/**
 * `_links`: relation names mapped to one link or an array of links
 */
export const HalLinksSchema = z.record(
  z
    .string()
    .min(1, 'Link relation cannot be empty')
    .max(MAX_LENGTHS.rel, `Link relation exceeds maximum length of ${MAX_LENGTHS.rel}`)
    .refine(rel => !ILLEGAL_REL_CHARS.test(rel), 'Invalid link relation'),
  z.union([HalLinkSchema, z.array(HalLinkSchema)])
);

/**
 * HAL resource object; other properties are the resource state
 */
export const HalResourceSchema = z
  .object({
    _links: HalLinksSchema.optional(),
    _embedded: z.record(z.string().min(1), z.unknown()).optional()
  })
  .passthrough();

/**
 * Single link rendering mode
 */
export const RenderSingleLinksSchema = z.enum(['AS_SINGLE', 'AS_ARRAY']);

/**
 * Log level names accepted in configuration
 */
export const LogLevelNameSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * halkit.yaml
 */
export const HalkitConfigSchema = z
  .object({
    hal: z
      .object({
        renderSingleLinks: RenderSingleLinksSchema.optional(),
        arrayRels: z.array(z.string().min(1)).optional()
      })
      .strict()
      .optional(),
    curies: z
      .record(
        z.string().regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/, 'Invalid curie name'),
        z.string().includes('{rel}', { message: 'Curie template must contain {rel}' })
      )
      .optional(),
    defaultCurie: z.string().optional(),
    web: z
      .object({
        trustForwardedHeaders: z.boolean().optional(),
        basePath: z.string().optional()
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: LogLevelNameSchema.optional()
      })
      .strict()
      .optional()
  })
  .strict();

/**
 * Type exports
 */
export type HalLinkObject = z.infer<typeof HalLinkSchema>;
export type HalLinksObject = z.infer<typeof HalLinksSchema>;
export type HalResourceObject = z.infer<typeof HalResourceSchema>;
export type RenderSingleLinksName = z.infer<typeof RenderSingleLinksSchema>;
export type LogLevelName = z.infer<typeof LogLevelNameSchema>;
export type HalkitConfig = z.infer<typeof HalkitConfigSchema>;

/**
 * Validation helper functions
 */
export function validateHalkitConfig(data: unknown): HalkitConfig {
  return HalkitConfigSchema.parse(data);
}

/**
 * Safe validation (returns result instead of throwing)
 */
export function safeValidateHalResource(data: unknown) {
  return HalResourceSchema.safeParse(data);
}

export function safeValidateHalkitConfig(data: unknown) {
  return HalkitConfigSchema.safeParse(data);
}
