import { z } from 'zod';
import { CONTENT_KINDS, PLATFORMS, type ContentRef } from '../core/types.js';
import { contentRefOf } from '../core/storage/scheduled-post-store.js';

export const contentKindSchema = z.enum(CONTENT_KINDS);

export const platformSchema = z.enum(PLATFORMS, {
  errorMap: () => ({ message: `platform must be one of: ${PLATFORMS.join(', ')}` }),
});

export const contentRefSchema = z
  .object({
    kind: contentKindSchema,
    id: z.string().trim().min(1, 'content id is required'),
  })
  .transform((value): ContentRef => contentRefOf(value.kind, value.id));

const idListSchema = z.array(z.string().trim().min(1)).max(500);

export const enqueueSchema = z.object({
  content: contentRefSchema,
  platform: platformSchema,
  /** Explicit time; omitted means "next free slot". */
  scheduledFor: z.string().trim().min(1).optional(),
});

export const editTimeSchema = z.object({
  scheduledFor: z.string().trim().min(1, 'scheduledFor is required'),
});

export const cancelBySourceSchema = z.object({
  content: contentRefSchema,
  platform: platformSchema,
});

export const reorderSchema = z.object({
  ids: idListSchema.min(2, 'reorder needs at least two post ids'),
});

export const moveSchema = z.object({
  ids: idListSchema.min(1, 'ids must not be empty'),
  position: z.enum(['top', 'bottom']),
  platform: platformSchema.optional(),
});

export const bulkDeleteSchema = z.object({
  ids: idListSchema.min(1, 'ids must not be empty'),
});

export const redistributeSchema = z.object({
  platform: platformSchema.optional(),
});

export const listQuerySchema = z.object({
  status: z.enum(['pending', 'posted', 'failed', 'cancelled']).optional(),
  platform: platformSchema.optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export const slotSchema = z.object({
  dayOfWeek: z.number().int(),
  timeOfDay: z.string().trim().min(1, 'timeOfDay is required'),
  enabled: z.boolean().optional(),
});

export const slotUpdateSchema = slotSchema.partial().refine(
  fields => Object.values(fields).some(value => value !== undefined),
  { message: 'Provide dayOfWeek, timeOfDay or enabled' },
);

export const limitSchema = z.object({
  maxPerDay: z.number().int().min(0, 'maxPerDay must be 0 (unlimited) or more'),
});

export const standalonePostSchema = z.object({
  content: z.string().trim().min(1, 'content is required').max(10_000),
  platform: platformSchema.optional(),
  imageUrl: z.string().url().optional(),
});

export const contentStatusQuerySchema = z.object({
  kind: contentKindSchema,
  ids: z
    .string()
    .transform(raw => raw.split(',').map(id => id.trim()).filter(id => id.length > 0))
    .pipe(idListSchema.min(1, 'ids must not be empty')),
});
