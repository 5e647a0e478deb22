import { z } from "zod";

// Every object schema passes unknown keys through so that a load/serialize
// round trip keeps host-editor fields this package does not model.

export const timeRangeSchema = z
  .object({
    start: z.number(),
    duration: z.number(),
  })
  .passthrough();

export const draftSegmentSchema = z
  .object({
    id: z.string(),
    material_id: z.string(),
    // Text and effect segments may carry a null source range
    source_timerange: timeRangeSchema.nullable().optional(),
    target_timerange: timeRangeSchema,
  })
  .passthrough();

export const draftTrackSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    segments: z.array(draftSegmentSchema),
  })
  .passthrough();

export const draftMaterialSchema = z
  .object({
    id: z.string(),
    type: z.string().optional(),
    path: z.string().optional(),
    duration: z.number().optional(),
    content: z.string().optional(),
    material_name: z.string().optional(),
  })
  .passthrough();

export const draftMaterialsSchema = z
  .object({
    videos: z.array(draftMaterialSchema).optional(),
    audios: z.array(draftMaterialSchema).optional(),
    texts: z.array(draftMaterialSchema).optional(),
  })
  .passthrough();

export const draftContentSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    duration: z.number().optional(),
    create_time: z.number().optional(),
    update_time: z.number().optional(),
    materials: draftMaterialsSchema,
    tracks: z.array(draftTrackSchema),
  })
  .passthrough();

export const draftMetaSchema = z
  .object({
    draft_id: z.string().optional(),
    draft_name: z.string().optional(),
    draft_root_path: z.string().optional(),
    draft_fold_path: z.string().optional(),
    tm_draft_create: z.number().optional(),
    tm_draft_modified: z.number().optional(),
    tm_duration: z.number().optional(),
  })
  .passthrough();

export type TimeRange = z.infer<typeof timeRangeSchema>;
export type DraftSegment = z.infer<typeof draftSegmentSchema>;
export type DraftTrack = z.infer<typeof draftTrackSchema>;
export type DraftMaterial = z.infer<typeof draftMaterialSchema>;
export type DraftContent = z.infer<typeof draftContentSchema>;
export type DraftMeta = z.infer<typeof draftMetaSchema>;
