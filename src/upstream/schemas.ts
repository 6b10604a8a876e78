import { z } from "zod";

// Upstream payloads are validated for the fields this gateway reads; everything else passes through.

export const exifInfoSchema = z
  .object({
    make: z.string().nullish(),
    model: z.string().nullish(),
    lensModel: z.string().nullish(),
    city: z.string().nullish(),
    state: z.string().nullish(),
    country: z.string().nullish(),
    fileSizeInByte: z.number().nullish()
  })
  .passthrough();

export const assetSchema = z
  .object({
    id: z.string(),
    type: z.string().optional(),
    originalFileName: z.string().nullish(),
    originalMimeType: z.string().nullish(),
    fileCreatedAt: z.string().nullish(),
    localDateTime: z.string().nullish(),
    isFavorite: z.boolean().optional(),
    isArchived: z.boolean().optional(),
    duration: z.string().nullish(),
    thumbhash: z.string().nullish(),
    exifInfo: exifInfoSchema.nullish()
  })
  .passthrough();

export const assetListSchema = z.array(assetSchema);

export const assetStatisticsSchema = z
  .object({
    images: z.number(),
    videos: z.number(),
    total: z.number()
  })
  .passthrough();

export const bulkIdResponseSchema = z
  .object({
    id: z.string(),
    success: z.boolean(),
    error: z.string().nullish()
  })
  .passthrough();

export const bulkIdResponseListSchema = z.array(bulkIdResponseSchema);

export const albumSchema = z
  .object({
    id: z.string(),
    albumName: z.string(),
    description: z.string().nullish(),
    assetCount: z.number().optional(),
    shared: z.boolean().optional(),
    createdAt: z.string().nullish(),
    updatedAt: z.string().nullish(),
    assets: z.array(assetSchema).optional()
  })
  .passthrough();

export const albumListSchema = z.array(albumSchema);

export const albumStatisticsSchema = z
  .object({
    owned: z.number(),
    shared: z.number(),
    notShared: z.number()
  })
  .passthrough();

export const personSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    birthDate: z.string().nullish(),
    isHidden: z.boolean().optional(),
    thumbnailPath: z.string().nullish()
  })
  .passthrough();

export const peopleResponseSchema = z
  .object({
    total: z.number().optional(),
    visible: z.number().optional(),
    hidden: z.number().optional(),
    people: z.array(personSchema)
  })
  .passthrough();

export const tagSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    value: z.string().nullish(),
    color: z.string().nullish()
  })
  .passthrough();

export const tagListSchema = z.array(tagSchema);

export const sharedLinkSchema = z
  .object({
    id: z.string(),
    key: z.string().optional(),
    type: z.string(),
    description: z.string().nullish(),
    expiresAt: z.string().nullish(),
    allowUpload: z.boolean().optional(),
    allowDownload: z.boolean().optional(),
    showMetadata: z.boolean().optional(),
    album: albumSchema.nullish(),
    assets: z.array(assetSchema).optional()
  })
  .passthrough();

export const sharedLinkListSchema = z.array(sharedLinkSchema);

export const activitySchema = z
  .object({
    id: z.string(),
    type: z.string(),
    comment: z.string().nullish(),
    assetId: z.string().nullish(),
    createdAt: z.string().optional()
  })
  .passthrough();

export const activityListSchema = z.array(activitySchema);

export const activityStatisticsSchema = z
  .object({
    comments: z.number()
  })
  .passthrough();

export const searchAssetPageSchema = z
  .object({
    assets: z
      .object({
        items: z.array(assetSchema),
        total: z.number(),
        nextPage: z.string().nullish()
      })
      .passthrough()
  })
  .passthrough();

export const exploreDataSchema = z.array(
  z
    .object({
      fieldName: z.string(),
      items: z.array(z.object({ value: z.string(), data: assetSchema }).passthrough())
    })
    .passthrough()
);

export const serverAboutSchema = z
  .object({
    version: z.string(),
    build: z.string().nullish(),
    nodejs: z.string().nullish(),
    ffmpeg: z.string().nullish(),
    exiftool: z.string().nullish()
  })
  .passthrough();

export const serverFeaturesSchema = z.record(z.string(), z.unknown());

export type Asset = z.infer<typeof assetSchema>;
export type AssetStatistics = z.infer<typeof assetStatisticsSchema>;
export type BulkIdResponse = z.infer<typeof bulkIdResponseSchema>;
export type Album = z.infer<typeof albumSchema>;
export type AlbumStatistics = z.infer<typeof albumStatisticsSchema>;
export type Person = z.infer<typeof personSchema>;
export type PeopleResponse = z.infer<typeof peopleResponseSchema>;
export type Tag = z.infer<typeof tagSchema>;
export type SharedLink = z.infer<typeof sharedLinkSchema>;
export type Activity = z.infer<typeof activitySchema>;
export type ActivityStatistics = z.infer<typeof activityStatisticsSchema>;
export type SearchAssetPage = z.infer<typeof searchAssetPageSchema>;
export type ExploreData = z.infer<typeof exploreDataSchema>;
export type ServerAbout = z.infer<typeof serverAboutSchema>;
export type ServerFeatures = z.infer<typeof serverFeaturesSchema>;

export interface AssetSummary {
  id: string;
  type?: string;
  original_file_name?: string | null;
  file_created_at?: string | null;
  local_date_time?: string | null;
  is_favorite?: boolean;
  is_archived?: boolean;
  duration?: string | null;
  city?: string | null;
  country?: string | null;
  make?: string | null;
  model?: string | null;
  thumbhash?: string | null;
}

export function summarizeAsset(asset: Asset): AssetSummary {
  return {
    id: asset.id,
    type: asset.type,
    original_file_name: asset.originalFileName,
    file_created_at: asset.fileCreatedAt,
    local_date_time: asset.localDateTime,
    is_favorite: asset.isFavorite,
    is_archived: asset.isArchived,
    duration: asset.duration,
    city: asset.exifInfo?.city,
    country: asset.exifInfo?.country,
    make: asset.exifInfo?.make,
    model: asset.exifInfo?.model,
    thumbhash: asset.thumbhash
  };
}
