import { z } from 'zod';

const thumbnailSchema = z.object({ url: z.string() });

// YouTube Data API v3: search.list
export const apiSearchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.object({ videoId: z.string().optional() }),
        snippet: z.object({
          title: z.string(),
          channelTitle: z.string().optional(),
          thumbnails: z
            .object({
              high: thumbnailSchema.optional(),
              medium: thumbnailSchema.optional(),
              default: thumbnailSchema.optional(),
            })
            .optional(),
        }),
      }),
    )
    .default([]),
});

// YouTube Data API v3: videos.list
export const apiVideosResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: z
          .object({
            title: z.string(),
            channelTitle: z.string().optional(),
            thumbnails: z
              .object({
                high: thumbnailSchema.optional(),
                medium: thumbnailSchema.optional(),
                default: thumbnailSchema.optional(),
              })
              .optional(),
          })
          .optional(),
        contentDetails: z.object({ duration: z.string() }).optional(),
      }),
    )
    .default([]),
});

const mirrorThumbnailSchema = z.object({
  url: z.string(),
  width: z.number().optional(),
  quality: z.string().optional(),
});

// Invidious /api/v1/search mixes videos with channels and playlists
export const mirrorSearchResponseSchema = z.array(
  z.object({
    type: z.string().optional(),
    videoId: z.string().optional(),
    title: z.string().optional(),
    author: z.string().optional(),
    lengthSeconds: z.number().optional(),
    videoThumbnails: z.array(mirrorThumbnailSchema).optional(),
  }),
);

const mirrorFormatSchema = z.object({
  url: z.string(),
  type: z.string().default(''),
  bitrate: z.union([z.string(), z.number()]).optional(),
});

export const mirrorVideoResponseSchema = z.object({
  videoId: z.string(),
  title: z.string(),
  author: z.string().optional(),
  lengthSeconds: z.number().optional(),
  videoThumbnails: z.array(mirrorThumbnailSchema).optional(),
  adaptiveFormats: z.array(mirrorFormatSchema).optional(),
  formatStreams: z.array(mirrorFormatSchema).optional(),
});

export type ApiThumbnails = z.infer<typeof apiSearchResponseSchema>['items'][number]['snippet']['thumbnails'];
export type MirrorThumbnail = z.infer<typeof mirrorThumbnailSchema>;
export type MirrorFormat = z.infer<typeof mirrorFormatSchema>;
