/**
 * JSON:API document shapes returned by App Store Connect, validated on receipt
 */

import { z } from 'zod';

const LinksSchema = z
  .object({
    next: z.string().nullish(),
  })
  .nullish();

export const ErrorDocumentSchema = z.object({
  errors: z.array(
    z.object({
      status: z.string().nullish(),
      code: z.string().nullish(),
      title: z.string().nullish(),
      detail: z.string().nullish(),
    })
  ),
});

const LocalizationSchema = z.object({
  id: z.string(),
  attributes: z.object({ locale: z.string() }),
});

const ScreenshotSetSchema = z.object({
  id: z.string(),
  attributes: z.object({ screenshotDisplayType: z.string() }),
});

const PreviewSetSchema = z.object({
  id: z.string(),
  attributes: z.object({ previewType: z.string() }),
});

const UploadOperationSchema = z.object({
  method: z.string(),
  url: z.string(),
  offset: z.number(),
  length: z.number(),
  requestHeaders: z.array(z.object({ name: z.string(), value: z.string() })).nullish(),
});

const DeliveryStateSchema = z.object({
  state: z.enum(['AWAITING_UPLOAD', 'UPLOAD_COMPLETE', 'COMPLETE', 'FAILED']),
  errors: z
    .array(z.object({ code: z.string().nullish(), description: z.string().nullish() }))
    .nullish(),
});

/**
 * appScreenshots and appPreviews share this shape; each fills in its own
 * delivery field (`imageAsset` or `videoUrl`)
 */
const AssetSchema = z.object({
  id: z.string(),
  attributes: z.object({
    fileName: z.string().nullish(),
    fileSize: z.number().nullish(),
    sourceFileChecksum: z.string().nullish(),
    assetDeliveryState: DeliveryStateSchema.nullish(),
    uploadOperations: z.array(UploadOperationSchema).nullish(),
    imageAsset: z
      .object({ templateUrl: z.string(), width: z.number(), height: z.number() })
      .nullish(),
    videoUrl: z.string().nullish(),
  }),
});

export const LocalizationListSchema = z.object({ data: z.array(LocalizationSchema), links: LinksSchema });
export const ScreenshotSetListSchema = z.object({ data: z.array(ScreenshotSetSchema), links: LinksSchema });
export const PreviewSetListSchema = z.object({ data: z.array(PreviewSetSchema), links: LinksSchema });
export const AssetListSchema = z.object({ data: z.array(AssetSchema), links: LinksSchema });

export const SetDocumentSchema = z.object({ data: z.object({ id: z.string() }) });
export const AssetDocumentSchema = z.object({ data: AssetSchema });

export type AssetResource = z.infer<typeof AssetSchema>;
export type UploadOperationResource = z.infer<typeof UploadOperationSchema>;

/**
 * One page of a list endpoint
 */
export interface Page<T> {
  data: T[];
  links?: { next?: string | null } | null;
}
