import { z } from 'zod';

export const GraphSiteSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  displayName: z.string().nullish(),
  webUrl: z.string().nullish(),
  description: z.string().nullish(),
});

export const GraphDriveSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  driveType: z.string().nullish(),
  webUrl: z.string().nullish(),
});

export const GraphGroupSchema = z.object({
  id: z.string(),
  displayName: z.string().nullish(),
});

export const GraphItemReferenceSchema = z.object({
  id: z.string().nullish(),
  driveId: z.string().nullish(),
  siteId: z.string().nullish(),
  name: z.string().nullish(),
  path: z.string().nullish(),
});

export const GraphDriveItemSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  size: z.number().nullish(),
  lastModifiedDateTime: z.string().nullish(),
  webUrl: z.string().nullish(),
  file: z.object({ mimeType: z.string().nullish() }).nullish(),
  folder: z.object({ childCount: z.number().nullish() }).nullish(),
  root: z.object({}).nullish(),
  parentReference: GraphItemReferenceSchema.nullish(),
  '@microsoft.graph.downloadUrl': z.string().nullish(),
});

export const GraphCollectionEnvelopeSchema = z.object({
  '@odata.nextLink': z.string().nullish(),
  value: z.array(z.unknown()),
});

export type GraphSite = z.infer<typeof GraphSiteSchema>;
export type GraphDrive = z.infer<typeof GraphDriveSchema>;
export type GraphGroup = z.infer<typeof GraphGroupSchema>;
export type GraphDriveItem = z.infer<typeof GraphDriveItemSchema>;

export interface GraphPage<T> {
  items: T[];
  nextLink?: string;
}
