import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

const identifier = z.string().trim().nonempty();

export const BrowseQuerySchema = z.object({
  siteId: identifier.optional(),
  driveId: identifier.optional(),
  folderId: identifier.optional(),
  pageCursor: identifier.optional().describe('Continuation cursor from a previous folder page'),
});

export class BrowseQueryDto extends createZodDto(BrowseQuerySchema) {}

export const TransferRequestSchema = z.object({
  fileIds: z
    .array(identifier)
    .refine((ids) => new Set(ids).size === ids.length, 'fileIds must not contain duplicates'),
  collectionId: identifier,
  driveId: identifier,
  siteId: identifier.optional(),
});

export class TransferRequestDto extends createZodDto(TransferRequestSchema) {}
