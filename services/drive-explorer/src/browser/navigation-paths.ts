export const SITES_PATH = '/sites';
export const FLAT_DRIVES_PATH = '/drives';

export function siteDrivesPath(siteId: string): string {
  return `/sites/${siteId}/drives`;
}

export function drivePath(driveId: string): string {
  return `/drives/${driveId}`;
}

export function driveItemPath(driveId: string, itemId: string): string {
  return `/drives/${driveId}/items/${itemId}`;
}

export function folderPath(driveId: string, folderId?: string): string {
  return folderId ? driveItemPath(driveId, folderId) : drivePath(driveId);
}
