import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import {
  DEFAULT_MAX_FOLDER_ITEMS,
  DEFAULT_MAX_GROUPS_FOR_SITE_DISCOVERY,
  DEFAULT_MAX_SITE_PAGES,
  DEFAULT_MAX_SITES,
  DEFAULT_SITE_PAGE_SIZE,
} from '../constants/defaults.constants';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().prefault(fallback);

export const BrowseConfigSchema = z.object({
  sitePageSize: positiveInt(DEFAULT_SITE_PAGE_SIZE).describe('Page size of site search requests'),
  maxSitePages: positiveInt(DEFAULT_MAX_SITE_PAGES).describe('Maximum site search pages followed'),
  maxSites: positiveInt(DEFAULT_MAX_SITES).describe('Maximum sites collected from site search'),
  maxGroupsForSiteDiscovery: positiveInt(DEFAULT_MAX_GROUPS_FOR_SITE_DISCOVERY).describe(
    'Number of unified groups whose team sites are looked up',
  ),
  maxFolderItems: positiveInt(DEFAULT_MAX_FOLDER_ITEMS).describe(
    'Folder children collected before a listing is cut and a page cursor is returned',
  ),
});

export type BrowseConfig = z.infer<typeof BrowseConfigSchema>;
export type BrowseConfigNamespaced = { browse: BrowseConfig };

export function parseBrowseConfig(env: NodeJS.ProcessEnv): BrowseConfig {
  return BrowseConfigSchema.parse({
    sitePageSize: env.BROWSE_SITE_PAGE_SIZE,
    maxSitePages: env.BROWSE_MAX_SITE_PAGES,
    maxSites: env.BROWSE_MAX_SITES,
    maxGroupsForSiteDiscovery: env.BROWSE_MAX_GROUPS_FOR_SITE_DISCOVERY,
    maxFolderItems: env.BROWSE_MAX_FOLDER_ITEMS,
  });
}

export const browseConfig = registerAs('browse', (): BrowseConfig => parseBrowseConfig(process.env));
