import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Config } from '../config';
import { AuthExpiredError, type DriveExplorerError } from '../errors/drive-explorer.error';
import { classifyGraphError } from '../errors/graph-error.util';
import { collectAvailablePages } from '../microsoft-apis/graph/graph-pagination';
import type { GraphGroup, GraphSite } from '../microsoft-apis/graph/types/graph.schemas';
import type { SiteDirectory } from '../sources/remote-source.interface';

type SourceResult = { sites: GraphSite[] } | { error: DriveExplorerError };

/**
 * Collects every site the connection can reach from several discovery
 * endpoints. Each endpoint fails on its own; only when all of them fail is the
 * browse request failed.
 */
@Injectable()
export class SiteAggregator {
  private readonly logger = new Logger(this.constructor.name);

  public constructor(private readonly configService: ConfigService<Config, true>) {}

  public async aggregateSites(directory: SiteDirectory, logPrefix = ''): Promise<GraphSite[]> {
    const rootSite = await this.fromRootSite(directory, logPrefix);
    const results: SourceResult[] = [
      rootSite,
      await this.fromSearch(directory, logPrefix),
      await this.fromFollowedSites(directory, logPrefix),
      await this.fromUnifiedGroups(directory, logPrefix),
    ];

    const failures = results.flatMap((result) => ('error' in result ? [result.error] : []));
    if (failures.length === results.length) {
      throw failures.find((error) => error instanceof AuthExpiredError) ?? failures[0];
    }

    const sitesById = new Map<string, GraphSite>();
    for (const result of results) {
      if (!('sites' in result)) continue;
      for (const site of result.sites) {
        if (!sitesById.has(site.id)) sitesById.set(site.id, site);
      }
    }

    this.logger.log(`${logPrefix} Discovered ${sitesById.size} sites`);
    return [...sitesById.values()];
  }

  private async fromRootSite(directory: SiteDirectory, logPrefix: string): Promise<SourceResult> {
    try {
      return { sites: [await directory.getRootSite()] };
    } catch (error) {
      const classified = classifyGraphError(error, 'get root site');
      this.logger.warn(`${logPrefix} Could not fetch root site: ${classified.message}`);
      return { error: classified };
    }
  }

  private async fromSearch(directory: SiteDirectory, logPrefix: string): Promise<SourceResult> {
    const { sitePageSize, maxSitePages, maxSites } = this.configService.get('browse', {
      infer: true,
    });
    const bounds = { maxPages: maxSitePages, maxItems: maxSites };

    try {
      const { items, error } = await collectAvailablePages(directory.searchSites(sitePageSize), bounds);
      if (error !== undefined) this.warnPartial(logPrefix, 'search sites', items.length, error);
      return { sites: items };
    } catch (searchError) {
      this.logger.debug(
        `${logPrefix} Site search failed, falling back to site listing: ` +
          classifyGraphError(searchError, 'search sites').message,
      );
    }

    try {
      const { items, error } = await collectAvailablePages(directory.listSites(sitePageSize), bounds);
      if (error !== undefined) this.warnPartial(logPrefix, 'list sites', items.length, error);
      return { sites: items };
    } catch (error) {
      const classified = classifyGraphError(error, 'list sites');
      this.logger.warn(`${logPrefix} Could not list sites: ${classified.message}`);
      return { error: classified };
    }
  }

  private warnPartial(logPrefix: string, operation: string, kept: number, error: unknown): void {
    this.logger.warn(
      `${logPrefix} Stopped paging after ${kept} sites, keeping them: ` +
        classifyGraphError(error, operation).message,
    );
  }

  private async fromFollowedSites(
    directory: SiteDirectory,
    logPrefix: string,
  ): Promise<SourceResult> {
    try {
      return { sites: await directory.listFollowedSites() };
    } catch (error) {
      // app-only tokens have no signed-in user
      const classified = classifyGraphError(error, 'list followed sites');
      this.logger.debug(`${logPrefix} Could not list followed sites: ${classified.message}`);
      return { error: classified };
    }
  }

  private async fromUnifiedGroups(
    directory: SiteDirectory,
    logPrefix: string,
  ): Promise<SourceResult> {
    const maxGroups = this.configService.get('browse.maxGroupsForSiteDiscovery', { infer: true });

    let groups: GraphGroup[];
    try {
      groups = await directory.listUnifiedGroups(maxGroups);
    } catch (error) {
      const classified = classifyGraphError(error, 'list groups');
      this.logger.debug(`${logPrefix} Could not list groups: ${classified.message}`);
      return { error: classified };
    }

    const sites: GraphSite[] = [];
    for (const group of groups.slice(0, maxGroups)) {
      try {
        const site = await directory.getGroupRootSite(group.id);
        sites.push({ ...site, displayName: group.displayName ?? site.displayName });
      } catch (error) {
        this.logger.debug(
          `${logPrefix} Skipping group without a reachable site: ` +
            classifyGraphError(error, 'get group site').message,
        );
      }
    }
    return { sites };
  }
}
