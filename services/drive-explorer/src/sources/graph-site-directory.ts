import type { GraphRequester } from '../microsoft-apis/graph/graph-requester';
import {
  type GraphGroup,
  GraphGroupSchema,
  type GraphPage,
  type GraphSite,
  GraphSiteSchema,
} from '../microsoft-apis/graph/types/graph.schemas';
import type { SiteDirectory } from './remote-source.interface';

const SITE_FIELDS = ['id', 'name', 'displayName', 'webUrl', 'description'];

/** Site discovery endpoints of SharePoint through Graph. */
export class GraphSiteDirectory implements SiteDirectory {
  public constructor(private readonly requester: GraphRequester) {}

  public async getRootSite(): Promise<GraphSite> {
    return this.requester.get('get root site', GraphSiteSchema, (client) =>
      client.api('/sites/root').select(SITE_FIELDS),
    );
  }

  public searchSites(pageSize: number): AsyncGenerator<GraphPage<GraphSite>> {
    return this.requester.paginate('search sites', GraphSiteSchema, (client) =>
      client.api('/sites').query({ search: '*' }).select(SITE_FIELDS).top(pageSize),
    );
  }

  public listSites(pageSize: number): AsyncGenerator<GraphPage<GraphSite>> {
    return this.requester.paginate('list sites', GraphSiteSchema, (client) =>
      client.api('/sites').select(SITE_FIELDS).top(pageSize),
    );
  }

  public async listFollowedSites(): Promise<GraphSite[]> {
    const page = await this.requester.getPage('list followed sites', GraphSiteSchema, (client) =>
      client.api('/me/followedSites').select(SITE_FIELDS),
    );
    return page.items;
  }

  public async listUnifiedGroups(limit: number): Promise<GraphGroup[]> {
    const page = await this.requester.getPage('list groups', GraphGroupSchema, (client) =>
      client
        .api('/groups')
        .filter("groupTypes/any(c:c eq 'Unified')")
        .select(['id', 'displayName'])
        .top(limit),
    );
    return page.items.slice(0, limit);
  }

  public async getGroupRootSite(groupId: string): Promise<GraphSite> {
    return this.requester.get('get group site', GraphSiteSchema, (client) =>
      client.api(`/groups/${groupId}/sites/root`).select(SITE_FIELDS),
    );
  }
}
