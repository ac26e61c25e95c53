import { ProviderKind } from '../constants/provider-kind.enum';
import { type GraphDrive, GraphDriveSchema } from '../microsoft-apis/graph/types/graph.schemas';
import { collectPages } from '../microsoft-apis/graph/graph-pagination';
import { GraphDriveSource, type GraphDriveSourceDependencies } from './graph-drive.source';
import { GraphSiteDirectory } from './graph-site-directory';
import type { SiteHierarchySource } from './remote-source.interface';

/** SharePoint Online: sites containing document libraries. */
export class SharepointSource extends GraphDriveSource implements SiteHierarchySource {
  public readonly provider = ProviderKind.SHAREPOINT;
  public readonly hierarchy = 'sites';
  public readonly sites: GraphSiteDirectory;

  public constructor(dependencies: GraphDriveSourceDependencies) {
    super(dependencies);
    this.sites = new GraphSiteDirectory(dependencies.requester);
  }

  public async listDrives(siteId: string): Promise<GraphDrive[]> {
    return collectPages(
      this.requester.paginate('list drives', GraphDriveSchema, (client) =>
        client.api(`/sites/${siteId}/drives`).select(['id', 'name', 'driveType', 'webUrl']),
      ),
    );
  }
}
