import { ProviderKind } from '../constants/provider-kind.enum';
import { type GraphDrive, GraphDriveSchema } from '../microsoft-apis/graph/types/graph.schemas';
import { collectPages } from '../microsoft-apis/graph/graph-pagination';
import { GraphDriveSource, type GraphDriveSourceDependencies } from './graph-drive.source';
import type { FlatDriveSource } from './remote-source.interface';

/** OneDrive: the signed-in user's drives, without a site level. */
export class OneDriveSource extends GraphDriveSource implements FlatDriveSource {
  public readonly provider = ProviderKind.ONEDRIVE;
  public readonly hierarchy = 'flat';

  public constructor(dependencies: GraphDriveSourceDependencies) {
    super(dependencies);
  }

  public async listDrives(): Promise<GraphDrive[]> {
    return collectPages(
      this.requester.paginate('list drives', GraphDriveSchema, (client) =>
        client.api('/me/drives').select(['id', 'name', 'driveType', 'webUrl']),
      ),
    );
  }
}
