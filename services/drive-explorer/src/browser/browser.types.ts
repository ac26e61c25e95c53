/** Where a browse request points inside a connection's hierarchy. */
export interface NavigationContext {
  organizationScope: string;
  siteId?: string;
  driveId?: string;
  folderId?: string;
  pageCursor?: string;
}

export type NodeKind = 'file' | 'folder';
export type NodeContainer = 'site' | 'drive' | 'folder' | 'file';

/** The navigation values a client sends back to open a node. */
export interface NodeNavigation {
  siteId?: string;
  driveId?: string;
  folderId?: string;
}

export interface RemoteNode {
  id: string;
  name: string;
  kind: NodeKind;
  container: NodeContainer;
  path: string;
  navigation: NodeNavigation;
  size?: number;
  modifiedAt?: string;
  mimeType?: string;
}

export interface RemotePage {
  files: RemoteNode[];
  folders: RemoteNode[];
  currentPath: string;
  parentPath?: string;
  nextPageCursor?: string;
}
