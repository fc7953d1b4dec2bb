/**
 * CloudService - Abstract base class for the credential/identity collaborator
 */

export interface Identity {
  account: string;
  arn: string;
  userId: string;
}

export interface ClusterDescription {
  name: string;
  /** CREATING | ACTIVE | UPDATING | DELETING | FAILED, or NOT_FOUND */
  status: string;
  endpoint?: string;
  version?: string;
}

export abstract class CloudService {
  abstract whoAmI(signal?: AbortSignal): Promise<Identity>;

  abstract describeCluster(
    name: string,
    region: string,
    signal?: AbortSignal
  ): Promise<ClusterDescription>;

  /**
   * Materialize a connection profile for the cluster at `kubeconfigPath`
   */
  abstract writeKubeconfig(
    name: string,
    region: string,
    kubeconfigPath: string,
    signal?: AbortSignal
  ): Promise<void>;
}
