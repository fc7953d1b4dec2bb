/**
 * ClusterService - Abstract base class for the cluster-apply collaborator
 *
 * Implementations apply declared state to a Kubernetes cluster and report
 * on the resources it contains. Every call targets the cluster the instance
 * was constructed for; nothing is read from process-global state.
 */

/**
 * A declared piece of cluster state
 */
export type ManifestPayload =
  | { kind: 'file'; path: string }
  | { kind: 'kustomize'; path: string }
  | { kind: 'url'; url: string }
  | { kind: 'inline'; yaml: string };

export interface ResourceCondition {
  status: string;
  reason?: string;
  message?: string;
}

/**
 * Normalized view of a single resource's status
 */
export interface ResourceStatus {
  exists: boolean;
  kind: string;
  name: string;
  namespace?: string;
  /** Conditions keyed by type (Complete, Failed, Available, ...) */
  conditions: Record<string, ResourceCondition>;
  replicas?: number;
  readyReplicas?: number;
  availableReplicas?: number;
  /** Job counters */
  succeeded?: number;
  failed?: number;
  active?: number;
  phase?: string;
  raw?: unknown;
}

export interface ResourceRef {
  kind: string;
  name: string;
  namespace?: string;
}

export interface ApplyOptions {
  namespace?: string;
  signal?: AbortSignal;
}

export abstract class ClusterService {
  /**
   * Apply a manifest payload (kubectl apply semantics, idempotent)
   */
  abstract applyManifest(payload: ManifestPayload, options?: ApplyOptions): Promise<void>;

  /**
   * Read the status of one resource. A missing resource resolves with `exists: false`.
   */
  abstract getResourceStatus(
    kind: string,
    name: string,
    namespace: string,
    signal?: AbortSignal
  ): Promise<ResourceStatus>;

  /**
   * Delete a resource. Deleting a missing resource is not an error.
   */
  abstract deleteResource(
    kind: string,
    name: string,
    namespace: string,
    signal?: AbortSignal
  ): Promise<void>;

  /**
   * List resources of a kind in one namespace, or in all of them
   */
  abstract listResources(
    kind: string,
    namespace: string | 'all',
    signal?: AbortSignal
  ): Promise<ResourceRef[]>;

  /**
   * Tail logs of the pods matching a label selector
   */
  abstract getLogs(
    namespace: string,
    selector: string,
    tailLines: number,
    signal?: AbortSignal
  ): Promise<string>;

  abstract ensureNamespace(namespace: string, signal?: AbortSignal): Promise<void>;

  /**
   * Whether the API server answers with the configured credentials
   */
  abstract isReachable(signal?: AbortSignal): Promise<boolean>;
}
