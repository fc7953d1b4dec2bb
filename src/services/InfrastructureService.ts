/**
 * InfrastructureService - Abstract base class for the infrastructure-apply collaborator
 */

/**
 * Where an environment's infrastructure is declared
 */
export interface InfraDeclaration {
  /** Directory holding the infrastructure code */
  workingDir: string;
  /** Variables file, relative to workingDir or absolute */
  varFile: string;
  /** Backend configuration file */
  backendConfig?: string;
}

export interface ProvisionOutput {
  /** Every declared output, stringified */
  outputs: Record<string, string>;
}

export interface ChangeSet {
  create: number;
  update: number;
  delete: number;
  replace: number;
  /** Addresses of changed resources, e.g. `module.eks.aws_eks_cluster.this` */
  resources: Array<{ address: string; action: 'create' | 'update' | 'delete' | 'replace' }>;
}

export abstract class InfrastructureService {
  /**
   * Converge infrastructure to the declaration and return its outputs
   */
  abstract apply(declaration: InfraDeclaration, signal?: AbortSignal): Promise<ProvisionOutput>;

  /**
   * Compute what `apply` would change, without changing anything
   */
  abstract planChanges(declaration: InfraDeclaration, signal?: AbortSignal): Promise<ChangeSet>;

  /**
   * Read outputs of the current state without applying
   */
  abstract outputs(declaration: InfraDeclaration, signal?: AbortSignal): Promise<ProvisionOutput>;

  abstract destroy(declaration: InfraDeclaration, signal?: AbortSignal): Promise<void>;
}

/**
 * Whether a change set is empty
 */
export function isNoop(changes: ChangeSet): boolean {
  return changes.create + changes.update + changes.delete + changes.replace === 0;
}
