/**
 * ================================================================================
 * TYPE DEFINITIONS - Cluster Data Model
 * ================================================================================
 *
 * Core data structures shared by discovery, launching, the lifecycle controller
 * and the bootstrap deployer.
 *
 * KEY TYPES:
 * • Role / InstanceState - Enumerations of cluster position and EC2 state
 * • ProviderInstance - Instance as decoded at the provider boundary
 * • InstanceRecord - Instance classified into exactly one role
 * • ClusterView - Point-in-time classification of a cluster
 * • LaunchPlan - Frozen description of what a launch requests
 *
 * @license BSD-3-Clause
 */

/**
 * ================================================================================
 * ROLES AND STATES
 * ================================================================================
 */

export const ROLES = ['master', 'worker', 'coordinator'] as const;
export type Role = (typeof ROLES)[number];

export const INSTANCE_STATES = [
    'pending',
    'running',
    'stopping',
    'stopped',
    'shutting-down',
    'terminated'
] as const;
export type InstanceState = (typeof INSTANCE_STATES)[number];

//? Stopped and stopping count as active: a stopped cluster can be started again
export const ACTIVE_STATES: readonly InstanceState[] = ['pending', 'running', 'stopping', 'stopped'];

export function isActive(state: InstanceState): boolean {
    return ACTIVE_STATES.includes(state);
}

/**
 * ================================================================================
 * INSTANCE REPRESENTATIONS
 * ================================================================================
 */

/**
 * Instance as reported by the provider, before role classification
 */
export interface ProviderInstance {
    instanceId: string;
    state: InstanceState;
    instanceType?: string;
    publicDns?: string;
    privateDns?: string;
    privateIp?: string;
    groupNames: string[];                  // Security group names the instance belongs to
    tags: Record<string, string>;
    launchTime?: Date;
}

/**
 * Instance classified into exactly one role of one cluster
 *
 * //! IMPORTANT: snapshot only - refresh through discovery, never mutate
 */
export interface InstanceRecord {
    instanceId: string;
    state: InstanceState;
    role: Role;
    instanceType?: string;
    publicAddress?: string;
    privateAddress?: string;
    buildThreads?: number;                 // From the launch plan, when tagged
}

export type RoleGroups = Record<Role, readonly InstanceRecord[]>;

export interface ClusterView {
    clusterName: string;
    groups: RoleGroups;
}

export type ClusterState = 'absent' | 'provisioning' | 'active' | 'stopped' | 'destroyed';

/**
 * ================================================================================
 * NETWORK SECURITY CONFIGURATION
 * ================================================================================
 */

export type IngressRule =
    | { kind: 'group'; sourceRole: Role }
    | { kind: 'cidr'; protocol: 'tcp' | 'udp'; fromPort: number; toPort: number; cidr: string };

export interface SecurityGroupSpec {
    role: Role;
    rules: readonly IngressRule[];
}

/**
 * Security group as seen at the provider boundary
 *
 * //? ruleCount of zero is the sentinel for "freshly created"
 */
export interface SecurityGroup {
    groupId: string;
    name: string;
    ruleCount: number;
}

/**
 * Ingress rule resolved against concrete group ids, ready for the provider
 */
export type ResolvedIngressRule =
    | { kind: 'group'; sourceGroupId: string }
    | { kind: 'cidr'; protocol: 'tcp' | 'udp'; fromPort: number; toPort: number; cidr: string };

/**
 * ================================================================================
 * LAUNCH CONFIGURATION
 * ================================================================================
 */

export type ImageClass = 'standard' | 'hpc';

export interface SpotOptions {
    maxPrice: number;                      // Ceiling price in dollars per hour
    waitSeconds?: number;                  // Budget for grants; unbounded when absent
    acceptPartial: boolean;                // Continue with fewer workers on timeout
}

/**
 * Everything a single launch invocation requests
 *
 * Built once by buildLaunchPlan() and frozen afterwards.
 */
export interface LaunchPlan {
    workerCount: number;
    coordinatorCount: number;
    workerInstanceType: string;
    masterInstanceType: string;
    zone?: string;
    imageSelector: string;                 // 'std', 'hpc' or a literal image id
    keyPair?: string;
    spot?: SpotOptions;
    volumeSizeGb?: number;
    waitSeconds: number;                   // Settle delay once nothing is pending
    buildThreads: number;                  // Parallelism hint exported to remote jobs
}

/**
 * Single provider request for instances of one role
 */
export interface InstanceRequest {
    clusterName: string;
    role: Role;
    count: number;
    instanceType: string;
    imageId: string;
    zone?: string;
    keyPair?: string;
    securityGroupIds: string[];
    volumeSizeGb?: number;
    buildThreads?: number;                 // Recorded on the instances as a tag
}

export interface SpotInstanceRequest extends InstanceRequest {
    maxPrice: number;
    launchGroup: string;
}

export type SpotRequestState = 'open' | 'active' | 'closed' | 'cancelled' | 'failed' | 'disabled';

export interface SpotRequestStatus {
    requestId: string;
    state: SpotRequestState;
    instanceId?: string;
}

/**
 * ================================================================================
 * REMOTE ACCESS
 * ================================================================================
 */

export interface SshCredential {
    identityFile: string;                  // Private key path, must be mode 400
    user: string;                          // Remote login user
}

export interface NodeFailure {
    host: string;
    role: Role;
    message: string;
}

export interface BootstrapReport {
    delivered: string[];                   // Hosts that received the key and config
    failures: NodeFailure[];
    hostfile: string[];                    // Lines written to the hostfile
}
