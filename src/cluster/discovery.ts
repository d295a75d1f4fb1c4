/**
 * ================================================================================
 * CLUSTER DISCOVERY - Role Classification of Active Instances
 * ================================================================================
 *
 * Rebuilds a ClusterView from the provider on every call. An active instance is
 * classified only when its security groups map to exactly one of the cluster's
 * three role groups; anything ambiguous is an error, never a guess.
 *
 * //! IMPORTANT: views are never cached across actions
 *
 * @license BSD-3-Clause
 */

import { ClusterState, ClusterView, InstanceRecord, ProviderInstance, Role, RoleGroups, ROLES, isActive } from '../types';
import { ClusterNotFoundError, InconsistentClusterError, ProviderError } from '../utils/errors';
import { logger } from '../utils/logger';
import { BUILD_THREADS_TAG, CLUSTER_TAG, roleForGroup, roleGroupName } from './groups';
import type { ProviderGateway } from '../services/provider';

function buildThreadsOf(instance: ProviderInstance): number | undefined {
    const value = instance.tags[BUILD_THREADS_TAG];
    if (value === undefined || !/^[1-9]\d*$/.test(value)) {
        return undefined;
    }
    return Number(value);
}

export function toInstanceRecord(instance: ProviderInstance, role: Role): InstanceRecord {
    return {
        instanceId: instance.instanceId,
        state: instance.state,
        role,
        instanceType: instance.instanceType,
        publicAddress: instance.publicDns || undefined,
        privateAddress: instance.privateDns || instance.privateIp || undefined,
        buildThreads: buildThreadsOf(instance)
    };
}

export function emptyGroups(): Record<Role, InstanceRecord[]> {
    return { master: [], worker: [], coordinator: [] };
}

export function countInstances(groups: RoleGroups): number {
    return ROLES.reduce((total, role) => total + groups[role].length, 0);
}

/**
 * Classify provider instances into the three role groups of a cluster
 *
 * @throws InconsistentClusterError when an active instance maps to several roles,
 *         or carries the cluster tag while mapping to none
 */
export function classifyInstances(clusterName: string, instances: ProviderInstance[]): RoleGroups {
    const groups = emptyGroups();

    for (const instance of instances) {
        if (!isActive(instance.state)) {
            continue;
        }

        const roles = new Set<Role>();
        for (const groupName of instance.groupNames) {
            const role = roleForGroup(clusterName, groupName);
            if (role) {
                roles.add(role);
            }
        }

        if (roles.size > 1) {
            throw new InconsistentClusterError(
                clusterName,
                instance.instanceId,
                instance.groupNames,
                `Instance ${instance.instanceId} belongs to several groups of cluster ${clusterName}: ` +
                [...roles].map((role) => roleGroupName(clusterName, role)).join(', ')
            );
        }

        const [role] = [...roles];
        if (!role) {
            if (instance.tags[CLUSTER_TAG] === clusterName) {
                throw new InconsistentClusterError(
                    clusterName,
                    instance.instanceId,
                    instance.groupNames,
                    `Instance ${instance.instanceId} is tagged for cluster ${clusterName} but is in none of its groups`
                );
            }
            continue;
        }

        groups[role].push(toInstanceRecord(instance, role));
    }

    return groups;
}

/**
 * Observed lifecycle state of a set of role groups
 */
export function clusterStateOf(groups: RoleGroups): ClusterState {
    const records = ROLES.flatMap((role) => groups[role]);
    if (records.length === 0) {
        return 'absent';
    }
    if (records.some((record) => record.state === 'pending')) {
        return 'provisioning';
    }
    if (records.every((record) => record.state === 'stopped' || record.state === 'stopping')) {
        return 'stopped';
    }
    return 'active';
}

export class ClusterDiscovery {
    constructor(private readonly gateway: ProviderGateway) { }

    /**
     * Classified groups of a cluster, possibly all empty
     */
    async scan(clusterName: string): Promise<RoleGroups> {
        logger.debug(`Searching for existing cluster ${clusterName}`);

        let instances: ProviderInstance[];
        try {
            instances = await this.gateway.listInstances();
        } catch (error) {
            throw new ProviderError('list-instances', error);
        }

        const groups = classifyInstances(clusterName, instances);
        logger.debug('Cluster scan complete', {
            clusterName,
            masters: groups.master.length,
            workers: groups.worker.length,
            coordinators: groups.coordinator.length
        });
        return groups;
    }

    /**
     * View of an existing cluster with at least one master and one worker
     *
     * @throws ClusterNotFoundError naming the empty group(s)
     */
    async discover(clusterName: string): Promise<ClusterView> {
        const groups = await this.scan(clusterName);
        const hasMaster = groups.master.length > 0;
        const hasWorkers = groups.worker.length > 0;

        if (hasMaster && hasWorkers) {
            logger.info(
                `Found ${groups.master.length} master(s), ${groups.worker.length} worker(s), ` +
                `${groups.coordinator.length} coordinator(s)`
            );
            return { clusterName, groups };
        }

        if (!hasMaster && hasWorkers) {
            throw new ClusterNotFoundError(
                clusterName,
                ['master'],
                `Could not find master in group ${roleGroupName(clusterName, 'master')}`
            );
        }
        if (hasMaster && !hasWorkers) {
            throw new ClusterNotFoundError(
                clusterName,
                ['worker'],
                `Could not find workers in group ${roleGroupName(clusterName, 'worker')}`
            );
        }
        throw new ClusterNotFoundError(
            clusterName,
            ['master', 'worker'],
            `Could not find any existing cluster named ${clusterName}`
        );
    }
}
