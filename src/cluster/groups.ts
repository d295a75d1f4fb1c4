/**
 * ================================================================================
 * GROUP RESOLVER - Role Group Naming
 * ================================================================================
 *
 * Maps a cluster name and role to the security group that namespaces the role's
 * instances, and back.
 *
 * @license BSD-3-Clause
 */

import { ROLES, Role } from '../types';

const GROUP_SUFFIX: Record<Role, string> = {
    master: 'master',
    worker: 'slaves',
    coordinator: 'zoo'
};

//? Tag written on every instance launched into a cluster
export const CLUSTER_TAG = 'cluster-name';
export const ROLE_TAG = 'cluster-role';

//? Build thread count chosen at launch, read back by exec
export const BUILD_THREADS_TAG = 'cluster-build-threads';

export function roleGroupName(clusterName: string, role: Role): string {
    return `${clusterName}-${GROUP_SUFFIX[role]}`;
}

export function roleForGroup(clusterName: string, groupName: string): Role | undefined {
    return ROLES.find((role) => roleGroupName(clusterName, role) === groupName);
}

export function launchGroupName(clusterName: string): string {
    return `launch-group-${clusterName}`;
}
