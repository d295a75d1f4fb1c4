/**
 * ================================================================================
 * CLUSTER LAUNCHER - Security Groups and Instance Provisioning
 * ================================================================================
 *
 * Provisions a cluster that does not exist yet:
 *
 * WORKFLOW STEPS:
 * 1. Exclusivity Check - Refuse when any role group has active instances
 * 2. Security Groups - Create missing groups, install rules into empty ones
 * 3. Placement - Resolve the image selector, pick a random zone when none is given
 * 4. Workers - Spot request with grant polling, or one on-demand request;
 *    requests still open when the wait budget runs out are cancelled
 * 5. Master - Exactly one instance
 * 6. Coordinators - Only when a coordinator count is requested
 *
 * //! No rollback: a failure after step 2 leaves a partial cluster behind and the
 * //! error names the step and role that failed
 *
 * @license BSD-3-Clause
 */

import {
    ClusterView,
    InstanceRequest,
    LaunchPlan,
    ProviderInstance,
    Role,
    ROLES,
    SecurityGroup,
    SpotInstanceRequest,
    SpotOptions,
    SpotRequestStatus
} from '../types';
import { AlreadyExistsError, ImageResolutionError, PartialGrantError, ProviderError } from '../utils/errors';
import { logger } from '../utils/logger';
import { Clock, systemClock } from '../utils/clock';
import { ClusterDiscovery, countInstances, toInstanceRecord } from './discovery';
import { launchGroupName, roleGroupName } from './groups';
import { SECURITY_GROUP_SPECS } from './security-rules';
import type { ProviderGateway } from '../services/provider';
import type { ImageResolver } from '../services/image';

export const DEFAULT_SPOT_POLL_INTERVAL_MS = 10000;

/**
 * Ensure the three role groups exist and carry their ingress rules
 *
 * Rules are installed only into groups that have none, so calling this again on
 * populated groups performs no authorization calls.
 */
export async function ensureSecurityGroups(
    gateway: ProviderGateway,
    clusterName: string
): Promise<Record<Role, SecurityGroup>> {
    let existing: SecurityGroup[];
    try {
        existing = await gateway.listSecurityGroups();
    } catch (error) {
        throw new ProviderError('list-security-groups', error);
    }

    const groups: Partial<Record<Role, SecurityGroup>> = {};
    for (const role of ROLES) {
        const name = roleGroupName(clusterName, role);
        const found = existing.find((group) => group.name === name);
        if (found) {
            groups[role] = found;
            continue;
        }
        logger.info(`Creating security group ${name}`);
        try {
            groups[role] = await gateway.createSecurityGroup(name, `Cluster ${clusterName} ${role} group`);
        } catch (error) {
            throw new ProviderError('create-security-group', error, role);
        }
    }

    const { master, worker, coordinator } = groups;
    if (!master || !worker || !coordinator) {
        throw new ProviderError('create-security-group', new Error('security group missing after creation'));
    }
    const resolved: Record<Role, SecurityGroup> = { master, worker, coordinator };

    for (const role of ROLES) {
        const group = resolved[role];
        if (group.ruleCount > 0) {
            continue;
        }
        logger.debug(`Installing ingress rules for ${group.name}`);
        for (const rule of SECURITY_GROUP_SPECS[role].rules) {
            try {
                await gateway.authorizeIngress(
                    group,
                    rule.kind === 'group' ? { kind: 'group', sourceGroupId: resolved[rule.sourceRole].groupId } : rule
                );
            } catch (error) {
                throw new ProviderError('authorize-ingress', error, role);
            }
        }
    }

    return resolved;
}

export interface LauncherOptions {
    clock?: Clock;
    spotPollIntervalMs?: number;
    random?: () => number;                 // Zone picker source, [0, 1)
}

export class ClusterLauncher {
    private readonly clock: Clock;
    private readonly spotPollIntervalMs: number;
    private readonly random: () => number;

    constructor(
        private readonly gateway: ProviderGateway,
        private readonly discovery: ClusterDiscovery,
        private readonly images: ImageResolver,
        options: LauncherOptions = {}
    ) {
        this.clock = options.clock ?? systemClock;
        this.spotPollIntervalMs = options.spotPollIntervalMs ?? DEFAULT_SPOT_POLL_INTERVAL_MS;
        this.random = options.random ?? Math.random;
    }

    async launch(clusterName: string, plan: LaunchPlan): Promise<ClusterView> {
        const timer = logger.timer('cluster-launch');

        logger.step('LAUNCH_CHECK', 'Checking for running cluster', { clusterName });
        const existing = await this.discovery.scan(clusterName);
        const activeCount = countInstances(existing);
        if (activeCount > 0) {
            throw new AlreadyExistsError(clusterName, activeCount);
        }

        logger.info('Setting up security groups...');
        const groups = await ensureSecurityGroups(this.gateway, clusterName);

        const imageId = await this.resolveImage(plan.imageSelector);
        const zone = plan.zone ?? await this.pickZone();

        const request = (role: Role, count: number, instanceType: string): InstanceRequest => ({
            clusterName,
            role,
            count,
            instanceType,
            imageId,
            zone,
            keyPair: plan.keyPair,
            securityGroupIds: [groups[role].groupId],
            volumeSizeGb: plan.volumeSizeGb,
            buildThreads: plan.buildThreads
        });

        logger.info('Launching instances...');
        const workerRequest = request('worker', plan.workerCount, plan.workerInstanceType);
        const workers = plan.spot
            ? await this.requestSpotWorkers(
                { ...workerRequest, maxPrice: plan.spot.maxPrice, launchGroup: launchGroupName(clusterName) },
                plan.spot
            )
            : await this.runRole(workerRequest, []);
        logger.success(`Launched ${workers.length} worker(s)`);

        const masters = await this.runRole(request('master', 1, plan.masterInstanceType), workers);
        logger.success(`Launched master ${masters.map((instance) => instance.instanceId).join(', ')}`);

        const coordinators = plan.coordinatorCount > 0
            ? await this.runRole(
                request('coordinator', plan.coordinatorCount, plan.workerInstanceType),
                [...workers, ...masters]
            )
            : [];
        if (coordinators.length > 0) {
            logger.success(`Launched ${coordinators.length} coordinator(s)`);
        }

        logger.step('LAUNCH_DONE', 'Instances requested', { clusterName, duration: timer.end() });
        return {
            clusterName,
            groups: {
                master: masters.map((instance) => toInstanceRecord(instance, 'master')),
                worker: workers.map((instance) => toInstanceRecord(instance, 'worker')),
                coordinator: coordinators.map((instance) => toInstanceRecord(instance, 'coordinator'))
            }
        };
    }

    /**
     * @throws ImageResolutionError when the manifest or the image itself is unavailable
     */
    private async resolveImage(selector: string): Promise<string> {
        const imageId = await this.images.resolve(selector);

        let exists: boolean;
        try {
            exists = await this.gateway.imageExists(imageId);
        } catch (error) {
            throw new ProviderError('describe-images', error);
        }
        if (!exists) {
            throw new ImageResolutionError(`Could not find image ${imageId}`);
        }
        return imageId;
    }

    /**
     * Random available zone; all roles land in the same one
     */
    private async pickZone(): Promise<string | undefined> {
        let zones: string[];
        try {
            zones = await this.gateway.listZones();
        } catch (error) {
            throw new ProviderError('describe-availability-zones', error);
        }
        if (zones.length === 0) {
            return undefined;
        }
        const zone = zones[Math.min(Math.floor(this.random() * zones.length), zones.length - 1)];
        logger.debug(`Picked availability zone ${zone}`);
        return zone;
    }

    /**
     * Single on-demand request; created lists instances already launched, for the
     * partial-cluster report on failure
     */
    private async runRole(request: InstanceRequest, created: ProviderInstance[]): Promise<ProviderInstance[]> {
        logger.step('LAUNCH_ROLE', `Requesting ${request.count} ${request.role} instance(s)`, {
            instanceType: request.instanceType,
            zone: request.zone
        });
        try {
            return await this.gateway.runInstances(request);
        } catch (error) {
            this.reportPartialCluster(request.role, created);
            throw new ProviderError('run-instances', error, request.role);
        }
    }

    private async requestSpotWorkers(request: SpotInstanceRequest, spot: SpotOptions): Promise<ProviderInstance[]> {
        logger.info(
            `Requesting ${request.count} workers as spot instances with price $${spot.maxPrice.toFixed(3)}`
        );

        let requestIds: string[];
        try {
            requestIds = await this.gateway.requestSpotInstances(request);
        } catch (error) {
            throw new ProviderError('request-spot-instances', error, 'worker');
        }

        const startedAt = this.clock.now();
        const spinner = logger.spinner('Waiting for spot instances to be granted...');

        while (true) {
            await this.clock.sleep(this.spotPollIntervalMs);

            let statuses: SpotRequestStatus[];
            try {
                statuses = await this.gateway.pollSpotRequests(requestIds);
            } catch (error) {
                spinner.fail('Could not read spot request status');
                throw new ProviderError('describe-spot-requests', error, 'worker');
            }

            const byId = new Map(statuses.map((status) => [status.requestId, status]));
            const grantedIds: string[] = [];
            const openRequestIds: string[] = [];
            for (const requestId of requestIds) {
                const status = byId.get(requestId);
                if (status?.state === 'active' && status.instanceId) {
                    grantedIds.push(status.instanceId);
                } else {
                    openRequestIds.push(requestId);
                }
            }

            if (grantedIds.length === request.count) {
                spinner.succeed(`All ${request.count} workers granted`);
                return this.adoptSpotWorkers(grantedIds, request);
            }

            const elapsedMs = this.clock.now() - startedAt;
            if (spot.waitSeconds !== undefined && elapsedMs >= spot.waitSeconds * 1000) {
                spinner.fail(`${grantedIds.length} of ${request.count} workers granted`);
                await this.cancelOpenRequests(openRequestIds);
                if (spot.acceptPartial && grantedIds.length > 0) {
                    logger.warn(`Continuing with ${grantedIds.length} of ${request.count} requested workers`);
                    return this.adoptSpotWorkers(grantedIds, request);
                }
                throw new PartialGrantError(grantedIds.length, request.count, grantedIds);
            }

            spinner.text = `${grantedIds.length} of ${request.count} workers granted, waiting longer`;
            logger.debug('Spot grant progress', { granted: grantedIds.length, requested: request.count, elapsedMs });
        }
    }

    /**
     * Withdraw requests that were not granted in time, so a late grant cannot add
     * a worker the cluster does not know about
     */
    private async cancelOpenRequests(requestIds: string[]): Promise<void> {
        if (requestIds.length === 0) {
            return;
        }
        logger.info(`Cancelling ${requestIds.length} ungranted spot request(s): ${requestIds.join(', ')}`);
        try {
            await this.gateway.cancelSpotRequests(requestIds);
        } catch (error) {
            throw new ProviderError('cancel-spot-requests', error, 'worker');
        }
    }

    private async adoptSpotWorkers(instanceIds: string[], request: SpotInstanceRequest): Promise<ProviderInstance[]> {
        try {
            await this.gateway.tagInstances(instanceIds, request);
        } catch (error) {
            throw new ProviderError('tag-instances', error, 'worker');
        }
        return this.fetchInstances(instanceIds);
    }

    private async fetchInstances(instanceIds: string[]): Promise<ProviderInstance[]> {
        let instances: ProviderInstance[];
        try {
            instances = await this.gateway.listInstances();
        } catch (error) {
            throw new ProviderError('list-instances', error, 'worker');
        }
        const byId = new Map(instances.map((instance) => [instance.instanceId, instance]));
        return instanceIds.flatMap((id) => {
            const instance = byId.get(id);
            return instance ? [instance] : [];
        });
    }

    private reportPartialCluster(failedRole: Role, created: ProviderInstance[]): void {
        if (created.length === 0) {
            return;
        }
        logger.warn(
            `Provisioning ${failedRole} failed; partial cluster left running: ` +
            created.map((instance) => instance.instanceId).join(', ')
        );
    }
}
