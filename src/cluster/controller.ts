/**
 * ================================================================================
 * CLUSTER LIFECYCLE CONTROLLER - Action State Machine
 * ================================================================================
 *
 * Drives every operator action against a named cluster. The cluster state is
 * never stored: each action observes it through discovery, checks that the
 * action is legal from there, and then mutates.
 *
 * STATE TRANSITIONS:
 * • Absent → Provisioning → Active          launch
 * • Active → Active                         resume, attach/detach volume, exec
 * • Active → Stopped                        stop (confirmed)
 * • Stopped → Provisioning → Active         start
 * • Active | Stopped → Destroyed            destroy (confirmed)
 *
 * //! stop and destroy without a matching confirmation token do nothing at all
 *
 * @license BSD-3-Clause
 */

import {
    BootstrapReport,
    ClusterState,
    ClusterView,
    InstanceState,
    LaunchPlan,
    ProviderInstance,
    Role,
    ROLES,
    SshCredential
} from '../types';
import { ClusterNotFoundError, ProviderError, RemoteExecutionError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { Clock, systemClock } from '../utils/clock';
import { DEFAULT_BUILD_THREADS } from '../utils/validation';
import { ClusterDiscovery, classifyInstances, clusterStateOf, countInstances } from './discovery';
import { ClusterLauncher } from './launcher';
import { BootstrapDeployer, HOSTFILE_REMOTE_PATH, primaryMaster, publicHost } from './bootstrap';
import { roleForGroup } from './groups';
import type { ProviderGateway } from '../services/provider';
import type { ImageResolver } from '../services/image';
import { RemoteCommand, RemoteExecutor, RemoteResult, runOrThrow } from '../services/remote';

export const DEFAULT_POLL_INTERVAL_MS = 5000;
export const DEFAULT_VOLUME_DEVICE = '/dev/sdh';

//? Start order: workers come up before the master that coordinates them
const START_ORDER: readonly Role[] = ['worker', 'master', 'coordinator'];

const NOT_YET_UP: readonly InstanceState[] = ['pending', 'stopping', 'stopped'];

export interface ControllerOptions {
    clock?: Clock;
    pollIntervalMs?: number;
    spotPollIntervalMs?: number;
    random?: () => number;
}

export interface LaunchOutcome {
    view: ClusterView;
    report: BootstrapReport;
}

export interface MutationOutcome {
    performed: boolean;                    // False when the confirmation did not match
    instanceIds: string[];
}

export interface ClusterStatus {
    state: ClusterState;
    view: ClusterView;
}

export class ClusterController {
    private readonly discovery: ClusterDiscovery;
    private readonly launcher: ClusterLauncher;
    private readonly deployer: BootstrapDeployer;
    private readonly clock: Clock;
    private readonly pollIntervalMs: number;

    constructor(
        private readonly gateway: ProviderGateway,
        private readonly executor: RemoteExecutor,
        images: ImageResolver,
        options: ControllerOptions = {}
    ) {
        this.clock = options.clock ?? systemClock;
        this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
        this.discovery = new ClusterDiscovery(gateway);
        this.launcher = new ClusterLauncher(gateway, this.discovery, images, {
            clock: this.clock,
            spotPollIntervalMs: options.spotPollIntervalMs,
            random: options.random
        });
        this.deployer = new BootstrapDeployer(executor);
    }

    /**
     * ================================================================
     * PROVISIONING ACTIONS
     * ================================================================
     */

    async launch(clusterName: string, plan: LaunchPlan, credential: SshCredential): Promise<LaunchOutcome> {
        logger.step('LAUNCH', `Launching cluster ${clusterName}`, {
            workers: plan.workerCount,
            coordinators: plan.coordinatorCount,
            instanceType: plan.workerInstanceType,
            spot: plan.spot !== undefined
        });

        const launched = await this.launcher.launch(clusterName, plan);
        const view = await this.waitForCluster(launched, plan.waitSeconds);
        const report = await this.deployer.deploy(view, credential, true);
        return { view, report };
    }

    async resume(clusterName: string, credential: SshCredential): Promise<LaunchOutcome> {
        logger.step('RESUME', `Resuming setup of cluster ${clusterName}`);
        const view = await this.discovery.discover(clusterName);
        const report = await this.deployer.deploy(view, credential, true);
        return { view, report };
    }

    async start(clusterName: string, credential: SshCredential, waitSeconds: number): Promise<LaunchOutcome> {
        const stopped = await this.discovery.discover(clusterName);

        for (const role of START_ORDER) {
            const ids = stopped.groups[role].map((record) => record.instanceId);
            if (ids.length === 0) {
                continue;
            }
            logger.info(`Starting ${role} instance(s): ${ids.join(', ')}`);
            await this.call('start-instances', role, () => this.gateway.startInstances(ids));
        }

        const view = await this.waitForCluster(stopped, waitSeconds);
        const report = await this.deployer.deploy(view, credential, false);
        return { view, report };
    }

    /**
     * ================================================================
     * CONFIRMED ACTIONS
     * ================================================================
     */

    async stop(clusterName: string, confirmation?: string): Promise<MutationOutcome> {
        return this.mutateConfirmed(clusterName, confirmation, 'stop-instances', (ids) =>
            this.gateway.stopInstances(ids)
        );
    }

    async destroy(clusterName: string, confirmation?: string): Promise<MutationOutcome> {
        return this.mutateConfirmed(clusterName, confirmation, 'terminate-instances', (ids) =>
            this.gateway.terminateInstances(ids)
        );
    }

    /**
     * ================================================================
     * VOLUMES
     * ================================================================
     */

    async attachVolume(clusterName: string, volumeId: string, device: string = DEFAULT_VOLUME_DEVICE): Promise<string> {
        requireVolumeId(volumeId);
        const view = await this.discovery.discover(clusterName);
        const master = primaryMaster(view);

        logger.info(`Attaching volume ${volumeId} to master ${master.instanceId} at ${device}`);
        await this.call('attach-volume', 'master', () =>
            this.gateway.attachVolume(volumeId, master.instanceId, device)
        );
        return master.instanceId;
    }

    async detachVolume(volumeId: string): Promise<void> {
        requireVolumeId(volumeId);
        logger.info(`Detaching volume ${volumeId}`);
        await this.call('detach-volume', undefined, () => this.gateway.detachVolume(volumeId));
    }

    /**
     * ================================================================
     * INSPECTION AND ACCESS
     * ================================================================
     */

    async getMaster(clusterName: string): Promise<string> {
        const view = await this.discovery.discover(clusterName);
        return publicHost(primaryMaster(view));
    }

    /**
     * Observed state; 'destroyed' when only terminated instances remain in the groups
     */
    async observe(clusterName: string): Promise<ClusterStatus> {
        let instances: ProviderInstance[];
        try {
            instances = await this.gateway.listInstances();
        } catch (error) {
            throw new ProviderError('list-instances', error);
        }

        const groups = classifyInstances(clusterName, instances);
        let state = clusterStateOf(groups);
        if (state === 'absent') {
            const leftovers = instances.some((instance) =>
                instance.groupNames.some((group) => roleForGroup(clusterName, group) !== undefined)
            );
            if (leftovers) {
                state = 'destroyed';
            }
        }
        return { state, view: { clusterName, groups } };
    }

    async status(clusterName: string): Promise<ClusterStatus> {
        return this.observe(clusterName);
    }

    /**
     * Interactive shell on the master, optionally with a SOCKS proxy
     */
    async login(clusterName: string, credential: SshCredential, proxy?: string): Promise<void> {
        const host = await this.getMaster(clusterName);
        logger.info(`Logging into master ${host}...`);

        const exitCode = await this.executor.interactive(host, credential, { proxy });
        if (exitCode !== 0) {
            throw new RemoteExecutionError(host, exitCode, '', `SSH session to ${host} ended with exit code ${exitCode}`);
        }
    }

    /**
     * Run an opaque job script on the master with the cluster layout exported;
     * CLUSTER_THREADS is the build thread count the cluster was launched with
     */
    async exec(clusterName: string, credential: SshCredential, script: string): Promise<RemoteResult> {
        const view = await this.discovery.discover(clusterName);
        const master = primaryMaster(view);
        const host = publicHost(master);

        const command = RemoteCommand.shell(script).withEnv({
            CLUSTER_HOSTFILE: HOSTFILE_REMOTE_PATH,
            CLUSTER_NODES: String(view.groups.master.length + view.groups.worker.length),
            CLUSTER_THREADS: String(master.buildThreads ?? DEFAULT_BUILD_THREADS)
        });

        logger.info(`Running job on master ${host}`);
        logger.debug('Remote job', { command: command.render() });
        return runOrThrow(this.executor, host, credential, command);
    }

    /**
     * ================================================================
     * INTERNALS
     * ================================================================
     */

    private async mutateConfirmed(
        clusterName: string,
        confirmation: string | undefined,
        step: 'stop-instances' | 'terminate-instances',
        mutate: (ids: string[]) => Promise<void>
    ): Promise<MutationOutcome> {
        if (confirmation !== clusterName) {
            logger.warn(`Confirmation did not match cluster name ${clusterName}; nothing was changed`);
            return { performed: false, instanceIds: [] };
        }

        const groups = await this.discovery.scan(clusterName);
        if (countInstances(groups) === 0) {
            throw new ClusterNotFoundError(
                clusterName,
                ['master', 'worker'],
                `Could not find any existing cluster named ${clusterName}`
            );
        }

        const instanceIds: string[] = [];
        for (const role of ROLES) {
            const ids = groups[role].map((record) => record.instanceId);
            if (ids.length === 0) {
                continue;
            }
            logger.info(`${step === 'stop-instances' ? 'Stopping' : 'Terminating'} ${role} instance(s): ${ids.join(', ')}`);
            await this.call(step, role, () => mutate(ids));
            instanceIds.push(...ids);
        }
        return { performed: true, instanceIds };
    }

    /**
     * Poll until every tracked instance has left pending (or stopped, after a
     * start), settle, then rediscover
     */
    private async waitForCluster(tracked: ClusterView, waitSeconds: number): Promise<ClusterView> {
        const ids = new Set(ROLES.flatMap((role) => tracked.groups[role].map((record) => record.instanceId)));
        const spinner = logger.spinner(`Waiting for ${ids.size} instance(s) to start up...`);

        while (true) {
            await this.clock.sleep(this.pollIntervalMs);

            let instances: ProviderInstance[];
            try {
                instances = await this.gateway.listInstances();
            } catch (error) {
                spinner.fail('Could not read instance states');
                throw new ProviderError('list-instances', error);
            }

            const seen = instances.filter((instance) => ids.has(instance.instanceId));
            const pending = seen.filter((instance) => NOT_YET_UP.includes(instance.state)).length;
            if (seen.length === ids.size && pending === 0) {
                break;
            }
            spinner.text = `${pending + ids.size - seen.length} of ${ids.size} instance(s) still starting`;
        }

        spinner.succeed('All instances left the pending state');
        if (waitSeconds > 0) {
            logger.info(`Waiting ${waitSeconds}s for instances to finish booting`);
            await this.clock.sleep(waitSeconds * 1000);
        }
        return this.discovery.discover(tracked.clusterName);
    }

    private async call(step: string, role: Role | undefined, action: () => Promise<void>): Promise<void> {
        try {
            await action();
        } catch (error) {
            throw new ProviderError(step, error, role);
        }
    }
}

function requireVolumeId(volumeId: string): void {
    if (volumeId.trim() === '') {
        throw new ValidationError('A volume id is required');
    }
}
