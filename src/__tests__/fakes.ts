/**
 * In-process stand-ins for the provider gateway, the remote executor and the
 * clock, shared by the cluster tests.
 */

import { promises as fs } from 'fs';
import type {
    InstanceRequest,
    InstanceState,
    ProviderInstance,
    ResolvedIngressRule,
    Role,
    SecurityGroup,
    SpotInstanceRequest,
    SpotRequestStatus,
    SshCredential
} from '../types';
import type { ProviderGateway } from '../services/provider';
import type { ImageResolver } from '../services/image';
import type { InteractiveOptions, RemoteCommand, RemoteExecutor, RemoteResult } from '../services/remote';
import type { Clock } from '../utils/clock';
import { BUILD_THREADS_TAG, CLUSTER_TAG, ROLE_TAG } from '../cluster/groups';
import { RemoteExecutionError } from '../utils/errors';

export const MUTATING_METHODS = [
    'createSecurityGroup',
    'authorizeIngress',
    'runInstances',
    'requestSpotInstances',
    'cancelSpotRequests',
    'tagInstances',
    'startInstances',
    'stopInstances',
    'terminateInstances',
    'attachVolume',
    'detachVolume'
] as const;

export type GatewayMethod = keyof ProviderGateway;

export interface GatewayCall {
    method: GatewayMethod;
    args: unknown[];
}

interface SpotRequestRecord {
    requestId: string;
    request: SpotInstanceRequest;
    instanceId?: string;
    cancelled?: boolean;
}

function tagsFor(request: InstanceRequest): Record<string, string> {
    const tags: Record<string, string> = { [CLUSTER_TAG]: request.clusterName, [ROLE_TAG]: request.role };
    if (request.buildThreads !== undefined) {
        tags[BUILD_THREADS_TAG] = String(request.buildThreads);
    }
    return tags;
}

export function instance(overrides: Partial<ProviderInstance> & { instanceId: string }): ProviderInstance {
    return {
        state: 'running',
        groupNames: [],
        tags: {},
        ...overrides
    };
}

/**
 * In-memory EC2. Created and started instances report 'pending' on the next
 * listing and 'running' on every listing after that.
 */
export class FakeProviderGateway implements ProviderGateway {
    instances: ProviderInstance[] = [];
    securityGroups: SecurityGroup[] = [];
    calls: GatewayCall[] = [];
    runRequests: InstanceRequest[] = [];
    spotRequestsMade: SpotInstanceRequest[] = [];
    knownImages = new Set<string>(['ami-test']);
    zones: string[] = ['us-west-2a', 'us-west-2b', 'us-west-2c'];
    spotGrantLimit = Number.POSITIVE_INFINITY;
    failures: Partial<Record<GatewayMethod, Error>> = {};

    private counter = 0;
    private readonly spotRequests: SpotRequestRecord[] = [];

    mutations(): GatewayCall[] {
        const mutating: readonly string[] = MUTATING_METHODS;
        return this.calls.filter((call) => mutating.includes(call.method));
    }

    callsTo(method: GatewayMethod): GatewayCall[] {
        return this.calls.filter((call) => call.method === method);
    }

    stateOf(instanceId: string): InstanceState | undefined {
        return this.instances.find((candidate) => candidate.instanceId === instanceId)?.state;
    }

    async listInstances(): Promise<ProviderInstance[]> {
        this.record('listInstances', []);
        const snapshot = this.instances.map((item) => ({ ...item, groupNames: [...item.groupNames] }));
        for (const item of this.instances) {
            if (item.state === 'pending') {
                item.state = 'running';
            }
        }
        return snapshot;
    }

    async listSecurityGroups(): Promise<SecurityGroup[]> {
        this.record('listSecurityGroups', []);
        return this.securityGroups.map((group) => ({ ...group }));
    }

    async createSecurityGroup(name: string, description: string): Promise<SecurityGroup> {
        this.record('createSecurityGroup', [name, description]);
        const group = { groupId: `sg-${++this.counter}`, name, ruleCount: 0 };
        this.securityGroups.push(group);
        return { ...group };
    }

    async authorizeIngress(group: SecurityGroup, rule: ResolvedIngressRule): Promise<void> {
        this.record('authorizeIngress', [group.name, rule]);
        const stored = this.securityGroups.find((candidate) => candidate.groupId === group.groupId);
        if (stored) {
            stored.ruleCount += 1;
        }
    }

    async runInstances(request: InstanceRequest): Promise<ProviderInstance[]> {
        this.record('runInstances', [request]);
        this.runRequests.push(request);
        const created: ProviderInstance[] = [];
        for (let i = 0; i < request.count; i++) {
            created.push(this.createInstance(request));
        }
        return created.map((item) => ({ ...item }));
    }

    async requestSpotInstances(request: SpotInstanceRequest): Promise<string[]> {
        this.record('requestSpotInstances', [request]);
        this.spotRequestsMade.push(request);
        const ids: string[] = [];
        for (let i = 0; i < request.count; i++) {
            const requestId = `sir-${++this.counter}`;
            this.spotRequests.push({ requestId, request });
            ids.push(requestId);
        }
        return ids;
    }

    async pollSpotRequests(requestIds: string[]): Promise<SpotRequestStatus[]> {
        this.record('pollSpotRequests', [requestIds]);
        return this.spotRequests
            .filter((spot) => requestIds.includes(spot.requestId))
            .map((spot, index): SpotRequestStatus => {
                if (spot.cancelled && !spot.instanceId) {
                    return { requestId: spot.requestId, state: 'cancelled' };
                }
                if (index >= this.spotGrantLimit) {
                    return { requestId: spot.requestId, state: 'open' };
                }
                if (!spot.instanceId) {
                    spot.instanceId = this.createInstance({ ...spot.request, count: 1 }, false).instanceId;
                }
                return { requestId: spot.requestId, state: 'active', instanceId: spot.instanceId };
            });
    }

    async cancelSpotRequests(requestIds: string[]): Promise<void> {
        this.record('cancelSpotRequests', [requestIds]);
        for (const spot of this.spotRequests) {
            if (requestIds.includes(spot.requestId)) {
                spot.cancelled = true;
            }
        }
    }

    async tagInstances(instanceIds: string[], request: InstanceRequest): Promise<void> {
        this.record('tagInstances', [instanceIds, request]);
        for (const item of this.instances) {
            if (instanceIds.includes(item.instanceId)) {
                item.tags = { ...item.tags, ...tagsFor(request) };
            }
        }
    }

    async startInstances(instanceIds: string[]): Promise<void> {
        this.record('startInstances', [instanceIds]);
        this.transition(instanceIds, 'pending');
    }

    async stopInstances(instanceIds: string[]): Promise<void> {
        this.record('stopInstances', [instanceIds]);
        this.transition(instanceIds, 'stopped');
    }

    async terminateInstances(instanceIds: string[]): Promise<void> {
        this.record('terminateInstances', [instanceIds]);
        this.transition(instanceIds, 'terminated');
    }

    async attachVolume(volumeId: string, instanceId: string, device: string): Promise<void> {
        this.record('attachVolume', [volumeId, instanceId, device]);
    }

    async detachVolume(volumeId: string): Promise<void> {
        this.record('detachVolume', [volumeId]);
    }

    async listZones(): Promise<string[]> {
        this.record('listZones', []);
        return [...this.zones];
    }

    async imageExists(imageId: string): Promise<boolean> {
        this.record('imageExists', [imageId]);
        return this.knownImages.has(imageId);
    }

    private record(method: GatewayMethod, args: unknown[]): void {
        this.calls.push({ method, args });
        const failure = this.failures[method];
        if (failure) {
            throw failure;
        }
    }

    //? Spot grants arrive untagged, as on EC2
    private createInstance(request: InstanceRequest, tagged = true): ProviderInstance {
        const n = ++this.counter;
        const group = this.securityGroups.find((candidate) => request.securityGroupIds.includes(candidate.groupId));
        const created: ProviderInstance = {
            instanceId: `i-${String(n).padStart(4, '0')}`,
            state: 'pending',
            instanceType: request.instanceType,
            publicDns: `ec2-${n}.compute.example.com`,
            privateDns: `ip-10-0-0-${n}.internal`,
            privateIp: `10.0.0.${n}`,
            groupNames: group ? [group.name] : [],
            tags: tagged ? tagsFor(request) : {}
        };
        this.instances.push(created);
        return created;
    }

    private transition(instanceIds: string[], state: InstanceState): void {
        for (const item of this.instances) {
            if (instanceIds.includes(item.instanceId)) {
                item.state = state;
            }
        }
    }
}

export interface RunRecord {
    host: string;
    command: string;
}

export interface CopyRecord {
    host: string;
    localPath: string;
    remotePath: string;
    content?: string;
}

/**
 * Records every remote call; hosts in failingHosts refuse connections
 */
export class FakeRemoteExecutor implements RemoteExecutor {
    runs: RunRecord[] = [];
    copies: CopyRecord[] = [];
    sessions: { host: string; options?: InteractiveOptions }[] = [];
    failingHosts = new Set<string>();
    runResult: RemoteResult = { exitCode: 0, stdout: '', stderr: '' };
    sessionExitCode = 0;

    async run(host: string, _credential: SshCredential, command: RemoteCommand): Promise<RemoteResult> {
        this.runs.push({ host, command: command.render() });
        if (this.failingHosts.has(host)) {
            return { exitCode: 255, stdout: '', stderr: `ssh: connect to host ${host} port 22: Connection refused` };
        }
        return { ...this.runResult };
    }

    async copy(host: string, _credential: SshCredential, localPath: string, remotePath: string): Promise<void> {
        const content = await fs.readFile(localPath, 'utf8').catch(() => undefined);
        this.copies.push({ host, localPath, remotePath, content });
        if (this.failingHosts.has(host)) {
            throw new RemoteExecutionError(host, 1, 'lost connection', `Copying ${localPath} to ${host}:${remotePath} failed`);
        }
    }

    async interactive(host: string, _credential: SshCredential, options?: InteractiveOptions): Promise<number> {
        this.sessions.push({ host, options });
        return this.sessionExitCode;
    }
}

/**
 * Clock whose sleep advances time instantly
 */
export class FakeClock implements Clock {
    time = 0;
    sleeps: number[] = [];

    now(): number {
        return this.time;
    }

    async sleep(ms: number): Promise<void> {
        this.sleeps.push(ms);
        this.time += ms;
    }
}

export const staticImages: ImageResolver = {
    resolve: async (selector: string) => (selector === 'std' || selector === 'hpc' ? 'ami-test' : selector)
};

export const TEST_CREDENTIAL: SshCredential = { identityFile: '/tmp/test-key.pem', user: 'ubuntu' };

/**
 * Seed a running cluster directly into the fake, returning instance ids by role
 */
export function seedCluster(
    gateway: FakeProviderGateway,
    clusterName: string,
    counts: Record<Role, number>,
    state: InstanceState = 'running'
): Record<Role, string[]> {
    const suffix: Record<Role, string> = { master: 'master', worker: 'slaves', coordinator: 'zoo' };
    const ids: Record<Role, string[]> = { master: [], worker: [], coordinator: [] };
    let n = 100;
    for (const role of ['master', 'worker', 'coordinator'] as const) {
        for (let i = 0; i < counts[role]; i++) {
            n += 1;
            const instanceId = `i-seed${n}`;
            gateway.instances.push({
                instanceId,
                state,
                publicDns: `ec2-${n}.compute.example.com`,
                privateDns: `ip-10-1-0-${n}.internal`,
                groupNames: [`${clusterName}-${suffix[role]}`],
                tags: { [CLUSTER_TAG]: clusterName }
            });
            ids[role].push(instanceId);
        }
    }
    return ids;
}

export function quietConsole(): void {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
}
