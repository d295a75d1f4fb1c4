import { ClusterDiscovery, classifyInstances, clusterStateOf, toInstanceRecord } from './discovery';
import { ClusterNotFoundError, InconsistentClusterError, ProviderError } from '../utils/errors';
import { FakeProviderGateway, instance } from '../__tests__/fakes';

describe('toInstanceRecord', () => {
    it('reads the build thread count from its tag', () => {
        const tagged = instance({ instanceId: 'i-1', tags: { 'cluster-build-threads': '8' } });

        expect(toInstanceRecord(tagged, 'master').buildThreads).toBe(8);
    });

    it('ignores a missing or malformed thread count', () => {
        expect(toInstanceRecord(instance({ instanceId: 'i-1' }), 'master').buildThreads).toBeUndefined();
        expect(
            toInstanceRecord(instance({ instanceId: 'i-2', tags: { 'cluster-build-threads': 'many' } }), 'worker')
                .buildThreads
        ).toBeUndefined();
    });
});

describe('classifyInstances', () => {
    it('puts each active instance into the role of its group', () => {
        const groups = classifyInstances('demo', [
            instance({ instanceId: 'i-1', groupNames: ['demo-master'], privateDns: 'ip-1.internal' }),
            instance({ instanceId: 'i-2', groupNames: ['demo-slaves', 'default'] }),
            instance({ instanceId: 'i-3', groupNames: ['demo-slaves'], state: 'stopped' }),
            instance({ instanceId: 'i-4', groupNames: ['demo-zoo'], state: 'pending' })
        ]);

        expect(groups.master.map((record) => record.instanceId)).toEqual(['i-1']);
        expect(groups.master[0].privateAddress).toBe('ip-1.internal');
        expect(groups.worker.map((record) => record.instanceId)).toEqual(['i-2', 'i-3']);
        expect(groups.coordinator.map((record) => record.role)).toEqual(['coordinator']);
    });

    it('ignores terminated and shutting-down instances', () => {
        const groups = classifyInstances('demo', [
            instance({ instanceId: 'i-1', groupNames: ['demo-master'], state: 'terminated' }),
            instance({ instanceId: 'i-2', groupNames: ['demo-slaves'], state: 'shutting-down' })
        ]);

        expect(groups).toEqual({ master: [], worker: [], coordinator: [] });
    });

    it('rejects an instance in two role groups', () => {
        expect(() =>
            classifyInstances('demo', [
                instance({ instanceId: 'i-9', groupNames: ['demo-master', 'demo-slaves'] })
            ])
        ).toThrow(InconsistentClusterError);
    });

    it('rejects an instance tagged for the cluster but in none of its groups', () => {
        const run = () =>
            classifyInstances('demo', [
                instance({ instanceId: 'i-7', groupNames: ['default'], tags: { 'cluster-name': 'demo' } })
            ]);

        expect(run).toThrow('Instance i-7 is tagged for cluster demo but is in none of its groups');
    });

    it('skips instances that belong to nobody', () => {
        const groups = classifyInstances('demo', [
            instance({ instanceId: 'i-5', groupNames: ['web'] }),
            instance({ instanceId: 'i-6', groupNames: ['other-master'], tags: { 'cluster-name': 'other' } })
        ]);

        expect(groups).toEqual({ master: [], worker: [], coordinator: [] });
    });
});

describe('clusterStateOf', () => {
    const record = (state: 'pending' | 'running' | 'stopped' | 'stopping') => ({
        instanceId: `i-${state}`,
        state,
        role: 'worker' as const
    });

    it('derives the lifecycle state from instance states', () => {
        expect(clusterStateOf({ master: [], worker: [], coordinator: [] })).toBe('absent');
        expect(clusterStateOf({ master: [record('running')], worker: [record('pending')], coordinator: [] }))
            .toBe('provisioning');
        expect(clusterStateOf({ master: [record('stopped')], worker: [record('stopping')], coordinator: [] }))
            .toBe('stopped');
        expect(clusterStateOf({ master: [record('running')], worker: [record('stopped')], coordinator: [] }))
            .toBe('active');
    });
});

describe('ClusterDiscovery', () => {
    let gateway: FakeProviderGateway;
    let discovery: ClusterDiscovery;

    beforeEach(() => {
        gateway = new FakeProviderGateway();
        discovery = new ClusterDiscovery(gateway);
    });

    it('finds a cluster with a master and workers', async () => {
        gateway.instances.push(
            instance({ instanceId: 'i-1', groupNames: ['demo-master'] }),
            instance({ instanceId: 'i-2', groupNames: ['demo-slaves'] })
        );

        const view = await discovery.discover('demo');

        expect(view.clusterName).toBe('demo');
        expect(view.groups.master).toHaveLength(1);
        expect(view.groups.worker).toHaveLength(1);
        expect(view.groups.coordinator).toHaveLength(0);
    });

    it('reports a missing master', async () => {
        gateway.instances.push(instance({ instanceId: 'i-2', groupNames: ['demo-slaves'] }));

        const error = await discovery.discover('demo').catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(ClusterNotFoundError);
        expect(error).toMatchObject({
            missing: ['master'],
            message: 'Could not find master in group demo-master'
        });
    });

    it('reports missing workers', async () => {
        gateway.instances.push(instance({ instanceId: 'i-1', groupNames: ['demo-master'] }));

        await expect(discovery.discover('demo')).rejects.toThrow('Could not find workers in group demo-slaves');
    });

    it('reports a cluster that does not exist', async () => {
        await expect(discovery.discover('demo')).rejects.toMatchObject({
            code: 'NOT_FOUND',
            missing: ['master', 'worker'],
            message: 'Could not find any existing cluster named demo'
        });
    });

    it('wraps listing failures', async () => {
        gateway.failures.listInstances = new Error('throttled');

        await expect(discovery.scan('demo')).rejects.toThrow(ProviderError);
        await expect(discovery.scan('demo')).rejects.toThrow('list-instances failed: throttled');
    });

    it('never mutates', async () => {
        gateway.instances.push(instance({ instanceId: 'i-1', groupNames: ['demo-master'] }));

        await discovery.scan('demo');
        await discovery.discover('demo').catch(() => undefined);

        expect(gateway.mutations()).toEqual([]);
    });
});
