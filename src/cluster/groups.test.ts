import { launchGroupName, roleForGroup, roleGroupName } from './groups';

describe('group resolver', () => {
    it('names the three role groups after the cluster', () => {
        expect(roleGroupName('demo', 'master')).toBe('demo-master');
        expect(roleGroupName('demo', 'worker')).toBe('demo-slaves');
        expect(roleGroupName('demo', 'coordinator')).toBe('demo-zoo');
    });

    it('maps group names back to roles', () => {
        expect(roleForGroup('demo', 'demo-slaves')).toBe('worker');
        expect(roleForGroup('demo', 'demo-zoo')).toBe('coordinator');
        expect(roleForGroup('demo', 'other-master')).toBeUndefined();
        expect(roleForGroup('demo', 'demo')).toBeUndefined();
    });

    it('does not confuse clusters whose names share a prefix', () => {
        expect(roleForGroup('demo', 'demo-2-master')).toBeUndefined();
        expect(roleForGroup('demo-2', 'demo-2-master')).toBe('master');
    });

    it('names the spot launch group', () => {
        expect(launchGroupName('demo')).toBe('launch-group-demo');
    });
});
