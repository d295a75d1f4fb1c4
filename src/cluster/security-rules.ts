/**
 * Ingress rules per role. Every group admits its peers; from outside only SSH and
 * the role's management and service ports are open.
 *
 * @license BSD-3-Clause
 */

import type { IngressRule, Role, SecurityGroupSpec } from '../types';

const ANYWHERE = '0.0.0.0/0';

function tcp(fromPort: number, toPort: number = fromPort): IngressRule {
    return { kind: 'cidr', protocol: 'tcp', fromPort, toPort, cidr: ANYWHERE };
}

const PEER_RULES: IngressRule[] = [
    { kind: 'group', sourceRole: 'master' },
    { kind: 'group', sourceRole: 'worker' },
    { kind: 'group', sourceRole: 'coordinator' }
];

export const SECURITY_GROUP_SPECS: Record<Role, SecurityGroupSpec> = {
    master: {
        role: 'master',
        rules: [...PEER_RULES, tcp(22), tcp(8080, 8081), tcp(50030), tcp(50070), tcp(60070), tcp(38090)]
    },
    worker: {
        role: 'worker',
        rules: [...PEER_RULES, tcp(22), tcp(8080, 8081), tcp(50060), tcp(50075), tcp(60060), tcp(60075)]
    },
    coordinator: {
        role: 'coordinator',
        rules: [...PEER_RULES, tcp(22), tcp(2181), tcp(2888), tcp(3888)]
    }
};
