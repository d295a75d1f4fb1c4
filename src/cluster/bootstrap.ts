/**
 * ================================================================================
 * BOOTSTRAP DEPLOYER - Initial Configuration Delivery
 * ================================================================================
 *
 * Pushes the shared identity key and SSH client config to the master and every
 * worker so nodes can reach each other without passwords, then delivers the
 * hostfile to the master.
 *
 * //? Key delivery is best-effort per node: one unreachable worker is reported
 * //? and the remaining nodes still receive the key
 * //! The hostfile delivery is not best-effort; failing it fails the deploy
 *
 * @license BSD-3-Clause
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { BootstrapReport, ClusterView, InstanceRecord, NodeFailure, SshCredential } from '../types';
import { RemoteCommand, RemoteExecutor, runOrThrow } from '../services/remote';
import { ValidationError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export const HOSTFILE_REMOTE_PATH = 'machines';
export const SSH_CLIENT_CONFIG = 'StrictHostKeyChecking no\nBatchMode yes\n';

export function primaryMaster(view: ClusterView): InstanceRecord {
    const [master] = view.groups.master;
    if (!master) {
        throw new ValidationError(`Cluster ${view.clusterName} has no master instance`);
    }
    return master;
}

export function publicHost(record: InstanceRecord): string {
    if (!record.publicAddress) {
        throw new ValidationError(`Instance ${record.instanceId} has no public address`);
    }
    return record.publicAddress;
}

/**
 * Hostfile lines: the master's private address first, then each worker's
 */
export function hostfileLines(view: ClusterView): string[] {
    const nodes = [primaryMaster(view), ...view.groups.worker];
    return nodes.map((node) => {
        if (!node.privateAddress) {
            throw new ValidationError(`Instance ${node.instanceId} has no private address`);
        }
        return node.privateAddress;
    });
}

export class BootstrapDeployer {
    constructor(private readonly executor: RemoteExecutor) { }

    async deploy(view: ClusterView, credential: SshCredential, pushKey: boolean): Promise<BootstrapReport> {
        const masterHost = publicHost(primaryMaster(view));
        const hostfile = hostfileLines(view);
        const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ec2-cluster-'));

        try {
            const delivered: string[] = [];
            const failures: NodeFailure[] = [];

            if (pushKey) {
                const configPath = path.join(workDir, 'ssh_config');
                await fs.writeFile(configPath, SSH_CLIENT_CONFIG, { mode: 0o600 });

                const nodes = [primaryMaster(view), ...view.groups.worker];
                const results = await Promise.allSettled(
                    nodes.map((node) => this.pushKey(node, credential, configPath))
                );

                results.forEach((result, index) => {
                    const node = nodes[index];
                    const host = node.publicAddress ?? node.instanceId;
                    if (result.status === 'fulfilled') {
                        delivered.push(host);
                        return;
                    }
                    const message = errorMessage(result.reason);
                    failures.push({ host, role: node.role, message });
                    logger.warn(`Could not deliver SSH key to ${node.role} ${host}: ${message}`);
                });
            }

            logger.info('Copying hostfile to master...');
            const hostfilePath = path.join(workDir, 'machines');
            await fs.writeFile(hostfilePath, hostfile.map((line) => `${line}\n`).join(''));
            await this.executor.copy(masterHost, credential, hostfilePath, HOSTFILE_REMOTE_PATH);

            logger.step('BOOTSTRAP', 'Configuration delivered', {
                master: masterHost,
                delivered: delivered.length,
                failed: failures.length
            });
            return { delivered, failures, hostfile };
        } finally {
            await fs.rm(workDir, { recursive: true, force: true });
        }
    }

    /**
     * Per-node steps, strictly in order: directories, key copy, key install, config copy
     */
    private async pushKey(node: InstanceRecord, credential: SshCredential, configPath: string): Promise<void> {
        const host = publicHost(node);
        logger.info(`Copying SSH key ${credential.identityFile} to ${node.role} node ${host}...`);

        await runOrThrow(this.executor, host, credential, RemoteCommand.of('mkdir', '-p', 'tmp', '.ssh'));
        await this.executor.copy(host, credential, credential.identityFile, 'tmp/id_rsa');
        await runOrThrow(
            this.executor,
            host,
            credential,
            RemoteCommand.of('mv', 'tmp/id_rsa', '.ssh/id_rsa').then('chmod', '600', '.ssh/id_rsa')
        );
        await this.executor.copy(host, credential, configPath, '.ssh/config');
    }
}
