/**
 * ================================================================================
 * STATUS COMMAND - Observed Cluster State
 * ================================================================================
 *
 * Shows the lifecycle state derived from the provider and every instance by role.
 * Read-only; works for clusters in any state, including partial ones.
 *
 * USAGE:
 * ec2-cluster status demo
 *
 * @license BSD-3-Clause
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ROLES } from '../types';
import type { ClusterState } from '../types';
import { roleGroupName } from '../cluster/groups';
import { parseClusterName } from '../utils/validation';
import { RawOptions, createContext, handleCommandError, withRegion } from './shared';

const STATE_COLORS: Record<ClusterState, (text: string) => string> = {
    absent: chalk.gray,
    provisioning: chalk.yellow,
    active: chalk.green,
    stopped: chalk.blue,
    destroyed: chalk.red
};

export const statusCommand = withRegion(new Command('status'))
    .description('Show the state and instances of a cluster')
    .argument('<cluster-name>', 'Name of the cluster')
    .action(async (rawName: string, options: RawOptions) => {
        try {
            const clusterName = parseClusterName(rawName);
            const { controller } = await createContext(options);
            const { state, view } = await controller.status(clusterName);

            console.log(`${chalk.bold(clusterName)}: ${STATE_COLORS[state](state)}`);
            for (const role of ROLES) {
                const records = view.groups[role];
                if (records.length === 0) {
                    continue;
                }
                console.log(chalk.bold(`\n${role} (${roleGroupName(clusterName, role)})`));
                for (const record of records) {
                    console.log(
                        `  ${record.instanceId}  ${record.state.padEnd(8)}  ${record.instanceType ?? '-'}  ` +
                        `${record.publicAddress ?? '-'}  ${record.privateAddress ?? '-'}`
                    );
                }
            }
        } catch (error) {
            handleCommandError('read cluster status', error);
        }
    });
