/**
 * ================================================================================
 * STOP COMMAND - Cluster Suspension
 * ================================================================================
 *
 * Stops every instance of a cluster, one provider call per role group. Stopped
 * instances keep their EBS volumes and can be brought back with `start`.
 *
 * USAGE:
 * ec2-cluster stop demo
 * ec2-cluster stop demo --yes
 *
 * //! Nothing happens unless the typed confirmation equals the cluster name
 * //? Stopped instances still incur EBS storage charges
 *
 * @license BSD-3-Clause
 */

import { Command } from 'commander';
import { logger } from '../utils/logger';
import { parseClusterName } from '../utils/validation';
import { confirmationToken } from '../utils/prompts';
import { RawOptions, createContext, handleCommandError, withRegion } from './shared';

export const stopCommand = withRegion(new Command('stop'))
    .description('Stop all instances of a cluster')
    .argument('<cluster-name>', 'Name of the cluster to stop')
    .option('-y, --yes', 'Confirm without prompting')
    .action(async (rawName: string, options: RawOptions) => {
        try {
            const clusterName = parseClusterName(rawName);
            const token = await confirmationToken('stop', clusterName, options.yes === true);
            const { controller } = await createContext(options);

            const outcome = await controller.stop(clusterName, token);
            if (!outcome.performed) {
                logger.info('Stop cancelled');
                return;
            }
            logger.success(`Stopped ${outcome.instanceIds.length} instance(s) of cluster ${clusterName}`);
            logger.info(`Start it again with: ec2-cluster start ${clusterName} -i <identity-file>`);
        } catch (error) {
            handleCommandError('stop cluster', error);
        }
    });
