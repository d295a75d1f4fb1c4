/**
 * ================================================================================
 * DESTROY COMMAND - Cluster Termination
 * ================================================================================
 *
 * Terminates every instance of a cluster. Security groups are left in place and
 * are reused by the next launch under the same name.
 *
 * USAGE:
 * ec2-cluster destroy demo
 *
 * //! DANGER: terminated instances and their instance volumes cannot be recovered
 *
 * @license BSD-3-Clause
 */

import { Command } from 'commander';
import { logger } from '../utils/logger';
import { parseClusterName } from '../utils/validation';
import { confirmationToken } from '../utils/prompts';
import { RawOptions, createContext, handleCommandError, withRegion } from './shared';

export const destroyCommand = withRegion(new Command('destroy'))
    .description('Terminate all instances of a cluster')
    .argument('<cluster-name>', 'Name of the cluster to destroy')
    .option('-y, --yes', 'Confirm without prompting')
    .action(async (rawName: string, options: RawOptions) => {
        try {
            const clusterName = parseClusterName(rawName);
            const token = await confirmationToken('destroy', clusterName, options.yes === true);
            const { controller } = await createContext(options);

            const outcome = await controller.destroy(clusterName, token);
            if (!outcome.performed) {
                logger.info('Destroy cancelled');
                return;
            }
            logger.success(`Terminated ${outcome.instanceIds.length} instance(s) of cluster ${clusterName}`);
        } catch (error) {
            handleCommandError('destroy cluster', error);
        }
    });
