/**
 * ================================================================================
 * GET-MASTER COMMAND
 * ================================================================================
 *
 * Prints the master's public address as the last line of output:
 * ec2-cluster get-master demo | tail -n 1
 *
 * @license BSD-3-Clause
 */

import { Command } from 'commander';
import { parseClusterName } from '../utils/validation';
import { RawOptions, createContext, handleCommandError, withRegion } from './shared';

export const getMasterCommand = withRegion(new Command('get-master'))
    .description('Print the public address of the master')
    .argument('<cluster-name>', 'Name of the cluster')
    .action(async (rawName: string, options: RawOptions) => {
        try {
            const clusterName = parseClusterName(rawName);
            const { controller } = await createContext(options);
            console.log(await controller.getMaster(clusterName));
        } catch (error) {
            handleCommandError('find master', error);
        }
    });
