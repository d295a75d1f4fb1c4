/**
 * ================================================================================
 * START COMMAND - Cluster Restart
 * ================================================================================
 *
 * Starts a stopped cluster (workers, then master, then coordinators), waits for
 * the instances and delivers a fresh hostfile. Private addresses may change on
 * restart, so the hostfile is always rewritten; the SSH key is already in place.
 *
 * USAGE:
 * ec2-cluster start demo -i ~/.ssh/demo.pem
 *
 * //? Public addresses change on restart; use get-master for the new one
 *
 * @license BSD-3-Clause
 */

import { Command } from 'commander';
import { logger } from '../utils/logger';
import { parseClusterName, parseOptions, startOptionsSchema } from '../utils/validation';
import { loadEnvironment } from '../config/settings';
import {
    RawOptions,
    createContext,
    handleCommandError,
    loadCredential,
    reportBootstrap,
    withIdentityFile,
    withRegion
} from './shared';

export const startCommand = withIdentityFile(withRegion(new Command('start')))
    .description('Start a stopped cluster and refresh its hostfile')
    .argument('<cluster-name>', 'Name of the cluster to start')
    .option('-w, --wait <seconds>', 'Seconds to wait for nodes to boot once they are running', '120')
    .action(async (rawName: string, options: RawOptions) => {
        try {
            const clusterName = parseClusterName(rawName);
            const { wait } = parseOptions(startOptionsSchema, options);
            const settings = loadEnvironment();
            const credential = loadCredential(options, settings);
            const { controller } = await createContext(options, settings);

            logger.info(`Starting cluster ${clusterName}...`);
            const { view, report } = await controller.start(clusterName, credential, wait);
            reportBootstrap(report);

            logger.success(`Cluster ${clusterName} started`);
            logger.info(`Master: ${view.groups.master[0]?.publicAddress ?? 'unknown'}`);
        } catch (error) {
            handleCommandError('start cluster', error);
        }
    });
