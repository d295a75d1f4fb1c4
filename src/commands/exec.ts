/**
 * ================================================================================
 * EXEC COMMAND - Run a Job on the Master
 * ================================================================================
 *
 * Runs an opaque shell command on the master. The job sees the cluster layout:
 * CLUSTER_HOSTFILE (path of the hostfile in the login directory), CLUSTER_NODES
 * (master plus workers) and CLUSTER_THREADS (build parallelism recorded at launch).
 *
 * USAGE:
 * ec2-cluster exec demo -i key.pem 'mpiexec -n $CLUSTER_NODES -hostfile $CLUSTER_HOSTFILE ./job'
 *
 * @license BSD-3-Clause
 */

import { Command } from 'commander';
import { parseClusterName } from '../utils/validation';
import { loadEnvironment } from '../config/settings';
import { logger } from '../utils/logger';
import {
    RawOptions,
    createContext,
    handleCommandError,
    loadCredential,
    withIdentityFile,
    withRegion
} from './shared';

export const execCommand = withIdentityFile(withRegion(new Command('exec')))
    .description('Run a command on the master with the cluster layout exported')
    .argument('<cluster-name>', 'Name of the cluster')
    .argument('<command>', 'Shell command to run on the master')
    .action(async (rawName: string, script: string, options: RawOptions) => {
        try {
            const clusterName = parseClusterName(rawName);
            const settings = loadEnvironment();
            const credential = loadCredential(options, settings);
            const { controller } = await createContext(options, settings);

            const result = await controller.exec(clusterName, credential, script);
            if (result.stdout) {
                console.log(result.stdout);
            }
            logger.success('Job finished');
        } catch (error) {
            handleCommandError('run job', error);
        }
    });
