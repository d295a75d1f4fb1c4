/**
 * ================================================================================
 * LAUNCH COMMAND - Cluster Provisioning
 * ================================================================================
 *
 * Launches a new cluster: security groups, workers (on-demand or spot), master
 * and optional coordinators, then waits for the instances and pushes the SSH key,
 * client config and hostfile. `--resume` skips provisioning and only redoes setup
 * on the running cluster; the `resume` command is the same thing.
 *
 * USAGE:
 * ec2-cluster launch demo -s 4 -t m5.xlarge -i ~/.ssh/demo.pem -k demo
 * ec2-cluster launch demo -s 8 --spot-price 0.12 --spot-wait 600 --accept-partial -i key.pem
 * ec2-cluster launch demo --resume -i key.pem
 *
 * //! COST ALERT: instances are billed from the moment they are requested
 *
 * @license BSD-3-Clause
 */

import { Command } from 'commander';
import { logger } from '../utils/logger';
import { buildLaunchPlan, launchOptionsSchema, parseClusterName, parseOptions } from '../utils/validation';
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

async function resumeCluster(clusterName: string, options: RawOptions): Promise<void> {
    const settings = loadEnvironment();
    const credential = loadCredential(options, settings);
    const { controller } = await createContext(options, settings);

    const { view, report } = await controller.resume(clusterName, credential);
    reportBootstrap(report);
    logger.success(`Cluster ${clusterName} is ready; master at ${view.groups.master[0]?.publicAddress ?? 'unknown'}`);
}

export const launchCommand = withIdentityFile(withRegion(new Command('launch')))
    .description('Launch a new cluster, or redo setup of a running one with --resume')
    .argument('<cluster-name>', 'Name of the cluster; prefixes its security groups')
    // Size and instance types
    .option('-s, --slaves <count>', 'Number of worker instances to launch', '1')
    .option('--coordinators <count>', 'Number of coordinator instances to launch', '0')
    .option('-t, --instance-type <type>', 'Instance type of the workers', 'm1.xlarge')
    .option('-m, --master-instance-type <type>', 'Instance type of the master (default: worker type)')
    // Placement and image
    .option('-z, --zone <zone>', 'Availability zone to launch in (default: a random available zone)')
    .option('-a, --ami <ami>', 'Image: "std", "hpc" or a literal image id', 'std')
    .option('-k, --key-pair <name>', 'Key pair to use on instances')
    // Timing and spot capacity
    .option('-w, --wait <seconds>', 'Seconds to wait for nodes to boot once they are running', '120')
    .option('--spot-price <price>', 'Launch workers as spot instances with this maximum hourly price')
    .option('--spot-wait <seconds>', 'Give up on spot grants after this many seconds')
    .option('--accept-partial', 'Continue with the workers granted when --spot-wait runs out')
    .option('--ebs-vol-size <gb>', 'Attach an EBS volume of this size to every instance, deleted on termination')
    .option('--resume', 'Skip provisioning and redo setup of the running cluster')
    .action(async (rawName: string, options: RawOptions) => {
        const timer = logger.timer('launch-command');

        try {
            const clusterName = parseClusterName(rawName);
            const launchOptions = parseOptions(launchOptionsSchema, options);

            if (launchOptions.resume) {
                await resumeCluster(clusterName, options);
                return;
            }

            const plan = buildLaunchPlan(launchOptions);
            const settings = loadEnvironment();
            const credential = loadCredential(options, settings);
            logger.step('INIT', 'Launch command started', { clusterName, plan });

            const { controller, region } = await createContext(options, settings);
            logger.info(`Launching cluster ${clusterName} in ${region}...`);

            const { view, report } = await controller.launch(clusterName, plan, credential);
            reportBootstrap(report);

            logger.success(`Cluster ${clusterName} launched in ${Math.round(timer.end() / 1000)}s`);
            logger.info(`Master: ${view.groups.master[0]?.publicAddress ?? 'unknown'}`);
            logger.info(`Login with: ec2-cluster login ${clusterName} -i ${credential.identityFile}`);
        } catch (error) {
            handleCommandError('launch cluster', error);
        }
    });

export const resumeCommand = withIdentityFile(withRegion(new Command('resume')))
    .description('Redo setup (SSH key, client config, hostfile) on a running cluster')
    .argument('<cluster-name>', 'Name of the cluster')
    .action(async (rawName: string, options: RawOptions) => {
        try {
            await resumeCluster(parseClusterName(rawName), options);
        } catch (error) {
            handleCommandError('resume cluster', error);
        }
    });
